/**
 * @fileoverview Grounded answers over an Amazon Kendra index
 *
 * Retrieves passages for a question, builds a prompt that confines the model
 * to those passages, and sends it to one of several Bedrock-hosted model
 * families behind a single `complete` call.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createRagClient } from 'kendra-grounded-answers';
 *
 * // KENDRA_INDEX_ID (and optionally AWS_REGION, RAG_*) come from the environment
 * const client = createRagClient();
 *
 * const answer = await client.ask('What are the benefits of using X?', { provider: 'claude' });
 * console.log(answer.completion.text);
 *
 * // Same prompt, several providers at once
 * const comparison = await client.compare('What are the benefits of using X?', ['titan', 'jurassic', 'claude']);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// ANSWERING
// ============================================================================

export {
  answerQuestion,
  compareProviders,
  prepareGrounding,
  RagClient,
  createRagClient,
  type AnswerDependencies,
  type AnswerRequest,
  type GroundingContext,
  type GroundedAnswer,
  type ProviderOutcome,
  type ProviderComparison,
  type RagClientOverrides,
  type AskOptions,
} from './api/index.js';

// ============================================================================
// STAGES
// ============================================================================

export {
  Retriever,
  KendraSearchIndex,
  type Passage,
  type SearchIndex,
  type SearchIndexRequest,
  type SearchIndexItem,
  type SearchIndexResponse,
  type RetrieverOptions,
  type KendraRetrieveClient,
  type KendraRetrieveOutput,
  type KendraSearchIndexOptions,
} from './retrieval/index.js';

export {
  buildPrompt,
  joinPassages,
  createPromptTemplate,
  DEFAULT_PROMPT_TEMPLATE,
  ANSWER_CUE,
  type PromptTemplate,
} from './prompt/index.js';

export {
  CompletionDispatcher,
  BedrockModelInvoker,
  getProviderSchema,
  isProviderId,
  frameClaudePrompt,
  DEFAULT_GENERATION_SETTINGS,
  TITAN_SCHEMA,
  JURASSIC_SCHEMA,
  CLAUDE_SCHEMA,
  type ProviderSchema,
  type CompletionConfig,
  type CompletionResult,
  type CompletionDispatcherOptions,
  type GenerationSettings,
  type ModelInvocation,
  type ModelInvoker,
  type BedrockInvokeClient,
  type BedrockInvokeOutput,
} from './providers/index.js';

// ============================================================================
// CONFIGURATION, ERRORS, LOGGING
// ============================================================================

export {
  loadConfig,
  RagConfigSchema,
  ENV_KEYS,
  PROVIDER_IDS,
  type RagConfig,
  type ProviderId,
} from './config/index.js';

export {
  RagError,
  RetrievalUnavailableError,
  EmptyResultError,
  ProviderUnavailableError,
  MalformedResponseError,
  UnsupportedProviderError,
  InvalidRequestError,
  ConfigurationError,
  isRagError,
  isRecoverable,
  isRetryableError,
  type ErrorJSON,
  type ProviderFailureReason,
  type Result,
} from './core/index.js';

export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';
export { TimeoutError, getErrorMessage } from './utils/index.js';
