/**
 * @fileoverview Provider Module Exports
 *
 * Provider schemas, the Bedrock model invoker and the completion dispatcher.
 *
 * @packageDocumentation
 */

export type {
  ProviderId,
  CompletionConfig,
  CompletionResult,
  GenerationSettings,
  ModelInvocation,
  ModelInvoker,
} from './types.js';

export {
  TITAN_SCHEMA,
  JURASSIC_SCHEMA,
  CLAUDE_SCHEMA,
  HUMAN_TURN,
  ASSISTANT_TURN,
  frameClaudePrompt,
  getProviderSchema,
  isProviderId,
  type ProviderSchema,
  type ProviderSchemaVariant,
  type TitanSchema,
  type JurassicSchema,
  type ClaudeSchema,
  type TitanRequestBody,
  type JurassicRequestBody,
  type ClaudeRequestBody,
} from './schemas.js';

export {
  BedrockModelInvoker,
  type BedrockInvokeClient,
  type BedrockInvokeOutput,
} from './bedrock_invoker.js';

export {
  CompletionDispatcher,
  DEFAULT_GENERATION_SETTINGS,
  type CompletionDispatcherOptions,
} from './dispatcher.js';
