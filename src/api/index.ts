/**
 * @fileoverview Public answering API.
 */

export {
  answerQuestion,
  compareProviders,
  prepareGrounding,
  type AnswerDependencies,
  type AnswerRequest,
  type GroundingContext,
  type GroundedAnswer,
  type ProviderOutcome,
  type ProviderComparison,
} from './answer.js';

export {
  RagClient,
  createRagClient,
  type RagClientOverrides,
  type AskOptions,
} from './client.js';
