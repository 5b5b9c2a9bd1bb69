/**
 * @fileoverview Core infrastructure: Result types and the error hierarchy.
 */

// Result types and helpers
export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
  safeAsync,
  safeSync,
  safeJsonParse,
} from './result.js';

// Error types
export {
  type ErrorJSON,
  RagError,
  RetrievalUnavailableError,
  EmptyResultError,
  ProviderUnavailableError,
  type ProviderFailureReason,
  MalformedResponseError,
  UnsupportedProviderError,
  InvalidRequestError,
  ConfigurationError,
  isRagError,
  isRecoverable,
  isRetryableError,
  Errors,
} from './errors.js';
