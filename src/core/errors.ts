/**
 * @fileoverview Error hierarchy for the retrieval, prompt and completion stages
 *
 * Every failure the pipeline surfaces is one of these typed errors. Nothing
 * here retries: callers decide what to do with `retryable` and `recoverable`.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class RagError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  /** True when the cycle may continue without the failed stage's output */
  readonly recoverable: boolean = false;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// RETRIEVAL ERRORS
// ============================================================================

export class RetrievalUnavailableError extends RagError {
  readonly code = 'RETRIEVAL_UNAVAILABLE';

  constructor(
    readonly indexId: string,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Search index ${indexId} unavailable: ${message}`);
    this.name = 'RetrievalUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        indexId: this.indexId,
        cause: this.cause?.message,
      },
    };
  }
}

export class EmptyResultError extends RagError {
  readonly code = 'EMPTY_RESULT';
  readonly retryable = false;
  readonly recoverable = true;

  constructor(
    readonly queryText: string,
    readonly page: number,
  ) {
    super(`No passages returned for page ${page} of "${queryText}"`);
    this.name = 'EmptyResultError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        queryText: this.queryText,
        page: this.page,
      },
    };
  }
}

// ============================================================================
// PROVIDER ERRORS
// ============================================================================

export type ProviderFailureReason =
  | 'timeout'
  | 'auth_failed'
  | 'throttled'
  | 'network_error'
  | 'unavailable';

export class ProviderUnavailableError extends RagError {
  readonly code = 'PROVIDER_UNAVAILABLE';

  constructor(
    readonly provider: string,
    readonly modelId: string,
    readonly reason: ProviderFailureReason,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Provider ${provider} (${modelId}) ${reason}: ${message}`);
    this.name = 'ProviderUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        provider: this.provider,
        modelId: this.modelId,
        reason: this.reason,
        cause: this.cause?.message,
      },
    };
  }
}

export class MalformedResponseError extends RagError {
  readonly code = 'MALFORMED_RESPONSE';
  readonly retryable = false;

  constructor(
    readonly provider: string,
    readonly expectedPath: string,
    message: string,
  ) {
    super(`Malformed ${provider} response (expected ${expectedPath}): ${message}`);
    this.name = 'MalformedResponseError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        provider: this.provider,
        expectedPath: this.expectedPath,
      },
    };
  }
}

export class UnsupportedProviderError extends RagError {
  readonly code = 'UNSUPPORTED_PROVIDER';
  readonly retryable = false;

  constructor(
    readonly provider: string,
    readonly supported: readonly string[],
  ) {
    super(`Unsupported provider "${provider}"; expected one of ${supported.join(', ')}`);
    this.name = 'UnsupportedProviderError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        provider: this.provider,
        supported: [...this.supported],
      },
    };
  }
}

// ============================================================================
// INPUT ERRORS
// ============================================================================

export class InvalidRequestError extends RagError {
  readonly code = 'INVALID_REQUEST';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Invalid ${field}: expected ${expected}, got ${received}`);
    this.name = 'InvalidRequestError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

export class ConfigurationError extends RagError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

export function isRecoverable(error: unknown): boolean {
  return error instanceof RagError && error.recoverable;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof RagError) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('econnreset') ||
      message.includes('etimedout') ||
      message.includes('enotfound') ||
      message.includes('socket hang up') ||
      message.includes('network')
    );
  }

  return false;
}

// ============================================================================
// ERROR FACTORY
// ============================================================================

export const Errors = {
  retrievalUnavailable: (indexId: string, message: string, retryable = true, cause?: Error) =>
    new RetrievalUnavailableError(indexId, retryable, message, cause),

  emptyResult: (queryText: string, page: number) =>
    new EmptyResultError(queryText, page),

  providerUnavailable: (
    provider: string,
    modelId: string,
    reason: ProviderFailureReason,
    message: string,
    cause?: Error,
    retryable = reason !== 'auth_failed',
  ) => new ProviderUnavailableError(provider, modelId, reason, retryable, message, cause),

  malformedResponse: (provider: string, expectedPath: string, message: string) =>
    new MalformedResponseError(provider, expectedPath, message),

  unsupportedProvider: (provider: string, supported: readonly string[]) =>
    new UnsupportedProviderError(provider, supported),

  invalidRequest: (field: string, expected: string, received: string) =>
    new InvalidRequestError(field, expected, received),

  config: (key: string, message: string) =>
    new ConfigurationError(key, message),
};
