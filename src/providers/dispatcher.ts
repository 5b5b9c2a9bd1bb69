/**
 * @fileoverview Completion dispatcher
 *
 * One uniform `complete` over every provider schema. Each call builds its
 * request fresh and makes exactly one outbound call; errors surface as soon
 * as they happen, with no retry and no fallback provider.
 */

import { z } from 'zod';
import { PROVIDER_IDS } from '../config/rag_config.js';
import { Errors, type ProviderFailureReason } from '../core/errors.js';
import { safeJsonParse } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';
import { timed, withTimeout, type Timed } from '../utils/async.js';
import { getErrorMessage, getErrorName, toError } from '../utils/errors.js';
import { getProviderSchema, isProviderId, type ProviderSchema } from './schemas.js';
import type {
  CompletionConfig,
  CompletionResult,
  GenerationSettings,
  ModelInvoker,
  ProviderId,
} from './types.js';

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = {
  maxOutputTokens: 512,
  temperature: 0,
};

const CompletionConfigSchema = z.object({
  maxOutputTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(1).optional(),
  modelId: z.string().trim().min(1).optional(),
});

const OPTION_EXPECTATIONS: Record<keyof CompletionConfig, string> = {
  maxOutputTokens: 'a positive integer',
  temperature: 'a number between 0.0 and 1.0',
  modelId: 'a non-empty model id',
};

function isOptionName(name: string): name is keyof CompletionConfig {
  return Object.prototype.hasOwnProperty.call(OPTION_EXPECTATIONS, name);
}

export interface CompletionDispatcherOptions {
  invoker: ModelInvoker;
  defaults?: Partial<GenerationSettings>;
  /** Per-call budget for the model call; 0 or undefined disables it */
  timeoutMs?: number;
}

interface FailureClass {
  reason: ProviderFailureReason;
  retryable: boolean;
}

const FAILURES_BY_ERROR_NAME: Record<string, FailureClass> = {
  TimeoutError: { reason: 'timeout', retryable: true },
  ModelTimeoutException: { reason: 'timeout', retryable: true },
  ThrottlingException: { reason: 'throttled', retryable: true },
  ServiceQuotaExceededException: { reason: 'throttled', retryable: true },
  AccessDeniedException: { reason: 'auth_failed', retryable: false },
  UnrecognizedClientException: { reason: 'auth_failed', retryable: false },
  ExpiredTokenException: { reason: 'auth_failed', retryable: false },
  CredentialsProviderError: { reason: 'auth_failed', retryable: false },
  ValidationException: { reason: 'unavailable', retryable: false },
  ResourceNotFoundException: { reason: 'unavailable', retryable: false },
  ModelNotReadyException: { reason: 'unavailable', retryable: true },
  ServiceUnavailableException: { reason: 'unavailable', retryable: true },
};

function classifyFailure(error: unknown): FailureClass {
  const name = getErrorName(error);
  const known = name !== undefined ? FAILURES_BY_ERROR_NAME[name] : undefined;
  return known ?? { reason: 'network_error', retryable: true };
}

export class CompletionDispatcher {
  private readonly invoker: ModelInvoker;
  private readonly defaults: GenerationSettings;
  private readonly timeoutMs?: number;

  constructor(options: CompletionDispatcherOptions) {
    this.invoker = options.invoker;
    this.defaults = { ...DEFAULT_GENERATION_SETTINGS, ...options.defaults };
    this.timeoutMs = options.timeoutMs;
  }

  get providers(): readonly ProviderId[] {
    return PROVIDER_IDS;
  }

  /**
   * Send `prompt` to `provider` and return the generated text.
   *
   * @throws UnsupportedProviderError before any network call for an unknown provider
   * @throws InvalidRequestError for out-of-range generation options
   * @throws ProviderUnavailableError on transport, auth, throttling or timeout failure
   * @throws MalformedResponseError when the envelope lacks the provider's text field
   */
  async complete(prompt: string, provider: string, config: CompletionConfig = {}): Promise<CompletionResult> {
    if (!isProviderId(provider)) {
      throw Errors.unsupportedProvider(provider, PROVIDER_IDS);
    }
    const schema = getProviderSchema(provider);
    const { settings, modelId } = this.resolve(schema, config);
    const body = JSON.stringify(schema.encode(prompt, settings));

    let invocation: Timed<string>;
    try {
      invocation = await timed(() =>
        withTimeout(this.invoker.invoke({ modelId, body }), this.timeoutMs, {
          context: `invoke ${modelId}`,
        })
      );
    } catch (error) {
      const { reason, retryable } = classifyFailure(error);
      throw Errors.providerUnavailable(
        schema.id,
        modelId,
        reason,
        getErrorMessage(error),
        toError(error),
        retryable
      );
    }

    const { value: raw, latencyMs } = invocation;
    const envelope = safeJsonParse(raw);
    if (!envelope.ok) {
      throw Errors.malformedResponse(schema.id, schema.extractionPath, `body is not JSON (${envelope.error.message})`);
    }
    const text = schema.decode(envelope.value);
    if (!text.ok) {
      throw Errors.malformedResponse(schema.id, schema.extractionPath, text.error);
    }

    logDebug('[dispatcher] completion received', {
      provider: schema.id,
      modelId,
      latencyMs,
      characters: text.value.length,
    });
    return { provider: schema.id, modelId, text: text.value, latencyMs };
  }

  private resolve(
    schema: ProviderSchema,
    config: CompletionConfig
  ): { settings: GenerationSettings; modelId: string } {
    const parsed = CompletionConfigSchema.safeParse(config);
    if (!parsed.success) {
      const field = String(parsed.error.issues[0]?.path[0] ?? '');
      if (isOptionName(field)) {
        throw Errors.invalidRequest(field, OPTION_EXPECTATIONS[field], JSON.stringify(config[field]));
      }
      throw Errors.invalidRequest('config', 'valid completion options', JSON.stringify(config));
    }
    const { maxOutputTokens, temperature, modelId } = parsed.data;
    return {
      settings: {
        maxOutputTokens: maxOutputTokens ?? this.defaults.maxOutputTokens,
        temperature: temperature ?? this.defaults.temperature,
      },
      modelId: modelId ?? schema.defaultModelId,
    };
  }
}
