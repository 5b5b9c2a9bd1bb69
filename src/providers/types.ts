/**
 * @fileoverview Completion provider types
 *
 * A provider is a hosted model family with its own request body and response
 * envelope. The dispatcher only sees the uniform shapes declared here.
 *
 * @packageDocumentation
 */

import type { ProviderId } from '../config/rag_config.js';

export type { ProviderId };

/**
 * Per-call generation options. Anything left out falls back to the
 * dispatcher's defaults.
 */
export interface CompletionConfig {
  /** Caps generation length */
  maxOutputTokens?: number;
  /** Sampling randomness, 0.0–1.0 */
  temperature?: number;
  /** Overrides the provider's default model id */
  modelId?: string;
}

/**
 * Fully resolved generation settings handed to a request encoder
 */
export interface GenerationSettings {
  maxOutputTokens: number;
  temperature: number;
}

/**
 * Provider-specific request, serialized for the wire
 */
export interface ModelInvocation {
  modelId: string;
  body: string;
}

/**
 * Model boundary: sends one request body, returns the raw response body.
 */
export interface ModelInvoker {
  invoke(request: ModelInvocation): Promise<string>;
}

export interface CompletionResult {
  provider: ProviderId;
  modelId: string;
  /** Generated text exactly as the provider returned it */
  text: string;
  latencyMs: number;
}
