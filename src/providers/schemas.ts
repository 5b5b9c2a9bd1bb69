/**
 * @fileoverview Provider schemas
 *
 * One tagged variant per model family, each pairing a request encoder with a
 * response decoder. Callers pick a variant by tag through `getProviderSchema`;
 * nothing probes response fields to guess the family.
 */

import { z } from 'zod';
import { PROVIDER_IDS } from '../config/rag_config.js';
import { Err, Ok, type Result } from '../core/result.js';
import type { GenerationSettings, ProviderId } from './types.js';

export interface ProviderSchemaVariant<Id extends ProviderId, Body> {
  readonly id: Id;
  readonly defaultModelId: string;
  /** Where the generated text lives in the response envelope */
  readonly extractionPath: string;
  encode(prompt: string, settings: GenerationSettings): Body;
  decode(envelope: unknown): Result<string, string>;
}

// ============================================================================
// AMAZON TITAN
// ============================================================================

export interface TitanRequestBody {
  inputText: string;
  textGenerationConfig: {
    maxTokenCount: number;
    temperature: number;
  };
}

const TitanResponseSchema = z.object({
  results: z.array(z.object({ outputText: z.string() })).nonempty(),
});

export type TitanSchema = ProviderSchemaVariant<'titan', TitanRequestBody>;

export const TITAN_SCHEMA: TitanSchema = {
  id: 'titan',
  defaultModelId: 'amazon.titan-text-express-v1',
  extractionPath: 'results[0].outputText',
  encode: (prompt, settings) => ({
    inputText: prompt,
    textGenerationConfig: {
      maxTokenCount: settings.maxOutputTokens,
      temperature: settings.temperature,
    },
  }),
  decode: (envelope) => decodeWith(TitanResponseSchema, envelope, (body) => body.results[0].outputText),
};

// ============================================================================
// AI21 JURASSIC
// ============================================================================

export interface JurassicRequestBody {
  prompt: string;
  maxTokens: number;
  temperature: number;
}

const JurassicResponseSchema = z.object({
  completions: z.array(z.object({ data: z.object({ text: z.string() }) })).nonempty(),
});

export type JurassicSchema = ProviderSchemaVariant<'jurassic', JurassicRequestBody>;

export const JURASSIC_SCHEMA: JurassicSchema = {
  id: 'jurassic',
  defaultModelId: 'ai21.j2-ultra-v1',
  extractionPath: 'completions[0].data.text',
  encode: (prompt, settings) => ({
    prompt,
    maxTokens: settings.maxOutputTokens,
    temperature: settings.temperature,
  }),
  decode: (envelope) => decodeWith(JurassicResponseSchema, envelope, (body) => body.completions[0].data.text),
};

// ============================================================================
// ANTHROPIC CLAUDE (text completions)
// ============================================================================

export const HUMAN_TURN = '\n\nHuman:';
export const ASSISTANT_TURN = '\n\nAssistant:';

export interface ClaudeRequestBody {
  prompt: string;
  max_tokens_to_sample: number;
  temperature: number;
}

const ClaudeResponseSchema = z.object({
  completion: z.string(),
});

/**
 * The text-completions API only accepts prompts that open with a Human turn
 * and end on an Assistant turn. Missing turns are added; a fully framed
 * prompt passes through.
 */
export function frameClaudePrompt(prompt: string): string {
  const opened = prompt.startsWith(HUMAN_TURN) ? prompt : `${HUMAN_TURN} ${prompt}`;
  return opened.endsWith(ASSISTANT_TURN) ? opened : `${opened}${ASSISTANT_TURN}`;
}

export type ClaudeSchema = ProviderSchemaVariant<'claude', ClaudeRequestBody>;

export const CLAUDE_SCHEMA: ClaudeSchema = {
  id: 'claude',
  defaultModelId: 'anthropic.claude-v2',
  extractionPath: 'completion',
  encode: (prompt, settings) => ({
    prompt: frameClaudePrompt(prompt),
    max_tokens_to_sample: settings.maxOutputTokens,
    temperature: settings.temperature,
  }),
  decode: (envelope) => decodeWith(ClaudeResponseSchema, envelope, (body) => body.completion),
};

// ============================================================================
// LOOKUP
// ============================================================================

export type ProviderSchema = TitanSchema | JurassicSchema | ClaudeSchema;

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

export function getProviderSchema(id: ProviderId): ProviderSchema {
  switch (id) {
    case 'titan':
      return TITAN_SCHEMA;
    case 'jurassic':
      return JURASSIC_SCHEMA;
    case 'claude':
      return CLAUDE_SCHEMA;
  }
}

function decodeWith<T>(
  schema: z.ZodType<T>,
  envelope: unknown,
  extract: (body: T) => string
): Result<string, string> {
  const parsed = schema.safeParse(envelope);
  if (!parsed.success) {
    return Err(parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; '));
  }
  return Ok(extract(parsed.data));
}
