/**
 * @fileoverview Runtime configuration
 *
 * Read from environment variables and validated with zod. Credentials are not
 * part of this surface: the AWS SDK resolves them through its default chain.
 */

import { z } from 'zod';
import { Errors } from '../core/errors.js';
import type { LogLevel } from '../telemetry/logger.js';

export const PROVIDER_IDS = ['titan', 'jurassic', 'claude'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];

/** Maps each config field to the variable it is read from */
export const ENV_KEYS = {
  region: 'AWS_REGION',
  indexId: 'KENDRA_INDEX_ID',
  pageSize: 'RAG_PAGE_SIZE',
  provider: 'RAG_PROVIDER',
  maxOutputTokens: 'RAG_MAX_OUTPUT_TOKENS',
  temperature: 'RAG_TEMPERATURE',
  timeoutMs: 'RAG_TIMEOUT_MS',
  logLevel: 'RAG_LOG_LEVEL',
} as const;

export const RagConfigSchema = z.object({
  region: z.string().trim().min(1).default('us-east-1'),
  indexId: z.string().trim().min(1),
  pageSize: z.coerce.number().int().positive().default(3),
  provider: z.enum(PROVIDER_IDS).default('titan'),
  maxOutputTokens: z.coerce.number().int().positive().default(512),
  temperature: z.coerce.number().min(0).max(1).default(0),
  timeoutMs: z.coerce.number().int().nonnegative().default(30000),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type RagConfig = z.infer<typeof RagConfigSchema>;

type ConfigField = keyof typeof ENV_KEYS;

function isConfigField(key: string): key is ConfigField {
  return key in ENV_KEYS;
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Build the configuration from environment variables.
 *
 * Blank variables count as unset, so defaults apply to them.
 *
 * @throws ConfigurationError naming the first offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RagConfig {
  const raw = {
    region: readEnv(env, ENV_KEYS.region),
    indexId: readEnv(env, ENV_KEYS.indexId),
    pageSize: readEnv(env, ENV_KEYS.pageSize),
    provider: readEnv(env, ENV_KEYS.provider),
    maxOutputTokens: readEnv(env, ENV_KEYS.maxOutputTokens),
    temperature: readEnv(env, ENV_KEYS.temperature),
    timeoutMs: readEnv(env, ENV_KEYS.timeoutMs),
    logLevel: readEnv(env, ENV_KEYS.logLevel),
  };

  const parsed = RagConfigSchema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const field = issue ? String(issue.path[0]) : 'config';
  const key = isConfigField(field) ? ENV_KEYS[field] : field;
  throw Errors.config(key, issue?.message ?? 'invalid configuration');
}
