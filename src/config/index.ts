/**
 * @fileoverview Configuration loading and provider identifiers.
 */

export {
  loadConfig,
  RagConfigSchema,
  ENV_KEYS,
  PROVIDER_IDS,
  type RagConfig,
  type ProviderId,
} from './rag_config.js';
