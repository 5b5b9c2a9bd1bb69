/**
 * Centralized Vitest setup
 *
 * Unpatched AWS clients must never be reached: the SDK clients are replaced
 * with stubs that fail loudly, so a test that forgets to inject a fake gets
 * an error instead of a network call.
 */

import { vi } from 'vitest';

vi.mock('@aws-sdk/client-kendra', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@aws-sdk/client-kendra')>();
  return {
    ...actual,
    KendraClient: class {
      async send(): Promise<never> {
        throw new Error('KendraClient is disabled in tests; inject a SearchIndex fake');
      }
    },
  };
});

vi.mock('@aws-sdk/client-bedrock-runtime', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@aws-sdk/client-bedrock-runtime')>();
  return {
    ...actual,
    BedrockRuntimeClient: class {
      async send(): Promise<never> {
        throw new Error('BedrockRuntimeClient is disabled in tests; inject a ModelInvoker fake');
      }
    },
  };
});
