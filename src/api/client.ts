/**
 * @fileoverview Wiring from configuration to a ready-to-use client.
 */

import { loadConfig, type RagConfig } from '../config/rag_config.js';
import type { PromptTemplate } from '../prompt/prompt_builder.js';
import { BedrockModelInvoker } from '../providers/bedrock_invoker.js';
import { CompletionDispatcher } from '../providers/dispatcher.js';
import type { CompletionConfig, ModelInvoker } from '../providers/types.js';
import { KendraSearchIndex } from '../retrieval/kendra_index.js';
import { Retriever } from '../retrieval/retriever.js';
import type { SearchIndex } from '../retrieval/types.js';
import { setLogLevel } from '../telemetry/logger.js';
import {
  answerQuestion,
  compareProviders,
  type AnswerDependencies,
  type GroundedAnswer,
  type ProviderComparison,
} from './answer.js';

export interface RagClientOverrides {
  /** Replaces the Kendra index, e.g. with an in-process fake */
  index?: SearchIndex;
  /** Replaces the Bedrock invoker */
  invoker?: ModelInvoker;
  template?: PromptTemplate;
}

export interface AskOptions {
  provider?: string;
  pageSize?: number;
  page?: number;
  completion?: CompletionConfig;
}

export class RagClient {
  private readonly deps: AnswerDependencies;

  constructor(
    readonly config: RagConfig,
    overrides: RagClientOverrides = {}
  ) {
    const index = overrides.index ?? KendraSearchIndex.forRegion(config.region, config.indexId);
    const invoker = overrides.invoker ?? BedrockModelInvoker.forRegion(config.region);
    this.deps = {
      retriever: new Retriever({ index, timeoutMs: config.timeoutMs }),
      dispatcher: new CompletionDispatcher({
        invoker,
        defaults: { maxOutputTokens: config.maxOutputTokens, temperature: config.temperature },
        timeoutMs: config.timeoutMs,
      }),
      template: overrides.template,
    };
  }

  ask(query: string, options: AskOptions = {}): Promise<GroundedAnswer> {
    return answerQuestion(this.deps, {
      query,
      provider: options.provider ?? this.config.provider,
      pageSize: options.pageSize ?? this.config.pageSize,
      page: options.page,
      completion: options.completion,
    });
  }

  compare(
    query: string,
    providers: readonly string[],
    options: Omit<AskOptions, 'provider'> = {}
  ): Promise<ProviderComparison> {
    return compareProviders(
      this.deps,
      {
        query,
        pageSize: options.pageSize ?? this.config.pageSize,
        page: options.page,
        completion: options.completion,
      },
      providers
    );
  }
}

/**
 * Build a client from `config` (read from the environment when omitted) and
 * apply its log level.
 */
export function createRagClient(
  config: RagConfig = loadConfig(),
  overrides: RagClientOverrides = {}
): RagClient {
  setLogLevel(config.logLevel);
  return new RagClient(config, overrides);
}
