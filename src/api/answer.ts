/**
 * @fileoverview Grounded answering
 *
 * Retriever → prompt builder → completion dispatcher, strictly in that order.
 * An empty retrieval is the one failure the cycle recovers from; every other
 * error aborts it and reaches the caller unchanged.
 */

import { isRecoverable } from '../core/errors.js';
import { safeAsync } from '../core/result.js';
import { buildPrompt, type PromptTemplate } from '../prompt/prompt_builder.js';
import type { CompletionDispatcher } from '../providers/dispatcher.js';
import type { CompletionConfig, CompletionResult } from '../providers/types.js';
import type { Retriever } from '../retrieval/retriever.js';
import type { Passage } from '../retrieval/types.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export interface AnswerDependencies {
  retriever: Retriever;
  dispatcher: CompletionDispatcher;
  template?: PromptTemplate;
}

export interface AnswerRequest {
  query: string;
  pageSize: number;
  /** 1-based; defaults to the first page */
  page?: number;
  completion?: CompletionConfig;
}

export interface GroundingContext {
  query: string;
  passages: Passage[];
  prompt: string;
}

export interface GroundedAnswer extends GroundingContext {
  completion: CompletionResult;
}

export type ProviderOutcome =
  | { provider: string; ok: true; completion: CompletionResult }
  | { provider: string; ok: false; error: Error };

export interface ProviderComparison extends GroundingContext {
  outcomes: ProviderOutcome[];
}

/**
 * Retrieve passages and build the prompt, recovering an empty retrieval as an
 * empty context.
 */
export async function prepareGrounding(
  deps: AnswerDependencies,
  request: AnswerRequest
): Promise<GroundingContext> {
  const page = request.page ?? 1;
  const retrieved = await safeAsync(() => deps.retriever.retrieve(request.query, request.pageSize, page));

  let passages: Passage[];
  if (retrieved.ok) {
    passages = retrieved.value;
  } else if (isRecoverable(retrieved.error)) {
    logWarning('[answer] continuing with empty context', { query: request.query, page });
    passages = [];
  } else {
    throw retrieved.error;
  }

  return {
    query: request.query,
    passages,
    prompt: buildPrompt(request.query, passages, deps.template),
  };
}

export async function answerQuestion(
  deps: AnswerDependencies,
  request: AnswerRequest & { provider: string }
): Promise<GroundedAnswer> {
  const grounding = await prepareGrounding(deps, request);
  const completion = await deps.dispatcher.complete(grounding.prompt, request.provider, request.completion);
  logInfo('[answer] answered', {
    provider: completion.provider,
    passages: grounding.passages.length,
    latencyMs: completion.latencyMs,
  });
  return { ...grounding, completion };
}

/**
 * Ground once, then send the same prompt to every provider concurrently.
 * Dispatcher calls share no state; each outcome is reported on its own.
 */
export async function compareProviders(
  deps: AnswerDependencies,
  request: AnswerRequest,
  providers: readonly string[]
): Promise<ProviderComparison> {
  const grounding = await prepareGrounding(deps, request);

  const outcomes = await Promise.all(
    providers.map(async (provider): Promise<ProviderOutcome> => {
      const result = await safeAsync(() =>
        deps.dispatcher.complete(grounding.prompt, provider, request.completion)
      );
      if (!result.ok) {
        logWarning('[answer] provider failed', { provider, error: getErrorMessage(result.error) });
        return { provider, ok: false, error: result.error };
      }
      return { provider, ok: true, completion: result.value };
    })
  );

  return { ...grounding, outcomes };
}
