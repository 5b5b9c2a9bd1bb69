/**
 * @fileoverview End-to-end tests for the answer pipeline.
 *
 * Both external collaborators are in-process fakes: a search index serving a
 * fixed page and a model invoker returning canned envelopes per model id.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { answerQuestion, compareProviders, type AnswerDependencies } from '../answer.js';
import { Retriever } from '../../retrieval/retriever.js';
import { CompletionDispatcher } from '../../providers/dispatcher.js';
import type { ModelInvocation } from '../../providers/types.js';
import type { SearchIndex, SearchIndexRequest, SearchIndexResponse } from '../../retrieval/types.js';
import { createPromptTemplate } from '../../prompt/prompt_builder.js';
import {
  InvalidRequestError,
  ProviderUnavailableError,
  RetrievalUnavailableError,
  UnsupportedProviderError,
} from '../../core/errors.js';

const QUERY = 'What are the benefits of using X?';
const P1 = 'X keeps configuration for every service in one place.';
const P2 = 'Teams using X roll out changes without redeploying.';
const P3 = 'X records a history of every configuration change.';

const PREAMBLE =
  '\n\nHuman: You answer questions using only the information in the context below.\n' +
  'If the context does not contain the answer, say that you do not know instead of guessing.\n';

const ENVELOPES: Record<string, unknown> = {
  'amazon.titan-text-express-v1': { results: [{ outputText: 'Central location for configuration.' }] },
  'ai21.j2-ultra-v1': { completions: [{ data: { text: 'Configuration lives in one place.' } }] },
  'anthropic.claude-v2': { completion: 'It centralizes configuration.' },
};

function fakeIndex(respond: (request: SearchIndexRequest) => Promise<SearchIndexResponse>): SearchIndex {
  return { indexId: 'test-index', query: vi.fn(respond) };
}

function setup(index: SearchIndex = fakeIndex(async () => ({ items: [P1, P2, P3].map((content) => ({ content })) }))) {
  const invoke = vi.fn(async ({ modelId }: ModelInvocation): Promise<string> => {
    if (modelId === 'ai21.j2-ultra-v1') {
      throw Object.assign(new Error('Rate exceeded'), { name: 'ThrottlingException' });
    }
    return JSON.stringify(ENVELOPES[modelId]);
  });
  const deps: AnswerDependencies = {
    retriever: new Retriever({ index }),
    dispatcher: new CompletionDispatcher({ invoker: { invoke } }),
  };
  return { deps, invoke, index };
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('answerQuestion', () => {
  it('grounds the prompt on every passage and returns the provider text exactly', async () => {
    const { deps, invoke } = setup();

    const answer = await answerQuestion(deps, { query: QUERY, pageSize: 3, provider: 'titan' });

    expect(answer.passages.map((p) => p.text)).toEqual([P1, P2, P3]);
    expect(answer.prompt).toBe(
      `${PREAMBLE}\n<context>\n${P1}\n${P2}\n${P3}\n</context>\n\n<question>${QUERY}</question>\n\nAssistant:`
    );
    expect(answer.completion.text).toBe('Central location for configuration.');
    expect(answer.completion.provider).toBe('titan');

    expect(invoke).toHaveBeenCalledTimes(1);
    const request = invoke.mock.calls[0]?.[0];
    expect(request ? JSON.parse(request.body) : undefined).toEqual({
      inputText: answer.prompt,
      textGenerationConfig: { maxTokenCount: 512, temperature: 0 },
    });
  });

  it('asks the index for the first page by default', async () => {
    const { deps, index } = setup();

    await answerQuestion(deps, { query: QUERY, pageSize: 3, provider: 'claude' });

    expect(index.query).toHaveBeenCalledWith({ queryText: QUERY, pageSize: 3, pageNumber: 1 });
  });

  it('continues with an empty context when the index returns nothing', async () => {
    const { deps, invoke } = setup(fakeIndex(async () => ({ items: [] })));

    const answer = await answerQuestion(deps, { query: QUERY, pageSize: 3, page: 2, provider: 'claude' });

    expect(answer.passages).toEqual([]);
    expect(answer.prompt).toContain('<context>\n\n</context>');
    expect(answer.prompt).toContain(`<question>${QUERY}</question>`);
    expect(answer.completion.text).toBe('It centralizes configuration.');
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('aborts without calling a model when the index is unavailable', async () => {
    const { deps, invoke } = setup(
      fakeIndex(async () => {
        throw new Error('connect ECONNREFUSED');
      })
    );

    await expect(answerQuestion(deps, { query: QUERY, pageSize: 3, provider: 'titan' })).rejects.toBeInstanceOf(
      RetrievalUnavailableError
    );
    expect(invoke).not.toHaveBeenCalled();
  });

  it('aborts on an invalid query before touching the index', async () => {
    const { deps, index } = setup();

    await expect(answerQuestion(deps, { query: ' ', pageSize: 3, provider: 'titan' })).rejects.toBeInstanceOf(
      InvalidRequestError
    );
    expect(index.query).not.toHaveBeenCalled();
  });

  it('surfaces provider failures unchanged', async () => {
    const { deps } = setup();

    const error = await answerQuestion(deps, { query: QUERY, pageSize: 3, provider: 'jurassic' }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    if (error instanceof ProviderUnavailableError) {
      expect(error.reason).toBe('throttled');
    }
  });

  it('rejects an unknown provider after grounding without invoking a model', async () => {
    const { deps, invoke } = setup();

    await expect(answerQuestion(deps, { query: QUERY, pageSize: 3, provider: 'unknown' })).rejects.toBeInstanceOf(
      UnsupportedProviderError
    );
    expect(invoke).not.toHaveBeenCalled();
  });

  it('builds the prompt from a custom template', async () => {
    const { deps } = setup();
    const template = createPromptTemplate('Context: {context}\nQuestion: {question}\nAnswer:');

    const answer = await answerQuestion({ ...deps, template }, { query: 'why?', pageSize: 1, provider: 'titan' });

    expect(answer.prompt).toBe(`Context: ${P1}\nQuestion: why?\nAnswer:`);
  });
});

describe('compareProviders', () => {
  it('retrieves once and reports each provider outcome independently', async () => {
    const { deps, index, invoke } = setup();

    const comparison = await compareProviders(deps, { query: QUERY, pageSize: 3 }, ['titan', 'jurassic', 'claude']);

    expect(index.query).toHaveBeenCalledTimes(1);
    expect(invoke).toHaveBeenCalledTimes(3);
    expect(comparison.outcomes.map((o) => o.provider)).toEqual(['titan', 'jurassic', 'claude']);

    const [titan, jurassic, claude] = comparison.outcomes;
    expect(titan).toMatchObject({ provider: 'titan', ok: true, completion: { text: 'Central location for configuration.' } });
    expect(claude).toMatchObject({ provider: 'claude', ok: true, completion: { text: 'It centralizes configuration.' } });
    expect(jurassic?.ok).toBe(false);
    if (jurassic && !jurassic.ok) {
      expect(jurassic.error).toBeInstanceOf(ProviderUnavailableError);
    }
    expect(jurassic).not.toHaveProperty('completion');
    expect(titan).not.toHaveProperty('error');
  });

  it('sends the same prompt to every provider', async () => {
    const { deps, invoke } = setup();

    const comparison = await compareProviders(deps, { query: QUERY, pageSize: 3 }, ['titan', 'claude']);

    const bodies = invoke.mock.calls.map(([request]) => JSON.parse(request.body));
    expect(bodies[0]).toMatchObject({ inputText: comparison.prompt });
    expect(bodies[1]).toMatchObject({ prompt: comparison.prompt });
  });

  it('reports an unknown provider as a failed outcome', async () => {
    const { deps } = setup();

    const comparison = await compareProviders(deps, { query: QUERY, pageSize: 3 }, ['unknown', 'claude']);

    const [unknown, claude] = comparison.outcomes;
    expect(unknown?.ok).toBe(false);
    if (unknown && !unknown.ok) {
      expect(unknown.error).toBeInstanceOf(UnsupportedProviderError);
    }
    expect(claude?.ok).toBe(true);
  });
});
