/**
 * @fileoverview Retriever
 *
 * One index call per `retrieve`, passages returned in the index's order. The
 * retriever never re-ranks and never retries.
 */

import { Errors } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';
import { getErrorMessage, getErrorName, toError } from '../utils/errors.js';
import type { Passage, SearchIndex, SearchIndexResponse } from './types.js';

export interface RetrieverOptions {
  index: SearchIndex;
  /** Per-call budget for the index call; 0 or undefined disables it */
  timeoutMs?: number;
}

const NON_RETRYABLE_INDEX_ERRORS = new Set([
  'AccessDeniedException',
  'ResourceNotFoundException',
  'ValidationException',
]);

function assertPositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw Errors.invalidRequest(field, 'a positive integer', String(value));
  }
}

export class Retriever {
  private readonly index: SearchIndex;
  private readonly timeoutMs?: number;

  constructor(options: RetrieverOptions) {
    this.index = options.index;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Fetch one page of passages for `query`.
   *
   * @throws InvalidRequestError for an empty query or a non-positive page/pageSize
   * @throws RetrievalUnavailableError when the index call fails or times out
   * @throws EmptyResultError (recoverable) when the page holds no passages
   */
  async retrieve(query: string, pageSize: number, page: number): Promise<Passage[]> {
    if (query.trim().length === 0) {
      throw Errors.invalidRequest('query', 'a non-empty string', JSON.stringify(query));
    }
    assertPositiveInteger('pageSize', pageSize);
    assertPositiveInteger('page', page);

    let response: SearchIndexResponse;
    try {
      response = await withTimeout(
        this.index.query({ queryText: query, pageSize, pageNumber: page }),
        this.timeoutMs,
        { context: `retrieve from ${this.index.indexId}` }
      );
    } catch (error) {
      const name = getErrorName(error);
      throw Errors.retrievalUnavailable(
        this.index.indexId,
        getErrorMessage(error),
        !(name !== undefined && NON_RETRYABLE_INDEX_ERRORS.has(name)),
        toError(error)
      );
    }

    const passages: Passage[] = [];
    for (const item of response.items) {
      if (passages.length >= pageSize) break;
      if (!item.content) continue;
      passages.push({
        text: item.content,
        rank: passages.length + 1,
        documentId: item.documentId,
        documentTitle: item.documentTitle,
        documentUri: item.documentUri,
      });
    }

    if (passages.length === 0) {
      logWarning('[retriever] index returned no passages', { indexId: this.index.indexId, page });
      throw Errors.emptyResult(query, page);
    }

    logDebug('[retriever] retrieved passages', {
      indexId: this.index.indexId,
      page,
      count: passages.length,
    });
    return passages;
  }
}
