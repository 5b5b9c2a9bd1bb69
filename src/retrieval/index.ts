/**
 * @fileoverview Retrieval: the search-index port, its Kendra adapter and the
 * retriever built on top.
 */

export type {
  Passage,
  SearchIndex,
  SearchIndexRequest,
  SearchIndexItem,
  SearchIndexResponse,
} from './types.js';

export {
  KendraSearchIndex,
  type KendraRetrieveClient,
  type KendraRetrieveOutput,
  type KendraSearchIndexOptions,
} from './kendra_index.js';

export { Retriever, type RetrieverOptions } from './retriever.js';
