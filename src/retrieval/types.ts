/**
 * @fileoverview Retrieval types
 *
 * The search index is an external collaborator; everything behind the
 * `SearchIndex` port is opaque to the rest of the package.
 */

/**
 * A retrieved text fragment. `rank` is its 1-based position in the page the
 * index returned; the optional fields are index metadata and never reach the
 * prompt.
 */
export interface Passage {
  text: string;
  rank: number;
  documentId?: string;
  documentTitle?: string;
  documentUri?: string;
}

export interface SearchIndexRequest {
  queryText: string;
  pageSize: number;
  pageNumber: number;
}

export interface SearchIndexItem {
  content?: string;
  documentId?: string;
  documentTitle?: string;
  documentUri?: string;
}

export interface SearchIndexResponse {
  /** Items in the order the index ranked them */
  items: SearchIndexItem[];
}

export interface SearchIndex {
  /** Identifier used in errors and logs */
  readonly indexId: string;
  query(request: SearchIndexRequest): Promise<SearchIndexResponse>;
}
