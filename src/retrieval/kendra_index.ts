import { KendraClient, RetrieveCommand } from '@aws-sdk/client-kendra';
import type { SearchIndex, SearchIndexItem, SearchIndexRequest, SearchIndexResponse } from './types.js';

/**
 * The slice of the Kendra Retrieve output this package reads.
 */
export interface KendraRetrieveOutput {
  ResultItems?: Array<{
    Id?: string;
    DocumentId?: string;
    DocumentTitle?: string;
    DocumentURI?: string;
    Content?: string;
  }>;
}

/**
 * Anything that can send a Retrieve command: a `KendraClient`, or a fake in
 * tests.
 */
export interface KendraRetrieveClient {
  send(command: RetrieveCommand): Promise<KendraRetrieveOutput>;
}

export interface KendraSearchIndexOptions {
  indexId: string;
  client: KendraRetrieveClient;
}

export class KendraSearchIndex implements SearchIndex {
  readonly indexId: string;
  private readonly client: KendraRetrieveClient;

  constructor(options: KendraSearchIndexOptions) {
    this.indexId = options.indexId;
    this.client = options.client;
  }

  static forRegion(region: string, indexId: string): KendraSearchIndex {
    const kendra = new KendraClient({ region });
    return new KendraSearchIndex({
      indexId,
      client: { send: (command) => kendra.send(command) },
    });
  }

  async query({ queryText, pageSize, pageNumber }: SearchIndexRequest): Promise<SearchIndexResponse> {
    const output = await this.client.send(
      new RetrieveCommand({
        IndexId: this.indexId,
        QueryText: queryText,
        PageSize: pageSize,
        PageNumber: pageNumber,
      })
    );

    const items: SearchIndexItem[] = (output.ResultItems ?? []).map((item) => ({
      content: item.Content,
      documentId: item.DocumentId,
      documentTitle: item.DocumentTitle,
      documentUri: item.DocumentURI,
    }));
    return { items };
  }
}
