import { describe, expect, it, vi } from 'vitest';
import { RetrieveCommand } from '@aws-sdk/client-kendra';
import { KendraSearchIndex, type KendraRetrieveOutput } from '../kendra_index.js';

describe('KendraSearchIndex', () => {
  it('sends a Retrieve command with the index id and paging', async () => {
    const send = vi.fn(async (_command: RetrieveCommand): Promise<KendraRetrieveOutput> => ({ ResultItems: [] }));
    const index = new KendraSearchIndex({ indexId: 'index-1', client: { send } });

    await index.query({ queryText: 'what is X?', pageSize: 3, pageNumber: 2 });

    expect(send).toHaveBeenCalledTimes(1);
    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(RetrieveCommand);
    expect(command?.input).toEqual({
      IndexId: 'index-1',
      QueryText: 'what is X?',
      PageSize: 3,
      PageNumber: 2,
    });
  });

  it('maps result items to search index items in order', async () => {
    const send = vi.fn(async (_command: RetrieveCommand): Promise<KendraRetrieveOutput> => ({
      ResultItems: [
        { Id: 'r1', DocumentId: 'd1', DocumentTitle: 'Guide', DocumentURI: 'https://docs.test/guide', Content: 'first' },
        { Id: 'r2', Content: 'second' },
      ],
    }));
    const index = new KendraSearchIndex({ indexId: 'index-1', client: { send } });

    const response = await index.query({ queryText: 'q', pageSize: 2, pageNumber: 1 });

    expect(response.items).toEqual([
      { content: 'first', documentId: 'd1', documentTitle: 'Guide', documentUri: 'https://docs.test/guide' },
      { content: 'second' },
    ]);
  });

  it('treats a missing ResultItems list as empty', async () => {
    const send = vi.fn(async (_command: RetrieveCommand): Promise<KendraRetrieveOutput> => ({}));
    const index = new KendraSearchIndex({ indexId: 'index-1', client: { send } });

    const response = await index.query({ queryText: 'q', pageSize: 2, pageNumber: 1 });

    expect(response.items).toEqual([]);
  });

  it('propagates client errors unchanged', async () => {
    const failure = new Error('socket hang up');
    const send = vi.fn(async (_command: RetrieveCommand): Promise<KendraRetrieveOutput> => {
      throw failure;
    });
    const index = new KendraSearchIndex({ indexId: 'index-1', client: { send } });

    await expect(index.query({ queryText: 'q', pageSize: 2, pageNumber: 1 })).rejects.toBe(failure);
  });
});
