import type { IRecordStore, StoredRecord } from '../store/IRecordStore.js';

export const CONFLUENCE_COLLECTION = 'content';

export interface SearchContentParams {
  cql: string;
  start?: number;
  limit?: number;
}

/**
 * Confluence content search: CQL over the `content` collection, paged with
 * `start` and `limit`. CQL has no ORDER BY here, so results keep insertion
 * order.
 */
export async function searchContent(
  store: IRecordStore,
  { cql, start = 0, limit = 25 }: SearchContentParams
): Promise<StoredRecord[]> {
  const page = await store.search(CONFLUENCE_COLLECTION, cql, {
    dialect: 'cql',
    allowMissing: true,
    offset: start,
    limit,
  });
  return page.items;
}
