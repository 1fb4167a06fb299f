import { parseSortList } from '../query/OrderByClause.js';
import type { IRecordStore, StoredRecord } from '../store/IRecordStore.js';

export const DRIVE_COLLECTION = 'files';

export interface ListFilesParams {
  q?: string;
  /** Comma-separated keys, each optionally followed by `desc`: `"modifiedTime desc,name"` */
  orderBy?: string;
  pageSize?: number;
}

export interface FileList {
  kind: 'drive#fileList';
  files: StoredRecord[];
}

export async function listFiles(
  store: IRecordStore,
  { q = '', orderBy, pageSize = 100 }: ListFilesParams = {}
): Promise<FileList> {
  const page = await store.search(DRIVE_COLLECTION, q, {
    dialect: 'drive',
    allowMissing: true,
    orderBy: orderBy?.trim() ? parseSortList(orderBy) : undefined,
    limit: pageSize,
  });

  return { kind: 'drive#fileList', files: page.items };
}
