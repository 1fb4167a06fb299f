import type { DialectName } from '../query/dialects.js';
import type { FieldResolver, QueryPage, SortKey } from '../query/types.js';

/** A stored record: any JSON object. The query engine reads its fields. */
export type StoredRecord = { readonly [key: string]: unknown };

export function isStoredRecord(value: unknown): value is StoredRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface CollectionSummary {
  name: string;
  recordCount: number;
  dialect: DialectName;
  idField: string;
}

export interface PutRecordsOptions {
  /** Dialect for queries against a new collection (default: the store default) */
  dialect?: DialectName;
  /** Field holding the record id (default: `id`) */
  idField?: string;
}

export interface StoreSearchOptions {
  offset?: number;
  limit?: number;
  orderBy?: readonly SortKey[];
  /** Query in a different dialect than the collection's own */
  dialect?: DialectName;
  resolveField?: FieldResolver<StoredRecord>;
  /** Search an unknown collection as an empty one instead of raising `not_found` */
  allowMissing?: boolean;
}

/**
 * Backend-neutral contract for the collections the simulators search.
 *
 * Every server or test builds its own store instance; nothing is shared
 * through module state.
 *
 * @example
 * ```typescript
 * const store: IRecordStore = new InMemoryRecordStore();
 *
 * await store.putRecords('issues', [
 *   { id: 'DEMO-1', fields: { status: 'Open', created: '2024-01-10' } },
 * ], { dialect: 'jql' });
 *
 * const page = await store.search('issues', "fields.status = 'Open'", { limit: 10 });
 * ```
 */
export interface IRecordStore {
  listCollections(): Promise<CollectionSummary[]>;

  /**
   * Insert or replace records by id, creating the collection on first use.
   *
   * @returns ids in input order (generated where a record had none)
   * @throws StoreError (`invalid_record`) for non-object records or ids that
   * are neither strings nor numbers
   */
  putRecords(
    collection: string,
    records: readonly StoredRecord[],
    options?: PutRecordsOptions
  ): Promise<string[]>;

  getRecord(collection: string, id: string): Promise<StoredRecord | undefined>;

  /** @returns whether a record was removed */
  deleteRecord(collection: string, id: string): Promise<boolean>;

  /** All records of a collection in insertion order */
  allRecords(collection: string): Promise<StoredRecord[]>;

  /**
   * Run a query against a collection.
   *
   * @throws StoreError (`not_found`) for unknown collections unless
   * `allowMissing` is set, and any QueryError the engine raises
   */
  search(
    collection: string,
    query: string,
    options?: StoreSearchOptions
  ): Promise<QueryPage<StoredRecord>>;
}
