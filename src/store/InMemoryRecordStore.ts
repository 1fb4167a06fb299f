import type { DialectName } from '../query/dialects.js';
import { QueryEngine, type QueryEngineOptions } from '../query/QueryEngine.js';
import type { QueryPage } from '../query/types.js';
import { logger } from '../utils/logger.js';
import {
  isStoredRecord,
  type CollectionSummary,
  type IRecordStore,
  type PutRecordsOptions,
  type StoreSearchOptions,
  type StoredRecord,
} from './IRecordStore.js';
import { StoreError } from './StoreError.js';

interface Collection {
  name: string;
  dialect: DialectName;
  idField: string;
  records: Map<string, StoredRecord>;
  nextId: number;
}

export interface InMemoryRecordStoreOptions {
  defaultDialect?: DialectName;
  /** Shared by the per-dialect engines (dialect itself is set per engine) */
  engine?: Omit<QueryEngineOptions, 'dialect'>;
}

/**
 * Record store held in process memory.
 *
 * Records are copied on the way in, so later changes to the caller's objects
 * do not leak into the store. Search results are the store's own copies and
 * must be treated as read-only.
 */
export class InMemoryRecordStore implements IRecordStore {
  private readonly collections = new Map<string, Collection>();
  private readonly engines = new Map<DialectName, QueryEngine>();
  private readonly defaultDialect: DialectName;
  private readonly engineOptions: Omit<QueryEngineOptions, 'dialect'>;

  constructor(options: InMemoryRecordStoreOptions = {}) {
    this.defaultDialect = options.defaultDialect ?? 'generic';
    this.engineOptions = options.engine ?? {};
  }

  engineFor(dialect: DialectName): QueryEngine {
    let engine = this.engines.get(dialect);
    if (!engine) {
      engine = new QueryEngine({ ...this.engineOptions, dialect });
      this.engines.set(dialect, engine);
    }
    return engine;
  }

  private require(collection: string): Collection {
    const found = this.collections.get(collection);
    if (!found) {
      throw new StoreError('not_found', `Collection "${collection}" does not exist`, {
        collection,
        available: [...this.collections.keys()],
      });
    }
    return found;
  }

  async listCollections(): Promise<CollectionSummary[]> {
    return [...this.collections.values()].map((collection) => ({
      name: collection.name,
      recordCount: collection.records.size,
      dialect: collection.dialect,
      idField: collection.idField,
    }));
  }

  async putRecords(
    collection: string,
    records: readonly StoredRecord[],
    options: PutRecordsOptions = {}
  ): Promise<string[]> {
    if (!collection.trim()) {
      throw new StoreError('invalid_record', 'Collection name must not be empty');
    }

    let target = this.collections.get(collection);
    if (!target) {
      target = {
        name: collection,
        dialect: options.dialect ?? this.defaultDialect,
        idField: options.idField ?? 'id',
        records: new Map(),
        nextId: 1,
      };
    }
    const { idField } = target;

    // Validate the whole batch before touching the collection
    const prepared = records.map((record, index) => {
      if (!isStoredRecord(record)) {
        throw new StoreError('invalid_record', `Record ${index} is not an object`, { index });
      }
      const rawId = record[idField];
      if (rawId !== undefined && typeof rawId !== 'string' && typeof rawId !== 'number') {
        throw new StoreError(
          'invalid_record',
          `Record ${index} has a ${typeof rawId} in "${idField}"; ids must be strings or numbers`,
          { index, idField }
        );
      }
      return { record, rawId };
    });

    const ids: string[] = [];
    for (const { record, rawId } of prepared) {
      let id: string;
      if (rawId === undefined) {
        do {
          id = `${collection}-${target.nextId++}`;
        } while (target.records.has(id));
      } else {
        id = String(rawId);
      }
      target.records.set(id, structuredClone({ ...record, [idField]: rawId ?? id }));
      ids.push(id);
    }

    this.collections.set(collection, target);
    logger.debug('store', 'records:put', { collection, count: ids.length });
    return ids;
  }

  async getRecord(collection: string, id: string): Promise<StoredRecord | undefined> {
    return this.require(collection).records.get(id);
  }

  async deleteRecord(collection: string, id: string): Promise<boolean> {
    const removed = this.require(collection).records.delete(id);
    logger.debug('store', 'records:delete', { collection, id, removed });
    return removed;
  }

  async allRecords(collection: string): Promise<StoredRecord[]> {
    return [...this.require(collection).records.values()];
  }

  async search(
    collection: string,
    query: string,
    options: StoreSearchOptions = {}
  ): Promise<QueryPage<StoredRecord>> {
    const target = options.allowMissing
      ? this.collections.get(collection)
      : this.require(collection);
    const engine = this.engineFor(options.dialect ?? target?.dialect ?? this.defaultDialect);
    const records = target ? [...target.records.values()] : [];

    return engine.search(records, query, {
      offset: options.offset,
      limit: options.limit,
      orderBy: options.orderBy,
      resolveField: options.resolveField,
    });
  }
}
