import type { DialectName } from '../query/dialects.js';
import type { SortKey, Token, ExpressionNode } from '../query/types.js';
import type { CollectionSummary, StoredRecord } from '../store/IRecordStore.js';

export interface PutRecordsToolArgs {
  collection: string;
  records: StoredRecord[];
  dialect?: DialectName;
  idField?: string;
}

export interface SearchRecordsToolArgs {
  collection: string;
  query?: string;
  dialect?: DialectName;
  offset?: number;
  limit?: number;
  /** Comma-separated keys: `"created desc,title"` */
  orderBy?: string;
}

export interface ExplainQueryToolArgs {
  query: string;
  dialect?: DialectName;
}

export interface PutRecordsResult {
  collection: string;
  ids: string[];
}

export interface SearchRecordsResult {
  collection: string;
  total: number;
  offset: number;
  limit?: number;
  records: StoredRecord[];
}

export interface ExplainQueryResult {
  dialect: DialectName;
  /** The WHERE part re-written in canonical form */
  canonical: string;
  orderBy: SortKey[];
  tokens: Token[];
  expression: ExpressionNode;
}

export interface ListCollectionsResult {
  collections: CollectionSummary[];
}
