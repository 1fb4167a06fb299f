/**
 * Applies an expression tree to a record collection, then orders and slices
 * the matches. Inputs are never mutated; the returned arrays hold the
 * caller's own record references.
 */

import { parseDateLike } from '../utils/dateUtils.js';
import { resolveDialect } from './dialects.js';
import { Evaluator, resolveFieldPath, type EvaluateOptions } from './Evaluator.js';
import { QueryOptionsError } from './QueryError.js';
import type { ExpressionNode, FieldValue, QueryPage, QueryRecord, SortKey } from './types.js';

export interface QueryOptions<R> extends EvaluateOptions<R> {
  orderBy?: readonly SortKey[];
  offset?: number;
  limit?: number;
}

/**
 * Sort rank of a value kind. Missing and incomparable values rank lowest, so
 * they come first ascending and last descending. Ranks: absent, boolean,
 * number, date, string, list.
 */
interface SortableValue {
  rank: number;
  key: number | string;
}

const INCOMPARABLE: SortableValue = { rank: 0, key: 0 };

function sortable(value: FieldValue | undefined, isDate: boolean): SortableValue {
  if (value === undefined || value === null) {
    return INCOMPARABLE;
  }
  if (typeof value === 'boolean') {
    return { rank: 1, key: value ? 1 : 0 };
  }
  if (typeof value === 'number') {
    return Number.isNaN(value) ? INCOMPARABLE : { rank: 2, key: value };
  }
  if (typeof value === 'string') {
    if (isDate) {
      const parsed = parseDateLike(value);
      return parsed === null ? INCOMPARABLE : { rank: 3, key: parsed };
    }
    return { rank: 4, key: value };
  }
  return { rank: 5, key: value.join('\u0000') };
}

function compareSortable(left: SortableValue, right: SortableValue): number {
  if (left.rank !== right.rank) {
    return left.rank - right.rank;
  }
  const a = left.key;
  const b = right.key;
  if (typeof a === 'number' && typeof b === 'number') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  const textA = String(a);
  const textB = String(b);
  return textA === textB ? 0 : textA < textB ? -1 : 1;
}

function checkIndex(name: string, value: number | undefined): void {
  if (value === undefined) {
    return;
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new QueryOptionsError(
      `${name} must be a non-negative integer, got ${value}`,
      `Pass ${name} as 0 or a positive whole number`
    );
  }
}

/**
 * Filter, order and slice, reporting the match count before slicing.
 *
 * @throws QueryOptionsError for a negative or fractional offset or limit
 */
export function queryPage<R = QueryRecord>(
  records: readonly R[],
  expression: ExpressionNode,
  options: QueryOptions<R> = {}
): QueryPage<R> {
  checkIndex('offset', options.offset);
  checkIndex('limit', options.limit);

  const evaluator = new Evaluator<R>(options);
  let matched = records.filter((record) => evaluator.matches(expression, record));

  const orderBy = options.orderBy ?? [];
  if (orderBy.length > 0) {
    const dialect = resolveDialect(options.dialect);
    const dateFields = new Set(options.dateFields ?? dialect.dateFields);
    const resolve = options.resolveField ?? resolveFieldPath;

    // Decorate once so each record's keys are resolved a single time
    const decorated = matched.map((record, index) => ({
      record,
      index,
      keys: orderBy.map((key) => sortable(resolve(record, key.field), dateFields.has(key.field))),
    }));

    decorated.sort((a, b) => {
      for (let i = 0; i < orderBy.length; i++) {
        const order = compareSortable(a.keys[i], b.keys[i]);
        if (order !== 0) {
          return orderBy[i].direction === 'DESC' ? -order : order;
        }
      }
      return a.index - b.index;
    });

    matched = decorated.map((entry) => entry.record);
  }

  const offset = options.offset ?? 0;
  const end = options.limit === undefined ? undefined : offset + options.limit;

  return {
    items: matched.slice(offset, end),
    total: matched.length,
    offset,
    limit: options.limit,
  };
}

/**
 * Filter, order and slice a record collection.
 */
export function query<R = QueryRecord>(
  records: readonly R[],
  expression: ExpressionNode,
  options: QueryOptions<R> = {}
): R[] {
  return queryPage(records, expression, options).items;
}
