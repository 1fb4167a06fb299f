import { keywordMatches, resolveDialect, type Dialect, type DialectName } from './dialects.js';
import { ParseError } from './QueryError.js';
import type { SortDirection, SortKey } from './types.js';

const FIELD = /^[A-Za-z_][A-Za-z0-9_.]*$/;

export interface SplitQuery {
  where: string;
  orderBy: SortKey[];
}

/**
 * Find where a trailing `ORDER BY` clause starts, skipping quoted literals.
 * Returns -1 when there is none.
 */
function findOrderBy(query: string, dialect: Dialect): number {
  let quote: string | null = null;

  for (let i = 0; i < query.length; i++) {
    const ch = query[i];

    if (quote) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (dialect.quotes.includes(ch)) {
      quote = ch;
      continue;
    }

    if (i > 0 && /[A-Za-z0-9_.]/.test(query[i - 1])) {
      continue;
    }

    const match = /^([A-Za-z]+)\s+([A-Za-z]+)(?![A-Za-z0-9_.])/.exec(query.slice(i));
    if (match && keywordMatches(dialect, match[1], 'ORDER') && keywordMatches(dialect, match[2], 'BY')) {
      return i;
    }
  }

  return -1;
}

function parseSortKey(dialect: Dialect, text: string, position: number, index: number): SortKey {
  const parts = text.trim().split(/\s+/).filter(Boolean);
  const [field, direction, ...rest] = parts;

  if (!field || !FIELD.test(field) || rest.length > 0) {
    throw new ParseError({
      message: `Invalid ORDER BY key "${text.trim()}" at position ${position}`,
      position,
      tokenIndex: -1,
      snippet: text.trim(),
      hint: 'Write ORDER BY field [ASC|DESC], field [ASC|DESC]',
    });
  }

  let resolved: SortDirection = 'ASC';
  if (direction !== undefined) {
    if (keywordMatches(dialect, direction, 'DESC')) {
      resolved = 'DESC';
    } else if (!keywordMatches(dialect, direction, 'ASC')) {
      throw new ParseError({
        message: `Invalid sort direction "${direction}" for ORDER BY key ${index + 1}`,
        position,
        tokenIndex: -1,
        snippet: direction,
        hint: 'Sort direction must be ASC or DESC',
      });
    }
  }

  return { field, direction: resolved };
}

/**
 * Separate a trailing `ORDER BY f1 [ASC|DESC], f2 ...` clause from the
 * condition text. Dialects without ORDER BY support return the query as is.
 *
 * `tokenIndex` on errors raised here is -1: the failure lies after the
 * condition tokens.
 */
export function splitOrderBy(query: string, dialect?: Dialect | DialectName): SplitQuery {
  const resolved = resolveDialect(dialect);
  if (!resolved.orderBy) {
    return { where: query, orderBy: [] };
  }

  const start = findOrderBy(query, resolved);
  if (start === -1) {
    return { where: query, orderBy: [] };
  }

  const clause = query.slice(start).replace(/^[A-Za-z]+\s+[A-Za-z]+/, '');
  const clauseStart = query.length - clause.length;
  if (clause.trim() === '') {
    throw new ParseError({
      message: `ORDER BY without a field at position ${start}`,
      position: start,
      tokenIndex: -1,
      snippet: query.slice(start),
      hint: 'Name at least one field after ORDER BY',
    });
  }

  let offset = clauseStart;
  const orderBy = clause.split(',').map((part, index) => {
    const key = parseSortKey(resolved, part, offset, index);
    offset += part.length + 1;
    return key;
  });

  return { where: query.slice(0, start).trimEnd(), orderBy };
}

/**
 * Parse a Drive-style ordering list: `"modifiedTime desc,name"`.
 */
export function parseSortList(text: string): SortKey[] {
  return splitOrderBy(`ORDER BY ${text}`, 'generic').orderBy;
}
