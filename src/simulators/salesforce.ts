import { resolveFieldPath } from '../query/Evaluator.js';
import { ParseError } from '../query/QueryError.js';
import type { IRecordStore, StoredRecord } from '../store/IRecordStore.js';

const STATEMENT = /^\s*SELECT\s+([\s\S]+?)\s+FROM\s+([A-Za-z_][A-Za-z0-9_]*)(?:\s+([\s\S]*))?$/;
const FIELD = /^[A-Za-z_][A-Za-z0-9_.]*$/;
const COUNT = /^count\(\s*\)$/i;
const SYNTAX_HINT = 'Write SELECT field, ... FROM Object [WHERE ...] [ORDER BY ...] [LIMIT n] [OFFSET n]';

export interface SoqlStatement {
  fields: string[];
  /** `SELECT COUNT() FROM ...` */
  count: boolean;
  object: string;
  /** WHERE condition followed by any ORDER BY clause, ready for the soql dialect */
  query: string;
  limit?: number;
  offset?: number;
}

export interface QueryResult {
  totalSize: number;
  done: true;
  records: StoredRecord[];
}

function malformed(message: string, soql: string, snippet?: string): ParseError {
  return new ParseError({
    message,
    position: snippet === undefined ? 0 : Math.max(0, soql.indexOf(snippet)),
    tokenIndex: -1,
    snippet: snippet ?? soql.trim(),
    hint: SYNTAX_HINT,
  });
}

/** Remove a trailing `KEYWORD n` and return its number. */
function takeTrailingNumber(
  rest: string,
  keyword: 'LIMIT' | 'OFFSET'
): { rest: string; value?: number } {
  const match = new RegExp(`(?:^|\\s)${keyword}\\s+(\\d+)$`).exec(rest);
  if (!match) {
    return { rest };
  }
  return { rest: rest.slice(0, match.index).trimEnd(), value: Number(match[1]) };
}

/**
 * Split a SOQL statement into its clauses. Keywords are upper case, like
 * the rest of the soql dialect.
 *
 * @throws ParseError for statements outside the supported subset
 */
export function parseSoql(soql: string): SoqlStatement {
  const match = STATEMENT.exec(soql.trim());
  if (!match) {
    throw malformed('Malformed SOQL statement', soql);
  }

  const [, fieldList, object, tail = ''] = match;
  const fields = fieldList.split(',').map((field) => field.trim());
  const count = fields.length === 1 && COUNT.test(fields[0]);
  if (!count) {
    const bad = fields.find((field) => !FIELD.test(field));
    if (bad !== undefined) {
      throw malformed(`Invalid field "${bad}" in SELECT list`, soql, bad || undefined);
    }
  }

  const afterOffset = takeTrailingNumber(tail.trim(), 'OFFSET');
  const afterLimit = takeTrailingNumber(afterOffset.rest, 'LIMIT');
  let rest = afterLimit.rest;

  if (/^WHERE(\s|$)/.test(rest)) {
    rest = rest.slice('WHERE'.length).trim();
    if (rest === '' || /^ORDER\s+BY(\s|$)/.test(rest)) {
      throw malformed('WHERE without a condition', soql, 'WHERE');
    }
  } else if (rest !== '' && !/^ORDER\s+BY(\s|$)/.test(rest)) {
    throw malformed(`Unexpected clause after FROM ${object}`, soql, rest);
  }

  return {
    fields: count ? [] : fields,
    count,
    object,
    query: rest,
    limit: afterLimit.value,
    offset: afterOffset.value,
  };
}

function project(record: StoredRecord, object: string, fields: readonly string[]): StoredRecord {
  const projected: Record<string, unknown> = { attributes: { type: object } };
  for (const field of fields) {
    const value = Object.prototype.hasOwnProperty.call(record, field)
      ? record[field]
      : resolveFieldPath(record, field);
    projected[field] = value ?? null;
  }
  return projected;
}

/**
 * Salesforce query endpoint. The FROM object names the collection; records
 * come back projected onto the SELECT list with an `attributes.type` entry.
 * Objects with no stored records yield no rows.
 */
export async function queryRecords(store: IRecordStore, soql: string): Promise<QueryResult> {
  const statement = parseSoql(soql);

  if (statement.count) {
    const page = await store.search(statement.object, statement.query, {
      dialect: 'soql',
      allowMissing: true,
    });
    return { totalSize: page.total, done: true, records: [] };
  }

  const page = await store.search(statement.object, statement.query, {
    dialect: 'soql',
    allowMissing: true,
    offset: statement.offset,
    limit: statement.limit,
  });
  const records = page.items.map((record) => project(record, statement.object, statement.fields));

  return { totalSize: records.length, done: true, records };
}
