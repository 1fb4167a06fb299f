import { OPERATORS, type Operator } from './types.js';

export type KeywordCase = 'upper' | 'lower' | 'insensitive';

export type DateGranularity = 'day' | 'instant';

export type DialectName = 'cql' | 'jql' | 'drive' | 'soql' | 'generic';

/**
 * One configuration of the shared grammar. Dialects differ in keyword
 * spelling, accepted operators and a few comparison details, never in
 * parser or evaluator code.
 */
export interface Dialect {
  name: DialectName;
  keywordCase: KeywordCase;
  quotes: readonly string[];
  operators: ReadonlySet<Operator>;
  orderBy: boolean;
  containsIgnoresCase: boolean;
  dateGranularity: DateGranularity;
  /** Fields relational operators treat as dates */
  dateFields: readonly string[];
}

const SYMBOLIC: readonly Operator[] = ['=', '!=', '<', '<=', '>', '>='];

export const DIALECTS: Readonly<Record<DialectName, Dialect>> = {
  cql: {
    name: 'cql',
    keywordCase: 'lower',
    quotes: ["'"],
    operators: new Set<Operator>([...SYMBOLIC, '~', '!~']),
    orderBy: false,
    containsIgnoresCase: false,
    dateGranularity: 'instant',
    dateFields: ['created', 'lastModified'],
  },
  jql: {
    name: 'jql',
    keywordCase: 'upper',
    quotes: ["'", '"'],
    operators: new Set<Operator>([...SYMBOLIC, '~', '!~', 'EMPTY', 'NULL', 'IN']),
    orderBy: true,
    containsIgnoresCase: true,
    dateGranularity: 'day',
    dateFields: ['created', 'updated', 'duedate'],
  },
  drive: {
    name: 'drive',
    keywordCase: 'lower',
    quotes: ["'", '"'],
    operators: new Set<Operator>([...SYMBOLIC, 'IN', 'CONTAINS']),
    orderBy: false,
    containsIgnoresCase: false,
    dateGranularity: 'instant',
    dateFields: ['createdTime', 'modifiedTime'],
  },
  soql: {
    name: 'soql',
    keywordCase: 'upper',
    quotes: ["'"],
    operators: new Set<Operator>([...SYMBOLIC, 'IN', 'LIKE', 'CONTAINS']),
    orderBy: true,
    containsIgnoresCase: true,
    dateGranularity: 'instant',
    dateFields: ['CreatedDate', 'LastModifiedDate'],
  },
  generic: {
    name: 'generic',
    keywordCase: 'insensitive',
    quotes: ["'", '"'],
    operators: new Set<Operator>(OPERATORS),
    orderBy: true,
    containsIgnoresCase: false,
    dateGranularity: 'instant',
    dateFields: ['created', 'updated_at'],
  },
};

export const DEFAULT_DIALECT: Dialect = DIALECTS.generic;

export function isDialectName(value: string): value is DialectName {
  return Object.prototype.hasOwnProperty.call(DIALECTS, value);
}

export function resolveDialect(dialect?: Dialect | DialectName): Dialect {
  if (dialect === undefined) {
    return DEFAULT_DIALECT;
  }
  return typeof dialect === 'string' ? DIALECTS[dialect] : dialect;
}

/**
 * Case-aware keyword comparison. `word` is the raw input text and `keyword`
 * its canonical upper-case spelling.
 */
export function keywordMatches(dialect: Dialect, word: string, keyword: string): boolean {
  switch (dialect.keywordCase) {
    case 'upper':
      return word === keyword;
    case 'lower':
      return word === keyword.toLowerCase();
    case 'insensitive':
      return word.toUpperCase() === keyword;
  }
}

/** Spelling of a keyword when writing queries in this dialect. */
export function spellKeyword(dialect: Dialect, keyword: string): string {
  return dialect.keywordCase === 'lower' ? keyword.toLowerCase() : keyword;
}
