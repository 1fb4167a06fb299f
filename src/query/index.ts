export type {
  ConditionValue,
  ExpressionNode,
  FieldResolver,
  FieldValue,
  MismatchPolicy,
  Operator,
  QueryPage,
  QueryRecord,
  SortDirection,
  SortKey,
  Token,
} from './types.js';
export { OPERATORS } from './types.js';

export { DIALECTS, DEFAULT_DIALECT, isDialectName, resolveDialect } from './dialects.js';
export type { Dialect, DialectName, KeywordCase } from './dialects.js';

export {
  QueryError,
  TokenizeError,
  ParseError,
  EvaluationTypeMismatch,
  QueryOptionsError,
} from './QueryError.js';

export { checkQueryLength, tokenize } from './Tokenizer.js';
export { parse, ALWAYS_TRUE } from './Parser.js';
export { evaluate, Evaluator, resolveFieldPath } from './Evaluator.js';
export { query, queryPage } from './QueryDriver.js';
export type { QueryOptions } from './QueryDriver.js';
export { serialize } from './Serializer.js';
export { splitOrderBy, parseSortList } from './OrderByClause.js';
export { QueryEngine } from './QueryEngine.js';
export type { CompiledQuery, QueryEngineOptions, SearchOptions } from './QueryEngine.js';
