import { logger } from '../utils/logger.js';
import { resolveDialect, type Dialect, type DialectName } from './dialects.js';
import { Evaluator, type EvaluateOptions } from './Evaluator.js';
import { splitOrderBy } from './OrderByClause.js';
import { DEFAULT_MAX_DEPTH, parse } from './Parser.js';
import { queryPage } from './QueryDriver.js';
import { checkQueryLength, DEFAULT_MAX_QUERY_LENGTH, tokenize } from './Tokenizer.js';
import type {
  ExpressionNode,
  FieldResolver,
  MismatchPolicy,
  QueryPage,
  QueryRecord,
  SortKey,
} from './types.js';

export interface QueryEngineOptions {
  dialect?: Dialect | DialectName;
  /** Compiled queries kept in memory; 0 disables caching */
  cacheSize?: number;
  maxQueryLength?: number;
  maxDepth?: number;
  mismatch?: MismatchPolicy;
  dateFields?: readonly string[];
}

export interface CompiledQuery {
  readonly source: string;
  readonly expression: ExpressionNode;
  readonly orderBy: readonly SortKey[];
}

export interface SearchOptions<R> {
  offset?: number;
  limit?: number;
  /** Replaces any ORDER BY clause in the query text */
  orderBy?: readonly SortKey[];
  resolveField?: FieldResolver<R>;
}

/**
 * Compiles query strings in one dialect and runs them over record
 * collections.
 *
 * @remarks
 * Compiled queries are frozen, so one cache entry can serve any number of
 * searches. The cache evicts least recently used entries once `cacheSize`
 * is reached.
 *
 * @example
 * ```typescript
 * const engine = new QueryEngine({ dialect: 'jql' });
 * const page = engine.search(issues, "project = 'DEMO' ORDER BY created DESC", { limit: 10 });
 * ```
 */
export class QueryEngine {
  readonly dialect: Dialect;
  private readonly cache = new Map<string, CompiledQuery>();
  private readonly cacheSize: number;
  private readonly maxQueryLength: number;
  private readonly maxDepth: number;
  private readonly mismatch: MismatchPolicy;
  private readonly dateFields?: readonly string[];

  constructor(options: QueryEngineOptions = {}) {
    this.dialect = resolveDialect(options.dialect);
    this.cacheSize = options.cacheSize ?? 256;
    this.maxQueryLength = options.maxQueryLength ?? DEFAULT_MAX_QUERY_LENGTH;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.mismatch = options.mismatch ?? 'false';
    this.dateFields = options.dateFields;
  }

  /**
   * Tokenize and parse a query, reusing a cached result when one exists.
   *
   * @throws TokenizeError, ParseError
   */
  compile(source: string): CompiledQuery {
    const cached = this.cache.get(source);
    if (cached) {
      // Refresh recency
      this.cache.delete(source);
      this.cache.set(source, cached);
      logger.debug('query', 'compile:cache-hit', { dialect: this.dialect.name, source });
      return cached;
    }

    checkQueryLength(source, this.maxQueryLength);
    const { where, orderBy } = splitOrderBy(source, this.dialect);
    const tokens = tokenize(where, { dialect: this.dialect, maxLength: this.maxQueryLength });
    const expression = parse(tokens, { maxDepth: this.maxDepth, inputLength: where.length });
    const compiled: CompiledQuery = Object.freeze({
      source,
      expression,
      orderBy: Object.freeze(orderBy.map((key) => Object.freeze({ ...key }))),
    });

    logger.debug('query', 'compile:parsed', {
      dialect: this.dialect.name,
      source,
      tokenCount: tokens.length,
      orderBy,
    });

    if (this.cacheSize > 0) {
      if (this.cache.size >= this.cacheSize) {
        const oldest = this.cache.keys().next();
        if (!oldest.done) {
          this.cache.delete(oldest.value);
        }
      }
      this.cache.set(source, compiled);
    }

    return compiled;
  }

  /** Number of compiled queries currently cached */
  get cachedQueryCount(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * Evaluate a query against a single record.
   */
  matches<R = QueryRecord>(source: string, record: R, resolveField?: FieldResolver<R>): boolean {
    const { expression } = this.compile(source);
    return new Evaluator<R>(this.evaluateOptions(resolveField)).matches(expression, record);
  }

  /**
   * Filter, order and page a record collection.
   *
   * @throws TokenizeError, ParseError, QueryOptionsError, and
   * EvaluationTypeMismatch under the `throw` mismatch policy
   */
  search<R = QueryRecord>(
    records: readonly R[],
    source: string,
    options: SearchOptions<R> = {}
  ): QueryPage<R> {
    const compiled = this.compile(source);

    return logger.withTimer(
      'query:search',
      { dialect: this.dialect.name, source, recordCount: records.length },
      () =>
        queryPage(records, compiled.expression, {
          ...this.evaluateOptions(options.resolveField),
          orderBy: options.orderBy ?? compiled.orderBy,
          offset: options.offset,
          limit: options.limit,
        })
    );
  }

  private evaluateOptions<R>(resolveField?: FieldResolver<R>): EvaluateOptions<R> {
    return {
      dialect: this.dialect,
      dateFields: this.dateFields,
      mismatch: this.mismatch,
      resolveField,
    };
  }
}
