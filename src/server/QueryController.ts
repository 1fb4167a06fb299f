import type { EngineConfig } from '../config/engine.js';
import type { DialectName } from '../query/dialects.js';
import { parseSortList, splitOrderBy } from '../query/OrderByClause.js';
import { parse } from '../query/Parser.js';
import { QueryError } from '../query/QueryError.js';
import { serialize } from '../query/Serializer.js';
import { checkQueryLength, tokenize } from '../query/Tokenizer.js';
import type { IRecordStore } from '../store/IRecordStore.js';
import { StoreError } from '../store/StoreError.js';
import { logger } from '../utils/logger.js';
import { ToolArgsValidator, ValidationError, type ToolArguments } from '../validators/ToolArgsValidator.js';
import type {
  ExplainQueryResult,
  ListCollectionsResult,
  PutRecordsResult,
  SearchRecordsResult,
} from './types.js';

/**
 * MCP Content format for responses
 */
export type McpContent = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

/**
 * Error payload returned to MCP clients. Query errors carry their stage,
 * position and hint; store errors their code.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof QueryError) {
    return error.toJSON();
  }
  if (error instanceof StoreError) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

/**
 * QueryController - MCP tool layer over a record store.
 *
 * Each handler validates its raw arguments, runs the operation and formats
 * the result as MCP text content. Failures never escape a handler: they come
 * back as `isError` content describing the error.
 *
 * @example
 * ```typescript
 * const controller = new QueryController(new InMemoryRecordStore(), loadEngineConfig());
 *
 * await controller.handlePutRecordsTool({
 *   collection: 'issues',
 *   dialect: 'jql',
 *   records: [{ id: 'DEMO-1', status: 'Open' }],
 * });
 * const result = await controller.handleSearchRecordsTool({
 *   collection: 'issues',
 *   query: "status = 'Open'",
 * });
 * ```
 */
export class QueryController {
  constructor(
    private readonly store: IRecordStore,
    private readonly config: EngineConfig
  ) {}

  /**
   * Format a result as MCP content
   */
  private formatResponse(result: unknown, summary?: string, isError = false): McpContent {
    const text = summary
      ? `${summary}\n\n${JSON.stringify(result, null, 2)}`
      : JSON.stringify(result, null, 2);

    return {
      content: [
        {
          type: 'text',
          text,
        },
      ],
      isError,
    };
  }

  private formatError(tool: string, error: unknown): McpContent {
    const described = describeError(error);

    // Bad input is the caller's problem; anything else is ours
    if (
      error instanceof QueryError ||
      error instanceof StoreError ||
      error instanceof ValidationError
    ) {
      logger.debug('server', `${tool}:rejected`, described);
    } else {
      logger.error(`${tool} failed`, error);
    }

    return this.formatResponse({ error: described }, `Error: ${String(described.message)}`, true);
  }

  /**
   * Handle PUT_RECORDS tool
   */
  async handlePutRecordsTool(args: ToolArguments): Promise<McpContent> {
    try {
      const { collection, records, dialect, idField } = ToolArgsValidator.putRecords(args);
      const ids = await this.store.putRecords(collection, records, { dialect, idField });

      const result: PutRecordsResult = { collection, ids };
      return this.formatResponse(result, `Stored ${ids.length} records in "${collection}".`);
    } catch (error) {
      return this.formatError('put_records', error);
    }
  }

  /**
   * Handle SEARCH_RECORDS tool
   */
  async handleSearchRecordsTool(args: ToolArguments): Promise<McpContent> {
    try {
      const { collection, query, dialect, offset, limit, orderBy } =
        ToolArgsValidator.searchRecords(args);

      const page = await this.store.search(collection, query ?? '', {
        dialect,
        offset,
        limit,
        orderBy: orderBy?.trim() ? parseSortList(orderBy) : undefined,
      });

      const result: SearchRecordsResult = {
        collection,
        total: page.total,
        offset: page.offset,
        limit: page.limit,
        records: page.items,
      };
      return this.formatResponse(
        result,
        `Found ${page.total} matching records; returning ${page.items.length}.`
      );
    } catch (error) {
      return this.formatError('search_records', error);
    }
  }

  /**
   * Handle EXPLAIN_QUERY tool
   */
  async handleExplainQueryTool(args: ToolArguments): Promise<McpContent> {
    try {
      const { query, dialect = this.config.defaultDialect } = ToolArgsValidator.explainQuery(args);
      const result = this.explain(query, dialect);

      return this.formatResponse(result, `Canonical form: ${result.canonical || '(matches everything)'}`);
    } catch (error) {
      return this.formatError('explain_query', error);
    }
  }

  /**
   * Handle LIST_COLLECTIONS tool
   */
  async handleListCollectionsTool(): Promise<McpContent> {
    try {
      const result: ListCollectionsResult = { collections: await this.store.listCollections() };
      return this.formatResponse(result, `Found ${result.collections.length} collections.`);
    } catch (error) {
      return this.formatError('list_collections', error);
    }
  }

  private explain(query: string, dialect: DialectName): ExplainQueryResult {
    checkQueryLength(query, this.config.maxQueryLength);
    const { where, orderBy } = splitOrderBy(query, dialect);
    const tokens = tokenize(where, { dialect, maxLength: this.config.maxQueryLength });
    const expression = parse(tokens, { maxDepth: this.config.maxDepth, inputLength: where.length });

    return {
      dialect,
      canonical: serialize(expression, dialect),
      orderBy,
      tokens,
      expression,
    };
  }
}
