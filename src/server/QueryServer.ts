import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { loadEngineConfig, type EngineConfig } from '../config/engine.js';
import { DIALECTS } from '../query/dialects.js';
import type { IRecordStore } from '../store/IRecordStore.js';
import { InMemoryRecordStore } from '../store/InMemoryRecordStore.js';
import { logger } from '../utils/logger.js';
import { QueryController, type McpContent } from './QueryController.js';

const DIALECT_NAMES = Object.keys(DIALECTS);

export function createQueryServer(config?: { store?: IRecordStore; engine?: EngineConfig }): Server {
  const engine = config?.engine ?? loadEngineConfig();
  const store =
    config?.store ??
    new InMemoryRecordStore({
      defaultDialect: engine.defaultDialect,
      engine: {
        cacheSize: engine.cacheSize,
        maxQueryLength: engine.maxQueryLength,
        maxDepth: engine.maxDepth,
        mismatch: engine.mismatch,
      },
    });

  logger.info('configuration-loaded', {
    defaultDialect: engine.defaultDialect,
    mismatch: engine.mismatch,
    maxQueryLength: engine.maxQueryLength,
    maxDepth: engine.maxDepth,
    cacheSize: engine.cacheSize,
  });

  const controller = new QueryController(store, engine);

  const server = new Server(
    {
      name: 'record-query-server',
      version: '1.0.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: 'put_records',
          description:
            'Insert or replace JSON records in a collection, creating it on first use. Records are matched by their id field; records without one get a generated id.',
          inputSchema: {
            type: 'object',
            properties: {
              collection: { type: 'string', description: 'Collection name.' },
              records: {
                type: 'array',
                items: { type: 'object' },
                description: 'Records to store.',
              },
              dialect: {
                type: 'string',
                enum: DIALECT_NAMES,
                description:
                  'Query dialect for a new collection (default: QUERY_DEFAULT_DIALECT). Ignored for existing collections.',
              },
              idField: {
                type: 'string',
                description: 'Field holding the record id for a new collection (default: id).',
              },
            },
            required: ['collection', 'records'],
          },
        },
        {
          name: 'search_records',
          description:
            "Filter a collection with a boolean query such as \"status = 'open' AND (priority >= '2' OR NOT assignee IS EMPTY)\", then order and page the matches.",
          inputSchema: {
            type: 'object',
            properties: {
              collection: { type: 'string', description: 'Collection name.' },
              query: {
                type: 'string',
                description: 'Query text in the collection dialect. Empty matches every record.',
              },
              dialect: {
                type: 'string',
                enum: DIALECT_NAMES,
                description: "Parse the query in this dialect instead of the collection's own.",
              },
              offset: { type: 'number', description: 'Matches to skip (default 0).' },
              limit: { type: 'number', description: 'Maximum records to return.' },
              orderBy: {
                type: 'string',
                description:
                  'Sort keys, e.g. "created desc,title". Overrides an ORDER BY clause in the query.',
              },
            },
            required: ['collection'],
          },
        },
        {
          name: 'explain_query',
          description:
            'Tokenize and parse a query without running it. Returns the canonical text, tokens, ORDER BY keys and expression tree, or the position of the first error.',
          inputSchema: {
            type: 'object',
            properties: {
              query: { type: 'string', description: 'Query text.' },
              dialect: {
                type: 'string',
                enum: DIALECT_NAMES,
                description: 'Dialect to parse with (default: QUERY_DEFAULT_DIALECT).',
              },
            },
            required: ['query'],
          },
        },
        {
          name: 'list_collections',
          description: 'List collections with their record counts, dialects and id fields.',
          inputSchema: {
            type: 'object',
            properties: {},
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const start = Date.now();

    logger.debug('server', 'request:start', {
      tool: name,
      argumentsSize: args ? JSON.stringify(args).length : 0,
    });

    let result: McpContent;
    switch (name) {
      case 'put_records':
        result = await controller.handlePutRecordsTool(args);
        break;
      case 'search_records':
        result = await controller.handleSearchRecordsTool(args);
        break;
      case 'explain_query':
        result = await controller.handleExplainQueryTool(args);
        break;
      case 'list_collections':
        result = await controller.handleListCollectionsTool();
        break;
      default:
        logger.warn('request:unknown-tool', { tool: name });
        return {
          content: [{ type: 'text', text: `Error: Unknown tool: ${name}` }],
          isError: true,
        };
    }

    logger.metric('tool:timing', {
      tool: name,
      durationMs: Date.now() - start,
      status: result.isError ? 'error' : 'success',
    });

    return result;
  });

  return server;
}
