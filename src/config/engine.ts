import { isDialectName, type DialectName } from '../query/dialects.js';
import { DEFAULT_MAX_DEPTH } from '../query/Parser.js';
import { DEFAULT_MAX_QUERY_LENGTH } from '../query/Tokenizer.js';
import type { MismatchPolicy } from '../query/types.js';
import { toNumber } from './debug.js';

export interface EngineConfig {
  maxQueryLength: number;
  maxDepth: number;
  cacheSize: number;
  mismatch: MismatchPolicy;
  defaultDialect: DialectName;
}

const positive = (value: number, fallback: number) => (value > 0 ? value : fallback);

export function loadEngineConfig(): EngineConfig {
  const dialect = process.env.QUERY_DEFAULT_DIALECT?.trim().toLowerCase();
  const mismatch = process.env.QUERY_TYPE_MISMATCH?.trim().toLowerCase();

  return {
    maxQueryLength: positive(
      toNumber(process.env.QUERY_MAX_LENGTH, DEFAULT_MAX_QUERY_LENGTH),
      DEFAULT_MAX_QUERY_LENGTH
    ),
    maxDepth: positive(toNumber(process.env.QUERY_MAX_DEPTH, DEFAULT_MAX_DEPTH), DEFAULT_MAX_DEPTH),
    // 0 disables the compiled-query cache
    cacheSize: Math.max(0, toNumber(process.env.QUERY_CACHE_SIZE, 256)),
    mismatch: mismatch === 'throw' ? 'throw' : 'false',
    defaultDialect: dialect && isDialectName(dialect) ? dialect : 'generic',
  };
}
