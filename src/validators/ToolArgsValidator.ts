import { DIALECTS, isDialectName, type DialectName } from '../query/dialects.js';
import { isStoredRecord, type StoredRecord } from '../store/IRecordStore.js';
import type {
  ExplainQueryToolArgs,
  PutRecordsToolArgs,
  SearchRecordsToolArgs,
} from '../server/types.js';

export type ToolArguments = Record<string, unknown> | undefined;

/**
 * Validates raw MCP tool arguments into typed argument objects.
 * Range checks (negative offsets and the like) are left to the query driver.
 */
export class ToolArgsValidator {
  static putRecords(args: ToolArguments): PutRecordsToolArgs {
    return {
      collection: this.requireString(args, 'collection'),
      records: this.requireRecords(args, 'records'),
      dialect: this.optionalDialect(args, 'dialect'),
      idField: this.optionalString(args, 'idField'),
    };
  }

  static searchRecords(args: ToolArguments): SearchRecordsToolArgs {
    return {
      collection: this.requireString(args, 'collection'),
      query: this.optionalString(args, 'query'),
      dialect: this.optionalDialect(args, 'dialect'),
      offset: this.optionalNumber(args, 'offset'),
      limit: this.optionalNumber(args, 'limit'),
      orderBy: this.optionalString(args, 'orderBy'),
    };
  }

  static explainQuery(args: ToolArguments): ExplainQueryToolArgs {
    return {
      query: this.requireString(args, 'query', true),
      dialect: this.optionalDialect(args, 'dialect'),
    };
  }

  private static requireString(args: ToolArguments, key: string, allowEmpty = false): string {
    const value = args?.[key];
    if (typeof value !== 'string' || (!allowEmpty && value.trim() === '')) {
      throw new ValidationError(`"${key}" is required and must be a non-empty string`);
    }
    return value;
  }

  private static optionalString(args: ToolArguments, key: string): string | undefined {
    const value = args?.[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new ValidationError(`"${key}" must be a string, got ${typeof value}`);
    }
    return value;
  }

  private static optionalNumber(args: ToolArguments, key: string): number | undefined {
    const value = args?.[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'number') {
      throw new ValidationError(`"${key}" must be a number, got ${typeof value}`);
    }
    return value;
  }

  private static optionalDialect(args: ToolArguments, key: string): DialectName | undefined {
    const value = this.optionalString(args, key);
    if (value === undefined) {
      return undefined;
    }
    const normalized = value.trim().toLowerCase();
    if (!isDialectName(normalized)) {
      throw new ValidationError(
        `Invalid ${key}: "${value}". Must be one of: ${Object.keys(DIALECTS).join(', ')}`
      );
    }
    return normalized;
  }

  private static requireRecords(args: ToolArguments, key: string): StoredRecord[] {
    const value = args?.[key];
    if (!Array.isArray(value)) {
      throw new ValidationError(`"${key}" must be an array of objects`);
    }

    const records: StoredRecord[] = [];
    value.forEach((item: unknown, index) => {
      if (!isStoredRecord(item)) {
        throw new ValidationError(`"${key}[${index}]" must be an object`);
      }
      records.push(item);
    });
    return records;
  }
}

/**
 * Custom error for tool argument validation failures
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
