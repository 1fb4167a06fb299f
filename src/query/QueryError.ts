import type { Operator } from './types.js';

export type QueryErrorStage = 'tokenizer' | 'parser' | 'evaluator' | 'driver';

export interface QueryErrorOptions {
  message: string;
  position: number;
  length?: number;
  snippet?: string;
  hint?: string;
}

/**
 * Structured error for query failures with detailed context
 */
export class QueryError extends Error {
  /** Stage where the error occurred */
  public readonly stage: QueryErrorStage;

  /** Position in the input string where error occurred */
  public readonly position: number;

  /** Length of the problematic segment (if applicable) */
  public readonly length?: number;

  /** Snippet of the problematic part of the expression */
  public readonly snippet?: string;

  /** Human-readable troubleshooting hint */
  public readonly hint?: string;

  constructor(stage: QueryErrorStage, options: QueryErrorOptions) {
    super(options.message);
    this.name = 'QueryError';
    this.stage = stage;
    this.position = options.position;
    this.length = options.length;
    this.snippet = options.snippet;
    this.hint = options.hint;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      stage: this.stage,
      message: this.message,
      position: this.position,
      ...(this.snippet !== undefined ? { snippet: this.snippet } : {}),
      ...(this.hint !== undefined ? { hint: this.hint } : {}),
    };
  }
}

/** Malformed atom or unrecognised character sequence. */
export class TokenizeError extends QueryError {
  constructor(options: QueryErrorOptions) {
    super('tokenizer', options);
    this.name = 'TokenizeError';
  }
}

/** Structurally invalid token sequence. */
export class ParseError extends QueryError {
  /** Index into the token sequence where parsing failed */
  public readonly tokenIndex: number;

  constructor(options: QueryErrorOptions & { tokenIndex: number }) {
    super('parser', options);
    this.name = 'ParseError';
    this.tokenIndex = options.tokenIndex;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), tokenIndex: this.tokenIndex };
  }
}

/**
 * Operator applied to a value it cannot compare. Only raised when the
 * mismatch policy is `throw`; the default policy treats it as a non-match.
 */
export class EvaluationTypeMismatch extends QueryError {
  public readonly field: string;
  public readonly operator: Operator;

  constructor(field: string, operator: Operator, reason: string) {
    super('evaluator', {
      message: `Cannot apply ${operator} to field "${field}": ${reason}`,
      position: 0,
      snippet: `${field} ${operator}`,
      hint: 'Relational operators need a numeric field or a field on the date allow-list',
    });
    this.name = 'EvaluationTypeMismatch';
    this.field = field;
    this.operator = operator;
  }
}

/** Invalid offset, limit or ordering passed to the driver. */
export class QueryOptionsError extends QueryError {
  constructor(message: string, hint?: string) {
    super('driver', { message, position: 0, hint });
    this.name = 'QueryOptionsError';
  }
}
