/**
 * Core types shared by the tokenizer, parser, evaluator and driver.
 */

// ============================================================================
// Operators and values
// ============================================================================

export const OPERATORS = [
  '=',
  '!=',
  '<',
  '<=',
  '>',
  '>=',
  '~',
  '!~',
  'EMPTY',
  'NULL',
  'IN',
  'LIKE',
  'CONTAINS',
] as const;

export type Operator = (typeof OPERATORS)[number];

export type RelationalOperator = '<' | '<=' | '>' | '>=';

/**
 * Right-hand side of a condition.
 *
 * `IN` with a `text` value is the container form (`'alice' in owners`);
 * `IN` with a `list` value is the SQL form (`status IN ('open', 'done')`).
 */
export type ConditionValue =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'list'; readonly items: readonly string[] }
  | { readonly kind: 'none' };

// ============================================================================
// Tokens
// ============================================================================

export type KeywordTokenType = 'AND' | 'OR' | 'NOT' | 'LPAREN' | 'RPAREN';

export interface KeywordToken {
  readonly type: KeywordTokenType;
  readonly position: number;
}

export interface ConditionToken {
  readonly type: 'CONDITION';
  readonly field: string;
  readonly operator: Operator;
  readonly value: ConditionValue;
  readonly position: number;
}

export type Token = KeywordToken | ConditionToken;

// ============================================================================
// Expression tree
// ============================================================================

export type ExpressionNode = AlwaysTrueNode | ConditionNode | LogicalNode | NegationNode;

export interface AlwaysTrueNode {
  readonly type: 'always_true';
}

export interface ConditionNode {
  readonly type: 'condition';
  readonly field: string;
  readonly operator: Operator;
  readonly value: ConditionValue;
}

export interface LogicalNode {
  readonly type: 'logical';
  readonly operator: 'AND' | 'OR';
  readonly children: readonly [ExpressionNode, ExpressionNode];
}

export interface NegationNode {
  readonly type: 'negation';
  readonly child: ExpressionNode;
}

// ============================================================================
// Records
// ============================================================================

export type FieldValue = string | number | boolean | readonly string[] | null;

export type QueryRecord = { readonly [field: string]: FieldValue | undefined };

/** Reads one field of a caller-owned record. */
export type FieldResolver<R> = (record: R, field: string) => FieldValue | undefined;

// ============================================================================
// Ordering and pages
// ============================================================================

export type SortDirection = 'ASC' | 'DESC';

export interface SortKey {
  field: string;
  direction: SortDirection;
}

export interface QueryPage<R> {
  items: R[];
  /** Matches before offset/limit were applied */
  total: number;
  offset: number;
  limit?: number;
}

export type MismatchPolicy = 'false' | 'throw';
