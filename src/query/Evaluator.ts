/**
 * Evaluates expression trees against one record at a time.
 *
 * @remarks
 * **Missing fields:** an absent (`undefined` or `null`) field makes every
 * condition false except `EMPTY` and `NULL`, which match it.
 *
 * **Type mismatches:** relational operators on fields that are neither
 * numeric nor on the date allow-list, unparseable dates and non-boolean
 * literals against boolean fields are mismatches. The `false` policy treats
 * them as non-matches; the `throw` policy raises `EvaluationTypeMismatch`.
 */

import { parseDateLike, startOfUtcDay } from '../utils/dateUtils.js';
import { resolveDialect, type Dialect, type DialectName } from './dialects.js';
import { EvaluationTypeMismatch } from './QueryError.js';
import type {
  ConditionNode,
  ExpressionNode,
  FieldResolver,
  FieldValue,
  MismatchPolicy,
  Operator,
  QueryRecord,
  RelationalOperator,
} from './types.js';

export interface EvaluateOptions<R> {
  dialect?: Dialect | DialectName;
  /** Overrides the dialect's date allow-list */
  dateFields?: readonly string[];
  mismatch?: MismatchPolicy;
  resolveField?: FieldResolver<R>;
}

// ============================================================================
// Field resolution
// ============================================================================

function normalizeValue(raw: unknown): FieldValue | undefined {
  if (raw === undefined || raw === null) {
    return raw;
  }
  if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
    return raw;
  }
  if (raw instanceof Date) {
    return raw.toISOString();
  }
  if (Array.isArray(raw)) {
    return raw
      .filter((item): item is string | number | boolean =>
        ['string', 'number', 'boolean'].includes(typeof item)
      )
      .map((item) => String(item));
  }
  return undefined;
}

function readProperty(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  return Object.prototype.hasOwnProperty.call(source, key) ? Reflect.get(source, key) : undefined;
}

/**
 * Default resolver: an own property named `field`, or a dotted path
 * (`fields.status`) when no such property exists.
 */
export function resolveFieldPath(record: unknown, field: string): FieldValue | undefined {
  const direct = readProperty(record, field);
  if (direct !== undefined || !field.includes('.')) {
    return normalizeValue(direct);
  }

  let current: unknown = record;
  for (const segment of field.split('.')) {
    current = readProperty(current, segment);
    if (current === undefined) {
      return undefined;
    }
  }
  return normalizeValue(current);
}

// ============================================================================
// Comparison helpers
// ============================================================================

function isEmptyValue(value: FieldValue | undefined): boolean {
  if (value === undefined || value === null || value === '') {
    return true;
  }
  return isList(value) && value.length === 0;
}

function isList(value: FieldValue | undefined): value is readonly string[] {
  return Array.isArray(value);
}

function stringify(value: string | number | boolean): string {
  return String(value);
}

function parseNumber(text: string): number | null {
  if (text.trim() === '') {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseBoolean(text: string): boolean | null {
  const normalized = text.trim().toLowerCase();
  if (normalized === 'true') {
    return true;
  }
  if (normalized === 'false') {
    return false;
  }
  return null;
}

function compare(left: number, right: number, operator: RelationalOperator): boolean {
  switch (operator) {
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '>':
      return left > right;
    case '>=':
      return left >= right;
  }
}

/**
 * SQL LIKE: `%` matches any run of characters, `_` exactly one.
 */
export function likeToRegExp(pattern: string, ignoreCase: boolean): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '%') {
      source += '[\\s\\S]*';
    } else if (ch === '_') {
      source += '[\\s\\S]';
    } else {
      source += ch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, ignoreCase ? 'i' : '');
}

// ============================================================================
// Evaluator
// ============================================================================

type PresentValue = string | number | boolean | readonly string[];

export class Evaluator<R = QueryRecord> {
  private readonly dialect: Dialect;
  private readonly dateFields: ReadonlySet<string>;
  private readonly mismatchPolicy: MismatchPolicy;
  private readonly resolveField: FieldResolver<R>;

  constructor(options: EvaluateOptions<R> = {}) {
    this.dialect = resolveDialect(options.dialect);
    this.dateFields = new Set(options.dateFields ?? this.dialect.dateFields);
    this.mismatchPolicy = options.mismatch ?? 'false';
    this.resolveField = options.resolveField ?? resolveFieldPath;
  }

  matches(node: ExpressionNode, record: R): boolean {
    switch (node.type) {
      case 'always_true':
        return true;

      case 'logical': {
        const [left, right] = node.children;
        if (node.operator === 'AND') {
          return this.matches(left, record) && this.matches(right, record);
        }
        return this.matches(left, record) || this.matches(right, record);
      }

      case 'negation':
        return !this.matches(node.child, record);

      case 'condition':
        return this.condition(node, record);

      default: {
        const impossible: never = node;
        throw new Error(`Unsupported expression node: ${JSON.stringify(impossible)}`);
      }
    }
  }

  private condition(node: ConditionNode, record: R): boolean {
    const actual = this.resolveField(record, node.field);

    if (node.operator === 'EMPTY' || node.operator === 'NULL') {
      return isEmptyValue(actual);
    }

    if (actual === undefined || actual === null) {
      return false;
    }

    if (node.operator === 'IN') {
      return this.membership(node, actual);
    }

    if (node.value.kind !== 'text') {
      return this.mismatch(node.field, node.operator, 'expected a single quoted value');
    }
    const expected = node.value.text;

    switch (node.operator) {
      case '=': {
        const equal = this.equals(actual, expected, node.field);
        return equal ?? this.mismatch(node.field, '=', `"${expected}" is not a boolean`);
      }
      case '!=': {
        const equal = this.equals(actual, expected, node.field);
        return equal === null
          ? this.mismatch(node.field, '!=', `"${expected}" is not a boolean`)
          : !equal;
      }
      case '~':
        return this.containsText(actual, expected);
      case '!~':
        return !this.containsText(actual, expected);
      case 'CONTAINS':
        if (isList(actual)) {
          const needle = this.fold(expected);
          return actual.some((item) => this.fold(item) === needle);
        }
        return this.containsText(actual, expected);
      case 'LIKE': {
        const pattern = likeToRegExp(expected, this.dialect.containsIgnoresCase);
        return this.textsOf(actual).some((text) => pattern.test(text));
      }
      case '<':
      case '<=':
      case '>':
      case '>=':
        return this.relational(node.field, node.operator, actual, expected);
      default: {
        const impossible: never = node.operator;
        throw new Error(`Unsupported operator: ${String(impossible)}`);
      }
    }
  }

  /** `null` when a boolean field meets a literal that is not a boolean */
  private equals(actual: PresentValue, expected: string, field: string): boolean | null {
    if (typeof actual === 'boolean') {
      const parsed = parseBoolean(expected);
      return parsed === null ? null : actual === parsed;
    }

    if (typeof actual === 'number') {
      const parsed = parseNumber(expected);
      return parsed === null ? stringify(actual) === expected : actual === parsed;
    }

    if (isList(actual)) {
      return actual.includes(expected);
    }

    if (typeof actual === 'string' && this.dateFields.has(field)) {
      const left = this.toDate(actual);
      const right = this.toDate(expected);
      if (left !== null && right !== null) {
        return left === right;
      }
    }

    return actual === expected;
  }

  private membership(node: ConditionNode, actual: PresentValue): boolean {
    const { value } = node;

    if (value.kind === 'list') {
      const items = value.items;
      if (isList(actual)) {
        return actual.some((item) => items.includes(item));
      }
      return items.includes(this.textsOf(actual)[0] ?? '');
    }

    if (value.kind === 'text') {
      if (isList(actual)) {
        return actual.includes(value.text);
      }
      if (typeof actual === 'string') {
        return actual.includes(value.text);
      }
    }

    return this.mismatch(node.field, 'IN', 'the field is not a collection');
  }

  private relational(
    field: string,
    operator: RelationalOperator,
    actual: PresentValue,
    expected: string
  ): boolean {
    if (this.dateFields.has(field)) {
      const left = typeof actual === 'string' ? this.toDate(actual) : null;
      const right = this.toDate(expected);
      if (left === null || right === null) {
        return this.mismatch(field, operator, 'value is not a date');
      }
      return compare(left, right, operator);
    }

    if (typeof actual === 'number') {
      const right = parseNumber(expected);
      if (right === null) {
        return this.mismatch(field, operator, `"${expected}" is not a number`);
      }
      return compare(actual, right, operator);
    }

    return this.mismatch(field, operator, 'field is neither numeric nor date-like');
  }

  private toDate(text: string): number | null {
    const parsed = parseDateLike(text);
    if (parsed === null) {
      return null;
    }
    return this.dialect.dateGranularity === 'day' ? startOfUtcDay(parsed) : parsed;
  }

  private textsOf(actual: PresentValue): string[] {
    return isList(actual) ? [...actual] : [stringify(actual)];
  }

  private fold(text: string): string {
    return this.dialect.containsIgnoresCase ? text.toLowerCase() : text;
  }

  private containsText(actual: PresentValue, expected: string): boolean {
    const needle = this.fold(expected);
    return this.textsOf(actual).some((text) => this.fold(text).includes(needle));
  }

  private mismatch(field: string, operator: Operator, reason: string): boolean {
    if (this.mismatchPolicy === 'throw') {
      throw new EvaluationTypeMismatch(field, operator, reason);
    }
    return false;
  }
}

/**
 * Evaluate one expression tree against one record.
 */
export function evaluate<R = QueryRecord>(
  node: ExpressionNode,
  record: R,
  options: EvaluateOptions<R> = {}
): boolean {
  return new Evaluator<R>(options).matches(node, record);
}
