import { resolveDialect, spellKeyword, type Dialect, type DialectName } from './dialects.js';
import type { ConditionNode, ExpressionNode } from './types.js';

const PRECEDENCE = { OR: 1, AND: 2 } as const;

function quote(dialect: Dialect, text: string): string {
  const mark = dialect.quotes[0] ?? "'";
  const escaped = text.replace(/\\/g, '\\\\').split(mark).join(`\\${mark}`);
  return `${mark}${escaped}${mark}`;
}

function serializeCondition(dialect: Dialect, node: ConditionNode): string {
  const kw = (keyword: string) => spellKeyword(dialect, keyword);
  const { field, operator, value } = node;

  switch (value.kind) {
    case 'none':
      return `${field} ${kw('IS')} ${kw(operator)}`;
    case 'list':
      return `${field} ${kw(operator)} (${value.items.map((item) => quote(dialect, item)).join(', ')})`;
    case 'text':
      if (operator === 'IN') {
        return `${quote(dialect, value.text)} ${kw('IN')} ${field}`;
      }
      if (operator === 'LIKE' || operator === 'CONTAINS') {
        return `${field} ${kw(operator)} ${quote(dialect, value.text)}`;
      }
      return `${field} ${operator} ${quote(dialect, value.text)}`;
  }
}

function serializeNode(dialect: Dialect, node: ExpressionNode): string {
  switch (node.type) {
    case 'always_true':
      return '';

    case 'condition':
      return serializeCondition(dialect, node);

    case 'negation': {
      const child = serializeNode(dialect, node.child);
      const wrapped = node.child.type === 'logical' ? `(${child})` : child;
      return `${spellKeyword(dialect, 'NOT')} ${wrapped}`;
    }

    case 'logical': {
      const own = PRECEDENCE[node.operator];
      const [left, right] = node.children;

      // Binary nodes parse left-associatively, so an equal-precedence right
      // child needs parentheses to keep its shape
      const leftText = serializeNode(dialect, left);
      const rightText = serializeNode(dialect, right);
      const wrapLeft = left.type === 'logical' && PRECEDENCE[left.operator] < own;
      const wrapRight = right.type === 'logical' && PRECEDENCE[right.operator] <= own;

      return [
        wrapLeft ? `(${leftText})` : leftText,
        spellKeyword(dialect, node.operator),
        wrapRight ? `(${rightText})` : rightText,
      ].join(' ');
    }
  }
}

/**
 * Canonical query text for an expression tree. Tokenizing and parsing the
 * result in the same dialect yields a structurally equal tree.
 */
export function serialize(node: ExpressionNode, dialect?: Dialect | DialectName): string {
  return serializeNode(resolveDialect(dialect), node);
}
