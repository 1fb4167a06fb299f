import { describe, it, expect } from '@jest/globals';
import { ALWAYS_TRUE, parse, type ParseOptions } from '../Parser.js';
import { ParseError } from '../QueryError.js';
import { tokenize } from '../Tokenizer.js';
import type { ExpressionNode } from '../types.js';

const parseQuery = (query: string, options?: ParseOptions) =>
  parse(tokenize(query), { inputLength: query.length, ...options });

function parseError(query: string, options?: ParseOptions): ParseError {
  try {
    parseQuery(query, options);
  } catch (error) {
    if (error instanceof ParseError) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected "${query}" to fail parsing`);
}

const cond = (field: string, text: string): ExpressionNode => ({
  type: 'condition',
  field,
  operator: '=',
  value: { kind: 'text', text },
});

describe('parse', () => {
  describe('structure', () => {
    it('should return AlwaysTrue for no tokens', () => {
      expect(parse([])).toBe(ALWAYS_TRUE);
      expect(parseQuery('  ')).toEqual({ type: 'always_true' });
    });

    it('should bind AND tighter than OR', () => {
      expect(parseQuery("a = '1' OR b = '2' AND c = '3'")).toEqual({
        type: 'logical',
        operator: 'OR',
        children: [
          cond('a', '1'),
          { type: 'logical', operator: 'AND', children: [cond('b', '2'), cond('c', '3')] },
        ],
      });
    });

    it('should associate binary operators to the left', () => {
      expect(parseQuery("a = '1' AND b = '2' AND c = '3'")).toEqual({
        type: 'logical',
        operator: 'AND',
        children: [
          { type: 'logical', operator: 'AND', children: [cond('a', '1'), cond('b', '2')] },
          cond('c', '3'),
        ],
      });
    });

    it('should bind NOT tighter than AND', () => {
      expect(parseQuery("NOT a = '1' AND b = '2'")).toEqual({
        type: 'logical',
        operator: 'AND',
        children: [{ type: 'negation', child: cond('a', '1') }, cond('b', '2')],
      });
    });

    it('should let parentheses override precedence', () => {
      expect(parseQuery("(a = '1' OR b = '2') AND c = '3'")).toEqual({
        type: 'logical',
        operator: 'AND',
        children: [
          { type: 'logical', operator: 'OR', children: [cond('a', '1'), cond('b', '2')] },
          cond('c', '3'),
        ],
      });
      expect(parseQuery("NOT (a = '1' OR b = '2')")).toEqual({
        type: 'negation',
        child: { type: 'logical', operator: 'OR', children: [cond('a', '1'), cond('b', '2')] },
      });
    });

    it('should freeze the whole tree', () => {
      const tree = parseQuery("NOT a = '1' OR b IN ('x', 'y')");

      expect(Object.isFrozen(tree)).toBe(true);
      if (tree.type !== 'logical') {
        throw new Error('expected a logical node');
      }
      const [negation, membership] = tree.children;
      expect(Object.isFrozen(tree.children)).toBe(true);
      expect(Object.isFrozen(negation)).toBe(true);
      expect(Object.isFrozen(membership)).toBe(true);
      if (membership.type !== 'condition' || membership.value.kind !== 'list') {
        throw new Error('expected a list condition');
      }
      expect(Object.isFrozen(membership.value)).toBe(true);
      expect(Object.isFrozen(membership.value.items)).toBe(true);
    });

    it('should not share list arrays with the tokens', () => {
      const tokens = tokenize("a IN ('x')");
      const tree = parse(tokens);
      const [token] = tokens;

      if (tree.type !== 'condition' || token.type !== 'CONDITION') {
        throw new Error('expected a condition');
      }
      expect(tree.value).toEqual(token.value);
      expect(tree.value).not.toBe(token.value);
    });
  });

  describe('errors', () => {
    it('should reject an unbalanced closing parenthesis', () => {
      const error = parseError("a = '1')");
      expect(error.message).toBe('Unbalanced closing parenthesis at token 1. Got RPAREN');
      expect(error.tokenIndex).toBe(1);
      expect(error.position).toBe(7);
      expect(error.stage).toBe('parser');
    });

    it('should reject a missing closing parenthesis', () => {
      const error = parseError("(a = '1'");
      expect(error.message).toBe('Expected closing parenthesis at token 2. Got end of input');
      expect(error.position).toBe(8);
    });

    it('should reject adjacent conditions', () => {
      const error = parseError("a = '1' b = '2'");
      expect(error.message).toBe(
        "Expected AND or OR between conditions at token 1. Got condition on 'b'"
      );
      expect(error.position).toBe(8);
    });

    it('should report end-of-input errors at the end of the text', () => {
      expect(parseError("a = '1' AND").position).toBe(11);
    });

    it('should reject dangling and leading keywords', () => {
      expect(parseError("a = '1' AND").message).toBe(
        'Expected a condition at token 2. Got end of input'
      );
      expect(parseError("AND a = '1'").message).toBe('Expected a condition at token 0. Got AND');
      expect(parseError('NOT').message).toBe('Expected a condition at token 1. Got end of input');
      expect(parseError(")").message).toBe('Expected a condition at token 0. Got RPAREN');
    });

    it('should reject empty parentheses', () => {
      expect(parseError('()').message).toBe('Empty parentheses at token 1. Got RPAREN');
    });
  });

  describe('depth cap', () => {
    it('should count NOT and parentheses towards the depth', () => {
      expect(parseError("NOT NOT NOT a = '1'", { maxDepth: 2 }).message).toBe(
        "Query nests deeper than 2 levels at token 3. Got condition on 'a'"
      );
      expect(parseError("((a = '1'))", { maxDepth: 1 }).message).toBe(
        "Query nests deeper than 1 levels at token 2. Got condition on 'a'"
      );
    });

    it('should allow exactly the default depth of 64', () => {
      expect(parseQuery(`${'NOT '.repeat(64)}a = '1'`).type).toBe('negation');
      expect(parseError(`${'NOT '.repeat(65)}a = '1'`).message).toMatch(
        /^Query nests deeper than 64 levels/
      );
    });

    it('should not count sibling groups towards the depth', () => {
      expect(() => parseQuery("(a = '1') AND (b = '2') AND (c = '3')", { maxDepth: 1 })).not.toThrow();
    });
  });
});
