import { describe, it, expect } from '@jest/globals';
import { tokenize, type TokenizeOptions } from '../Tokenizer.js';
import { TokenizeError } from '../QueryError.js';

function tokenizeError(query: string, options?: TokenizeOptions): TokenizeError {
  try {
    tokenize(query, options);
  } catch (error) {
    if (error instanceof TokenizeError) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected "${query}" to fail tokenizing`);
}

describe('tokenize', () => {
  describe('basic conditions', () => {
    it('should return no tokens for empty or blank input', () => {
      expect(tokenize('')).toEqual([]);
      expect(tokenize('   \t\n ')).toEqual([]);
    });

    it('should read a single comparison', () => {
      expect(tokenize("status = 'open'")).toEqual([
        {
          type: 'CONDITION',
          field: 'status',
          operator: '=',
          value: { kind: 'text', text: 'open' },
          position: 0,
        },
      ]);
    });

    it('should record the start position of every token', () => {
      const tokens = tokenize("(a = 'x' OR b = 'y') AND NOT c ~ 'z'");

      expect(tokens.map((token) => token.type)).toEqual([
        'LPAREN',
        'CONDITION',
        'OR',
        'CONDITION',
        'RPAREN',
        'AND',
        'NOT',
        'CONDITION',
      ]);
      expect(tokens.map((token) => token.position)).toEqual([0, 1, 9, 12, 19, 21, 25, 29]);
    });

    it('should match two-character operators before one-character ones', () => {
      const operators = ["a>='1'", "a<='1'", "a!='1'", "a!~'1'", "a>'1'", "a<'1'", "a='1'", "a~'1'"].map(
        (query) => {
          const [token] = tokenize(query);
          return token.type === 'CONDITION' ? token.operator : token.type;
        }
      );

      expect(operators).toEqual(['>=', '<=', '!=', '!~', '>', '<', '=', '~']);
    });

    it('should accept dotted field names', () => {
      const [token] = tokenize("fields.status = 'Open'");
      expect(token).toMatchObject({ type: 'CONDITION', field: 'fields.status' });
    });
  });

  describe('quoted literals', () => {
    it('should unescape quotes and backslashes', () => {
      const [quoted] = tokenize("title = 'it\\'s'");
      const [slashed] = tokenize("path = 'a\\\\b'");

      expect(quoted).toMatchObject({ value: { kind: 'text', text: "it's" } });
      expect(slashed).toMatchObject({ value: { kind: 'text', text: 'a\\b' } });
    });

    it('should keep other backslashes as written', () => {
      const [token] = tokenize("body = 'line\\nbreak'");
      expect(token).toMatchObject({ value: { kind: 'text', text: 'line\\nbreak' } });
    });

    it('should keep whitespace and keywords inside literals', () => {
      const [token] = tokenize("title = '  a AND b  '");
      expect(token).toMatchObject({ value: { kind: 'text', text: '  a AND b  ' } });
    });

    it('should accept either quote in dialects that allow both', () => {
      const [token] = tokenize('title = "say \'hi\'"', { dialect: 'jql' });
      expect(token).toMatchObject({ value: { kind: 'text', text: "say 'hi'" } });
    });
  });

  describe('word operators', () => {
    it('should read IS EMPTY, IS NULL and the bare forms', () => {
      const operators = ['a IS EMPTY', 'a is null', 'a EMPTY', 'a NULL'].map((query) => {
        const [token] = tokenize(query);
        return token.type === 'CONDITION' ? [token.operator, token.value.kind] : [token.type];
      });

      expect(operators).toEqual([
        ['EMPTY', 'none'],
        ['NULL', 'none'],
        ['EMPTY', 'none'],
        ['NULL', 'none'],
      ]);
    });

    it('should read LIKE and CONTAINS with a literal', () => {
      expect(tokenize("name LIKE 'Acme%'")[0]).toMatchObject({
        operator: 'LIKE',
        value: { kind: 'text', text: 'Acme%' },
      });
      expect(tokenize("name CONTAINS 'corp'")[0]).toMatchObject({
        operator: 'CONTAINS',
        value: { kind: 'text', text: 'corp' },
      });
    });

    it('should read an IN list', () => {
      expect(tokenize("status IN ('open', \"done\")")[0]).toEqual({
        type: 'CONDITION',
        field: 'status',
        operator: 'IN',
        value: { kind: 'list', items: ['open', 'done'] },
        position: 0,
      });
    });

    it('should read the container form', () => {
      expect(tokenize("'alice' IN owners")[0]).toEqual({
        type: 'CONDITION',
        field: 'owners',
        operator: 'IN',
        value: { kind: 'text', text: 'alice' },
        position: 0,
      });
    });
  });

  describe('errors', () => {
    it('should report unterminated strings at the opening quote', () => {
      const error = tokenizeError("status = 'open");
      expect(error.message).toBe('Unterminated string at position 9');
      expect(error.position).toBe(9);
      expect(error.stage).toBe('tokenizer');
    });

    it('should require a quoted value after an operator', () => {
      expect(tokenizeError('status = open').message).toBe(
        'Expected quoted value after operator = at position 9'
      );
    });

    it('should require an operator after a field', () => {
      const error = tokenizeError("status 'open'");
      expect(error.message).toBe("Expected operator after field 'status' at position 7");
      expect(error.position).toBe(7);
    });

    it('should reject unknown characters', () => {
      const error = tokenizeError("status = 'a' # x");
      expect(error.message).toBe("Unexpected character '#' at position 13");
      expect(error.snippet).toBe('#');
    });

    it('should reject empty value lists', () => {
      expect(tokenizeError('status IN ()').message).toBe('Empty value list at position 10');
    });

    it('should reject IS without EMPTY or NULL', () => {
      expect(tokenizeError('a IS open').message).toBe('Expected EMPTY or NULL after IS at position 5');
    });

    it('should reject input longer than the cap at the cap position', () => {
      const error = tokenizeError("a = '123456789'", { maxLength: 5 });
      expect(error.message).toBe('Query is 15 characters long; the limit is 5');
      expect(error.position).toBe(5);
    });
  });

  describe('dialects', () => {
    it('should treat wrong-case keywords as field names', () => {
      const error = tokenizeError("a = '1' and b = '2'", { dialect: 'jql' });
      expect(error.message).toBe("Expected operator after field 'and' at position 12");
      expect(error.hint).toBe('Keywords are upper-case in the jql dialect');
    });

    it('should read lower-case keywords in cql and drive', () => {
      expect(tokenize("a = '1' and not b = '2'", { dialect: 'cql' }).map((t) => t.type)).toEqual([
        'CONDITION',
        'AND',
        'NOT',
        'CONDITION',
      ]);
      expect(tokenize("'root' in parents or name contains 'x'", { dialect: 'drive' })).toHaveLength(3);
    });

    it('should reject operators outside the dialect', () => {
      const error = tokenizeError("labels in ('a')", { dialect: 'cql' });
      expect(error.message).toBe('Operator IN is not supported by the cql dialect');
      expect(error.position).toBe(7);

      expect(tokenizeError("summary LIKE 'x%'", { dialect: 'jql' }).message).toBe(
        'Operator LIKE is not supported by the jql dialect'
      );
    });

    it('should reject quote characters outside the dialect', () => {
      expect(tokenizeError('title = "x"', { dialect: 'cql' }).message).toBe(
        'Expected quoted value after operator = at position 8'
      );
    });
  });
});
