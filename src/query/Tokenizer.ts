/**
 * Query Tokenizer
 *
 * Turns a query string into a flat sequence of keyword, parenthesis and
 * condition tokens. A condition is recognised as a whole atom here, so the
 * parser only ever sees `CONDITION`, `AND`, `OR`, `NOT`, `(` and `)`.
 *
 * @remarks
 * **Atom forms:**
 * ```
 * field op 'value'          op: >= <= != !~ > < = ~
 * field LIKE 'value'
 * field CONTAINS 'value'
 * field IN ('a', 'b')
 * field IS EMPTY | field IS NULL | field EMPTY | field NULL
 * 'value' IN field          container membership
 * ```
 * Keyword spelling (`AND`, `and`, either) follows the dialect's case policy and
 * applies to word operators as well.
 */

import { keywordMatches, resolveDialect, type Dialect, type DialectName } from './dialects.js';
import { TokenizeError } from './QueryError.js';
import type { ConditionValue, Operator, Token } from './types.js';

export const DEFAULT_MAX_QUERY_LENGTH = 4096;

/** Longest first so `>=` is never read as `>` followed by `=`. */
const SYMBOLIC_OPERATORS: readonly Operator[] = ['>=', '<=', '!=', '!~', '>', '<', '=', '~'];

const IDENT_START = /[A-Za-z_]/;
const IDENT_CHAR = /[A-Za-z0-9_.]/;
const WHITESPACE = /\s/;

export interface TokenizeOptions {
  dialect?: Dialect | DialectName;
  maxLength?: number;
}

class Tokenizer {
  private pos = 0;
  private readonly input: string;
  private readonly dialect: Dialect;

  constructor(input: string, dialect: Dialect) {
    this.input = input;
    this.dialect = dialect;
  }

  private peek(offset = 0): string {
    return this.input[this.pos + offset] ?? '';
  }

  private advance(): string {
    return this.input[this.pos++] ?? '';
  }

  private isEof(): boolean {
    return this.pos >= this.input.length;
  }

  private skipWhitespace(): void {
    while (!this.isEof() && WHITESPACE.test(this.peek())) {
      this.advance();
    }
  }

  private context(position: number): string {
    return `...${this.input.slice(Math.max(0, position - 20), position + 20)}...`;
  }

  private isKeyword(word: string, keyword: string): boolean {
    return keywordMatches(this.dialect, word, keyword);
  }

  private readWord(): string {
    let word = '';
    if (!IDENT_START.test(this.peek())) {
      return word;
    }
    while (!this.isEof() && IDENT_CHAR.test(this.peek())) {
      word += this.advance();
    }
    return word;
  }

  /**
   * Read a quoted literal. The backslash escapes the quote character and
   * itself; any other backslash is kept as written.
   */
  private readString(): string {
    const start = this.pos;
    const quote = this.advance();

    let value = '';
    while (!this.isEof() && this.peek() !== quote) {
      const ch = this.advance();
      if (ch === '\\' && (this.peek() === quote || this.peek() === '\\')) {
        value += this.advance();
      } else {
        value += ch;
      }
    }

    if (this.peek() !== quote) {
      throw new TokenizeError({
        message: `Unterminated string at position ${start}`,
        position: start,
        snippet: this.context(start),
        hint: `Close the string with a matching quote (${quote})`,
      });
    }

    this.advance();
    return value;
  }

  private isQuote(ch: string): boolean {
    return ch !== '' && this.dialect.quotes.includes(ch);
  }

  private expectString(after: string): string {
    this.skipWhitespace();
    if (!this.isQuote(this.peek())) {
      throw new TokenizeError({
        message: `Expected quoted value after ${after} at position ${this.pos}`,
        position: this.pos,
        snippet: this.context(this.pos),
        hint: `Values must be quoted with ${this.dialect.quotes.join(' or ')}`,
      });
    }
    return this.readString();
  }

  private readList(): string[] {
    const start = this.pos;
    this.advance(); // skip (

    const items: string[] = [];
    this.skipWhitespace();
    while (!this.isEof() && this.peek() !== ')') {
      if (items.length > 0) {
        if (this.peek() !== ',') {
          throw new TokenizeError({
            message: `Expected "," or ")" in value list at position ${this.pos}`,
            position: this.pos,
            snippet: this.context(this.pos),
            hint: "Separate list values with commas: IN ('a', 'b')",
          });
        }
        this.advance();
      }
      items.push(this.expectString('IN list separator'));
      this.skipWhitespace();
    }

    if (this.peek() !== ')') {
      throw new TokenizeError({
        message: `Unterminated value list at position ${start}`,
        position: start,
        snippet: this.context(start),
        hint: "Close the value list with ')'",
      });
    }
    this.advance();

    if (items.length === 0) {
      throw new TokenizeError({
        message: `Empty value list at position ${start}`,
        position: start,
        length: this.pos - start,
        snippet: this.input.slice(start, this.pos),
        hint: 'IN lists need at least one value',
      });
    }

    return items;
  }

  private readSymbolicOperator(): Operator | undefined {
    for (const op of SYMBOLIC_OPERATORS) {
      if (this.input.startsWith(op, this.pos)) {
        this.pos += op.length;
        return op;
      }
    }
    return undefined;
  }

  private condition(
    field: string,
    operator: Operator,
    value: ConditionValue,
    position: number,
    operatorPosition: number
  ): Token {
    if (!this.dialect.operators.has(operator)) {
      throw new TokenizeError({
        message: `Operator ${operator} is not supported by the ${this.dialect.name} dialect`,
        position: operatorPosition,
        length: operator.length,
        snippet: operator,
        hint: `Supported operators: ${[...this.dialect.operators].join(' ')}`,
      });
    }
    return { type: 'CONDITION', field, operator, value, position };
  }

  /**
   * Everything after the field name of a condition atom.
   */
  private readConditionTail(field: string, start: number): Token {
    this.skipWhitespace();
    const opStart = this.pos;

    const symbolic = this.readSymbolicOperator();
    if (symbolic) {
      const text = this.expectString(`operator ${symbolic}`);
      return this.condition(field, symbolic, { kind: 'text', text }, start, opStart);
    }

    const word = this.readWord();

    if (this.isKeyword(word, 'IS')) {
      this.skipWhitespace();
      const unaryStart = this.pos;
      const unary = this.readWord();
      if (this.isKeyword(unary, 'EMPTY') || this.isKeyword(unary, 'NULL')) {
        const operator = this.isKeyword(unary, 'EMPTY') ? 'EMPTY' : 'NULL';
        return this.condition(field, operator, { kind: 'none' }, start, unaryStart);
      }
      throw new TokenizeError({
        message: `Expected EMPTY or NULL after IS at position ${unaryStart}`,
        position: unaryStart,
        snippet: this.context(unaryStart),
        hint: 'Use "field IS EMPTY" or "field IS NULL"',
      });
    }

    if (this.isKeyword(word, 'EMPTY') || this.isKeyword(word, 'NULL')) {
      const operator = this.isKeyword(word, 'EMPTY') ? 'EMPTY' : 'NULL';
      return this.condition(field, operator, { kind: 'none' }, start, opStart);
    }

    if (this.isKeyword(word, 'LIKE') || this.isKeyword(word, 'CONTAINS')) {
      const operator = this.isKeyword(word, 'LIKE') ? 'LIKE' : 'CONTAINS';
      const text = this.expectString(`operator ${operator}`);
      return this.condition(field, operator, { kind: 'text', text }, start, opStart);
    }

    if (this.isKeyword(word, 'IN')) {
      this.skipWhitespace();
      if (this.peek() !== '(') {
        throw new TokenizeError({
          message: `Expected value list after IN at position ${this.pos}`,
          position: this.pos,
          snippet: this.context(this.pos),
          hint: "Write field IN ('a', 'b') or 'value' IN field",
        });
      }
      const items = this.readList();
      return this.condition(field, 'IN', { kind: 'list', items }, start, opStart);
    }

    throw new TokenizeError({
      message: `Expected operator after field '${field}' at position ${opStart}`,
      position: opStart,
      length: word.length || 1,
      snippet: this.context(opStart),
      hint: this.dialect.keywordCase === 'insensitive'
        ? 'Valid operators are: = != < <= > >= ~ !~ LIKE CONTAINS IN IS EMPTY IS NULL'
        : `Keywords are ${this.dialect.keywordCase === 'upper' ? 'upper' : 'lower'}-case in the ${this.dialect.name} dialect`,
    });
  }

  /**
   * `'value' IN field`: the literal must be a member of the field.
   */
  private readContainerCondition(): Token {
    const start = this.pos;
    const text = this.readString();

    this.skipWhitespace();
    const opStart = this.pos;
    const word = this.readWord();
    if (!this.isKeyword(word, 'IN')) {
      throw new TokenizeError({
        message: `Expected IN after quoted value at position ${opStart}`,
        position: opStart,
        snippet: this.context(opStart),
        hint: "A condition may only start with a value in the form 'value' in field",
      });
    }

    this.skipWhitespace();
    const fieldStart = this.pos;
    const field = this.readWord();
    if (!field) {
      throw new TokenizeError({
        message: `Expected field name after IN at position ${fieldStart}`,
        position: fieldStart,
        snippet: this.context(fieldStart),
        hint: "Name the collection field: 'value' in parents",
      });
    }

    return this.condition(field, 'IN', { kind: 'text', text }, start, opStart);
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (!this.isEof()) {
      this.skipWhitespace();

      if (this.isEof()) {
        break;
      }

      const startPos = this.pos;
      const ch = this.peek();

      if (ch === '(') {
        this.advance();
        tokens.push({ type: 'LPAREN', position: startPos });
        continue;
      }

      if (ch === ')') {
        this.advance();
        tokens.push({ type: 'RPAREN', position: startPos });
        continue;
      }

      if (this.isQuote(ch)) {
        tokens.push(this.readContainerCondition());
        continue;
      }

      if (IDENT_START.test(ch)) {
        const word = this.readWord();

        if (this.isKeyword(word, 'AND')) {
          tokens.push({ type: 'AND', position: startPos });
        } else if (this.isKeyword(word, 'OR')) {
          tokens.push({ type: 'OR', position: startPos });
        } else if (this.isKeyword(word, 'NOT')) {
          tokens.push({ type: 'NOT', position: startPos });
        } else {
          tokens.push(this.readConditionTail(word, startPos));
        }
        continue;
      }

      throw new TokenizeError({
        message: `Unexpected character '${ch}' at position ${startPos}`,
        position: startPos,
        length: 1,
        snippet: ch,
        hint: 'Valid syntax includes: field op \'value\', AND, OR, NOT, (, )',
      });
    }

    return tokens;
  }
}

/**
 * Reject query text longer than `maxLength`, ORDER BY clause included.
 *
 * @throws TokenizeError at the cap position
 */
export function checkQueryLength(query: string, maxLength = DEFAULT_MAX_QUERY_LENGTH): void {
  if (query.length > maxLength) {
    throw new TokenizeError({
      message: `Query is ${query.length} characters long; the limit is ${maxLength}`,
      position: maxLength,
      hint: 'Split the query or raise QUERY_MAX_LENGTH',
    });
  }
}

/**
 * Break a query string into tokens.
 *
 * @throws TokenizeError on malformed atoms, unknown characters or input
 * longer than `maxLength`
 */
export function tokenize(query: string, options: TokenizeOptions = {}): Token[] {
  checkQueryLength(query, options.maxLength);
  return new Tokenizer(query, resolveDialect(options.dialect)).tokenize();
}
