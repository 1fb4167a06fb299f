/**
 * Recursive descent parser for tokenized queries.
 *
 * **Grammar (BNF):**
 * ```
 * Expression := Term ('OR' Term)*
 * Term       := Factor ('AND' Factor)*
 * Factor     := 'NOT' Factor | Condition | '(' Expression ')'
 * ```
 * NOT binds tighter than AND, which binds tighter than OR. Binary nodes are
 * left-associative. The returned tree is frozen.
 */

import { ParseError } from './QueryError.js';
import type {
  AlwaysTrueNode,
  ConditionNode,
  ConditionToken,
  ConditionValue,
  ExpressionNode,
  LogicalNode,
  NegationNode,
  Token,
} from './types.js';

export const DEFAULT_MAX_DEPTH = 64;

export const ALWAYS_TRUE: ExpressionNode = frozen<AlwaysTrueNode>({ type: 'always_true' });

export interface ParseOptions {
  maxDepth?: number;
  /** Length of the tokenized text; end-of-input errors are reported there */
  inputLength?: number;
}

function frozen<T extends object>(value: T): T {
  Object.freeze(value);
  return value;
}

function logical(operator: LogicalNode['operator'], left: ExpressionNode, right: ExpressionNode): LogicalNode {
  const children: LogicalNode['children'] = frozen<[ExpressionNode, ExpressionNode]>([left, right]);
  return frozen<LogicalNode>({ type: 'logical', operator, children });
}

function describe(token: Token | undefined): string {
  if (!token) {
    return 'end of input';
  }
  if (token.type === 'CONDITION') {
    return `condition on '${token.field}'`;
  }
  return token.type;
}

class Parser {
  private readonly tokens: readonly Token[];
  private readonly maxDepth: number;
  private readonly inputLength?: number;
  private current = 0;
  private depth = 0;

  constructor(tokens: readonly Token[], maxDepth: number, inputLength?: number) {
    this.tokens = tokens;
    this.maxDepth = maxDepth;
    this.inputLength = inputLength;
  }

  private peek(): Token | undefined {
    return this.tokens[this.current];
  }

  private match(type: Token['type']): boolean {
    return this.peek()?.type === type;
  }

  private endPosition(): number {
    if (this.inputLength !== undefined) {
      return this.inputLength;
    }
    const last = this.tokens[this.tokens.length - 1];
    return last ? last.position + 1 : 0;
  }

  private error(message: string, hint?: string): ParseError {
    const token = this.peek();
    return new ParseError({
      message: `${message} at token ${this.current}. Got ${describe(token)}`,
      tokenIndex: this.current,
      position: token ? token.position : this.endPosition(),
      snippet: describe(token),
      hint,
    });
  }

  parse(): ExpressionNode {
    if (this.tokens.length === 0) {
      return ALWAYS_TRUE;
    }

    const expr = this.parseExpression();

    if (this.current < this.tokens.length) {
      if (this.match('RPAREN')) {
        throw this.error('Unbalanced closing parenthesis', 'Remove the extra ")" or add a matching "("');
      }
      throw this.error(
        'Expected AND or OR between conditions',
        'Join adjacent conditions with AND or OR'
      );
    }

    return expr;
  }

  /**
   * Expression := Term ('OR' Term)*
   */
  private parseExpression(): ExpressionNode {
    let left = this.parseTerm();

    while (this.match('OR')) {
      this.current++;
      const right = this.parseTerm();
      left = logical('OR', left, right);
    }

    return left;
  }

  /**
   * Term := Factor ('AND' Factor)*
   */
  private parseTerm(): ExpressionNode {
    let left = this.parseFactor();

    while (this.match('AND')) {
      this.current++;
      const right = this.parseFactor();
      left = logical('AND', left, right);
    }

    return left;
  }

  /**
   * Factor := 'NOT' Factor | Condition | '(' Expression ')'
   */
  private parseFactor(): ExpressionNode {
    const token = this.peek();

    if (!token) {
      throw this.error('Expected a condition', 'A logical keyword needs an operand on its right');
    }

    switch (token.type) {
      case 'NOT': {
        this.current++;
        const child = this.nested(() => this.parseFactor());
        return frozen<NegationNode>({ type: 'negation', child });
      }

      case 'LPAREN': {
        this.current++;
        if (this.match('RPAREN')) {
          throw this.error('Empty parentheses', 'Put a condition between "(" and ")"');
        }
        const expr = this.nested(() => this.parseExpression());
        if (!this.match('RPAREN')) {
          throw this.error('Expected closing parenthesis', 'Add a matching ")"');
        }
        this.current++;
        return expr;
      }

      case 'CONDITION':
        this.current++;
        return this.conditionNode(token);

      default:
        throw this.error('Expected a condition', 'AND and OR need a condition on both sides');
    }
  }

  private nested(parse: () => ExpressionNode): ExpressionNode {
    this.depth++;
    if (this.depth > this.maxDepth) {
      throw this.error(
        `Query nests deeper than ${this.maxDepth} levels`,
        'Flatten the query or raise QUERY_MAX_DEPTH'
      );
    }
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private conditionNode(token: ConditionToken): ExpressionNode {
    const value: ConditionValue =
      token.value.kind === 'list'
        ? { kind: 'list', items: frozen([...token.value.items]) }
        : { ...token.value };

    return frozen<ConditionNode>({
      type: 'condition',
      field: token.field,
      operator: token.operator,
      value: frozen(value),
    });
  }
}

/**
 * Build an expression tree from tokens. An empty sequence matches everything.
 *
 * @throws ParseError on unbalanced parentheses, dangling keywords, adjacent
 * conditions or nesting deeper than `maxDepth`
 */
export function parse(tokens: readonly Token[], options: ParseOptions = {}): ExpressionNode {
  return new Parser(tokens, options.maxDepth ?? DEFAULT_MAX_DEPTH, options.inputLength).parse();
}
