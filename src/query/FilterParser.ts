/**
 * Recursive descent parser for the filter expression DSL.
 *
 * @remarks
 * **Grammar (EBNF):**
 * ```
 * filter      := OPERATOR '(' expr_list ')'
 * expr_list   := expr (',' expr)*
 * expr        := filter | condition
 * condition   := IDENT COMPARISON value
 * value       := IDENT | NUMBER | STRING
 * ```
 *
 * **Condition dispatch**, in priority order, on the upper-cased identifier:
 * 1. `AGE` and `NIHSS` take an integer value
 * 2. `DISCHARGEDATE` takes an ISO calendar date
 * 3. otherwise the *value* is looked up as a sex, then as a stroke type; the
 *    identifier and comparison are ignored for these leaves
 * 4. otherwise the *identifier* is looked up as a boolean property, true when the
 *    value reads `true` in any case
 *
 * Anything else fails with {@link UnknownIdentifierError}.
 *
 * **Examples:**
 * ```
 * AND(AGE>=50, SEX==MALE)
 * OR(STROKE==ISCHEMIC, AND(NIHSS>10, THROMBECTOMY==TRUE))
 * NOT(DISCHARGEDATE<2024-01-01)
 * ```
 */

import { getDefaultAliasRegistry, type AliasRegistry } from '../aliases/AliasRegistry.js';
import type { Comparison } from '../aliases/families.js';
import { debugLog } from '../utils/logger.js';
import { tokenize, type TokenizeOptions } from './Lexer.js';
import { QuerySyntaxError, UnknownIdentifierError } from './QueryCompilerError.js';
import {
  ageLeaf,
  booleanLeaf,
  countFilterNodes,
  dateLeaf,
  logical,
  nihssLeaf,
  sexLeaf,
  strokeLeaf,
  type FilterNode,
  type LogicalNode,
  type Token,
  type TokenKind,
} from './types.js';

const VALUE_KINDS: readonly TokenKind[] = ['IDENT', 'NUMBER', 'STRING'];

export class FilterParser {
  private current = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly registry: AliasRegistry = getDefaultAliasRegistry()
  ) {}

  private peek(): Token {
    return this.tokens[this.current] ?? this.endOfInput();
  }

  private endOfInput(): Token {
    const last = this.tokens[this.tokens.length - 1];
    return { kind: 'EOF', text: '', offset: last ? last.offset + last.text.length : 0 };
  }

  private advance(): Token {
    const token = this.peek();
    if (this.current < this.tokens.length) {
      this.current++;
    }
    return token;
  }

  private expect(kind: TokenKind): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      throw new QuerySyntaxError(kind, token, this.current);
    }
    return this.advance();
  }

  /**
   * Parse a complete `OPERATOR(...)` filter. Trailing tokens are an error.
   */
  parse(): LogicalNode {
    const node = this.parseFilter();
    this.expect('EOF');
    this.logParsed(node);
    return node;
  }

  /**
   * Parse a filter or a bare condition such as `AGE>=50`.
   */
  parseExpression(): FilterNode {
    const node = this.parseExpr();
    this.expect('EOF');
    this.logParsed(node);
    return node;
  }

  private parseFilter(): LogicalNode {
    const operatorToken = this.expect('OPERATOR');
    this.expect('LPAREN');

    const children = [this.parseExpr()];
    while (this.peek().kind === 'COMMA') {
      this.advance();
      children.push(this.parseExpr());
    }

    this.expect('RPAREN');
    return logical(this.registry.resolve('logical', operatorToken.text), children);
  }

  private parseExpr(): FilterNode {
    const token = this.peek();
    switch (token.kind) {
      case 'OPERATOR':
        return this.parseFilter();
      case 'IDENT':
        return this.parseCondition();
      default:
        throw new QuerySyntaxError('expr', token, this.current);
    }
  }

  private parseCondition(): FilterNode {
    const identifier = this.expect('IDENT');
    const comparisonToken = this.expect('COMPARISON');

    const valuePosition = this.current;
    const value = this.peek();
    if (!VALUE_KINDS.includes(value.kind)) {
      throw new QuerySyntaxError('value', value, valuePosition);
    }
    this.advance();

    const comparison = this.registry.resolve('comparison', comparisonToken.text);
    return this.dispatch(identifier.text, comparison, comparisonToken.text, value, valuePosition);
  }

  private dispatch(
    identifier: string,
    comparison: Comparison,
    writtenComparison: string,
    value: Token,
    valuePosition: number
  ): FilterNode {
    switch (identifier.toUpperCase()) {
      case 'AGE':
        return ageLeaf(comparison, this.integerValue(value, valuePosition));
      case 'NIHSS':
        return nihssLeaf(comparison, this.integerValue(value, valuePosition));
      case 'DISCHARGEDATE':
        if (value.kind !== 'STRING') {
          throw new QuerySyntaxError('STRING', value, valuePosition);
        }
        return dateLeaf(comparison, value.text);
    }

    const sex = this.registry.tryResolve('sex', value.text);
    if (sex !== undefined) {
      return sexLeaf(sex);
    }

    const stroke = this.registry.tryResolve('stroke', value.text);
    if (stroke !== undefined) {
      return strokeLeaf(stroke);
    }

    const property = this.registry.tryResolve('boolean', identifier);
    if (property !== undefined) {
      return booleanLeaf(property, value.text.toLowerCase() === 'true');
    }

    throw new UnknownIdentifierError(identifier, writtenComparison, value.text);
  }

  private integerValue(token: Token, position: number): number {
    if (token.kind !== 'NUMBER') {
      throw new QuerySyntaxError('NUMBER', token, position);
    }
    return Number(token.text);
  }

  private logParsed(node: FilterNode): void {
    debugLog('parser', 'Parsed filter expression', {
      root: node.type,
      nodeCount: countFilterNodes(node),
    });
  }
}

/**
 * Parse a filter expression string into a filter tree.
 *
 * @throws {QueryCompilerError} On lexical gaps (strict mode), syntax errors or unknown names
 */
export function parseFilterString(
  text: string,
  registry: AliasRegistry = getDefaultAliasRegistry(),
  options: TokenizeOptions = {}
): LogicalNode {
  return new FilterParser(tokenize(text, options), registry).parse();
}

/** Like {@link parseFilterString}, but also accepts a single bare condition. */
export function parseFilterExpression(
  text: string,
  registry: AliasRegistry = getDefaultAliasRegistry(),
  options: TokenizeOptions = {}
): FilterNode {
  return new FilterParser(tokenize(text, options), registry).parseExpression();
}
