/**
 * Infix to postfix conversion (shunting-yard).
 *
 * @module compiler/postfix
 */

import type { Token, TokenType } from './lexer.js';
import { DslSyntaxError, FilterDslErrorCode } from './errors.js';

export type OperatorType = Extract<TokenType, 'NOT' | 'AND' | 'OR'>;

export interface OperatorInfo {
  readonly precedence: number;
  readonly associativity: 'left' | 'right';
}

export const OPERATORS: Readonly<Record<OperatorType, OperatorInfo>> = Object.freeze({
  NOT: Object.freeze({ precedence: 3, associativity: 'right' }),
  AND: Object.freeze({ precedence: 2, associativity: 'left' }),
  OR: Object.freeze({ precedence: 1, associativity: 'left' }),
});

export function isOperator(type: TokenType): type is OperatorType {
  return type === 'NOT' || type === 'AND' || type === 'OR';
}

function shouldPop(top: OperatorType, incoming: OperatorType): boolean {
  const a = OPERATORS[top];
  const b = OPERATORS[incoming];
  return a.precedence > b.precedence
    || (a.precedence === b.precedence && b.associativity === 'left');
}

/**
 * Reorder validated infix tokens into postfix order. Parentheses are
 * consumed; an unmatched one is reported at its own position.
 */
export function toPostfix(tokens: readonly Token[]): Token[] {
  const output: Token[] = [];
  const operators: Token[] = [];

  for (const token of tokens) {
    switch (token.type) {
      case 'IDENTIFIER':
        output.push(token);
        break;

      case 'NOT':
      case 'LPAREN':
        operators.push(token);
        break;

      case 'AND':
      case 'OR': {
        let top = operators.at(-1);
        while (top && isOperator(top.type) && shouldPop(top.type, token.type)) {
          output.push(top);
          operators.pop();
          top = operators.at(-1);
        }
        operators.push(token);
        break;
      }

      case 'RPAREN': {
        let top = operators.pop();
        while (top && top.type !== 'LPAREN') {
          output.push(top);
          top = operators.pop();
        }
        if (!top) {
          throw new DslSyntaxError(
            FilterDslErrorCode.UNMATCHED_RIGHT_PAREN,
            "Unmatched ')'",
            token.pos,
            token.value,
          );
        }
        break;
      }
    }
  }

  for (let op = operators.pop(); op; op = operators.pop()) {
    if (op.type === 'LPAREN') {
      throw new DslSyntaxError(
        FilterDslErrorCode.UNMATCHED_LEFT_PAREN,
        "Unmatched '('",
        op.pos,
        op.value,
      );
    }
    output.push(op);
  }

  return output;
}
