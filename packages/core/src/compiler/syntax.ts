/**
 * Token-level grammar checks.
 *
 * Every adjacent pair of tokens is checked before a tree is built, so a
 * bad expression is reported at the offending token rather than as an
 * operand shortage deep in the builder. Parenthesis balance is left to
 * the postfix converter, which knows which bracket is unmatched.
 *
 * @module compiler/syntax
 */

import type { Token, TokenType } from './lexer.js';
import { DslSyntaxError, FilterDslErrorCode } from './errors.js';

const BINARY: readonly TokenType[] = ['AND', 'OR'];

function isBinary(token: Token | undefined): boolean {
  return token !== undefined && BINARY.includes(token.type);
}

function isOneOf(token: Token | undefined, types: readonly TokenType[]): token is Token {
  return token !== undefined && types.includes(token.type);
}

function transitionError(message: string, token: Token): DslSyntaxError {
  return new DslSyntaxError(FilterDslErrorCode.INVALID_TRANSITION, message, token.pos, token.value);
}

function boundaryError(message: string, token: Token): DslSyntaxError {
  return new DslSyntaxError(FilterDslErrorCode.INVALID_BOUNDARY, message, token.pos, token.value);
}

function checkTransition(prev: Token | undefined, current: Token, next: Token | undefined): void {
  switch (current.type) {
    case 'IDENTIFIER':
      if (isOneOf(next, ['IDENTIFIER', 'NOT'])) {
        throw transitionError(
          `Identifier '${current.value}' cannot be followed by '${next.value}'`,
          next,
        );
      }
      if (isOneOf(prev, ['RPAREN'])) {
        throw transitionError(`Identifier '${current.value}' cannot follow ')'`, current);
      }
      return;

    case 'AND':
    case 'OR':
      if (!isOneOf(prev, ['IDENTIFIER', 'RPAREN'])) {
        throw transitionError(`Binary operator '${current.value}' requires a left operand`, current);
      }
      if (isOneOf(next, BINARY)) {
        throw transitionError(
          `Binary operator '${current.value}' cannot be followed by '${next.value}'`,
          next,
        );
      }
      return;

    case 'NOT':
      if (isOneOf(next, BINARY)) {
        throw transitionError(
          `NOT operator cannot be followed by binary operator '${next.value}'`,
          next,
        );
      }
      if (isOneOf(prev, ['IDENTIFIER', 'RPAREN'])) {
        throw transitionError(`NOT operator cannot follow '${prev.value}'`, current);
      }
      return;

    case 'LPAREN':
      if (isOneOf(prev, ['IDENTIFIER', 'RPAREN'])) {
        throw transitionError(`Left parenthesis cannot follow '${prev.value}'`, current);
      }
      return;

    case 'RPAREN':
      if (isOneOf(prev, ['AND', 'OR', 'NOT', 'LPAREN'])) {
        throw transitionError(`Right parenthesis cannot follow '${prev.value}'`, current);
      }
      return;
  }
}

/**
 * Throw a {@link DslSyntaxError} for the first grammar violation found:
 * the leading token, then adjacent pairs left to right, then the trailing
 * token.
 */
export function validateTokens(tokens: readonly Token[]): void {
  if (tokens.length === 0) {
    throw new DslSyntaxError(FilterDslErrorCode.EMPTY_EXPRESSION, 'Empty expression');
  }

  const first = tokens[0];
  if (isBinary(first)) {
    throw boundaryError(`Expression cannot start with binary operator '${first.value}'`, first);
  }

  tokens.forEach((current, i) => {
    checkTransition(tokens[i - 1], current, tokens[i + 1]);
  });

  const last = tokens[tokens.length - 1];
  if (isBinary(last) || last.type === 'NOT') {
    throw boundaryError(`Expression cannot end with operator '${last.value}'`, last);
  }
}
