/**
 * Tokenizer for filter expressions.
 *
 * @module compiler/lexer
 */

import { DslSyntaxError, FilterDslErrorCode } from './errors.js';

export type TokenType =
  | 'IDENTIFIER'
  | 'AND'
  | 'OR'
  | 'NOT'
  | 'LPAREN'
  | 'RPAREN';

export interface Token {
  type: TokenType;
  value: string;
  pos: number;
}

export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Wider than IDENTIFIER_PATTERN: runs such as "été" or "2fa" lex as one
// token and are reported as invalid identifiers.
const IDENTIFIER_CHAR = /^[\p{L}\p{N}_]$/u;

const SYMBOLS: ReadonlyMap<string, TokenType> = new Map([
  ['&', 'AND'],
  ['|', 'OR'],
  ['!', 'NOT'],
  ['(', 'LPAREN'],
  [')', 'RPAREN'],
]);

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

function charAt(input: string, index: number): string {
  const code = input.codePointAt(index);
  return code === undefined ? '' : String.fromCodePoint(code);
}

/**
 * Split an expression into positioned tokens. Positions are UTF-16
 * offsets into `input` as given, leading whitespace included.
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = charAt(input, i);

    if (/\s/.test(ch)) {
      i += ch.length;
      continue;
    }

    const symbol = SYMBOLS.get(ch);
    if (symbol) {
      tokens.push({ type: symbol, value: ch, pos: i });
      i += ch.length;
      continue;
    }

    if (IDENTIFIER_CHAR.test(ch)) {
      const start = i;
      let ident = '';
      let next = ch;
      while (next !== '' && IDENTIFIER_CHAR.test(next)) {
        ident += next;
        i += next.length;
        next = charAt(input, i);
      }
      if (!isValidIdentifier(ident)) {
        throw new DslSyntaxError(
          FilterDslErrorCode.INVALID_IDENTIFIER,
          `Invalid identifier '${ident}'`,
          start,
          ident,
        );
      }
      tokens.push({ type: 'IDENTIFIER', value: ident, pos: start });
      continue;
    }

    throw new DslSyntaxError(
      FilterDslErrorCode.INVALID_CHARACTER,
      `Invalid character '${ch}'`,
      i,
      ch,
    );
  }

  return tokens;
}
