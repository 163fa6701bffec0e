import { describe, it, expect } from 'vitest';
import { tokenize } from '../../src/compiler/lexer.js';
import { validateTokens } from '../../src/compiler/syntax.js';
import { DslSyntaxError } from '../../src/compiler/errors.js';

function syntaxError(input: string): DslSyntaxError {
  try {
    validateTokens(tokenize(input));
  } catch (e) {
    if (e instanceof DslSyntaxError) return e;
    throw e;
  }
  throw new Error(`expected '${input}' to fail`);
}

describe('Syntax validator', () => {
  it.each(['A', '!A', '!!A', '(A)', '((A))', 'A & (B | !C)', '!(A | B)', '(A & B'])(
    'should accept %s',
    (input) => {
      expect(() => validateTokens(tokenize(input))).not.toThrow();
    },
  );

  it('should reject an empty token list', () => {
    const err = syntaxError('');
    expect(err.code).toBe('EMPTY_EXPRESSION');
    expect(err.message).toBe('Empty expression');
  });

  describe('identifiers', () => {
    it('should reject two adjacent identifiers', () => {
      const err = syntaxError('A B');
      expect(err.code).toBe('INVALID_TRANSITION');
      expect(err.pos).toBe(2);
      expect(err.token).toBe('B');
      expect(err.message).toBe("Identifier 'A' cannot be followed by 'B' at position 2");
    });

    it('should reject an identifier followed by NOT', () => {
      const err = syntaxError('A !B');
      expect(err.pos).toBe(2);
      expect(err.token).toBe('!');
    });

    it('should reject an identifier after a closing parenthesis', () => {
      const err = syntaxError('(A) B');
      expect(err.message).toBe("Identifier 'B' cannot follow ')' at position 4");
    });
  });

  describe('binary operators', () => {
    it('should require a left operand after an opening parenthesis', () => {
      const err = syntaxError('(| A)');
      expect(err.code).toBe('INVALID_TRANSITION');
      expect(err.message).toBe("Binary operator '|' requires a left operand at position 1");
    });

    it('should reject two binary operators in a row', () => {
      const err = syntaxError('A & | B');
      expect(err.message).toBe("Binary operator '&' cannot be followed by '|' at position 4");
    });
  });

  describe('NOT', () => {
    it('should reject NOT followed by a binary operator', () => {
      const err = syntaxError('!& A');
      expect(err.message).toBe("NOT operator cannot be followed by binary operator '&' at position 1");
    });

    it('should reject NOT after a closing parenthesis', () => {
      const err = syntaxError('(A) !B');
      expect(err.message).toBe("NOT operator cannot follow ')' at position 4");
    });
  });

  describe('parentheses', () => {
    it('should reject an opening parenthesis after an identifier', () => {
      const err = syntaxError('A (B)');
      expect(err.message).toBe("Left parenthesis cannot follow 'A' at position 2");
    });

    it('should reject empty parentheses', () => {
      const err = syntaxError('()');
      expect(err.message).toBe("Right parenthesis cannot follow '(' at position 1");
    });

    it('should reject a closing parenthesis after an operator', () => {
      const err = syntaxError('(A &)');
      expect(err.message).toBe("Right parenthesis cannot follow '&' at position 4");
    });
  });

  describe('boundaries', () => {
    it('should reject a leading binary operator', () => {
      const err = syntaxError('& A');
      expect(err.code).toBe('INVALID_BOUNDARY');
      expect(err.pos).toBe(0);
      expect(err.message).toBe("Expression cannot start with binary operator '&' at position 0");
    });

    it('should check the leading operator before later pairs', () => {
      const err = syntaxError('| A B');
      expect(err.code).toBe('INVALID_BOUNDARY');
      expect(err.token).toBe('|');
    });

    it('should reject a trailing binary operator', () => {
      const err = syntaxError('A &');
      expect(err.code).toBe('INVALID_BOUNDARY');
      expect(err.message).toBe("Expression cannot end with operator '&' at position 2");
    });

    it('should reject a lone NOT', () => {
      const err = syntaxError('!');
      expect(err.code).toBe('INVALID_BOUNDARY');
      expect(err.pos).toBe(0);
    });

    it('should reject a trailing NOT', () => {
      const err = syntaxError('A | !');
      expect(err.code).toBe('INVALID_BOUNDARY');
      expect(err.pos).toBe(4);
    });
  });
});
