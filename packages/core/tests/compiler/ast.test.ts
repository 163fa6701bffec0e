import { describe, it, expect } from 'vitest';
import {
  and,
  astDepth,
  collectIdentifiers,
  identifier,
  not,
  or,
  toExpression,
} from '../../src/compiler/ast.js';
import { compile } from '../../src/compiler/index.js';

describe('AST', () => {
  describe('astDepth', () => {
    it('should count a single identifier as one', () => {
      expect(astDepth(identifier('A'))).toBe(1);
    });

    it('should use the deepest branch', () => {
      expect(astDepth(compile('(A | B) & C'))).toBe(3);
      expect(astDepth(compile('!(A | B) & C'))).toBe(4);
    });
  });

  describe('collectIdentifiers', () => {
    it('should list distinct names in first-appearance order', () => {
      expect(collectIdentifiers(compile('B & A | B & !C'))).toEqual(['B', 'A', 'C']);
    });
  });

  describe('toExpression', () => {
    it.each([
      ['A | B & C', 'A | B & C'],
      ['(A | B) & C', '(A | B) & C'],
      ['(A & B) & C', 'A & B & C'],
      ['A & (B & C)', 'A & (B & C)'],
      ['A | (B | C)', 'A | (B | C)'],
      ['!!A', '!!A'],
      ['!(A | B) & C', '!(A | B) & C'],
      ['A & B | !C', 'A & B | !C'],
      ['((A))', 'A'],
      ['a&b', 'a & b'],
    ])('should render %s as %s', (input, expected) => {
      expect(toExpression(compile(input))).toBe(expected);
    });

    it.each([
      'A | B & C',
      '(A | B) & C',
      '(A & B) & C',
      'A & (B & C)',
      'A | (B | C)',
      '!!A',
      '!(A | B) & C',
      'A & B | !C',
      '((A))',
      'a&b',
    ])('should re-parse the rendering of %s to an equal tree', (input) => {
      const tree = compile(input);
      expect(compile(toExpression(tree))).toEqual(tree);
    });

    it('should render hand-built trees', () => {
      const tree = not(and(identifier('x'), or(identifier('y'), identifier('z'))));
      expect(toExpression(tree)).toBe('!(x & (y | z))');
    });

    it('should re-parse to the same tree', () => {
      const tree = compile('!(a | b) & (c | !d) | e');
      expect(compile(toExpression(tree))).toEqual(tree);
    });
  });
});
