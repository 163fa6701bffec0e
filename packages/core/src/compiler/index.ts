/**
 * Boolean filter expression compiler.
 *
 * Provides compile() to parse expressions into ASTs and generate() to
 * fold them into a caller-defined condition type.
 *
 * @module compiler
 *
 * @example
 * ```typescript
 * import { parse } from 'filter-dsl/compiler';
 *
 * const tree = parse('(A | B) & !C');
 * tree.identifiers(); // ['A', 'B', 'C']
 * const condition = tree.generate(context);
 * ```
 */

export { tokenize, isValidIdentifier, IDENTIFIER_PATTERN } from './lexer.js';
export type { Token, TokenType } from './lexer.js';

export { validateTokens } from './syntax.js';

export { toPostfix, isOperator, OPERATORS } from './postfix.js';
export type { OperatorType, OperatorInfo } from './postfix.js';

export { buildTree, buildTreeWithDepth } from './builder.js';
export type { BuiltTree } from './builder.js';

export { generate } from './evaluator.js';

export { compile, parse, evaluate, safeParse, FilterTree, DslParser } from './parser.js';
export type { SafeParseResult } from './parser.js';

export {
  FilterDslError,
  DslSyntaxError,
  UnresolvedReferenceError,
  FilterDslErrorCode,
  isFilterDslError,
} from './errors.js';

export {
  identifier,
  not,
  and,
  or,
  astDepth,
  collectIdentifiers,
  toExpression,
} from './ast.js';
export type {
  ASTNode,
  IdentifierNode,
  NotNode,
  AndNode,
  OrNode,
  BinaryNode,
} from './ast.js';
