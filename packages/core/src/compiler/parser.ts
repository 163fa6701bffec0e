/**
 * Entry points for filter expressions.
 *
 * Pipeline: tokenize -> validateTokens -> toPostfix -> buildTree, then
 * generate against a context. Every syntax error is raised before the
 * first context lookup.
 *
 * Grammar:
 *   expr     -> or_expr
 *   or_expr  -> and_expr ('|' and_expr)*
 *   and_expr -> not_expr ('&' not_expr)*
 *   not_expr -> '!' not_expr | primary
 *   primary  -> IDENTIFIER | '(' expr ')'
 *
 * @module compiler/parser
 */

import type { ASTNode } from './ast.js';
import { astDepth, collectIdentifiers, toExpression } from './ast.js';
import { tokenize } from './lexer.js';
import { validateTokens } from './syntax.js';
import { toPostfix } from './postfix.js';
import { buildTreeWithDepth, type BuiltTree } from './builder.js';
import { generate } from './evaluator.js';
import {
  DslSyntaxError,
  FilterDslError,
  FilterDslErrorCode,
  UnresolvedReferenceError,
} from './errors.js';
import type { Condition, Context } from '../types/condition.js';
import type { Logger } from '../utils/logger.js';
import {
  resolveParseOptions,
  type ParseOptions,
  type ResolvedParseOptions,
} from '../config/options.js';

function compileWith(expression: string, options: ResolvedParseOptions): BuiltTree {
  if (typeof expression !== 'string' || expression.trim().length === 0) {
    throw new DslSyntaxError(
      FilterDslErrorCode.EMPTY_EXPRESSION,
      'Filter expression cannot be null or empty',
    );
  }

  const tokens = tokenize(expression);
  validateTokens(tokens);
  const built = buildTreeWithDepth(toPostfix(tokens), options.maxDepth);

  options.logger.debug('Parsed filter expression', {
    expression,
    tokens: tokens.length,
    depth: built.depth,
  });
  return built;
}

/**
 * Compile a filter expression string into an AST.
 */
export function compile(expression: string, options?: ParseOptions): ASTNode {
  return compileWith(expression, resolveParseOptions(options)).root;
}

/**
 * A parsed expression, ready to be generated against any number of contexts.
 */
export class FilterTree {
  private readonly treeDepth: number;

  constructor(
    public readonly root: ASTNode,
    private readonly logger: Logger,
    depth?: number,
  ) {
    this.treeDepth = depth ?? astDepth(root);
  }

  generate<C extends Condition<C>>(context: Context<C>): C {
    this.logger.debug('Generating condition', { depth: this.treeDepth });
    try {
      return generate(this.root, context);
    } catch (error) {
      if (error instanceof UnresolvedReferenceError) {
        this.logger.warn('Unresolved filter reference', { identifier: error.identifier });
      }
      throw error;
    }
  }

  identifiers(): string[] {
    return collectIdentifiers(this.root);
  }

  depth(): number {
    return this.treeDepth;
  }

  toString(): string {
    return toExpression(this.root);
  }
}

export function parse(expression: string, options?: ParseOptions): FilterTree {
  const resolved = resolveParseOptions(options);
  const built = compileWith(expression, resolved);
  return new FilterTree(built.root, resolved.logger, built.depth);
}

/**
 * Parse and generate in one step.
 *
 * @example
 * ```typescript
 * const context = MapContext.fromRecord({
 *   active: PredicateCondition.of((u: User) => u.active),
 *   admin: PredicateCondition.of((u: User) => u.role === 'admin'),
 * });
 * const condition = evaluate('active & !admin', context);
 * condition.filter(users);
 * ```
 */
export function evaluate<C extends Condition<C>>(
  expression: string,
  context: Context<C>,
  options?: ParseOptions,
): C {
  return parse(expression, options).generate(context);
}

export type SafeParseResult =
  | { success: true; tree: FilterTree }
  | { success: false; error: FilterDslError };

/**
 * Like {@link parse}, but returns expression errors instead of throwing.
 * Anything that is not a {@link FilterDslError} still throws.
 */
export function safeParse(expression: string, options?: ParseOptions): SafeParseResult {
  try {
    return { success: true, tree: parse(expression, options) };
  } catch (error) {
    if (error instanceof FilterDslError) {
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Parser bound to a fixed set of options, for callers that inject one.
 */
export class DslParser {
  private readonly options: ResolvedParseOptions;

  constructor(options: ParseOptions = {}) {
    this.options = resolveParseOptions(options);
  }

  parse(expression: string): FilterTree {
    const built = compileWith(expression, this.options);
    return new FilterTree(built.root, this.options.logger, built.depth);
  }

  evaluate<C extends Condition<C>>(expression: string, context: Context<C>): C {
    return this.parse(expression).generate(context);
  }
}
