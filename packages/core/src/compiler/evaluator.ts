/**
 * Tree-walking evaluator. Turns an AST into one composite condition by
 * resolving identifiers through a context.
 *
 * @module compiler/evaluator
 */

import type { ASTNode } from './ast.js';
import type { Condition, Context } from '../types/condition.js';
import { UnresolvedReferenceError } from './errors.js';

/**
 * Both sides of `and`/`or` are always generated, left first; conditions
 * are values, not side-effecting checks. Each identifier occurrence costs
 * one `lookup` call.
 */
export function generate<C extends Condition<C>>(node: ASTNode, context: Context<C>): C {
  switch (node.kind) {
    case 'identifier': {
      const condition = context.lookup(node.name);
      if (condition === undefined || condition === null) {
        throw new UnresolvedReferenceError(node.name);
      }
      return condition;
    }

    case 'not':
      return generate(node.operand, context).not();

    case 'and': {
      const left = generate(node.left, context);
      const right = generate(node.right, context);
      return left.and(right);
    }

    case 'or': {
      const left = generate(node.left, context);
      const right = generate(node.right, context);
      return left.or(right);
    }
  }
}
