/**
 * Builds the AST from postfix tokens with an operand stack.
 *
 * @module compiler/builder
 */

import type { Token } from './lexer.js';
import type { ASTNode } from './ast.js';
import { and, identifier, not, or } from './ast.js';
import { DslSyntaxError, FilterDslErrorCode } from './errors.js';

export interface BuiltTree {
  root: ASTNode;
  depth: number;
}

interface Operand {
  node: ASTNode;
  depth: number;
}

function checkDepth(depth: number, maxDepth: number): number {
  if (depth > maxDepth) {
    throw new DslSyntaxError(
      FilterDslErrorCode.MAX_DEPTH_EXCEEDED,
      `Expression depth ${depth} exceeds maximum of ${maxDepth}`,
    );
  }
  return depth;
}

/**
 * Build the tree and its depth in one pass. Depth is carried on the operand
 * stack, so no stage recurses over the tree, and `maxDepth` is enforced as
 * soon as a node passes it.
 */
export function buildTreeWithDepth(
  postfix: readonly Token[],
  maxDepth: number = Number.POSITIVE_INFINITY,
): BuiltTree {
  const stack: Operand[] = [];

  for (const token of postfix) {
    switch (token.type) {
      case 'IDENTIFIER':
        stack.push({ node: identifier(token.value), depth: checkDepth(1, maxDepth) });
        break;

      case 'NOT': {
        const operand = stack.pop();
        if (!operand) {
          throw new DslSyntaxError(
            FilterDslErrorCode.MISSING_OPERAND,
            'NOT operator without operand',
            token.pos,
            token.value,
          );
        }
        stack.push({ node: not(operand.node), depth: checkDepth(operand.depth + 1, maxDepth) });
        break;
      }

      case 'AND':
      case 'OR': {
        // popped right first so that `left op right` keeps source order
        const right = stack.pop();
        const left = stack.pop();
        if (!left || !right) {
          throw new DslSyntaxError(
            FilterDslErrorCode.MISSING_OPERAND,
            `${token.type} operator requires two operands`,
            token.pos,
            token.value,
          );
        }
        stack.push({
          node: token.type === 'AND' ? and(left.node, right.node) : or(left.node, right.node),
          depth: checkDepth(Math.max(left.depth, right.depth) + 1, maxDepth),
        });
        break;
      }

      case 'LPAREN':
      case 'RPAREN':
        throw new DslSyntaxError(
          FilterDslErrorCode.MALFORMED_EXPRESSION,
          `Unexpected '${token.value}' in postfix sequence`,
          token.pos,
          token.value,
        );
    }
  }

  if (stack.length !== 1) {
    throw new DslSyntaxError(
      FilterDslErrorCode.MALFORMED_EXPRESSION,
      `Malformed expression: expected a single root, found ${stack.length}`,
    );
  }

  return { root: stack[0].node, depth: stack[0].depth };
}

export function buildTree(postfix: readonly Token[]): ASTNode {
  return buildTreeWithDepth(postfix).root;
}
