/**
 * AST node types for filter expressions.
 *
 * @module compiler/ast
 */

export interface IdentifierNode {
  readonly kind: 'identifier';
  readonly name: string;
}

export interface NotNode {
  readonly kind: 'not';
  readonly operand: ASTNode;
}

export interface AndNode {
  readonly kind: 'and';
  readonly left: ASTNode;
  readonly right: ASTNode;
}

export interface OrNode {
  readonly kind: 'or';
  readonly left: ASTNode;
  readonly right: ASTNode;
}

export type BinaryNode = AndNode | OrNode;

export type ASTNode =
  | IdentifierNode
  | NotNode
  | AndNode
  | OrNode;

export function identifier(name: string): IdentifierNode {
  const node: IdentifierNode = { kind: 'identifier', name };
  return Object.freeze(node);
}

export function not(operand: ASTNode): NotNode {
  const node: NotNode = { kind: 'not', operand };
  return Object.freeze(node);
}

export function and(left: ASTNode, right: ASTNode): AndNode {
  const node: AndNode = { kind: 'and', left, right };
  return Object.freeze(node);
}

export function or(left: ASTNode, right: ASTNode): OrNode {
  const node: OrNode = { kind: 'or', left, right };
  return Object.freeze(node);
}

/**
 * Compute the depth of an AST tree.
 */
export function astDepth(node: ASTNode): number {
  switch (node.kind) {
    case 'identifier':
      return 1;
    case 'not':
      return 1 + astDepth(node.operand);
    case 'and':
    case 'or':
      return 1 + Math.max(astDepth(node.left), astDepth(node.right));
  }
}

/**
 * Distinct identifier names in the order they first appear in the source.
 */
export function collectIdentifiers(node: ASTNode): string[] {
  const seen = new Set<string>();

  const visit = (current: ASTNode): void => {
    switch (current.kind) {
      case 'identifier':
        seen.add(current.name);
        return;
      case 'not':
        visit(current.operand);
        return;
      case 'and':
      case 'or':
        visit(current.left);
        visit(current.right);
        return;
    }
  };

  visit(node);
  return [...seen];
}

function precedence(node: ASTNode): number {
  switch (node.kind) {
    case 'identifier':
      return 4;
    case 'not':
      return 3;
    case 'and':
      return 2;
    case 'or':
      return 1;
  }
}

function wrap(node: ASTNode, parens: boolean): string {
  const text = toExpression(node);
  return parens ? `(${text})` : text;
}

/**
 * Render a tree back to expression text with the fewest parentheses that
 * still re-parse to the same tree. A right operand of equal precedence is
 * kept in parentheses, so `A & (B & C)` does not flatten to `A & B & C`.
 *
 * @example
 * ```typescript
 * toExpression(and(or(identifier('A'), identifier('B')), identifier('C')));
 * // '(A | B) & C'
 * ```
 */
export function toExpression(node: ASTNode): string {
  switch (node.kind) {
    case 'identifier':
      return node.name;
    case 'not':
      return `!${wrap(node.operand, precedence(node.operand) < precedence(node))}`;
    case 'and':
    case 'or': {
      const own = precedence(node);
      const op = node.kind === 'and' ? '&' : '|';
      const left = wrap(node.left, precedence(node.left) < own);
      const right = wrap(node.right, precedence(node.right) <= own);
      return `${left} ${op} ${right}`;
    }
  }
}
