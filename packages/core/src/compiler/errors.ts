/**
 * Stable error taxonomy for filter expressions.
 *
 * Each code maps to one failure type. Codes are stable across versions
 * and safe to match against in downstream systems.
 *
 * @module compiler/errors
 */

export const FilterDslErrorCode = {
  EMPTY_EXPRESSION: 'EMPTY_EXPRESSION',
  INVALID_CHARACTER: 'INVALID_CHARACTER',
  INVALID_IDENTIFIER: 'INVALID_IDENTIFIER',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  INVALID_BOUNDARY: 'INVALID_BOUNDARY',
  UNMATCHED_LEFT_PAREN: 'UNMATCHED_LEFT_PAREN',
  UNMATCHED_RIGHT_PAREN: 'UNMATCHED_RIGHT_PAREN',
  MISSING_OPERAND: 'MISSING_OPERAND',
  MALFORMED_EXPRESSION: 'MALFORMED_EXPRESSION',
  MAX_DEPTH_EXCEEDED: 'MAX_DEPTH_EXCEEDED',
  UNRESOLVED_REFERENCE: 'UNRESOLVED_REFERENCE',
} as const;

export type FilterDslErrorCode =
  (typeof FilterDslErrorCode)[keyof typeof FilterDslErrorCode];

export class FilterDslError extends Error {
  constructor(
    message: string,
    public readonly code: FilterDslErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FilterDslError';
  }
}

/**
 * Raised before any evaluation when the expression text is not valid.
 * `pos` is the offset of the offending character or token, when known.
 */
export class DslSyntaxError extends FilterDslError {
  constructor(
    code: FilterDslErrorCode,
    message: string,
    public readonly pos?: number,
    public readonly token?: string,
  ) {
    super(pos === undefined ? message : `${message} at position ${pos}`, code);
    this.name = 'DslSyntaxError';
  }
}

/** Raised at evaluation time when the context has no entry for an identifier. */
export class UnresolvedReferenceError extends FilterDslError {
  constructor(public readonly identifier: string) {
    super(
      `Referenced filter '${identifier}' not found in context`,
      FilterDslErrorCode.UNRESOLVED_REFERENCE,
    );
    this.name = 'UnresolvedReferenceError';
  }
}

export function isFilterDslError(error: unknown): error is FilterDslError {
  return error instanceof FilterDslError;
}
