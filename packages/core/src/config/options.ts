/**
 * Parser options and their defaults.
 *
 * @module config/options
 */

import { silentLogger, type Logger } from '../utils/logger.js';

export interface ParseOptions {
  /** Receives debug events for parsed expressions and generated conditions. */
  logger?: Logger;
  /**
   * Reject trees deeper than this. Defaults to {@link DEFAULT_MAX_DEPTH};
   * `Infinity` lifts the limit, but generating a very deep tree can then
   * exhaust the call stack.
   */
  maxDepth?: number;
}

export interface ResolvedParseOptions {
  logger: Logger;
  maxDepth: number;
}

export const DEFAULT_MAX_DEPTH = 1000;

export const DEFAULT_PARSE_OPTIONS: Readonly<ResolvedParseOptions> = Object.freeze({
  logger: silentLogger,
  maxDepth: DEFAULT_MAX_DEPTH,
});

export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  const maxDepth = options.maxDepth ?? DEFAULT_PARSE_OPTIONS.maxDepth;
  if (maxDepth !== Number.POSITIVE_INFINITY && (!Number.isInteger(maxDepth) || maxDepth < 1)) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  return {
    logger: options.logger ?? DEFAULT_PARSE_OPTIONS.logger,
    maxDepth,
  };
}
