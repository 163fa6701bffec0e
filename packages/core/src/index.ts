/**
 * filter-dsl
 *
 * Parses boolean combinations of named filters (`&`, `|`, `!`, parentheses)
 * and folds them into a caller-supplied condition type.
 *
 * @example
 * ```typescript
 * import { evaluate, MapContext, PredicateCondition } from 'filter-dsl';
 *
 * const context = MapContext.fromRecord({
 *   cheap: PredicateCondition.of((p: Product) => p.price < 20),
 *   inStock: PredicateCondition.of((p: Product) => p.stock > 0),
 * });
 *
 * evaluate('cheap & inStock', context).filter(products);
 * ```
 */

export * from './compiler/index.js';

export type { Condition, Context } from './types/condition.js';

export { MapContext, PredicateCondition } from './context/index.js';
export type { Predicate } from './context/index.js';

export { DEFAULT_MAX_DEPTH, DEFAULT_PARSE_OPTIONS, resolveParseOptions } from './config/options.js';
export type { ParseOptions, ResolvedParseOptions } from './config/options.js';

export { createLogger, isLogLevel, silentLogger, LOG_LEVELS } from './utils/logger.js';
export type { Logger, LogLevel, LogContext } from './utils/logger.js';
