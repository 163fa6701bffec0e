export { MapContext } from './map-context.js';
export { PredicateCondition } from './predicate-condition.js';
export type { Predicate } from './predicate-condition.js';
