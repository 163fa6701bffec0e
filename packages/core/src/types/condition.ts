/**
 * Capabilities consumed by the evaluator. Implementations live with the
 * caller (query adapters, in-memory predicates, test doubles).
 *
 * @module types/condition
 */

/**
 * An opaque boolean-algebra value. The type parameter keeps an
 * implementation closed over itself, so `and` only ever receives values
 * of the same family.
 */
export interface Condition<C extends Condition<C>> {
  and(other: C): C;
  or(other: C): C;
  not(): C;
}

/**
 * Name-to-condition lookup. `undefined` (or `null`) means the name was
 * never registered.
 */
export interface Context<C extends Condition<C>> {
  lookup(name: string): C | null | undefined;
}
