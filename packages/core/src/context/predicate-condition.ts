/**
 * Condition over in-memory items, built from plain predicate functions.
 *
 * @module context/predicate-condition
 */

import type { Condition } from '../types/condition.js';

export type Predicate<T> = (item: T) => boolean;

export class PredicateCondition<T> implements Condition<PredicateCondition<T>> {
  private constructor(private readonly predicate: Predicate<T>) {}

  static of<T>(predicate: Predicate<T>): PredicateCondition<T> {
    return new PredicateCondition(predicate);
  }

  static constant<T = void>(value: boolean): PredicateCondition<T> {
    return new PredicateCondition<T>(() => value);
  }

  and(other: PredicateCondition<T>): PredicateCondition<T> {
    return new PredicateCondition<T>((item) => this.predicate(item) && other.predicate(item));
  }

  or(other: PredicateCondition<T>): PredicateCondition<T> {
    return new PredicateCondition<T>((item) => this.predicate(item) || other.predicate(item));
  }

  not(): PredicateCondition<T> {
    return new PredicateCondition<T>((item) => !this.predicate(item));
  }

  test(item: T): boolean {
    return this.predicate(item);
  }

  filter(items: Iterable<T>): T[] {
    const matched: T[] = [];
    for (const item of items) {
      if (this.predicate(item)) matched.push(item);
    }
    return matched;
  }
}
