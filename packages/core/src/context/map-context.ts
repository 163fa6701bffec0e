/**
 * In-memory context backed by a Map.
 *
 * @module context/map-context
 */

import type { Condition, Context } from '../types/condition.js';
import { isValidIdentifier } from '../compiler/lexer.js';
import { FilterDslError, FilterDslErrorCode } from '../compiler/errors.js';

export class MapContext<C extends Condition<C>> implements Context<C> {
  private readonly conditions = new Map<string, C>();

  constructor(entries: Iterable<readonly [string, C]> = []) {
    for (const [name, condition] of entries) {
      this.set(name, condition);
    }
  }

  static fromRecord<C extends Condition<C>>(record: Record<string, C>): MapContext<C> {
    return new MapContext<C>(Object.entries(record));
  }

  /**
   * Register a condition under `name`, replacing any previous entry.
   * Names must be usable in an expression.
   */
  set(name: string, condition: C): this {
    if (!isValidIdentifier(name)) {
      throw new FilterDslError(
        `Invalid identifier '${name}': names must match [A-Za-z_][A-Za-z0-9_]*`,
        FilterDslErrorCode.INVALID_IDENTIFIER,
      );
    }
    this.conditions.set(name, condition);
    return this;
  }

  lookup(name: string): C | undefined {
    return this.conditions.get(name);
  }

  has(name: string): boolean {
    return this.conditions.has(name);
  }

  delete(name: string): boolean {
    return this.conditions.delete(name);
  }

  names(): string[] {
    return [...this.conditions.keys()];
  }

  get size(): number {
    return this.conditions.size;
  }
}
