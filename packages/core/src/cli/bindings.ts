/**
 * Bindings files for `filter-dsl eval`.
 *
 * A bindings file is a YAML mapping of filter names to booleans, either at
 * the top level or under a `filters:` key:
 *
 * ```yaml
 * filters:
 *   active: true
 *   admin: false
 * ```
 *
 * @module cli/bindings
 */

import { parse as parseYaml } from 'yaml';
import { MapContext } from '../context/map-context.js';
import { PredicateCondition } from '../context/predicate-condition.js';

export type Bindings = Map<string, boolean>;

export class BindingsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BindingsError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseBindings(content: string): Bindings {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (e) {
    throw new BindingsError(
      `YAML parse error: ${e instanceof Error ? e.message : String(e)}`,
      { cause: e },
    );
  }

  const root = isRecord(parsed) && 'filters' in parsed ? parsed.filters : parsed;
  if (!isRecord(root)) {
    throw new BindingsError('Bindings must be a YAML mapping of filter names to booleans');
  }

  const bindings: Bindings = new Map();
  for (const [name, value] of Object.entries(root)) {
    if (typeof value !== 'boolean') {
      throw new BindingsError(`Binding '${name}' must be a boolean, got ${JSON.stringify(value)}`);
    }
    bindings.set(name, value);
  }
  return bindings;
}

export function bindingsContext(bindings: Bindings): MapContext<PredicateCondition<void>> {
  return new MapContext(
    [...bindings].map(
      ([name, value]): [string, PredicateCondition<void>] => [name, PredicateCondition.constant(value)],
    ),
  );
}
