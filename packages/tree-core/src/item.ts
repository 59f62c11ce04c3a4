// ---------------------------------------------------------------------------
// Training / query items
// ---------------------------------------------------------------------------

import type { Category } from './types.js';
import { MissingAttributeError } from './errors.js';

/**
 * A labeled record: named attribute values plus a category.
 *
 * Attribute values are opaque to the tree; their meaning is decided by the
 * predicates that test them. Items are read, never mutated, by training.
 */
export interface Item {
  readonly category: Category;
  attributeNames(): readonly string[];
  /** @throws MissingAttributeError when the attribute is absent. */
  value(attribute: string): unknown;
}

class FrozenItem implements Item {
  private readonly attributes: ReadonlyMap<string, unknown>;
  private readonly names: readonly string[];

  constructor(
    readonly category: Category,
    attributes: Readonly<Record<string, unknown>>,
  ) {
    this.attributes = new Map(Object.entries(attributes));
    this.names = Object.freeze([...this.attributes.keys()]);
  }

  attributeNames(): readonly string[] {
    return this.names;
  }

  value(attribute: string): unknown {
    if (!this.attributes.has(attribute)) {
      throw new MissingAttributeError(attribute);
    }
    return this.attributes.get(attribute);
  }
}

/**
 * Create an immutable item. Attribute order is the insertion order of
 * `attributes`, which is also the order split search visits them in.
 *
 * @example
 * ```ts
 * const item = createItem('A', { color: 'red', size: 3 });
 * item.value('color'); // 'red'
 * ```
 */
export function createItem(
  category: Category,
  attributes: Readonly<Record<string, unknown>>,
): Item {
  return Object.freeze(new FrozenItem(category, attributes));
}
