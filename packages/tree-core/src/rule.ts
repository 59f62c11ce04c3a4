// ---------------------------------------------------------------------------
// Rules: (attribute, predicate, reference value)
// ---------------------------------------------------------------------------

import type { Item } from './item.js';
import type { Predicate } from './predicates.js';

/**
 * A split test binding an attribute name, a predicate and a reference value.
 * Two rules are equal when all three parts are equal: the attribute by
 * string equality, the predicate by identity and the value by SameValueZero.
 */
export class Rule {
  constructor(
    readonly attribute: string,
    readonly predicate: Predicate,
    readonly value: unknown,
  ) {
    Object.freeze(this);
  }

  /** Test the item's value for this rule's attribute against the reference. */
  match(item: Item): boolean {
    return this.predicate.test(item.value(this.attribute), this.value);
  }

  equals(other: Rule): boolean {
    return (
      this.attribute === other.attribute &&
      this.predicate === other.predicate &&
      sameValueZero(this.value, other.value)
    );
  }

  toString(): string {
    return `${this.attribute} ${this.predicate.symbol} ${formatValue(this.value)}`;
  }
}

function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

/** Render a reference value: strings quoted, everything else via `String`. */
export function formatValue(value: unknown): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

/**
 * Set of rules with value-equality membership.
 *
 * Buckets by attribute, then predicate; the innermost `Set` holds reference
 * values and so inherits SameValueZero from the platform.
 */
export class RuleSet {
  private readonly buckets = new Map<string, Map<Predicate, Set<unknown>>>();
  private count = 0;

  has(rule: Rule): boolean {
    return this.buckets.get(rule.attribute)?.get(rule.predicate)?.has(rule.value) ?? false;
  }

  /** Add a rule; returns false if an equal rule was already present. */
  add(rule: Rule): boolean {
    let byPredicate = this.buckets.get(rule.attribute);
    if (byPredicate === undefined) {
      byPredicate = new Map();
      this.buckets.set(rule.attribute, byPredicate);
    }
    let values = byPredicate.get(rule.predicate);
    if (values === undefined) {
      values = new Set();
      byPredicate.set(rule.predicate, values);
    }
    if (values.has(rule.value)) return false;
    values.add(rule.value);
    this.count++;
    return true;
  }

  get size(): number {
    return this.count;
  }
}
