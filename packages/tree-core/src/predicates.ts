// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

/**
 * A reusable boolean test comparing an item's attribute value (`candidate`)
 * with a rule's reference value.
 *
 * Predicates are compared by identity when rules are deduplicated, so define
 * each one once and share it.
 */
export interface Predicate {
  readonly name: string;
  /** Short operator used when rendering rules, e.g. `==`. */
  readonly symbol: string;
  test(candidate: unknown, reference: unknown): boolean;
}

/** Define a frozen predicate. */
export function definePredicate(
  name: string,
  symbol: string,
  test: (candidate: unknown, reference: unknown) => boolean,
): Predicate {
  return Object.freeze({ name, symbol, test });
}

/** Type guard for values that satisfy the `Predicate` shape. */
export function isPredicate(value: unknown): value is Predicate {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'symbol' in value &&
    typeof value.symbol === 'string' &&
    'test' in value &&
    typeof value.test === 'function'
  );
}

type Ordered = number | string;

/** Both operands numbers, or both strings. NaN never compares. */
function comparable(a: unknown, b: unknown): [Ordered, Ordered] | null {
  if (typeof a === 'number' && typeof b === 'number') {
    return Number.isNaN(a) || Number.isNaN(b) ? null : [a, b];
  }
  if (typeof a === 'string' && typeof b === 'string') return [a, b];
  return null;
}

function ordering(
  name: string,
  symbol: string,
  holds: (a: Ordered, b: Ordered) => boolean,
): Predicate {
  return definePredicate(name, symbol, (candidate, reference) => {
    const pair = comparable(candidate, reference);
    return pair !== null && holds(pair[0], pair[1]);
  });
}

// ---------------------------------------------------------------------------
// Built-ins
// ---------------------------------------------------------------------------

export const EQUAL = definePredicate('equal', '==', (candidate, reference) =>
  Object.is(candidate, reference) || candidate === reference,
);

export const NOT_EQUAL = definePredicate(
  'not_equal',
  '!=',
  (candidate, reference) => !EQUAL.test(candidate, reference),
);

export const LESS_THAN = ordering('less_than', '<', (a, b) => a < b);

export const LESS_THAN_OR_EQUAL = ordering(
  'less_than_or_equal',
  '<=',
  (a, b) => a <= b,
);

export const GREATER_THAN = ordering('greater_than', '>', (a, b) => a > b);

export const GREATER_THAN_OR_EQUAL = ordering(
  'greater_than_or_equal',
  '>=',
  (a, b) => a >= b,
);

/** Candidate is an array holding the reference, or a string containing it. */
export const CONTAINS = definePredicate(
  'contains',
  'contains',
  (candidate, reference) => {
    if (Array.isArray(candidate)) return candidate.includes(reference);
    if (typeof candidate === 'string' && typeof reference === 'string') {
      return candidate.includes(reference);
    }
    return false;
  },
);
