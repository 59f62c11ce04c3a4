// ---------------------------------------------------------------------------
// Best-split search by information gain
// ---------------------------------------------------------------------------

import type { Item } from './item.js';
import type { Predicate } from './predicates.js';
import type { InductionSettings } from './config.js';
import { Rule, RuleSet } from './rule.js';
import { entropy } from './entropy.js';

/** Partition of an item set under one rule. Lives only during induction. */
export interface SplitResult {
  readonly rule: Rule;
  readonly matched: readonly Item[];
  readonly notMatched: readonly Item[];
}

/** Partition `items` by `rule`, preserving input order on both sides. */
export function splitItems(rule: Rule, items: readonly Item[]): SplitResult {
  const matched: Item[] = [];
  const notMatched: Item[] = [];
  for (const item of items) {
    if (rule.match(item)) {
      matched.push(item);
    } else {
      notMatched.push(item);
    }
  }
  return { rule, matched, notMatched };
}

/**
 * Predicates tried for `attribute`: its own list when non-empty, else the
 * default list, else none.
 */
export function predicatesFor(
  attribute: string,
  settings: InductionSettings,
): readonly Predicate[] {
  const own = settings.attributePredicates.get(attribute);
  if (own !== undefined && own.length > 0) return own;
  return settings.defaultPredicates;
}

/**
 * Information gain of `split` over a parent set with entropy `parentEntropy`.
 * Weighted child entropy uses the partition sizes as probabilities.
 */
export function informationGain(parentEntropy: number, split: SplitResult): number {
  const n = split.matched.length + split.notMatched.length;
  if (n === 0) return 0;
  const pMatched = split.matched.length / n;
  const pNotMatched = split.notMatched.length / n;
  return (
    parentEntropy -
    pMatched * entropy(split.matched) -
    pNotMatched * entropy(split.notMatched)
  );
}

/**
 * Exhaustive search over (attribute, predicate, observed value) triples.
 *
 * Candidates are visited item by item, then attribute by attribute, then in
 * predicate-list order; each distinct rule is evaluated once. Only a strictly
 * greater gain replaces the current best, so the first rule to reach the
 * maximum wins.
 *
 * @returns The best split, or `null` when no rule has positive gain.
 */
export function findBestSplit(
  items: readonly Item[],
  settings: InductionSettings,
): SplitResult | null {
  const initialEntropy = entropy(items);
  const tested = new RuleSet();

  let bestGain = 0;
  let best: SplitResult | null = null;

  for (const base of items) {
    for (const attribute of base.attributeNames()) {
      if (settings.ignoredAttributes.has(attribute)) continue;

      const value = base.value(attribute);
      for (const predicate of predicatesFor(attribute, settings)) {
        const rule = new Rule(attribute, predicate, value);
        if (!tested.add(rule)) continue;

        const split = splitItems(rule, items);
        const gain = informationGain(initialEntropy, split);
        if (gain > bestGain) {
          bestGain = gain;
          best = split;
        }
      }
    }
  }

  return best;
}
