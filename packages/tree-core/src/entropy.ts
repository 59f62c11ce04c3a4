// ---------------------------------------------------------------------------
// Category distributions and Shannon entropy
// ---------------------------------------------------------------------------

import type { Category } from './types.js';
import { compareCategories } from './types.js';
import type { Item } from './item.js';

/** Count items per category, in first-seen order. */
export function categoryCounts(items: readonly Item[]): Map<Category, number> {
  const counts = new Map<Category, number>();
  for (const item of items) {
    counts.set(item.category, (counts.get(item.category) ?? 0) + 1);
  }
  return counts;
}

/**
 * Shannon entropy H = -Σ p_i * ln(p_i) of a count distribution.
 *
 * @returns Entropy in nats; 0 for an empty or single-category distribution.
 */
export function entropyOfCounts(counts: Iterable<number>): number {
  const values = [...counts];
  let total = 0;
  for (const c of values) total += c;
  if (total === 0) return 0;

  let h = 0;
  for (const c of values) {
    if (c <= 0) continue;
    const p = c / total;
    h -= p * Math.log(p);
  }
  return h;
}

/** Entropy (nats) of the category distribution of `items`. */
export function entropy(items: readonly Item[]): number {
  return entropyOfCounts(categoryCounts(items).values());
}

/**
 * Category with the highest count. Ties go to the smallest category under
 * `compareCategories`, so the result never depends on iteration order.
 *
 * @returns `undefined` when `counts` is empty.
 */
export function majorityCategory<C extends Category | undefined>(
  counts: ReadonlyMap<C, number>,
): C | undefined {
  let best: C | undefined;
  let bestCount = -1;
  for (const [category, count] of counts) {
    if (
      count > bestCount ||
      (count === bestCount && compareOptional(category, best) < 0)
    ) {
      best = category;
      bestCount = count;
    }
  }
  return best;
}

/** `undefined` sorts after every category. */
function compareOptional(a: Category | undefined, b: Category | undefined): number {
  if (a === undefined) return b === undefined ? 0 : 1;
  if (b === undefined) return -1;
  return compareCategories(a, b);
}

/** Most frequent category among `items`; `undefined` for no items. */
export function mostFrequentCategory(items: readonly Item[]): Category | undefined {
  return majorityCategory(categoryCounts(items));
}
