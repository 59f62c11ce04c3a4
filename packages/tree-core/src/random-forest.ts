// ---------------------------------------------------------------------------
// Random Forest — bagged decision trees with vote aggregation
// ---------------------------------------------------------------------------

import type { Category, CategoryHistogram, PRNG } from './types.js';
import { createPRNG, shuffled } from './types.js';
import type { Item } from './item.js';
import type { InductionSettings } from './config.js';
import { forestOptionsSchema, parseConfig } from './config.js';
import type { TreeLogger } from './logger.js';
import { silentLogger } from './logger.js';
import { DecisionTree } from './decision-tree.js';
import { majorityCategory } from './entropy.js';
import { treeStats } from './traversal.js';

/** Source of the shared training set and the settings every member uses. */
export interface TrainingSetProvider {
  getTrainingSet(): readonly Item[];
  getSettings(): InductionSettings;
}

export interface ForestCreateOptions {
  /** Seed for the shuffle. Ignored when `rng` is given. */
  seed?: number;
  rng?: PRNG;
  logger?: TreeLogger;
}

// ---------------------------------------------------------------------------
// Resampling
// ---------------------------------------------------------------------------

/** Items whose position is not a multiple of `modulus`. */
export function moduloSubset<T>(items: readonly T[], modulus: number): T[] {
  return items.filter((_, index) => index % modulus !== 0);
}

/**
 * Training subset of ensemble member `memberIndex`: its own contiguous chunk
 * of the shuffled set, followed by every shuffled item whose index is not a
 * multiple of `memberIndex + 1`. Member 0 therefore trains on its chunk only.
 */
export function memberTrainingSet<T>(
  shuffledItems: readonly T[],
  memberIndex: number,
  chunkSize: number,
): T[] {
  const start = memberIndex * chunkSize;
  return [
    ...shuffledItems.slice(start, start + chunkSize),
    ...moduloSubset(shuffledItems, memberIndex + 1),
  ];
}

// ---------------------------------------------------------------------------
// RandomForest
// ---------------------------------------------------------------------------

/**
 * Ensemble of independently trained decision trees.
 *
 * The training set is shuffled once and cut into `ensembleSize` equal
 * chunks (`floor(n / ensembleSize)` items each; a remainder is left out of
 * every chunk). Each member trains on its chunk plus a modulo-selected subset
 * of the whole shuffled set, and is pruned with `mergeRedundantRules`.
 */
export class RandomForest {
  private readonly trees: readonly DecisionTree[];

  constructor(trees: readonly DecisionTree[]) {
    this.trees = Object.freeze([...trees]);
  }

  static create(
    provider: TrainingSetProvider,
    ensembleSize: number,
    options: ForestCreateOptions = {},
  ): RandomForest {
    const { seed } = parseConfig(forestOptionsSchema, { ensembleSize, seed: options.seed });
    const logger = options.logger ?? silentLogger;
    const rng = options.rng ?? (seed === undefined ? Math.random : createPRNG(seed));

    const settings = provider.getSettings();
    const items = shuffled(provider.getTrainingSet(), rng);
    const chunkSize = Math.floor(items.length / ensembleSize);
    if (chunkSize === 0) {
      logger.warn('ensemble larger than training set, chunks are empty', {
        ensembleSize,
        trainingItems: items.length,
      });
    }

    const trees: DecisionTree[] = [];
    for (let i = 0; i < ensembleSize; i++) {
      const subset = memberTrainingSet(items, i, chunkSize);
      const tree = DecisionTree.build(subset, settings, logger).mergeRedundantRules();
      logger.debug('forest member trained', {
        member: i,
        items: subset.length,
        ...treeStats(tree.getRoot()),
      });
      trees.push(tree);
    }

    logger.info('forest created', {
      ensembleSize,
      trainingItems: items.length,
      chunkSize,
    });
    return new RandomForest(trees);
  }

  /** Votes per category across all trees; counts sum to `size`. */
  classify(item: Item): CategoryHistogram {
    const votes: CategoryHistogram = new Map();
    for (const tree of this.trees) {
      const category = tree.classify(item);
      votes.set(category, (votes.get(category) ?? 0) + 1);
    }
    return votes;
  }

  /**
   * Majority vote. Ties go to the smallest category under
   * `compareCategories`; `undefined` only wins outright.
   */
  predict(item: Item): Category | undefined {
    return majorityCategory(this.classify(item));
  }

  get size(): number {
    return this.trees.length;
  }

  getTrees(): readonly DecisionTree[] {
    return this.trees;
  }
}
