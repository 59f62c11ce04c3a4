// ---------------------------------------------------------------------------
// Tests: RandomForest resampling, training and voting
// ---------------------------------------------------------------------------

import { describe, it, expect, vi } from 'vitest';
import { createPRNG } from '../types.js';
import { createItem } from '../item.js';
import { EQUAL, LESS_THAN } from '../predicates.js';
import type { TreeLogger } from '../logger.js';
import { ConfigurationError } from '../errors.js';
import { resolveInductionSettings } from '../config.js';
import { DecisionTree, leaf } from '../decision-tree.js';
import type { TrainingSetProvider } from '../random-forest.js';
import { RandomForest, memberTrainingSet, moduloSubset } from '../random-forest.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** x in [0, n): 'low' below n/2, 'high' from n/2 on. */
function thresholdItems(n: number) {
  return Array.from({ length: n }, (_, x) => createItem(x < n / 2 ? 'low' : 'high', { x }));
}

function provider(n: number): TrainingSetProvider {
  const items = thresholdItems(n);
  const settings = resolveInductionSettings({ defaultPredicates: [LESS_THAN, EQUAL] });
  return { getTrainingSet: () => items, getSettings: () => settings };
}

function recordingLogger(): TreeLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function sum(values: Iterable<number>): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

// ===========================================================================
// Resampling
// ===========================================================================

describe('moduloSubset', () => {
  it('drops positions that are multiples of the modulus', () => {
    expect(moduloSubset([0, 1, 2, 3, 4, 5], 3)).toEqual([1, 2, 4, 5]);
  });

  it('is empty for modulus 1', () => {
    expect(moduloSubset([0, 1, 2], 1)).toEqual([]);
  });
});

describe('memberTrainingSet', () => {
  const shuffledItems = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

  it('gives member 0 only its own chunk', () => {
    expect(memberTrainingSet(shuffledItems, 0, 5)).toEqual([0, 1, 2, 3, 4]);
  });

  it('appends the modulo subset of the whole set to later members', () => {
    expect(memberTrainingSet(shuffledItems, 1, 5)).toEqual([5, 6, 7, 8, 9, 1, 3, 5, 7, 9]);
    expect(memberTrainingSet(shuffledItems, 2, 3)).toEqual([6, 7, 8, 1, 2, 4, 5, 7, 8]);
  });

  it('has no chunk when the chunk size is zero', () => {
    expect(memberTrainingSet([0, 1, 2], 1, 0)).toEqual([1]);
  });
});

// ===========================================================================
// RandomForest
// ===========================================================================

describe('RandomForest.create', () => {
  it('trains one tree per member and casts one vote each', () => {
    const forest = RandomForest.create(provider(100), 5, { seed: 7 });
    expect(forest.size).toBe(5);
    expect(forest.getTrees()).toHaveLength(5);

    for (const x of [0, 25, 49, 50, 75, 99]) {
      const votes = forest.classify(createItem('?', { x }));
      expect(sum(votes.values())).toBe(5);
    }
  });

  it('predicts the majority category on separable data', () => {
    const forest = RandomForest.create(provider(100), 5, { seed: 11 });
    expect(forest.predict(createItem('?', { x: 10 }))).toBe('low');
    expect(forest.predict(createItem('?', { x: 95 }))).toBe('high');
  });

  it('is reproducible for a fixed seed', () => {
    const a = RandomForest.create(provider(60), 4, { seed: 3 });
    const b = RandomForest.create(provider(60), 4, { seed: 3 });
    for (let x = 0; x < 60; x += 7) {
      const probe = createItem('?', { x });
      expect(a.classify(probe)).toEqual(b.classify(probe));
    }
  });

  it('draws the shuffle from a supplied rng', () => {
    const rng = vi.fn(createPRNG(5));
    RandomForest.create(provider(100), 5, { rng });
    expect(rng).toHaveBeenCalledTimes(99);
  });

  it('leaves the training set untouched', () => {
    const source = provider(30);
    const before = [...source.getTrainingSet()];
    RandomForest.create(source, 3, { seed: 1 });
    expect(source.getTrainingSet()).toEqual(before);
  });

  it('warns when the ensemble outnumbers the training items', () => {
    const logger = recordingLogger();
    const forest = RandomForest.create(provider(3), 5, { seed: 1, logger });
    expect(forest.size).toBe(5);
    expect(logger.warn).toHaveBeenCalledWith('ensemble larger than training set, chunks are empty', {
      ensembleSize: 5,
      trainingItems: 3,
    });
  });

  it('logs each member and the finished forest', () => {
    const logger = recordingLogger();
    RandomForest.create(provider(20), 2, { seed: 1, logger });
    expect(logger.debug).toHaveBeenCalledWith(
      'forest member trained',
      expect.objectContaining({ member: 1 }),
    );
    expect(logger.info).toHaveBeenCalledWith('forest created', {
      ensembleSize: 2,
      trainingItems: 20,
      chunkSize: 10,
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('rejects an ensemble size below one or not an integer', () => {
    expect(() => RandomForest.create(provider(10), 0)).toThrow(ConfigurationError);
    expect(() => RandomForest.create(provider(10), 2.5)).toThrow(ConfigurationError);
  });

  it('rejects a non-integer seed', () => {
    expect(() => RandomForest.create(provider(10), 2, { seed: 0.5 })).toThrow(ConfigurationError);
  });
});

describe('RandomForest voting', () => {
  const probe = createItem('?', { x: 0 });

  it('counts votes per category', () => {
    const forest = new RandomForest([
      new DecisionTree(leaf('B')),
      new DecisionTree(leaf('A')),
      new DecisionTree(leaf('B')),
    ]);
    expect(forest.classify(probe)).toEqual(new Map([['B', 2], ['A', 1]]));
    expect(forest.predict(probe)).toBe('B');
  });

  it('breaks a tied vote with the smallest category', () => {
    const forest = new RandomForest([new DecisionTree(leaf('B')), new DecisionTree(leaf('A'))]);
    expect(forest.predict(probe)).toBe('A');
  });
});
