// ---------------------------------------------------------------------------
// Fluent configuration for trees and forests
// ---------------------------------------------------------------------------

import type { Item } from './item.js';
import type { Predicate } from './predicates.js';
import type { InductionSettings } from './config.js';
import { resolveInductionSettings } from './config.js';
import type { TreeLogger } from './logger.js';
import { silentLogger } from './logger.js';
import { DecisionTree } from './decision-tree.js';
import type { ForestCreateOptions, TrainingSetProvider } from './random-forest.js';
import { RandomForest } from './random-forest.js';

/**
 * Collects a training set and induction options, then builds a tree or a
 * forest. Options are validated when a model is created, so an invalid
 * setting surfaces as a `ConfigurationError` at that point.
 *
 * @example
 * ```ts
 * const tree = DecisionTree.createBuilder()
 *   .trainingSet(items)
 *   .predicates('color', EQUAL)
 *   .defaultPredicates(EQUAL, LESS_THAN)
 *   .minimalNumberOfItems(2)
 *   .createDecisionTree()
 *   .mergeRedundantRules();
 * ```
 */
export class DecisionTreeBuilder implements TrainingSetProvider {
  private items: readonly Item[] = [];
  private minimalLeafSize = 0;
  private ignored: string[] = [];
  private readonly attributePredicates: Record<string, Predicate[]> = {};
  private defaults: Predicate[] = [];
  private log: TreeLogger = silentLogger;

  trainingSet(items: readonly Item[]): this {
    this.items = [...items];
    return this;
  }

  /** Nodes holding this many items or fewer are not split further. */
  minimalNumberOfItems(count: number): this {
    this.minimalLeafSize = count;
    return this;
  }

  ignoredAttributes(...attributes: string[]): this {
    this.ignored = [...this.ignored, ...attributes];
    return this;
  }

  /** Predicates to try for one attribute, replacing the defaults for it. */
  predicates(attribute: string, ...predicates: Predicate[]): this {
    this.attributePredicates[attribute] = predicates;
    return this;
  }

  defaultPredicates(...predicates: Predicate[]): this {
    this.defaults = predicates;
    return this;
  }

  logger(logger: TreeLogger): this {
    this.log = logger;
    return this;
  }

  getTrainingSet(): readonly Item[] {
    return this.items;
  }

  getSettings(): InductionSettings {
    return resolveInductionSettings({
      minimalLeafSize: this.minimalLeafSize,
      attributePredicates: { ...this.attributePredicates },
      defaultPredicates: this.defaults,
      ignoredAttributes: this.ignored,
    });
  }

  createDecisionTree(): DecisionTree {
    return DecisionTree.build(this.items, this.getSettings(), this.log);
  }

  createRandomForest(ensembleSize: number, options: ForestCreateOptions = {}): RandomForest {
    return RandomForest.create(this, ensembleSize, { ...options, logger: options.logger ?? this.log });
  }
}
