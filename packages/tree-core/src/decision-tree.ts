// ---------------------------------------------------------------------------
// Rule-based Decision Tree (entropy / information gain)
// ---------------------------------------------------------------------------

import type { Category } from './types.js';
import type { Item } from './item.js';
import type { Rule } from './rule.js';
import type { InductionSettings } from './config.js';
import type { TreeLogger } from './logger.js';
import { silentLogger } from './logger.js';
import { TreeInvariantError } from './errors.js';
import { entropy, mostFrequentCategory } from './entropy.js';
import { findBestSplit } from './split.js';
import { treeStats } from './traversal.js';
import { DecisionTreeBuilder } from './builder.js';

export interface LeafNode {
  readonly kind: 'leaf';
  /** `undefined` only for a leaf induced from an empty item set. */
  readonly category: Category | undefined;
}

export interface InternalNode {
  readonly kind: 'internal';
  readonly rule: Rule;
  readonly match: TreeNode;
  readonly notMatch: TreeNode;
}

export type TreeNode = LeafNode | InternalNode;

/** Type guard: is this node a leaf? */
export function isLeaf(node: TreeNode): node is LeafNode {
  return node.kind === 'leaf';
}

export function leaf(category: Category | undefined): LeafNode {
  return Object.freeze({ kind: 'leaf', category });
}

export function internal(rule: Rule, match: TreeNode, notMatch: TreeNode): InternalNode {
  return Object.freeze({ kind: 'internal', rule, match, notMatch });
}

function unreachable(node: never): never {
  throw new TreeInvariantError(`Unknown tree node shape: ${JSON.stringify(node)}`);
}

// ---------------------------------------------------------------------------
// Induction
// ---------------------------------------------------------------------------

/**
 * Recursively induce a tree over `items`.
 *
 * Stops with a majority-category leaf when the set is no larger than
 * `minimalLeafSize`, is pure (zero entropy), or admits no split with
 * positive information gain. Children are built before their parent.
 */
export function induceTree(items: readonly Item[], settings: InductionSettings): TreeNode {
  if (items.length <= settings.minimalLeafSize) {
    return leaf(mostFrequentCategory(items));
  }

  if (entropy(items) === 0) {
    return leaf(mostFrequentCategory(items));
  }

  const split = findBestSplit(items, settings);
  if (split === null) {
    return leaf(mostFrequentCategory(items));
  }

  const match = induceTree(split.matched, settings);
  const notMatch = induceTree(split.notMatched, settings);
  return internal(split.rule, match, notMatch);
}

/** Route `item` to a leaf and return its category. */
export function classifyNode(root: TreeNode, item: Item): Category | undefined {
  let node = root;
  for (;;) {
    switch (node.kind) {
      case 'leaf':
        return node.category;
      case 'internal':
        node = node.rule.match(item) ? node.match : node.notMatch;
        break;
      default:
        return unreachable(node);
    }
  }
}

/**
 * Post-order collapse of internal nodes whose two children are leaves with
 * the same category. Returns a new node; `node` is untouched. Subtrees that
 * need no change are returned as-is.
 */
export function mergeRedundantRules(node: TreeNode): TreeNode {
  if (isLeaf(node)) return node;

  const match = mergeRedundantRules(node.match);
  const notMatch = mergeRedundantRules(node.notMatch);

  if (isLeaf(match) && isLeaf(notMatch) && match.category === notMatch.category) {
    return leaf(match.category);
  }
  if (match === node.match && notMatch === node.notMatch) return node;
  return internal(node.rule, match, notMatch);
}

// ---------------------------------------------------------------------------
// DecisionTree
// ---------------------------------------------------------------------------

/**
 * A trained decision tree.
 *
 * Each internal node holds a rule; items matching it descend into the match
 * subtree, all others into the not-match subtree. Classification is
 * read-only; `mergeRedundantRules` replaces the root with a simplified one.
 */
export class DecisionTree {
  private root: TreeNode;

  constructor(root: TreeNode) {
    this.root = root;
  }

  static createBuilder(): DecisionTreeBuilder {
    return new DecisionTreeBuilder();
  }

  /** Induce a tree from `items` with resolved settings. */
  static build(
    items: readonly Item[],
    settings: InductionSettings,
    logger: TreeLogger = silentLogger,
  ): DecisionTree {
    const tree = new DecisionTree(induceTree(items, settings));
    logger.debug('tree induced', { items: items.length, ...treeStats(tree.root) });
    return tree;
  }

  classify(item: Item): Category | undefined {
    return classifyNode(this.root, item);
  }

  /** Collapse redundant rules in place; returns `this` for chaining. */
  mergeRedundantRules(): this {
    this.root = mergeRedundantRules(this.root);
    return this;
  }

  getRoot(): TreeNode {
    return this.root;
  }

  isLeaf(): boolean {
    return isLeaf(this.root);
  }
}
