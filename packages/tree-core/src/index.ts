// ---------------------------------------------------------------------------
// @arbor/tree-core — rule-based decision trees and random forests
// ---------------------------------------------------------------------------

// Types
export * from './types.js';
export * from './errors.js';

// Configuration + logging
export * from './config.js';
export * from './logger.js';

// Items, predicates, rules
export * from './item.js';
export * from './predicates.js';
export * from './rule.js';

// Induction
export * from './entropy.js';
export * from './split.js';
export * from './decision-tree.js';
export * from './traversal.js';

// Ensembles
export * from './random-forest.js';
export * from './builder.js';
