// ---------------------------------------------------------------------------
// Tree traversal, statistics and text rendering
// ---------------------------------------------------------------------------

import type { TreeNode } from './decision-tree.js';
import { isLeaf } from './decision-tree.js';

/** Which edge led to the visited node. */
export type Branch = 'root' | 'match' | 'notMatch';

export interface VisitContext {
  readonly depth: number;
  readonly branch: Branch;
}

export type TreeVisitor = (node: TreeNode, context: VisitContext) => void;

/** Pre-order walk: node, then its match subtree, then its not-match subtree. */
export function walkTree(root: TreeNode, visitor: TreeVisitor): void {
  const stack: Array<{ node: TreeNode; context: VisitContext }> = [
    { node: root, context: { depth: 0, branch: 'root' } },
  ];
  while (stack.length > 0) {
    const { node, context } = stack.pop()!;
    visitor(node, context);
    if (!isLeaf(node)) {
      const depth = context.depth + 1;
      stack.push({ node: node.notMatch, context: { depth, branch: 'notMatch' } });
      stack.push({ node: node.match, context: { depth, branch: 'match' } });
    }
  }
}

export interface TreeStats {
  /** Edges on the longest root-to-leaf path; 0 for a lone leaf. */
  depth: number;
  leaves: number;
  internalNodes: number;
}

export function treeStats(root: TreeNode): TreeStats {
  const stats: TreeStats = { depth: 0, leaves: 0, internalNodes: 0 };
  walkTree(root, (node, { depth }) => {
    stats.depth = Math.max(stats.depth, depth);
    if (isLeaf(node)) stats.leaves++;
    else stats.internalNodes++;
  });
  return stats;
}

const BRANCH_LABEL: Record<Branch, string> = {
  root: '',
  match: 'match -> ',
  notMatch: 'not match -> ',
};

/**
 * One line per node, indented two spaces per level.
 *
 * @example
 * ```
 * [color == "red"]
 *   match -> A
 *   not match -> B
 * ```
 */
export function formatTree(root: TreeNode): string {
  const lines: string[] = [];
  walkTree(root, (node, { depth, branch }) => {
    const body = isLeaf(node)
      ? node.category === undefined
        ? '(none)'
        : String(node.category)
      : `[${node.rule.toString()}]`;
    lines.push(`${'  '.repeat(depth)}${BRANCH_LABEL[branch]}${body}`);
  });
  return lines.join('\n');
}
