/**
 * Documentable-node locator
 */

import type { DocumentableNode, SourceTree } from './types.js';

/**
 * Every definition in the tree, depth-first and in source order: a
 * definition comes before the ones nested in it, siblings in textual order.
 */
export function* walkDefinitions(tree: SourceTree): Generator<DocumentableNode> {
  const stack = [...tree.definitions].reverse();
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    yield node;
    for (let i = node.children.length - 1; i >= 0; i -= 1) {
      stack.push(node.children[i]);
    }
  }
}

export function isDocumented(node: DocumentableNode): boolean {
  const first = node.body[0];
  if (!first) return false;
  return first.type === 'inserted' || first.docstring;
}

/**
 * Lazily yield the definitions that lack a docstring. The nodes are object
 * references into the tree, so the sequence stays valid while earlier
 * candidates are mutated.
 */
export function* findUndocumented(tree: SourceTree): Generator<DocumentableNode> {
  for (const node of walkDefinitions(tree)) {
    if (!isDocumented(node)) {
      yield node;
    }
  }
}

export function countDefinitions(tree: SourceTree): number {
  let count = 0;
  for (const _node of walkDefinitions(tree)) {
    count += 1;
  }
  return count;
}
