/**
 * Tree mutation
 */

import type { DocstringLiteral, DocumentableNode } from './types.js';

/**
 * Make `literal` the first statement of the node's body. Only this node's
 * body changes; every other node object stays as it was. Callers pass only
 * nodes the locator reported as undocumented.
 */
export function insertDocstring(node: DocumentableNode, literal: DocstringLiteral): void {
  node.body.unshift({ type: 'inserted', literal });
}
