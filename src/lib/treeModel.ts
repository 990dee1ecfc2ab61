/**
 * Tree model: root node, flattened visible rows and a scrolled cursor.
 *
 * Nodes are never mutated in place once they belong to a model: expanding
 * grafts a fetched child list onto a copied path, collapsing drops it.
 */
import type { TreeNode } from './types';
import { adjustViewport, visibleRows } from './viewport';

export interface TreeItem {
  node: TreeNode;
  level: number;
  isLast: boolean;
}

export interface TreeModel {
  root: TreeNode;
  items: TreeItem[];
  cursor: number;
  viewportTop: number;
  // rows given to the list, footer included
  height: number;
}

/**
 * Depth-first pre-order list of the nodes under expanded ancestors
 */
export function flatten(root: TreeNode): TreeItem[] {
  const items: TreeItem[] = [];
  const walk = (node: TreeNode, level: number, isLast: boolean): void => {
    items.push({ node, level, isLast });
    if (!node.loaded || !node.children) return;
    node.children.forEach((child, i, all) =>
      walk(child, level + 1, i === all.length - 1)
    );
  };
  walk(root, 0, true);
  return items;
}

export function createTreeModel(root: TreeNode, height: number): TreeModel {
  return { root, items: flatten(root), cursor: 0, viewportTop: 0, height };
}

export const treeRows = (model: TreeModel): number =>
  visibleRows(model.height, model.items.length);

export function setCursor(model: TreeModel, cursor: number): TreeModel {
  const { cursor: c, top } = adjustViewport(
    cursor,
    model.viewportTop,
    treeRows(model),
    model.items.length
  );
  return { ...model, cursor: c, viewportTop: top };
}

export const moveCursor = (model: TreeModel, delta: number): TreeModel =>
  setCursor(model, model.cursor + delta);

export const pageDown = (model: TreeModel): TreeModel =>
  moveCursor(model, treeRows(model));

export const cursorEnd = (model: TreeModel): TreeModel =>
  setCursor(model, model.items.length - 1);

export const resizeTree = (model: TreeModel, height: number): TreeModel =>
  setCursor({ ...model, height }, model.cursor);

export const selectedNode = (model: TreeModel): TreeNode | undefined =>
  model.items[model.cursor]?.node;

function replaceNode(
  node: TreeNode,
  dn: string,
  update: (node: TreeNode) => TreeNode
): TreeNode {
  if (node.dn === dn) return update(node);
  if (!node.children) return node;
  let changed = false;
  const children = node.children.map(child => {
    const next = replaceNode(child, dn, update);
    if (next !== child) changed = true;
    return next;
  });
  return changed ? { ...node, children } : node;
}

// keeps the cursor on the same DN, or on `fallbackDN` when that row is gone
function withRoot(
  model: TreeModel,
  root: TreeNode,
  fallbackDN?: string
): TreeModel {
  if (root === model.root) return model;
  const current = selectedNode(model);
  const items = flatten(root);
  let index = current ? items.findIndex(i => i.node.dn === current.dn) : -1;
  if (index < 0 && fallbackDN !== undefined) {
    index = items.findIndex(i => i.node.dn === fallbackDN);
  }
  return setCursor({ ...model, root, items }, index >= 0 ? index : model.cursor);
}

/**
 * Attach fetched children to the node with the given DN
 */
export function graftChildren(
  model: TreeModel,
  dn: string,
  children: TreeNode[]
): TreeModel {
  return withRoot(
    model,
    replaceNode(model.root, dn, node => ({
      ...node,
      children,
      loaded: true,
    }))
  );
}

/**
 * Children are discarded, expanding again fetches them again
 */
export function collapseNode(model: TreeModel, dn: string): TreeModel {
  return withRoot(
    model,
    replaceNode(model.root, dn, node =>
      node.loaded ? { ...node, children: null, loaded: false } : node
    ),
    dn
  );
}

/**
 * Copy of a node safe to hand to a background task
 */
export const detachNode = (node: TreeNode): TreeNode => ({
  dn: node.dn,
  name: node.name,
  children: null,
  loaded: false,
});
