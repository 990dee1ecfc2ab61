import type { TreeItem } from '../../lib/treeModel';
import type { AppState } from '../types';

import { renderList, textBlock, plain, type Block } from './list';

export function treePrefix(item: TreeItem, expanding: boolean): string {
  const { node } = item;
  if (expanding) return '[~] ';
  if (!node.loaded) return '[+] ';
  return node.children && node.children.length > 0 ? '[-] ' : '[·] ';
}

export function renderTree(state: AppState, y: number, height: number): Block {
  const { tree, width } = state;
  if (!tree.model) {
    if (tree.loading) {
      const seconds = (tree.elapsedMs / 1000).toFixed(1);
      return textBlock([plain(`Loading LDAP tree... (${seconds}s)`, width)]);
    }
    if (tree.error) {
      return textBlock([[{ text: `Error: ${tree.error}`, style: 'error' }]]);
    }
    return textBlock([
      plain('Tree view not available without LDAP connection', width),
    ]);
  }
  const { model } = tree;
  return renderList({
    items: model.items,
    cursor: model.cursor,
    top: model.viewportTop,
    height,
    width,
    y,
    highlight: true,
    format: item =>
      '  '.repeat(item.level) +
      treePrefix(item, tree.expanding.includes(item.node.dn)) +
      (item.node.name || item.node.dn),
    target: index => ({ kind: 'treeRow', index }),
  });
}
