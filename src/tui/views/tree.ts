/**
 * Tree view key handling
 */
import {
  collapseNode,
  detachNode,
  selectedNode,
  setCursor,
  treeRows,
} from '../../lib/treeModel';
import {
  fetchEntryTask,
  loadChildrenTask,
  loadRootTask,
  loadingTimerTask,
} from '../store/tasks';
import type { AppState, TreeState, Transition } from '../types';

import { listTarget, stay } from './navigation';

const withTree = (state: AppState, tree: Partial<TreeState>): AppState => ({
  ...state,
  tree: { ...state.tree, ...tree },
});

export function reloadTree(state: AppState): Transition {
  if (!state.client) return stay(state);
  const loadId = state.tree.loadId + 1;
  return {
    state: {
      ...withTree(state, {
        model: null,
        loading: true,
        expanding: [],
        error: null,
        loadId,
        elapsedMs: 0,
      }),
      status: 'Loading LDAP tree...',
    },
    tasks: [loadRootTask(state.client), loadingTimerTask(loadId)],
  };
}

function expand(state: AppState): Transition {
  const { model } = state.tree;
  const node = model ? selectedNode(model) : undefined;
  if (!node || !state.client) return stay(state);
  if (node.loaded) {
    const status =
      node.children && node.children.length > 0
        ? 'Node already expanded'
        : 'No children to expand';
    return stay({ ...state, status });
  }
  if (state.tree.expanding.includes(node.dn)) return stay(state);
  return {
    state: {
      ...withTree(state, { expanding: [...state.tree.expanding, node.dn] }),
      status: `Loading children of ${node.name}...`,
    },
    tasks: [loadChildrenTask(state.client, detachNode(node))],
  };
}

function collapse(state: AppState): Transition {
  const { model } = state.tree;
  const node = model ? selectedNode(model) : undefined;
  if (!model || !node) return stay(state);
  if (!node.loaded || !node.children || node.children.length === 0) {
    return stay({ ...state, status: 'No children to collapse' });
  }
  return stay({
    ...withTree(state, { model: collapseNode(model, node.dn) }),
    status: 'Node collapsed',
  });
}

/**
 * Fetch the entry under the cursor and show it in the record view
 */
export function openRecord(state: AppState, dn: string): Transition {
  if (!state.client) return stay(state);
  return {
    state: {
      ...state,
      record: { ...state.record, loading: true, error: null },
      status: `Loading ${dn}...`,
    },
    tasks: [fetchEntryTask(state.client, dn)],
  };
}

export function treeKey(state: AppState, key: string): Transition {
  const { model } = state.tree;
  if (key === 'r') return reloadTree(state);
  if (!model) return stay(state);

  const target = listTarget(
    key,
    model.cursor,
    treeRows(model),
    model.items.length
  );
  if (target !== null) {
    return stay(withTree(state, { model: setCursor(model, target) }));
  }

  switch (key) {
    case 'right':
    case 'l':
      return expand(state);
    case 'left':
    case 'h':
      return collapse(state);
    case 'enter':
    case ' ': {
      const node = selectedNode(model);
      return node ? openRecord(state, node.dn) : stay(state);
    }
    default:
      return stay(state);
  }
}
