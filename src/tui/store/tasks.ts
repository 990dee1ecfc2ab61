/**
 * Background tasks and the messages they resolve to.
 * A task never rejects for a directory error: failures become messages.
 */
import { setTimeout as delay } from 'node:timers/promises';

import type { DirectoryClient } from '../../lib/directoryClient';
import type { ConnectionParams, TreeNode } from '../../lib/types';
import type { PageRequest } from '../../lib/querySession';
import { errorMessage } from '../../lib/errors';
import type { Message, Task } from '../types';

export type Connect = (params: ConnectionParams) => Promise<DirectoryClient>;

export const connectTask = (
  connect: Connect,
  params: ConnectionParams,
  attempt: number,
  pageSize: number,
  timeoutMs: number
): Task<Message> => ({
  label: `connect #${attempt} to ${params.host}:${params.port}`,
  run: async () => {
    try {
      const client = await connect(params);
      return { type: 'connected', attempt, client, pageSize };
    } catch (err) {
      return { type: 'connectFailed', attempt, error: errorMessage(err) };
    }
  },
  timeoutMs,
  onTimeout: () => ({ type: 'connectTimeout', attempt }),
});

export const LOADING_TICK_MS = 100;

/**
 * Elapsed-time tick of tree load `loadId`. The first tick starts the clock.
 */
export const loadingTimerTask = (
  loadId: number,
  startedAt: number | null = null,
  clock: () => number = Date.now
): Task<Message> => ({
  label: `loading timer #${loadId}`,
  run: async () => {
    const start = startedAt ?? clock();
    await delay(LOADING_TICK_MS);
    return { type: 'loadingTick', loadId, startedAt: start, now: clock() };
  },
});

export const loadRootTask = (client: DirectoryClient): Task<Message> => ({
  label: `load tree ${client.baseDN}`,
  run: async () => {
    try {
      const root = client.buildTree();
      await client.loadChildren(root);
      return { type: 'treeLoaded', client, root };
    } catch (err) {
      return { type: 'error', client, scope: 'tree', error: errorMessage(err) };
    }
  },
});

/**
 * `node` must be a detached copy: the task fills it in
 */
export const loadChildrenTask = (
  client: DirectoryClient,
  node: TreeNode
): Task<Message> => ({
  label: `load children of ${node.dn}`,
  run: async () => {
    try {
      await client.loadChildren(node);
      return {
        type: 'childrenLoaded',
        client,
        dn: node.dn,
        children: node.children ?? [],
      };
    } catch (err) {
      return {
        type: 'error',
        client,
        scope: 'children',
        dn: node.dn,
        error: errorMessage(err),
      };
    }
  },
});

export const fetchEntryTask = (
  client: DirectoryClient,
  dn: string
): Task<Message> => ({
  label: `fetch ${dn}`,
  run: async () => {
    try {
      const entry = await client.getEntry(dn);
      return { type: 'entryLoaded', client, entry };
    } catch (err) {
      return {
        type: 'error',
        client,
        scope: 'record',
        dn,
        error: errorMessage(err),
      };
    }
  },
});

export const queryPageTask = (
  client: DirectoryClient,
  request: PageRequest
): Task<Message> => ({
  label: `query ${request.filter}${request.first ? '' : ' (next page)'}`,
  run: async () => {
    try {
      const page = await client.customSearchPaged(
        request.filter,
        request.pageSize,
        request.cookie
      );
      return {
        type: 'queryPage',
        client,
        generation: request.generation,
        page,
        first: request.first,
      };
    } catch (err) {
      return {
        type: 'queryFailed',
        client,
        generation: request.generation,
        error: errorMessage(err),
      };
    }
  },
});

export const closeClientTask = (client: DirectoryClient): Task<Message> => ({
  label: `close connection to ${client.params.host}`,
  run: async () => {
    await client.close();
    return { type: 'clientClosed' };
  },
});
