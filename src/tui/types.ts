/**
 * Application state, messages and frames
 */
import type { DirectoryClient } from '../lib/directoryClient';
import type { Entry, SearchPage, TreeNode } from '../lib/types';
import type { TreeModel } from '../lib/treeModel';
import type { QuerySession } from '../lib/querySession';
import type { ConnectionForm } from '../lib/connection';
import type { Settings } from '../config/settings';

export type ViewKind = 'start' | 'tree' | 'record' | 'query';

export const viewOrder: ViewKind[] = ['start', 'tree', 'record', 'query'];

export interface StartState {
  form: ConnectionForm;
  focus: number;
  editing: boolean;
  draft: string;
  connecting: boolean;
  // increases with every connection attempt
  attempt: number;
  pageSize: number;
  error: string | null;
  warnings: string[];
}

export interface TreeState {
  model: TreeModel | null;
  loading: boolean;
  // DNs whose children are being fetched
  expanding: string[];
  error: string | null;
  // bumped by every root load; timer ticks of older loads are dropped
  loadId: number;
  elapsedMs: number;
}

export interface RecordState {
  entry: Entry | null;
  cursor: number;
  viewportTop: number;
  loading: boolean;
  error: string | null;
}

export interface QueryState {
  session: QuerySession;
  cursor: number;
  viewportTop: number;
  error: string | null;
}

export interface AppState {
  view: ViewKind;
  start: StartState;
  tree: TreeState;
  record: RecordState;
  query: QueryState;
  client: DirectoryClient | null;
  settings: Settings;
  status: string;
  width: number;
  height: number;
  quitting: boolean;
}

export type Target =
  | { kind: 'tab'; view: ViewKind }
  | { kind: 'field'; index: number }
  | { kind: 'treeRow'; index: number }
  | { kind: 'recordRow'; index: number }
  | { kind: 'queryRow'; index: number };

export type ErrorScope = 'tree' | 'children' | 'record';

export type Message =
  | { type: 'key'; key: string }
  | { type: 'activate'; target: Target }
  | { type: 'resize'; width: number; height: number }
  | {
      type: 'connected';
      attempt: number;
      client: DirectoryClient;
      pageSize: number;
    }
  | { type: 'connectFailed'; attempt: number; error: string }
  | { type: 'connectTimeout'; attempt: number }
  | { type: 'treeLoaded'; client: DirectoryClient; root: TreeNode }
  | { type: 'loadingTick'; loadId: number; startedAt: number; now: number }
  | {
      type: 'childrenLoaded';
      client: DirectoryClient;
      dn: string;
      children: TreeNode[];
    }
  | { type: 'entryLoaded'; client: DirectoryClient; entry: Entry }
  | {
      type: 'queryPage';
      client: DirectoryClient;
      generation: number;
      page: SearchPage;
      first: boolean;
    }
  | {
      type: 'queryFailed';
      client: DirectoryClient;
      generation: number;
      error: string;
    }
  | {
      type: 'error';
      client: DirectoryClient | null;
      scope: ErrorScope;
      dn?: string;
      error: string;
    }
  | { type: 'status'; text: string }
  | { type: 'clientClosed' };

/**
 * Background unit of work. Its result re-enters the queue as a message.
 */
export interface Task<M> {
  label: string;
  run: () => Promise<M>;
  timeoutMs?: number;
  onTimeout?: () => M;
}

export interface Transition {
  state: AppState;
  tasks: Task<Message>[];
}

export type Style =
  | 'normal'
  | 'title'
  | 'active'
  | 'disabled'
  | 'selected'
  | 'editing'
  | 'dim'
  | 'error'
  | 'warning'
  | 'status'
  | 'help';

export interface Segment {
  text: string;
  style?: Style;
}

export type Line = Segment[];

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Zone {
  rect: Rect;
  target: Target;
}

export interface Frame {
  lines: Line[];
  // paint order
  zones: Zone[];
}
