/**
 * Application controller: the only code that computes a new AppState.
 *
 * update(state, message) returns the next state and the background tasks to
 * start. Results of tasks started for a client that is no longer current are
 * dropped, and so is a connection attempt that was abandoned.
 */
import type winston from 'winston';

import type { DirectoryClient } from '../../lib/directoryClient';
import { formFromSettings } from '../../lib/connection';
import { createQuerySession, applyError, applyPage } from '../../lib/querySession';
import { createTreeModel, graftChildren, resizeTree, setCursor } from '../../lib/treeModel';
import type { Settings } from '../../config/settings';
import { treeHeight } from '../layout';
import { activateField, beginConnect, startKey } from '../views/start';
import { openRecord, reloadTree, treeKey } from '../views/tree';
import { recordKey, setRecordCursor } from '../views/record';
import { isTypingQuery, queryKey, setQueryCursor } from '../views/query';
import { stay } from '../views/navigation';
import {
  viewOrder,
  type AppState,
  type Message,
  type Target,
  type Transition,
  type ViewKind,
} from '../types';

import { closeClientTask, loadingTimerTask, type Connect } from './tasks';

export interface ControllerEnv {
  connect: Connect;
  logger: winston.Logger;
}

export interface InitOptions {
  client?: DirectoryClient;
  settings: Settings;
  warnings: string[];
  width: number;
  height: number;
}

export interface Controller {
  init(options: InitOptions): Transition;
  update(state: AppState, message: Message): Transition;
}

export function isEnabled(state: AppState, view: ViewKind): boolean {
  switch (view) {
    case 'start':
      return true;
    case 'tree':
    case 'query':
      return state.client !== null;
    case 'record':
      return state.record.entry !== null;
  }
}

const isTyping = (state: AppState): boolean =>
  (state.view === 'start' && state.start.editing) || isTypingQuery(state);

function cycle(state: AppState, step: 1 | -1): ViewKind {
  const current = viewOrder.indexOf(state.view);
  for (let i = 1; i <= viewOrder.length; i++) {
    const view =
      viewOrder[(current + step * i + viewOrder.length * 2) % viewOrder.length];
    if (isEnabled(state, view)) return view;
  }
  return state.view;
}

function switchView(state: AppState, view: ViewKind): Transition {
  if (!isEnabled(state, view) || view === state.view) return stay(state);
  const next = { ...state, view };
  if (view === 'tree' && !state.tree.model && !state.tree.loading) {
    return reloadTree(next);
  }
  return stay(next);
}

function freshViews(
  state: AppState,
  client: DirectoryClient,
  pageSize: number
): AppState {
  return {
    ...state,
    client,
    view: 'tree',
    tree: {
      model: null,
      loading: true,
      expanding: [],
      error: null,
      loadId: state.tree.loadId,
      elapsedMs: 0,
    },
    record: {
      entry: null,
      cursor: 0,
      viewportTop: 0,
      loading: false,
      error: null,
    },
    query: {
      session: createQuerySession(pageSize),
      cursor: 0,
      viewportTop: 0,
      error: null,
    },
  };
}

export function createController(env: ControllerEnv): Controller {
  const { logger } = env;

  const install = (
    state: AppState,
    client: DirectoryClient,
    pageSize: number
  ): Transition => {
    const previous = state.client;
    const next = freshViews(state, client, pageSize);
    const { tasks } = reloadTree(next);
    if (previous && previous !== client) tasks.push(closeClientTask(previous));
    return {
      state: {
        ...next,
        start: { ...next.start, connecting: false, error: null },
        status: 'Successfully connected to LDAP server',
      },
      tasks,
    };
  };

  const init = (options: InitOptions): Transition => {
    const { settings } = options;
    const state: AppState = {
      view: 'start',
      start: {
        form: formFromSettings(settings),
        focus: 0,
        editing: false,
        draft: '',
        connecting: false,
        attempt: 0,
        pageSize: settings.pageSize,
        error: null,
        warnings: options.warnings,
      },
      tree: {
        model: null,
        loading: false,
        expanding: [],
        error: null,
        loadId: 0,
        elapsedMs: 0,
      },
      record: {
        entry: null,
        cursor: 0,
        viewportTop: 0,
        loading: false,
        error: null,
      },
      query: {
        session: createQuerySession(settings.pageSize),
        cursor: 0,
        viewportTop: 0,
        error: null,
      },
      client: null,
      settings,
      status: 'Ready',
      width: options.width,
      height: options.height,
      quitting: false,
    };
    if (options.client) {
      return install(state, options.client, settings.pageSize);
    }
    if (settings.autoConnect) return beginConnect(state, env.connect);
    return stay(state);
  };

  const keyMessage = (state: AppState, key: string): Transition => {
    if (key === 'ctrl+c') return stay({ ...state, quitting: true });

    if (state.start.connecting) {
      if (key !== 'esc') return stay(state);
      logger.info(`connection attempt #${state.start.attempt} cancelled`);
      return stay({
        ...state,
        start: { ...state.start, connecting: false },
        status: 'Connection cancelled',
      });
    }

    if (!isTyping(state)) {
      if (key === 'q' || key === 'Q') return stay({ ...state, quitting: true });
      const index = ['1', '2', '3', '4'].indexOf(key);
      if (index >= 0) return switchView(state, viewOrder[index]);
    }
    if (!(state.view === 'start' && state.start.editing)) {
      if (key === 'tab') return switchView(state, cycle(state, 1));
      if (key === 'shift+tab') return switchView(state, cycle(state, -1));
    }

    switch (state.view) {
      case 'start':
        return startKey(state, key, env.connect);
      case 'tree':
        return treeKey(state, key);
      case 'record':
        return recordKey(state, key);
      case 'query':
        return queryKey(state, key);
    }
  };

  /**
   * Pointer activation, mapped onto the matching keyboard action
   */
  const activate = (state: AppState, target: Target): Transition => {
    if (state.start.connecting) return stay(state);
    switch (target.kind) {
      case 'tab':
        return switchView(state, target.view);
      case 'field':
        if (state.view !== 'start' || state.start.editing) return stay(state);
        return activateField(
          { ...state, start: { ...state.start, focus: target.index } },
          env.connect
        );
      case 'treeRow': {
        const { model } = state.tree;
        if (state.view !== 'tree' || !model) return stay(state);
        const moved = setCursor(model, target.index);
        const item = moved.items[moved.cursor];
        const next = { ...state, tree: { ...state.tree, model: moved } };
        return item ? openRecord(next, item.node.dn) : stay(next);
      }
      case 'recordRow':
        if (state.view !== 'record') return stay(state);
        return stay({ ...state, record: setRecordCursor(state, target.index) });
      case 'queryRow': {
        if (state.view !== 'query' || state.query.session.mode !== 'browse') {
          return stay(state);
        }
        const query = setQueryCursor(state, target.index);
        const entry = query.session.results[query.cursor];
        const next = { ...state, query };
        return entry ? openRecord(next, entry.dn) : stay(next);
      }
    }
  };

  const resize = (state: AppState, width: number, height: number): AppState => {
    const sized = { ...state, width, height };
    return {
      ...sized,
      tree: {
        ...sized.tree,
        model: sized.tree.model
          ? resizeTree(sized.tree.model, treeHeight(height))
          : null,
      },
      record: setRecordCursor(sized, sized.record.cursor),
      query: setQueryCursor(sized, sized.query.cursor),
    };
  };

  const current = (state: AppState, client: DirectoryClient): boolean =>
    state.client === client;

  const update = (state: AppState, message: Message): Transition => {
    switch (message.type) {
      case 'key':
        return keyMessage(state, message.key);

      case 'activate':
        return activate(state, message.target);

      case 'resize':
        return stay(resize(state, message.width, message.height));

      case 'connected': {
        const { start } = state;
        if (!start.connecting || message.attempt !== start.attempt) {
          logger.info(`discarding late connection #${message.attempt}`);
          return { state, tasks: [closeClientTask(message.client)] };
        }
        return install(state, message.client, message.pageSize);
      }

      case 'connectFailed':
        if (
          !state.start.connecting ||
          message.attempt !== state.start.attempt
        ) {
          return stay(state);
        }
        return stay({
          ...state,
          view: 'start',
          start: { ...state.start, connecting: false, error: message.error },
          status: `Connection failed: ${message.error}`,
        });

      case 'connectTimeout': {
        if (
          !state.start.connecting ||
          message.attempt !== state.start.attempt
        ) {
          return stay(state);
        }
        const seconds = state.settings.connectTimeoutMs / 1000;
        const error = `Connection timeout after ${seconds} seconds`;
        return stay({
          ...state,
          view: 'start',
          start: { ...state.start, connecting: false, error },
          status: error,
        });
      }

      case 'treeLoaded':
        if (!current(state, message.client)) return stay(state);
        return stay({
          ...state,
          tree: {
            ...state.tree,
            model: createTreeModel(message.root, treeHeight(state.height)),
            loading: false,
            expanding: [],
            error: null,
          },
          status: 'Tree loaded',
        });

      case 'loadingTick': {
        const { tree } = state;
        if (!tree.loading || tree.loadId !== message.loadId) {
          return stay(state);
        }
        return {
          state: {
            ...state,
            tree: { ...tree, elapsedMs: message.now - message.startedAt },
          },
          tasks: [loadingTimerTask(message.loadId, message.startedAt)],
        };
      }

      case 'childrenLoaded': {
        const { model } = state.tree;
        if (!current(state, message.client) || !model) return stay(state);
        const expanding = state.tree.expanding.filter(dn => dn !== message.dn);
        const count = message.children.length;
        return stay({
          ...state,
          tree: {
            ...state.tree,
            model: graftChildren(model, message.dn, message.children),
            expanding,
          },
          status:
            count > 0
              ? `Loaded ${count} children for ${message.dn}`
              : 'No children to expand',
        });
      }

      case 'entryLoaded':
        if (!current(state, message.client)) return stay(state);
        return stay({
          ...state,
          view: 'record',
          record: {
            entry: message.entry,
            cursor: 0,
            viewportTop: 0,
            loading: false,
            error: null,
          },
          status: `Loaded ${message.entry.dn}`,
        });

      case 'queryPage': {
        if (!current(state, message.client)) return stay(state);
        const { session } = state.query;
        const next = applyPage(
          session,
          message.generation,
          message.page,
          message.first
        );
        if (next === session) return stay(state);
        const cursor = message.first ? 0 : state.query.cursor;
        const sized = {
          ...state,
          query: {
            ...state.query,
            session: next,
            viewportTop: message.first ? 0 : state.query.viewportTop,
          },
        };
        const found = next.results.length;
        return stay({
          ...sized,
          query: setQueryCursor(sized, cursor),
          status: next.hasMore
            ? `Found ${found} results, press [N] for more`
            : `Found ${found} results`,
        });
      }

      case 'queryFailed': {
        if (!current(state, message.client)) return stay(state);
        const session = applyError(state.query.session, message.generation);
        if (session === state.query.session) return stay(state);
        return stay({
          ...state,
          query: { ...state.query, session, error: message.error },
          status: `Error: ${message.error}`,
        });
      }

      case 'error': {
        if (message.client && !current(state, message.client)) {
          return stay(state);
        }
        const status = `Error: ${message.error}`;
        switch (message.scope) {
          case 'tree':
            return stay({
              ...state,
              tree: { ...state.tree, loading: false, error: message.error },
              status,
            });
          case 'children':
            return stay({
              ...state,
              tree: {
                ...state.tree,
                expanding: state.tree.expanding.filter(
                  dn => dn !== message.dn
                ),
              },
              status,
            });
          case 'record':
            return stay({
              ...state,
              record: { ...state.record, loading: false, error: message.error },
              status,
            });
        }
      }

      case 'status':
        return stay({ ...state, status: message.text });

      case 'clientClosed':
        return stay(state);
    }
  };

  return { init, update };
}
