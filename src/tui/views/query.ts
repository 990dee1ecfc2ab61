/**
 * Query view: filter input, then result browsing
 */
import {
  cancel,
  editFilter,
  loadMore,
  submit,
  type QueryStep,
} from '../../lib/querySession';
import { adjustViewport, visibleRows } from '../../lib/viewport';
import { errorMessage } from '../../lib/errors';
import { queryHeight } from '../layout';
import { queryPageTask } from '../store/tasks';
import type { AppState, QueryState, Transition } from '../types';

import { isPrintable, listTarget, stay } from './navigation';
import { openRecord } from './tree';

export function setQueryCursor(state: AppState, cursor: number): QueryState {
  const length = state.query.session.results.length;
  const { cursor: c, top } = adjustViewport(
    cursor,
    state.query.viewportTop,
    visibleRows(queryHeight(state.height), length),
    length
  );
  return { ...state.query, cursor: c, viewportTop: top };
}

function run(state: AppState, step: QueryStep, status: string): Transition {
  if (!state.client) return stay(state);
  const query = { ...state.query, session: step.session, error: null };
  if (!step.request) return stay({ ...state, query });
  return {
    state: { ...state, query, status },
    tasks: [queryPageTask(state.client, step.request)],
  };
}

function inputKey(state: AppState, key: string): Transition {
  const { session } = state.query;
  switch (key) {
    case 'enter': {
      let step: QueryStep;
      try {
        step = submit(session);
      } catch (err) {
        const error = errorMessage(err);
        return stay({
          ...state,
          query: { ...state.query, error },
          status: `Error: ${error}`,
        });
      }
      return run(state, step, `Running ${step.session.filter}...`);
    }
    case 'esc':
      return stay({
        ...state,
        query: {
          ...state.query,
          session: editFilter(cancel(session), ''),
          error: null,
        },
      });
    case 'backspace':
      return stay({
        ...state,
        query: {
          ...state.query,
          session: editFilter(session, session.filter.slice(0, -1)),
        },
      });
    case 'ctrl+u':
      return stay({
        ...state,
        query: { ...state.query, session: editFilter(session, '') },
      });
    default:
      if (!isPrintable(key)) return stay(state);
      return stay({
        ...state,
        query: { ...state.query, session: editFilter(session, session.filter + key) },
      });
  }
}

export function nextPage(state: AppState): Transition {
  const step = loadMore(state.query.session);
  if (!step.request) return stay(state);
  return run(state, step, 'Loading next page...');
}

function browseKey(state: AppState, key: string): Transition {
  const { session, cursor } = state.query;
  const length = session.results.length;
  const target = listTarget(
    key,
    cursor,
    visibleRows(queryHeight(state.height), length),
    length
  );
  if (target !== null) {
    return stay({ ...state, query: setQueryCursor(state, target) });
  }
  switch (key) {
    case 'n':
    case 'N':
      return nextPage(state);
    case 'enter':
    case ' ': {
      const entry = session.results[cursor];
      return entry ? openRecord(state, entry.dn) : stay(state);
    }
    case 'esc':
      return stay({
        ...state,
        query: { session: cancel(session), cursor: 0, viewportTop: 0, error: null },
        status: 'Query cleared',
      });
    default:
      return stay(state);
  }
}

export const isTypingQuery = (state: AppState): boolean =>
  state.view === 'query' && state.query.session.mode === 'input';

export function queryKey(state: AppState, key: string): Transition {
  return state.query.session.mode === 'input'
    ? inputKey(state, key)
    : browseKey(state, key);
}
