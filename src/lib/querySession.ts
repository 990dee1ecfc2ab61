/**
 * Custom query session: filter text, paging cookie and accumulated results.
 *
 * The session is the only owner of a live cookie. Every fetch carries the
 * generation it was issued for, pages from an older generation are dropped.
 */
import type { Entry, SearchPage } from './types';
import { MATCH_ALL } from './types';
import { InvalidInputError } from './errors';

export type QueryMode = 'input' | 'browse';

export interface QuerySession {
  mode: QueryMode;
  filter: string;
  pageSize: number;
  results: Entry[];
  cookie: Buffer | null;
  hasMore: boolean;
  pending: boolean;
  generation: number;
}

export interface PageRequest {
  filter: string;
  pageSize: number;
  cookie: Buffer | null;
  generation: number;
  first: boolean;
}

export interface QueryStep {
  session: QuerySession;
  request: PageRequest | null;
}

export function createQuerySession(
  pageSize: number,
  filter: string = MATCH_ALL
): QuerySession {
  return {
    mode: 'input',
    filter,
    pageSize,
    results: [],
    cookie: null,
    hasMore: false,
    pending: false,
    generation: 0,
  };
}

/**
 * Start a new query. An empty filter is rejected before anything is sent,
 * nothing is sent while a page is still pending.
 */
export function submit(session: QuerySession): QueryStep {
  if (session.pending) return { session, request: null };
  const filter = session.filter.trim();
  if (!filter) throw new InvalidInputError('Filter is empty');
  const generation = session.generation + 1;
  return {
    session: {
      ...session,
      filter,
      cookie: null,
      hasMore: false,
      pending: true,
      generation,
    },
    request: {
      filter,
      pageSize: session.pageSize,
      cookie: null,
      generation,
      first: true,
    },
  };
}

/**
 * Next page, or no request at all when nothing more can be fetched now
 */
export function loadMore(session: QuerySession): QueryStep {
  if (
    session.mode !== 'browse' ||
    !session.hasMore ||
    session.pending ||
    !session.cookie
  ) {
    return { session, request: null };
  }
  return {
    session: { ...session, pending: true },
    request: {
      filter: session.filter,
      pageSize: session.pageSize,
      cookie: session.cookie,
      generation: session.generation,
      first: false,
    },
  };
}

export function applyPage(
  session: QuerySession,
  generation: number,
  page: SearchPage,
  first: boolean
): QuerySession {
  if (generation !== session.generation || !session.pending) return session;
  return {
    ...session,
    mode: 'browse',
    results: first ? page.entries : [...session.results, ...page.entries],
    cookie: page.cookie,
    hasMore: page.hasMore,
    pending: false,
  };
}

export function applyError(
  session: QuerySession,
  generation: number
): QuerySession {
  if (generation !== session.generation) return session;
  return { ...session, pending: false };
}

/**
 * Back to input mode. Whatever is still in flight is discarded.
 */
export function cancel(session: QuerySession): QuerySession {
  return {
    ...session,
    mode: 'input',
    results: [],
    cookie: null,
    hasMore: false,
    pending: false,
    generation: session.generation + 1,
  };
}

export function editFilter(session: QuerySession, filter: string): QuerySession {
  if (filter === session.filter) return session;
  return { ...session, filter, cookie: null, hasMore: false };
}
