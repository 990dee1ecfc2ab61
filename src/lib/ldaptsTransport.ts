/**
 * ldapts implementation of the directory transport
 *
 * ldapts drives the paged results control through an async generator, so
 * paging cookies handed to callers are local ids of suspended generators.
 * One page is read ahead to know whether another one exists. Parked
 * generators are bounded per connection and closed when dropped.
 */
import { randomBytes } from 'node:crypto';
import type { ConnectionOptions } from 'node:tls';

import { Client } from 'ldapts';
import { LRUCache } from 'lru-cache';
import type { ClientOptions, SearchResult } from 'ldapts';

import type { ConnectionParams, Entry, SearchRequest } from './types';
import { PagingCookieError, TransportError } from './errors';
import { ldapUrl, type DirectoryTransport, type TransportPage } from './transport';

type LdaptsEntry = SearchResult['searchEntries'][number];

export type LdapClient = Pick<
  Client,
  'startTLS' | 'bind' | 'search' | 'searchPaginated' | 'unbind'
>;

// suspended searches kept per connection
export const MAX_CURSORS = 16;

interface Cursor {
  key: string;
  shape: string;
  pages: AsyncGenerator<SearchResult>;
  next: SearchResult;
}

export function toEntry(raw: LdaptsEntry): Entry {
  const attributes: Record<string, string[]> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (name === 'dn') continue;
    const values: (string | Buffer)[] = Array.isArray(value)
      ? [...value]
      : [value];
    attributes[name] = values.map(v =>
      Buffer.isBuffer(v) ? v.toString('base64') : v
    );
  }
  return { dn: raw.dn, attributes };
}

export const cursorKey = (request: SearchRequest, pageSize: number): string =>
  JSON.stringify([
    request.baseDN,
    request.filter,
    request.scope,
    request.attributes,
    pageSize,
  ]);

/**
 * Same search except for the filter: a new first page of that shape
 * replaces the query still parked under it.
 */
export const cursorShape = (request: SearchRequest, pageSize: number): string =>
  JSON.stringify([request.baseDN, request.scope, request.attributes, pageSize]);

export class LdaptsTransport implements DirectoryTransport {
  private client: LdapClient;
  private tlsOptions: ConnectionOptions;
  private cursors = new LRUCache<string, Cursor>({
    max: MAX_CURSORS,
    dispose: (cursor, _id, reason) => {
      if (reason === 'evict') this.release(cursor);
    },
  });
  private releasing = new Set<Promise<void>>();
  private releaseError: unknown = null;
  private closed = false;

  constructor(params: ConnectionParams, client?: LdapClient) {
    this.tlsOptions = {
      minVersion: 'TLSv1.2',
      rejectUnauthorized: params.tlsVerify,
      servername: params.host,
    };
    const options: ClientOptions = {
      url: ldapUrl(params),
      timeout: params.timeoutMs,
      connectTimeout: params.timeoutMs,
      strictDN: false,
    };
    if (params.transport === 'ldaps') options.tlsOptions = this.tlsOptions;
    this.client = client ?? new Client(options);
  }

  async startTLS(): Promise<void> {
    this.ensureOpen();
    await this.client.startTLS(this.tlsOptions);
  }

  async bind(dn: string, password: string): Promise<void> {
    this.ensureOpen();
    await this.client.bind(dn, password);
  }

  async search(request: SearchRequest): Promise<Entry[]> {
    this.ensureOpen();
    const { searchEntries } = await this.client.search(request.baseDN, {
      scope: request.scope,
      filter: request.filter,
      attributes: request.attributes,
    });
    return searchEntries.map(toEntry);
  }

  async searchPage(
    request: SearchRequest,
    pageSize: number,
    cookie: Buffer | null
  ): Promise<TransportPage> {
    this.ensureOpen();
    const key = cursorKey(request, pageSize);
    const shape = cursorShape(request, pageSize);
    let pages: AsyncGenerator<SearchResult>;
    let current: SearchResult;

    if (cookie && cookie.length > 0) {
      const id = cookie.toString('hex');
      const cursor = this.cursors.get(id);
      if (!cursor) throw new PagingCookieError();
      if (cursor.key !== key) {
        throw new PagingCookieError(
          'Paging cookie was issued for another search'
        );
      }
      this.cursors.delete(id);
      pages = cursor.pages;
      current = cursor.next;
    } else {
      this.dropShape(shape);
      pages = this.client.searchPaginated(request.baseDN, {
        scope: request.scope,
        filter: request.filter,
        attributes: request.attributes,
        paged: { pageSize },
      });
      const first = await pages.next();
      if (first.done) return { entries: [], cookie: Buffer.alloc(0) };
      current = first.value;
    }

    const entries = current.searchEntries.map(toEntry);
    const ahead = await pages.next();
    if (ahead.done) return { entries, cookie: Buffer.alloc(0) };

    const next = randomBytes(8);
    this.cursors.set(next.toString('hex'), { key, shape, pages, next: ahead.value });
    return { entries, cookie: next };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const cursors = [...this.cursors.values()];
    this.cursors.clear();
    cursors.forEach(cursor => this.release(cursor));
    await Promise.all(this.releasing);
    await this.client.unbind();
    if (this.releaseError !== null) throw this.releaseError;
  }

  get openCursors(): number {
    return this.cursors.size;
  }

  private dropShape(shape: string): void {
    for (const [id, cursor] of [...this.cursors.entries()]) {
      if (cursor.shape !== shape) continue;
      this.cursors.delete(id);
      this.release(cursor);
    }
  }

  private release(cursor: Cursor): void {
    const done: Promise<void> = cursor.pages
      .return(undefined)
      .then(
        () => undefined,
        (err: unknown) => {
          this.releaseError ??= err;
        }
      )
      .finally(() => this.releasing.delete(done));
    this.releasing.add(done);
  }

  private ensureOpen(): void {
    if (this.closed) throw new TransportError('Connection closed');
  }
}

export const ldaptsTransportFactory = (
  params: ConnectionParams
): DirectoryTransport => new LdaptsTransport(params);
