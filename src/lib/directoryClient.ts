/**
 * Resilient directory client
 *
 * Owns one transport. Every wire call after the initial connect goes through
 * the retry policy: a retryable failure closes the transport, opens a new one
 * from the stored parameters, re-binds, waits and tries again.
 *
 * @example
 * const client = await DirectoryClient.connect(params, { logger });
 * const root = client.buildTree();
 * await client.loadChildren(root);
 */
import type winston from 'winston';
import { LRUCache } from 'lru-cache';

import type {
  ConnectionParams,
  Entry,
  SearchPage,
  SearchRequest,
  SearchScope,
  TreeNode,
} from './types';
import { MATCH_ALL, freezeConnectionParams } from './types';
import type { DirectoryTransport, TransportFactory } from './transport';
import { ldaptsTransportFactory } from './ldaptsTransport';
import {
  InvalidInputError,
  NotFoundError,
  ReconnectError,
  TransportError,
  errorMessage,
  toDirectoryError,
} from './errors';
import { withRetry, defaultSleep, type Sleep } from './retry';
import { rdnName } from './dn';

export interface DirectoryClientDeps {
  logger: winston.Logger;
  transportFactory?: TransportFactory;
  sleep?: Sleep;
  cacheMax?: number;
  // seconds
  cacheTtl?: number;
}

async function openTransport(
  params: ConnectionParams,
  factory: TransportFactory,
  logger: winston.Logger
): Promise<DirectoryTransport> {
  const transport = factory(params);
  try {
    if (params.transport === 'starttls') await transport.startTLS();
    await transport.bind(params.bindDN ?? '', params.bindPassword ?? '');
  } catch (err) {
    await transport
      .close()
      .catch((closeError: unknown) =>
        logger.debug(`closing failed connection: ${errorMessage(closeError)}`)
      );
    throw toDirectoryError(err);
  }
  return transport;
}

export class DirectoryClient {
  readonly params: ConnectionParams;
  logger: winston.Logger;
  private transport: DirectoryTransport;
  private factory: TransportFactory;
  private sleep: Sleep;
  private entryCache: LRUCache<string, Entry>;
  private closed = false;
  private reconnecting: Promise<void> | null = null;

  private constructor(
    params: ConnectionParams,
    transport: DirectoryTransport,
    deps: DirectoryClientDeps
  ) {
    this.params = params;
    this.transport = transport;
    this.logger = deps.logger;
    this.factory = deps.transportFactory ?? ldaptsTransportFactory;
    this.sleep = deps.sleep ?? defaultSleep;
    this.entryCache = new LRUCache<string, Entry>({
      max: deps.cacheMax ?? 1000,
      ttl: (deps.cacheTtl ?? 30) * 1000,
      updateAgeOnGet: false,
    });
  }

  /**
   * Open, optionally upgrade and bind. Not retried: the caller bounds it
   * with its own timeout.
   */
  static async connect(
    params: ConnectionParams,
    deps: DirectoryClientDeps
  ): Promise<DirectoryClient> {
    const frozen = freezeConnectionParams(params);
    const identity = frozen.bindDN ? `as ${frozen.bindDN}` : 'anonymously';
    const transport = await openTransport(
      frozen,
      deps.transportFactory ?? ldaptsTransportFactory,
      deps.logger
    );
    deps.logger.notice(
      `Connected to ${frozen.host}:${frozen.port} (${frozen.transport}) ${identity}`
    );
    return new DirectoryClient(frozen, transport, deps);
  }

  get baseDN(): string {
    return this.params.baseDN;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async search(
    baseDN: string,
    filter: string,
    scope: SearchScope,
    attributes: string[]
  ): Promise<Entry[]> {
    const request = this.request(baseDN, filter, scope, attributes);
    this.logger.debug(
      `search base="${request.baseDN}" scope=${scope} filter=${filter}`
    );
    return this.call('search', transport => transport.search(request));
  }

  async searchPaged(
    baseDN: string,
    filter: string,
    scope: SearchScope,
    attributes: string[],
    pageSize: number,
    cookie: Buffer | null
  ): Promise<SearchPage> {
    const request = this.request(baseDN, filter, scope, attributes);
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new InvalidInputError(`Invalid page size: ${pageSize}`);
    }
    this.logger.debug(
      `paged search base="${request.baseDN}" filter=${filter} size=${pageSize}${cookie ? ' (next page)' : ''}`
    );
    const page = await this.call('paged search', transport =>
      transport.searchPage(request, pageSize, cookie)
    );
    const hasMore = page.cookie.length > 0;
    return {
      entries: page.entries,
      cookie: hasMore ? page.cookie : null,
      hasMore,
      pageSize,
    };
  }

  /**
   * Base-scope read of user and operational attributes
   */
  async getEntry(dn: string): Promise<Entry> {
    const key = dn.toLowerCase();
    const cached = this.entryCache.get(key);
    if (cached) {
      this.logger.debug(`entry cache hit: ${dn}`);
      return cached;
    }
    const entries = await this.search(dn, MATCH_ALL, 'base', ['*', '+']);
    if (entries.length === 0) throw new NotFoundError(`No such entry: ${dn}`);
    this.entryCache.set(key, entries[0]);
    return entries[0];
  }

  async getChildren(dn: string): Promise<TreeNode[]> {
    const parent = dn || this.baseDN;
    const entries = await this.search(parent, MATCH_ALL, 'one', ['dn']);
    return entries.map(entry => ({
      dn: entry.dn,
      name: rdnName(entry.dn, parent),
      children: null,
      loaded: false,
    }));
  }

  /**
   * Populate a node's children. A loaded node is left as is.
   */
  async loadChildren(node: TreeNode): Promise<void> {
    if (node.loaded) return;
    node.children = await this.getChildren(node.dn);
    node.loaded = true;
  }

  buildTree(): TreeNode {
    return {
      dn: this.baseDN,
      name: this.baseDN,
      children: null,
      loaded: false,
    };
  }

  async customSearchPaged(
    filter: string,
    pageSize: number,
    cookie: Buffer | null
  ): Promise<SearchPage> {
    return this.searchPaged(
      this.baseDN,
      filter,
      'sub',
      ['*'],
      pageSize,
      cookie
    );
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.entryCache.clear();
    await this.transport.close();
    this.logger.info(`Disconnected from ${this.params.host}`);
  }

  private request(
    baseDN: string,
    filter: string,
    scope: SearchScope,
    attributes: string[]
  ): SearchRequest {
    const trimmed = filter.trim();
    if (!trimmed) throw new InvalidInputError('Filter is empty');
    return {
      baseDN: baseDN || this.baseDN,
      filter: trimmed,
      scope,
      attributes,
    };
  }

  private async call<T>(
    label: string,
    operation: (transport: DirectoryTransport) => Promise<T>
  ): Promise<T> {
    if (this.closed) throw new TransportError('Client is closed');
    let used = this.transport;
    try {
      return await withRetry(
        async () => {
          used = this.transport;
          try {
            return await operation(used);
          } catch (err) {
            throw toDirectoryError(err);
          }
        },
        this.params.retry,
        {
          label,
          logger: this.logger,
          sleep: this.sleep,
          reconnect: () => this.reconnect(used),
        }
      );
    } catch (err) {
      this.logger.debug(`${label} failed: ${errorMessage(err)}`);
      throw err;
    }
  }

  /**
   * Replace a transport that failed. Concurrent callers share one reconnect
   * and a transport already replaced is not replaced again.
   */
  private reconnect(failed: DirectoryTransport): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ReconnectError('Client is closed'));
    }
    if (this.transport !== failed) return Promise.resolve();
    if (!this.reconnecting) {
      this.reconnecting = this.replaceTransport(failed).finally(() => {
        this.reconnecting = null;
      });
    }
    return this.reconnecting;
  }

  private async replaceTransport(failed: DirectoryTransport): Promise<void> {
    try {
      await failed.close();
    } catch (err) {
      this.logger.debug(`closing broken connection: ${errorMessage(err)}`);
    }
    let fresh: DirectoryTransport;
    try {
      fresh = await openTransport(this.params, this.factory, this.logger);
    } catch (err) {
      throw new ReconnectError(errorMessage(err), { cause: err });
    }
    if (this.closed) {
      await fresh
        .close()
        .catch((closeError: unknown) =>
          this.logger.debug(`closing late connection: ${errorMessage(closeError)}`)
        );
      throw new ReconnectError('Client is closed');
    }
    this.transport = fresh;
    this.entryCache.clear();
    this.logger.notice(`Reconnected to ${this.params.host}:${this.params.port}`);
  }
}
