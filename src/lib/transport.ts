/**
 * Wire boundary of the directory client
 */
import type { ConnectionParams, Entry, SearchRequest } from './types';

export interface TransportPage {
  entries: Entry[];
  // empty when the result set is exhausted
  cookie: Buffer;
}

export interface DirectoryTransport {
  startTLS(): Promise<void>;
  bind(dn: string, password: string): Promise<void>;
  search(request: SearchRequest): Promise<Entry[]>;
  searchPage(
    request: SearchRequest,
    pageSize: number,
    cookie: Buffer | null
  ): Promise<TransportPage>;
  close(): Promise<void>;
}

export type TransportFactory = (params: ConnectionParams) => DirectoryTransport;

export const ldapUrl = (params: ConnectionParams): string =>
  `${params.transport === 'ldaps' ? 'ldaps' : 'ldap'}://${params.host}:${params.port}`;
