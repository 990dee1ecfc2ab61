/**
 * Shared directory types
 */

export type SearchScope = 'base' | 'one' | 'sub';

// plain: ldap://, ldaps: implicit TLS at connect time, starttls: in-band upgrade before bind
export type TransportMode = 'plain' | 'ldaps' | 'starttls';

export interface RetryPolicy {
  enabled: boolean;
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

/**
 * Fully resolved connection parameters.
 * Frozen by {@link freezeConnectionParams}: a client never sees them change,
 * reconnecting with other settings means building a new client.
 */
export interface ConnectionParams {
  readonly host: string;
  readonly port: number;
  readonly baseDN: string;
  readonly transport: TransportMode;
  readonly bindDN?: string;
  readonly bindPassword?: string;
  readonly tlsVerify: boolean;
  readonly timeoutMs: number;
  readonly retry: Readonly<RetryPolicy>;
}

export interface Entry {
  dn: string;
  attributes: Record<string, string[]>;
}

/**
 * Lazily populated tree node.
 * `children` is null until fetched and never null once `loaded` is set.
 */
export interface TreeNode {
  dn: string;
  name: string;
  children: TreeNode[] | null;
  loaded: boolean;
}

export interface SearchPage {
  entries: Entry[];
  // null once the result set is exhausted
  cookie: Buffer | null;
  hasMore: boolean;
  pageSize: number;
}

export interface SearchRequest {
  baseDN: string;
  filter: string;
  scope: SearchScope;
  attributes: string[];
}

export const freezeConnectionParams = (
  params: ConnectionParams
): ConnectionParams =>
  Object.freeze({ ...params, retry: Object.freeze({ ...params.retry }) });

export const MATCH_ALL = '(objectClass=*)';
