/**
 * Directory error classes and retry classification
 */

export type ErrorKind =
  | 'transport'
  | 'unavailable'
  | 'auth'
  | 'input'
  | 'reconnect'
  | 'notFound'
  | 'protocol';

/**
 * Base directory error, tagged with its kind
 */
export class DirectoryError extends Error {
  constructor(
    message: string,
    public kind: ErrorKind = 'protocol',
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DirectoryError';
  }
}

/**
 * Retryable errors
 */
export class TransportError extends DirectoryError {
  constructor(message = 'Connection lost', options?: { cause?: unknown }) {
    super(message, 'transport', options);
    this.name = 'TransportError';
  }
}

export class ServerUnavailableError extends DirectoryError {
  constructor(message = 'Server unavailable', options?: { cause?: unknown }) {
    super(message, 'unavailable', options);
    this.name = 'ServerUnavailableError';
  }
}

/**
 * Terminal errors
 */
export class AuthenticationError extends DirectoryError {
  constructor(message = 'Invalid credentials', options?: { cause?: unknown }) {
    super(message, 'auth', options);
    this.name = 'AuthenticationError';
  }
}

export class InvalidInputError extends DirectoryError {
  constructor(message = 'Invalid input', options?: { cause?: unknown }) {
    super(message, 'input', options);
    this.name = 'InvalidInputError';
  }
}

export class PagingCookieError extends InvalidInputError {
  constructor(message = 'Paging cookie is no longer valid, run the query again') {
    super(message);
    this.name = 'PagingCookieError';
  }
}

export class ReconnectError extends DirectoryError {
  constructor(message = 'Reconnection failed', options?: { cause?: unknown }) {
    super(message, 'reconnect', options);
    this.name = 'ReconnectError';
  }
}

export class NotFoundError extends DirectoryError {
  constructor(message = 'Entry not found') {
    super(message, 'notFound');
    this.name = 'NotFoundError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// LDAP result codes
const RESULT_NO_SUCH_OBJECT = 32;
const RESULT_INAPPROPRIATE_AUTH = 48;
const RESULT_INVALID_CREDENTIALS = 49;
const RESULT_INSUFFICIENT_ACCESS = 50;
const RESULT_BUSY = 51;
const RESULT_UNAVAILABLE = 52;
const RESULT_SERVER_DOWN = 81;
const RESULT_FILTER_ERROR = 87;
const RESULT_CONNECT_ERROR = 91;

const retryableResultCodes = new Set([
  RESULT_BUSY,
  RESULT_UNAVAILABLE,
  RESULT_SERVER_DOWN,
  RESULT_CONNECT_ERROR,
]);

const authResultCodes = new Set([
  RESULT_INAPPROPRIATE_AUTH,
  RESULT_INVALID_CREDENTIALS,
  RESULT_INSUFFICIENT_ACCESS,
]);

const retryableSocketCodes = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'ETIMEDOUT',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ENOTCONN',
  'EAI_AGAIN',
]);

const retryableMessages = [
  'connection closed',
  'connection reset',
  'connection refused',
  'broken pipe',
  'network is unreachable',
  'socket closed',
  'timeout',
  'timed out',
  'server down',
  'unavailable',
];

const codeOf = (err: unknown): unknown =>
  typeof err === 'object' && err !== null && 'code' in err
    ? err.code
    : undefined;

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/**
 * Map anything thrown by a transport to a DirectoryError
 */
export function toDirectoryError(err: unknown): DirectoryError {
  if (err instanceof DirectoryError) return err;
  const message = errorMessage(err);
  const code = codeOf(err);
  if (typeof code === 'number') {
    if (retryableResultCodes.has(code))
      return new ServerUnavailableError(message, { cause: err });
    if (authResultCodes.has(code))
      return new AuthenticationError(message, { cause: err });
    if (code === RESULT_FILTER_ERROR)
      return new InvalidInputError(message, { cause: err });
    if (code === RESULT_NO_SUCH_OBJECT) return new NotFoundError(message);
    return new DirectoryError(message, 'protocol', { cause: err });
  }
  if (typeof code === 'string' && retryableSocketCodes.has(code)) {
    return new TransportError(message, { cause: err });
  }
  const lower = message.toLowerCase();
  if (retryableMessages.some(m => lower.includes(m))) {
    return new TransportError(message, { cause: err });
  }
  return new DirectoryError(message, 'protocol', { cause: err });
}

export function isRetryable(err: unknown): boolean {
  const kind = toDirectoryError(err).kind;
  return kind === 'transport' || kind === 'unavailable';
}
