/**
 * HTTP transport bound to a single device address and set of credentials.
 *
 * The transport only knows how to issue a GET and hand back the raw body.
 * Decoding is left to the client so that a malformed body never looks like
 * a network failure.
 */

import type { Connection, Credentials } from '../types/index.js';
import { InvalidArgumentError } from '../utils/errors.js';

export const DEFAULT_PORT = 8080;
export const DEFAULT_TIMEOUT = 10000;

export type TransportErrorCode =
  | 'NETWORK_ERROR' // device unreachable
  | 'TIMEOUT'
  | 'HTTP_ERROR'; // non-2xx status

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code: TransportErrorCode,
    public readonly status?: number,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'TransportError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransportError);
    }
  }
}

export interface FetchInit {
  method: 'GET';
  headers: Record<string, string>;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<Response>;

export interface Transport {
  readonly baseUrl: string;

  /**
   * Issue a GET to `path` and resolve with the response body, or `null`
   * when the device sent no content.
   *
   * @throws TransportError when the request itself fails
   */
  get(path: string): Promise<string | null>;
}

export interface HttpTransportOptions {
  /** Request timeout in ms (default: 10000) */
  timeout?: number;

  /** Replaces the global fetch */
  fetch?: FetchLike;
}

export type TransportFactory = (
  connection: Connection,
  credentials: Credentials,
  options?: HttpTransportOptions
) => Transport;

export function buildBaseUrl(connection: Connection): string {
  const scheme = connection.scheme ?? 'http';
  const port = connection.port ?? DEFAULT_PORT;
  const host = connection.host.includes(':') && !connection.host.startsWith('[') ? `[${connection.host}]` : connection.host;
  return `${scheme}://${host}:${port}`;
}

export function buildAuthorizationHeader(credentials: Credentials): string {
  if ('token' in credentials) {
    return `Bearer ${credentials.token}`;
  }
  const encoded = Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
  return `Basic ${encoded}`;
}

export class HttpTransport implements Transport {
  readonly baseUrl: string;

  private readonly authorization: string;
  private readonly timeout: number;
  private readonly fetchImpl: FetchLike;

  constructor(connection: Connection, credentials: Credentials, options: HttpTransportOptions = {}) {
    this.baseUrl = buildBaseUrl(connection);
    if (!URL.canParse(this.baseUrl)) {
      throw new InvalidArgumentError('connection', `"${this.baseUrl}" is not a valid device address`);
    }
    this.authorization = buildAuthorizationHeader(credentials);
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async get(path: string): Promise<string | null> {
    const url = new URL(path, this.baseUrl).toString();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          Authorization: this.authorization
        },
        signal: controller.signal
      });

      if (!response.ok) {
        throw new TransportError(
          `HTTP ${response.status}: ${response.statusText || 'request failed'}`,
          'HTTP_ERROR',
          response.status
        );
      }

      if (response.status === 204) {
        return null;
      }

      const body = await response.text();
      return body.trim() === '' ? null : body;
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request to ${url} timed out after ${this.timeout}ms`, 'TIMEOUT', undefined, error);
      }

      if (error instanceof TypeError) {
        throw new TransportError(
          `Cannot reach device at ${this.baseUrl}: ${error.message}`,
          'NETWORK_ERROR',
          undefined,
          error
        );
      }

      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export const createHttpTransport: TransportFactory = (connection, credentials, options) =>
  new HttpTransport(connection, credentials, options);
