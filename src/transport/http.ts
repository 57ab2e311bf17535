/**
 * fetch-based HttpClient.
 * Separates "never connected" from every other failure, which the server
 * well-known lookup treats differently.
 */
import type { HttpClient, HttpResponse } from './types.js';

/** Default request timeout */
const DEFAULT_TIMEOUT = 10000;

/** Socket-level codes meaning the request never reached the server */
const CONNECT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EADDRNOTAVAIL',
  'UND_ERR_CONNECT_TIMEOUT',
]);

export class HttpConnectError extends Error {
  readonly url: string;
  readonly code: string | undefined;

  constructor(url: string, code: string | undefined, options?: { cause?: unknown }) {
    super(code ? `Connection to ${url} failed (${code})` : `Connection to ${url} failed`, options);
    this.name = 'HttpConnectError';
    this.url = url;
    this.code = code;
  }
}

function errorCode(value: unknown): string | undefined {
  if (value && typeof value === 'object' && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

/**
 * Find the connect-level code on a fetch rejection.
 * undici wraps the socket error as `TypeError('fetch failed', { cause })`,
 * sometimes inside an AggregateError when several addresses were tried.
 */
export function connectErrorCode(error: unknown): string | undefined {
  if (!(error instanceof TypeError)) {
    return undefined;
  }
  const cause: unknown = error.cause;
  const direct = errorCode(cause);
  if (direct && CONNECT_ERROR_CODES.has(direct)) {
    return direct;
  }
  if (cause instanceof AggregateError) {
    for (const inner of cause.errors) {
      const code = errorCode(inner);
      if (code && CONNECT_ERROR_CODES.has(code)) {
        return code;
      }
    }
  }
  return undefined;
}

export class FetchHttpClient implements HttpClient {
  private readonly timeout: number;

  constructor(timeout: number = DEFAULT_TIMEOUT) {
    this.timeout = timeout;
  }

  async get(url: string): Promise<HttpResponse> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      const code = connectErrorCode(error);
      if (code) {
        throw new HttpConnectError(url, code, { cause: error });
      }
      throw error;
    }

    return {
      status: response.status,
      body: await response.text(),
    };
  }
}
