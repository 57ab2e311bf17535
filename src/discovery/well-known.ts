/**
 * /.well-known/matrix/server delegation lookup
 */
import type { Logger } from '../config/logger.js';
import { ServerConnectError } from '../errors.js';
import { HttpConnectError } from '../transport/http.js';
import type { HttpClient, HttpResponse } from '../transport/types.js';
import { parseJsonBody, serverWellKnownSchema } from './schemas.js';
import type { WellKnownScheme, WellKnownServerDoc } from './types.js';

export interface WellKnownOptions {
  /** Defaults to https */
  scheme?: WellKnownScheme;
  /** Explicit port for the request; production requests use the scheme default */
  port?: number;
}

export function serverWellKnownUrl(name: string, options: WellKnownOptions = {}): string {
  const scheme = options.scheme ?? 'https';
  const authority = options.port !== undefined ? `${name}:${options.port}` : name;
  return `${scheme}://${authority}/.well-known/matrix/server`;
}

/**
 * Fetch the delegation document for a server name.
 *
 * A server that cannot be reached at all stops discovery; a server that
 * answers with anything other than a valid document does not.
 *
 * @returns the document, or null when there is no usable delegation
 * @throws ServerConnectError if no connection could be opened
 */
export async function fetchServerWellKnown(
  http: HttpClient,
  name: string,
  logger: Logger,
  options: WellKnownOptions = {}
): Promise<WellKnownServerDoc | null> {
  const url = serverWellKnownUrl(name, options);

  let response: HttpResponse;
  try {
    response = await http.get(url);
  } catch (error) {
    if (error instanceof HttpConnectError) {
      throw new ServerConnectError(name, error);
    }
    logger.debug({ url, err: error }, 'Server well-known request failed, ignoring delegation');
    return null;
  }

  if (response.status < 200 || response.status >= 300) {
    logger.debug({ url, status: response.status }, 'Server well-known not available');
    return null;
  }

  const document = parseJsonBody(response.body, serverWellKnownSchema);
  if (!document) {
    logger.debug({ url }, 'Server well-known body is not a valid delegation document');
    return null;
  }

  return { server: document['m.server'] };
}
