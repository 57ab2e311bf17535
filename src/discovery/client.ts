/**
 * Client-server discovery through /.well-known/matrix/client
 *
 * Discovery stages:
 * 1. GET https://{domain}/.well-known/matrix/client (404 means no delegation)
 * 2. Parse m.homeserver.base_url
 * 3. Validate it with GET {base_url}/_matrix/client/versions
 * 4. If m.identity_server is present, validate {base_url}/_matrix/identity/api/v1
 */
import type { Logger } from '../config/logger.js';
import { HardFailure, PromptFailure } from '../errors.js';
import type { HttpClient, HttpResponse } from '../transport/types.js';
import { clientWellKnownSchema, parseJsonBody, versionsSchema } from './schemas.js';
import type { ClientVersions, WellKnownClientDoc, WellKnownScheme } from './types.js';

function parseUrl(value: string): URL {
  try {
    return new URL(value);
  } catch (error) {
    throw HardFailure.invalidUrl(value, error);
  }
}

/**
 * Append a relative API path to a base URL.
 * "https://h/prefix" and "https://h/prefix/" both yield "https://h/prefix/{path}".
 */
export function joinBasePath(base: URL, path: string): string {
  const directory = new URL(base.href);
  if (!directory.pathname.endsWith('/')) {
    directory.pathname = `${directory.pathname}/`;
  }
  return new URL(path, directory).href;
}

function isSuccess(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

export interface ClientResolverOptions {
  logger: Logger;
  /** Defaults to https */
  scheme?: WellKnownScheme;
}

/**
 * Resolves the client-server API base URL for an account domain.
 * Stateless; one instance may serve concurrent lookups.
 */
export class ClientResolver {
  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly scheme: WellKnownScheme;

  constructor(http: HttpClient, options: ClientResolverOptions) {
    this.http = http;
    this.logger = options.logger;
    this.scheme = options.scheme ?? 'https';
  }

  /**
   * Fetch and parse the client well-known document.
   * @returns null when the domain answers 404
   * @throws PromptFailure on transport errors or an unusable document
   */
  async fetchWellKnown(domain: string, base: URL): Promise<WellKnownClientDoc | null> {
    const url = joinBasePath(base, '.well-known/matrix/client');

    let response: HttpResponse;
    try {
      response = await this.http.get(url);
    } catch (error) {
      throw new PromptFailure(domain, `Could not fetch ${url}`, { cause: error });
    }

    if (response.status === 404) {
      return null;
    }
    if (!isSuccess(response)) {
      throw new PromptFailure(domain, `${url} answered HTTP ${response.status}`);
    }

    const document = parseJsonBody(response.body, clientWellKnownSchema);
    if (!document) {
      throw new PromptFailure(domain, `${url} is not a valid client well-known document`);
    }

    const identity = document['m.identity_server'];
    return {
      homeserverBaseUrl: document['m.homeserver'].base_url,
      ...(identity ? { identityServerBaseUrl: identity.base_url } : {}),
    };
  }

  /**
   * Check that a homeserver base URL serves the client-server API.
   * @throws HardFailure if the versions endpoint is unreachable or malformed
   */
  async validateHomeserver(baseUrl: URL): Promise<ClientVersions> {
    const url = joinBasePath(baseUrl, '_matrix/client/versions');

    let response: HttpResponse;
    try {
      response = await this.http.get(url);
    } catch (error) {
      throw HardFailure.validation(url, 'request failed', error);
    }

    if (!isSuccess(response)) {
      throw HardFailure.validation(url, `HTTP ${response.status}`);
    }

    const versions = parseJsonBody(response.body, versionsSchema);
    if (!versions) {
      throw HardFailure.validation(url, 'response is not a versions document');
    }

    return {
      versions: versions.versions,
      unstableFeatures: versions.unstable_features ?? {},
    };
  }

  /**
   * Check that an identity server base URL answers.
   * @throws HardFailure on transport errors or a 4xx/5xx status
   */
  async validateIdentityServer(baseUrl: URL): Promise<void> {
    const url = joinBasePath(baseUrl, '_matrix/identity/api/v1');

    let response: HttpResponse;
    try {
      response = await this.http.get(url);
    } catch (error) {
      throw HardFailure.validation(url, 'request failed', error);
    }

    if (response.status >= 400) {
      throw HardFailure.validation(url, `HTTP ${response.status}`);
    }
  }

  /**
   * Resolve the client-server API base URL for an account domain.
   *
   * @param domain Account domain (e.g., "example.org")
   * @returns The validated homeserver base URL, or the domain's own URL if it has no well-known
   * @throws PromptFailure if the domain could not be queried
   * @throws HardFailure if the well-known points at an invalid or failing target
   */
  async resolve(domain: string): Promise<URL> {
    const log = this.logger.child({ domain });
    const base = parseUrl(`${this.scheme}://${domain}`);

    log.debug('Querying client well-known');
    const wellKnown = await this.fetchWellKnown(domain, base);
    if (!wellKnown) {
      log.info({ baseUrl: base.href }, 'No client well-known, using domain');
      return base;
    }

    const homeserver = parseUrl(wellKnown.homeserverBaseUrl);
    log.debug({ baseUrl: homeserver.href }, 'Validating homeserver');
    const versions = await this.validateHomeserver(homeserver);
    log.debug({ versions: versions.versions }, 'Homeserver validated');

    if (wellKnown.identityServerBaseUrl !== undefined) {
      const identity = parseUrl(wellKnown.identityServerBaseUrl);
      log.debug({ identityServer: identity.href }, 'Validating identity server');
      await this.validateIdentityServer(identity);
    }

    log.info({ baseUrl: homeserver.href }, 'Client well-known resolved');
    return homeserver;
  }
}
