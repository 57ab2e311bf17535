/**
 * Server-server name resolution.
 *
 * Resolution order:
 * 1. IP literal with port
 * 2. IP literal
 * 3. Hostname with port
 * 4. /.well-known/matrix/server delegation, whose target goes through 1-3
 *    and then an SRV lookup
 * 5. SRV lookup on the name itself, else the bare hostname
 */
import type { Logger } from '../config/logger.js';
import { AddressLookupError, NoRecordsError } from '../errors.js';
import { isNoDataError } from '../transport/dns.js';
import type { DiscoveryBackend } from '../transport/types.js';
import { classifyAddress, formatHost, formatSocket, splitPort } from './address.js';
import { lookupFederationSrv } from './dns-srv.js';
import { fetchServerWellKnown, type WellKnownOptions } from './well-known.js';
import {
  DEFAULT_FEDERATION_PORT,
  type ResolvedServer,
  type SocketAddress,
} from './types.js';

export const resolvedServer = {
  ip: (ip: string): ResolvedServer => Object.freeze({ kind: 'ip', ip }),
  socket: (ip: string, port: number): ResolvedServer => Object.freeze({ kind: 'socket', ip, port }),
  host: (hostname: string): ResolvedServer => Object.freeze({ kind: 'host', hostname }),
  hostPort: (address: string): ResolvedServer => Object.freeze({ kind: 'host-port', address }),
  srv: (target: string, hostname: string): ResolvedServer =>
    Object.freeze({ kind: 'srv', target, hostname }),
};

/**
 * Literal steps of the procedure (1-3, and 4.1-4.3 for a delegated name).
 * @returns a terminal result, or null if the name needs network lookups
 */
export function classifyServerName(name: string): ResolvedServer | null {
  const literal = classifyAddress(name);
  if (!literal) {
    return null;
  }
  switch (literal.kind) {
    case 'socket':
      return resolvedServer.socket(literal.ip, literal.port);
    case 'ip':
      return resolvedServer.ip(literal.ip);
    case 'host-port':
      return resolvedServer.hostPort(name);
  }
}

/** Value for the Host header of requests to a resolved server */
export function hostHeader(server: ResolvedServer): string {
  switch (server.kind) {
    case 'ip':
      return formatHost(server.ip);
    case 'socket':
      return formatSocket(server.ip, server.port);
    case 'host':
      return server.hostname;
    case 'host-port':
      return server.address;
    case 'srv':
      return server.hostname;
  }
}

/** "host:port" to open a connection to */
export function connectAddress(server: ResolvedServer): string {
  switch (server.kind) {
    case 'ip':
      return formatSocket(server.ip, DEFAULT_FEDERATION_PORT);
    case 'socket':
      return formatSocket(server.ip, server.port);
    case 'host':
      return `${server.hostname}:${DEFAULT_FEDERATION_PORT}`;
    case 'host-port':
      return server.address;
    case 'srv':
      return server.target;
  }
}

export interface ServerResolverOptions extends WellKnownOptions {
  logger: Logger;
}

/**
 * Resolves federation server names.
 * Holds no state between calls; concurrent resolutions may share one instance.
 */
export class ServerResolver {
  private readonly backend: DiscoveryBackend;
  private readonly logger: Logger;
  private readonly wellKnown: WellKnownOptions;

  constructor(backend: DiscoveryBackend, options: ServerResolverOptions) {
    this.backend = backend;
    this.logger = options.logger;
    this.wellKnown = { scheme: options.scheme, port: options.port };
  }

  /**
   * Resolve a server name to where and as whom to connect.
   * @throws ServerConnectError if the well-known request could not connect
   */
  async resolve(name: string): Promise<ResolvedServer> {
    const log = this.logger.child({ serverName: name });

    log.debug('Parsing server name literals');
    const literal = classifyServerName(name);
    if (literal) {
      log.info({ kind: literal.kind }, 'Server name is a literal');
      return literal;
    }

    log.debug('Querying server well-known');
    const wellKnown = await fetchServerWellKnown(this.backend, name, log, this.wellKnown);
    if (wellKnown) {
      const delegated = wellKnown.server;
      log.debug({ delegated }, 'Well-known received');

      const delegatedLiteral = classifyServerName(delegated);
      if (delegatedLiteral) {
        log.info({ kind: delegatedLiteral.kind, delegated }, 'Delegated name is a literal');
        return delegatedLiteral;
      }

      log.debug({ delegated }, 'Looking up SRV record for delegated hostname');
      const target = await lookupFederationSrv(this.backend, delegated, log);
      if (target) {
        log.info({ target, delegated }, 'Delegated name resolved through SRV');
        return resolvedServer.srv(target, delegated);
      }

      log.info({ delegated }, 'Using delegated hostname directly');
      return resolvedServer.host(delegated);
    }

    log.debug('Looking up SRV record for hostname');
    const target = await lookupFederationSrv(this.backend, name, log);
    if (target) {
      log.info({ target }, 'Server name resolved through SRV');
      return resolvedServer.srv(target, name);
    }

    log.info('Using server name directly');
    return resolvedServer.host(name);
  }

  /**
   * Turn a resolved server into a socket address.
   * Hostnames get a forward lookup; the first address returned is used.
   * @throws NoRecordsError if the lookup returns no address
   * @throws AddressLookupError if the lookup itself fails
   */
  async addressOf(server: ResolvedServer): Promise<SocketAddress> {
    let host: string;
    let port: number;
    switch (server.kind) {
      case 'ip':
        return Object.freeze({ ip: server.ip, port: DEFAULT_FEDERATION_PORT });
      case 'socket':
        return Object.freeze({ ip: server.ip, port: server.port });
      case 'host':
        host = server.hostname;
        port = DEFAULT_FEDERATION_PORT;
        break;
      case 'host-port':
      case 'srv': {
        const address = server.kind === 'srv' ? server.target : server.address;
        const endpoint = splitPort(address);
        if (!endpoint) {
          // Only reachable with a hand-built value
          throw new NoRecordsError(address);
        }
        host = endpoint.host;
        port = endpoint.port;
        break;
      }
    }

    let addresses: string[];
    try {
      addresses = await this.backend.lookupAddress(host);
    } catch (error) {
      if (isNoDataError(error)) {
        throw new NoRecordsError(host);
      }
      throw new AddressLookupError(host, error);
    }

    const [ip] = addresses;
    if (ip === undefined) {
      throw new NoRecordsError(host);
    }

    this.logger.debug({ host, ip, port }, 'Resolved server address');
    return Object.freeze({ ip, port });
  }
}
