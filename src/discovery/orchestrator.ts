/**
 * Wires the resolvers to a backend from configuration.
 */
import type { Config } from '../config/schema.js';
import type { Logger } from '../config/logger.js';
import { NodeBackend } from '../transport/backend.js';
import type { DiscoveryBackend } from '../transport/types.js';
import { ClientResolver } from './client.js';
import { ServerResolver } from './server.js';

export interface Resolvers {
  server: ServerResolver;
  client: ClientResolver;
  backend: DiscoveryBackend;
}

/**
 * Build both resolvers over one shared backend.
 * @param backend Defaults to a NodeBackend with the configured timeouts
 */
export function createResolvers(
  config: Config,
  logger: Logger,
  backend: DiscoveryBackend = new NodeBackend({
    httpTimeout: config.HTTP_TIMEOUT_MS,
    dnsTimeout: config.DNS_TIMEOUT_MS,
  })
): Resolvers {
  return {
    server: new ServerResolver(backend, {
      logger,
      scheme: config.WELL_KNOWN_SCHEME,
      port: config.WELL_KNOWN_PORT,
    }),
    client: new ClientResolver(backend, {
      logger,
      scheme: config.WELL_KNOWN_SCHEME,
    }),
    backend,
  };
}
