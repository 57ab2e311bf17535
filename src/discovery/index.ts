/**
 * Matrix discovery module
 * Exports literal parsing, well-known and SRV lookups, and both resolvers
 */

// Types
export type {
  ClientVersions,
  ResolvedServer,
  ResolvedServerKind,
  SocketAddress,
  WellKnownClientDoc,
  WellKnownScheme,
  WellKnownServerDoc,
} from './types.js';
export { DEFAULT_FEDERATION_PORT } from './types.js';

// Low-level discovery functions
export {
  classifyAddress,
  formatHost,
  formatSocket,
  parseIpLiteral,
  parseSocketLiteral,
  splitPort,
  type AddressLiteral,
} from './address.js';
export { lookupFederationSrv, pickSrvRecord, srvQueryName } from './dns-srv.js';
export { fetchServerWellKnown, serverWellKnownUrl, type WellKnownOptions } from './well-known.js';

// Resolvers
export {
  ServerResolver,
  classifyServerName,
  connectAddress,
  hostHeader,
  resolvedServer,
  type ServerResolverOptions,
} from './server.js';
export { ClientResolver, joinBasePath, type ClientResolverOptions } from './client.js';
export { createResolvers, type Resolvers } from './orchestrator.js';
