/**
 * Network capabilities used by the resolvers
 */

export type {
  DiscoveryBackend,
  DnsClient,
  HttpClient,
  HttpResponse,
  SrvRecord,
} from './types.js';

export { FetchHttpClient, HttpConnectError, connectErrorCode } from './http.js';
export { NodeDnsClient, isNoDataError, type DnsQuerier, type NodeDnsClientOptions } from './dns.js';
export { NodeBackend, type NodeBackendOptions } from './backend.js';
export { MemoryBackend, type BackendCall, type HttpRoute } from './memory.js';
