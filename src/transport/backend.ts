/**
 * Production DiscoveryBackend: fetch for HTTP, node:dns for DNS.
 */
import { FetchHttpClient } from './http.js';
import { NodeDnsClient, type DnsQuerier } from './dns.js';
import type { DiscoveryBackend, HttpClient, DnsClient, HttpResponse, SrvRecord } from './types.js';

export interface NodeBackendOptions {
  httpTimeout?: number;
  dnsTimeout?: number;
  querier?: DnsQuerier;
}

export class NodeBackend implements DiscoveryBackend {
  private readonly http: HttpClient;
  private readonly dns: DnsClient;

  constructor(options: NodeBackendOptions = {}) {
    this.http = new FetchHttpClient(options.httpTimeout);
    this.dns = new NodeDnsClient({ timeout: options.dnsTimeout, querier: options.querier });
  }

  get(url: string): Promise<HttpResponse> {
    return this.http.get(url);
  }

  lookupSrv(name: string): Promise<SrvRecord[]> {
    return this.dns.lookupSrv(name);
  }

  lookupAddress(host: string): Promise<string[]> {
    return this.dns.lookupAddress(host);
  }
}
