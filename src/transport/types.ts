/**
 * Capabilities the resolvers consume.
 * Implementations must tolerate concurrent calls from independent resolutions.
 */

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpClient {
  /**
   * Issue a GET request.
   * Rejects with HttpConnectError when no connection could be established,
   * with any other error for failures after that (timeouts, resets).
   */
  get(url: string): Promise<HttpResponse>;
}

export interface SrvRecord {
  priority: number;
  weight: number;
  port: number;
  target: string;
}

export interface DnsClient {
  lookupSrv(name: string): Promise<SrvRecord[]>;
  lookupAddress(host: string): Promise<string[]>;
}

export interface DiscoveryBackend extends HttpClient, DnsClient {}
