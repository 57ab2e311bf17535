/**
 * Deterministic in-memory DiscoveryBackend.
 * Answers come from tables filled up front; unknown URLs answer 404 and
 * unknown names answer with no records. Every call is recorded in order.
 */
import { HttpConnectError } from './http.js';
import type { DiscoveryBackend, HttpResponse, SrvRecord } from './types.js';

export type HttpRoute =
  | { kind: 'response'; response: HttpResponse }
  | { kind: 'connect-error' }
  | { kind: 'error'; message: string };

export interface BackendCall {
  method: 'get' | 'lookupSrv' | 'lookupAddress';
  target: string;
}

export class MemoryBackend implements DiscoveryBackend {
  readonly calls: BackendCall[] = [];
  private readonly routes = new Map<string, HttpRoute>();
  private readonly srvRecords = new Map<string, SrvRecord[] | Error>();
  private readonly addresses = new Map<string, string[] | Error>();

  /** Answer GET url with a JSON body (objects are serialized) or a raw string */
  respond(url: string, status: number, body: unknown = ''): this {
    const text = typeof body === 'string' ? body : JSON.stringify(body);
    this.routes.set(url, { kind: 'response', response: { status, body: text } });
    return this;
  }

  /** Fail GET url as if no socket could be opened */
  refuse(url: string): this {
    this.routes.set(url, { kind: 'connect-error' });
    return this;
  }

  /** Fail GET url after connecting (timeout, reset) */
  fail(url: string, message = 'socket hang up'): this {
    this.routes.set(url, { kind: 'error', message });
    return this;
  }

  srv(name: string, records: SrvRecord[] | Error): this {
    this.srvRecords.set(name, records);
    return this;
  }

  address(host: string, ips: string[] | Error): this {
    this.addresses.set(host, ips);
    return this;
  }

  requested(method: BackendCall['method']): string[] {
    return this.calls.filter((call) => call.method === method).map((call) => call.target);
  }

  async get(url: string): Promise<HttpResponse> {
    this.calls.push({ method: 'get', target: url });
    const route = this.routes.get(url);
    if (!route) {
      return { status: 404, body: '' };
    }
    switch (route.kind) {
      case 'response':
        return { ...route.response };
      case 'connect-error':
        throw new HttpConnectError(url, 'ECONNREFUSED');
      case 'error':
        throw new Error(route.message);
    }
  }

  async lookupSrv(name: string): Promise<SrvRecord[]> {
    this.calls.push({ method: 'lookupSrv', target: name });
    const records = this.srvRecords.get(name) ?? [];
    if (records instanceof Error) {
      throw records;
    }
    return records.map((record) => ({ ...record }));
  }

  async lookupAddress(host: string): Promise<string[]> {
    this.calls.push({ method: 'lookupAddress', target: host });
    const ips = this.addresses.get(host) ?? [];
    if (ips instanceof Error) {
      throw ips;
    }
    return [...ips];
  }
}
