/**
 * node:dns backed DnsClient.
 * Errors are passed through untouched; callers decide what absence means.
 */
import { promises as dns, type SrvRecord as NodeSrvRecord } from 'node:dns';
import type { DnsClient, SrvRecord } from './types.js';

/** Subset of dns.promises.Resolver this client needs */
export interface DnsQuerier {
  resolveSrv(hostname: string): Promise<NodeSrvRecord[]>;
  resolve4(hostname: string): Promise<string[]>;
  resolve6(hostname: string): Promise<string[]>;
}

/** Default per-query timeout */
const DEFAULT_TIMEOUT = 3000;

/** Codes meaning "the name exists in DNS but has no such record" or "no such name" */
const NO_DATA_CODES = new Set(['ENOTFOUND', 'ENODATA']);

export function isNoDataError(error: unknown): boolean {
  return (
    !!error &&
    typeof error === 'object' &&
    'code' in error &&
    typeof error.code === 'string' &&
    NO_DATA_CODES.has(error.code)
  );
}

async function withTimeout<T>(query: Promise<T>, timeout: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      query,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`DNS timeout: ${label}`)), timeout);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

export interface NodeDnsClientOptions {
  timeout?: number;
  querier?: DnsQuerier;
}

export class NodeDnsClient implements DnsClient {
  private readonly timeout: number;
  private readonly querier: DnsQuerier;

  constructor(options: NodeDnsClientOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.querier = options.querier ?? new dns.Resolver();
  }

  async lookupSrv(name: string): Promise<SrvRecord[]> {
    const records = await withTimeout(this.querier.resolveSrv(name), this.timeout, name);
    return records.map((record) => ({
      priority: record.priority,
      weight: record.weight,
      port: record.port,
      target: record.name,
    }));
  }

  /**
   * Forward lookup, IPv4 answers first.
   * AAAA is only queried when there is no A record.
   */
  async lookupAddress(host: string): Promise<string[]> {
    try {
      const v4 = await withTimeout(this.querier.resolve4(host), this.timeout, host);
      if (v4.length > 0) {
        return v4;
      }
    } catch (error) {
      if (!isNoDataError(error)) {
        throw error;
      }
    }

    try {
      return await withTimeout(this.querier.resolve6(host), this.timeout, host);
    } catch (error) {
      if (isNoDataError(error)) {
        return [];
      }
      throw error;
    }
  }
}
