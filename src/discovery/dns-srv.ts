/**
 * DNS SRV lookup for Matrix federation
 * Queries _matrix._tcp.{name}
 */
import type { Logger } from '../config/logger.js';
import { isNoDataError } from '../transport/dns.js';
import type { DnsClient, SrvRecord } from '../transport/types.js';

export function srvQueryName(name: string): string {
  return `_matrix._tcp.${name}`;
}

/**
 * Record with the lowest priority value.
 * Weight is not consulted; on a tie the first record in answer order wins.
 */
export function pickSrvRecord(records: readonly SrvRecord[]): SrvRecord | null {
  let best: SrvRecord | null = null;
  for (const record of records) {
    if (!best || record.priority < best.priority) {
      best = record;
    }
  }
  return best;
}

/**
 * Resolve the federation SRV record for a server name.
 *
 * @param dns - DNS client to query
 * @param name - Hostname to query (e.g., "example.org")
 * @returns "target:port" with the target's trailing dot removed, or null if there is no usable record
 */
export async function lookupFederationSrv(
  dns: DnsClient,
  name: string,
  logger: Logger
): Promise<string | null> {
  const query = srvQueryName(name);

  let records: SrvRecord[];
  try {
    records = await dns.lookupSrv(query);
  } catch (error) {
    if (isNoDataError(error)) {
      // No record - the common case for most server names
      return null;
    }
    logger.warn({ query, err: error }, 'DNS SRV query failed');
    return null;
  }

  const record = pickSrvRecord(records);
  if (!record) {
    return null;
  }

  const target = record.target.replace(/\.+$/, '');
  return `${target}:${record.port}`;
}
