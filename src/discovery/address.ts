/**
 * Literal server-name forms: IP, IP:port, host:port.
 * Pure and total; nothing here throws or does I/O.
 */
import { isIP, isIPv6 } from 'node:net';

export type AddressLiteral =
  | { kind: 'socket'; ip: string; port: number }
  | { kind: 'ip'; ip: string }
  | { kind: 'host-port'; host: string; port: number };

const PORT_PATTERN = /^\d{1,5}$/;

export function parsePort(value: string): number | null {
  if (!PORT_PATTERN.test(value)) {
    return null;
  }
  const port = Number(value);
  return port <= 65535 ? port : null;
}

/** Strip brackets from "[v6]"; anything else is returned as-is */
function unbracket(value: string): string | null {
  if (value.startsWith('[') && value.endsWith(']')) {
    const inner = value.slice(1, -1);
    return isIPv6(inner) ? inner : null;
  }
  return value;
}

/**
 * "1.2.3.4:80" or "[::1]:80".
 * An unbracketed IPv6 address never carries a port.
 */
export function parseSocketLiteral(value: string): { ip: string; port: number } | null {
  if (value.startsWith('[')) {
    const close = value.indexOf(']:');
    if (close === -1) {
      return null;
    }
    const ip = value.slice(1, close);
    const port = parsePort(value.slice(close + 2));
    return isIPv6(ip) && port !== null ? { ip, port } : null;
  }

  const parts = value.split(':');
  if (parts.length !== 2 || isIP(parts[0]) !== 4) {
    return null;
  }
  const port = parsePort(parts[1]);
  return port !== null ? { ip: parts[0], port } : null;
}

/** "1.2.3.4", "::1" or "[::1]" */
export function parseIpLiteral(value: string): string | null {
  const ip = unbracket(value);
  return ip !== null && isIP(ip) !== 0 ? ip : null;
}

/**
 * Port suffix of "host:port".
 * Exactly one colon, a non-empty host and a 16-bit decimal port.
 */
export function splitPort(value: string): { host: string; port: number } | null {
  const parts = value.split(':');
  if (parts.length !== 2 || parts[0] === '') {
    return null;
  }
  const port = parsePort(parts[1]);
  return port !== null ? { host: parts[0], port } : null;
}

type AddressRule = (value: string) => AddressLiteral | null;

/** Order matters: "1.2.3.4:80" must be a socket, never a host-port */
const ADDRESS_RULES: readonly AddressRule[] = [
  (value) => {
    const socket = parseSocketLiteral(value);
    return socket ? { kind: 'socket', ip: socket.ip, port: socket.port } : null;
  },
  (value) => {
    const ip = parseIpLiteral(value);
    return ip !== null ? { kind: 'ip', ip } : null;
  },
  (value) => {
    const hostPort = splitPort(value);
    return hostPort ? { kind: 'host-port', host: hostPort.host, port: hostPort.port } : null;
  },
];

export function classifyAddress(value: string): AddressLiteral | null {
  for (const rule of ADDRESS_RULES) {
    const literal = rule(value);
    if (literal) {
      return literal;
    }
  }
  return null;
}

/** IP in host position: IPv6 gets brackets */
export function formatHost(ip: string): string {
  return isIPv6(ip) ? `[${ip}]` : ip;
}

export function formatSocket(ip: string, port: number): string {
  return `${formatHost(ip)}:${port}`;
}
