import { ZodError } from 'zod';

/**
 * Base class for every failure the resolvers surface.
 * `type` is a stable machine-readable code, `fix` a hint for whoever reads the CLI output.
 */
export class DiscoveryError extends Error {
  type: string;
  fix: string;

  constructor(message: string, type: string, fix: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DiscoveryError';
    this.type = type;
    this.fix = fix;
  }
}

/**
 * The server well-known request could not open a connection.
 * The only error `ServerResolver.resolve` lets through.
 */
export class ServerConnectError extends DiscoveryError {
  readonly serverName: string;

  constructor(serverName: string, cause?: unknown) {
    super(
      `Could not connect to ${serverName} to fetch /.well-known/matrix/server`,
      'connectFailed',
      'Check network connectivity and that the server name resolves. Discovery stops here instead of falling back.',
      { cause }
    );
    this.name = 'ServerConnectError';
    this.serverName = serverName;
  }
}

/**
 * FAIL_PROMPT: the account domain could not be queried.
 * Transient from the caller's point of view; retry or ask for another domain.
 */
export class PromptFailure extends DiscoveryError {
  readonly domain: string;

  constructor(domain: string, message: string, options?: { cause?: unknown }) {
    super(
      message,
      'prompt',
      `Check that ${domain} is the right domain and is reachable, then try again.`,
      options
    );
    this.name = 'PromptFailure';
    this.domain = domain;
  }
}

export type HardFailureReason = 'url' | 'http';

/**
 * FAIL_ERROR: the well-known document points at something broken.
 * Either a base_url that is not a URL, or a target that failed validation.
 */
export class HardFailure extends DiscoveryError {
  readonly reason: HardFailureReason;

  constructor(reason: HardFailureReason, message: string, options?: { cause?: unknown }) {
    super(
      message,
      reason === 'url' ? 'invalidUrl' : 'validationFailed',
      reason === 'url'
        ? 'The .well-known/matrix/client document contains an invalid base_url. Contact the domain administrator.'
        : 'The server advertised in .well-known/matrix/client did not validate. Contact the domain administrator.',
      options
    );
    this.name = 'HardFailure';
    this.reason = reason;
  }

  static invalidUrl(value: string, cause?: unknown): HardFailure {
    return new HardFailure('url', `Invalid base URL: ${value}`, { cause });
  }

  static validation(url: string, details: string, cause?: unknown): HardFailure {
    return new HardFailure('http', `Validation of ${url} failed: ${details}`, { cause });
  }
}

/**
 * The forward address lookup for a resolved server returned nothing.
 */
export class NoRecordsError extends DiscoveryError {
  readonly host: string;

  constructor(host: string) {
    super(
      `No address records for ${host}`,
      'noRecords',
      `Add an A or AAAA record for ${host}, or check the delegation that points at it.`
    );
    this.name = 'NoRecordsError';
    this.host = host;
  }
}

/**
 * The forward address lookup itself failed (timeout, refused, SERVFAIL).
 */
export class AddressLookupError extends DiscoveryError {
  readonly host: string;

  constructor(host: string, cause?: unknown) {
    super(
      `Address lookup for ${host} failed`,
      'lookupFailed',
      'Check the DNS resolver configuration and try again.',
      { cause }
    );
    this.name = 'AddressLookupError';
    this.host = host;
  }
}

export type ClientFailureKind = 'prompt' | 'fail';

/**
 * Map a client discovery error onto the two outcomes a login UI distinguishes.
 * @returns null for errors that did not come from client discovery
 */
export function classifyClientFailure(error: unknown): ClientFailureKind | null {
  if (error instanceof PromptFailure) {
    return 'prompt';
  }
  if (error instanceof HardFailure) {
    return 'fail';
  }
  return null;
}

export function formatCliError(error: Error, subject?: string): string {
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => {
      const field = issue.path.join('.');
      return `  ${field}: ${issue.message}`;
    });
    return [
      'Configuration validation failed:',
      ...issues,
      '',
      'Fix: Check your environment variables.',
      'Supported: LOG_LEVEL, HTTP_TIMEOUT_MS, DNS_TIMEOUT_MS, WELL_KNOWN_SCHEME, WELL_KNOWN_PORT',
    ].join('\n');
  }

  if (error instanceof DiscoveryError) {
    return [error.message, '', `Fix: ${error.fix}`].join('\n');
  }

  const context = subject ? ` while resolving ${subject}` : '';
  return [
    `Unexpected error${context}: ${error.message}`,
    '',
    'Fix: Check your configuration and try again.',
  ].join('\n');
}
