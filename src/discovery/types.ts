/**
 * Matrix discovery result types
 * Server-server name resolution and client-server well-known documents
 */

/** Port used when neither the name nor a delegation gives one */
export const DEFAULT_FEDERATION_PORT = 8448;

/**
 * Outcome of resolving a server name.
 * Built once at the terminal step of a resolution and frozen.
 */
export type ResolvedServer =
  /** IP literal, implicit port */
  | { readonly kind: 'ip'; readonly ip: string }
  /** IP literal with explicit port */
  | { readonly kind: 'socket'; readonly ip: string; readonly port: number }
  /** Hostname, implicit port */
  | { readonly kind: 'host'; readonly hostname: string }
  /** "host:port", kept as given */
  | { readonly kind: 'host-port'; readonly address: string }
  /** "target:port" from an SRV record; hostname is what the record was looked up for */
  | { readonly kind: 'srv'; readonly target: string; readonly hostname: string };

export type ResolvedServerKind = ResolvedServer['kind'];

export interface SocketAddress {
  readonly ip: string;
  readonly port: number;
}

/** Parsed `/.well-known/matrix/server` */
export interface WellKnownServerDoc {
  server: string;
}

/** Parsed `/.well-known/matrix/client` */
export interface WellKnownClientDoc {
  homeserverBaseUrl: string;
  identityServerBaseUrl?: string;
}

/** Parsed `/_matrix/client/versions` */
export interface ClientVersions {
  versions: string[];
  unstableFeatures: Record<string, boolean>;
}

/** Scheme used for well-known requests; http only for local test servers */
export type WellKnownScheme = 'https' | 'http';
