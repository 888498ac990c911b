/**
 * Oracle connection type definitions
 *
 * A run connects either directly (host, port, service) or through a named
 * alias resolved from a tnsnames.ora directory. The two are mutually
 * exclusive and validated before anything connects.
 *
 * @license MIT
 */

export type OracleProtocol = 'tcp' | 'tcps';

/**
 * Direct connection by host, port and service name
 */
export interface DirectConnectionTarget {
  kind: 'direct';
  host: string;
  port: number;
  service: string;
  protocol: OracleProtocol;
}

/**
 * Connection through a tnsnames.ora alias
 */
export interface AliasConnectionTarget {
  kind: 'alias';
  alias: string;
  /** Directory holding tnsnames.ora (and sqlnet.ora / wallet, if any) */
  configDir?: string;
}

export type ConnectionTarget = DirectConnectionTarget | AliasConnectionTarget;

/**
 * Thick mode settings; the libraries are searched on the system path when
 * libDir is unset
 */
export interface ThickClientOptions {
  libDir?: string;
}

/**
 * Credentials plus target, as handed to the connector
 */
export interface OracleConnectorConfig {
  target: ConnectionTarget;
  user: string;
  /** Resolved password (never a secret reference) */
  password: string;
  /** Per round-trip driver timeout in milliseconds; unset means no limit */
  callTimeout?: number;
  /** Load the Oracle Client libraries before connecting */
  thickClient?: ThickClientOptions;
}

/**
 * Identifier of the host or alias a run targets, for logs and file names
 */
export function describeTarget(target: ConnectionTarget): string {
  return target.kind === 'direct'
    ? `${target.host}:${target.port}/${target.service}`
    : target.alias;
}

/**
 * Connection whose lifetime is scoped to one batch of checks
 */
export interface ManagedConnection {
  connect(): Promise<void>;
  close(): Promise<void>;
}
