/**
 * Oracle connector
 *
 * Opens one connection for a batch of checks, either through an Easy Connect
 * string built from host/port/service or through a tnsnames.ora alias, and
 * executes statements on it one at a time. Thick mode (Oracle Client
 * libraries) is opt-in, for servers the thin driver cannot reach.
 *
 * @license MIT
 */

import oracledb from 'oracledb';
import type {
  ConnectionTarget,
  ManagedConnection,
  OracleConnectorConfig,
} from '../types/connector.js';
import { describeTarget } from '../types/connector.js';
import type { CheckCursor, ResultRow } from '../types.js';
import { ConfigurationError, ConnectionError, ErrorHandler } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../observability/logger.js';

/**
 * Attributes handed to the driver's getConnection
 */
export interface OracleConnectAttributes {
  user: string;
  password: string;
  connectString: string;
  /** Directory with tnsnames.ora, for alias targets */
  configDir?: string;
  sslServerDNMatch?: boolean;
}

/**
 * Open driver connection, reduced to what the audit needs
 */
export interface OracleSession {
  execute(sql: string): Promise<ResultRow[]>;
  setCallTimeout(ms: number): void;
  close(): Promise<void>;
}

export interface OracleDriver {
  /** Switch the driver to thick mode, loading the Oracle Client libraries */
  initThickClient(libDir?: string): void;
  getConnection(attributes: OracleConnectAttributes): Promise<OracleSession>;
}

/**
 * Fetch LOBs and numbers as values rather than locators and JS numbers
 *
 * CLOB/NCLOB become strings, BLOB a Buffer and NUMBER its exact decimal text,
 * so rows stay readable once the connection is closed.
 */
export function fetchTypeHandler(metadata: { dbType?: unknown }) {
  switch (metadata.dbType) {
    case oracledb.DB_TYPE_CLOB:
    case oracledb.DB_TYPE_NCLOB:
    case oracledb.DB_TYPE_NUMBER:
      return { type: oracledb.STRING };
    case oracledb.DB_TYPE_BLOB:
      return { type: oracledb.BUFFER };
    default:
      return undefined;
  }
}

let thickClientLibDir: string | undefined;
let thickClientLoaded = false;

/**
 * node-oracledb, fetching rows as arrays
 *
 * Thin mode unless initThickClient is called first; the client libraries can
 * only be loaded once per process.
 */
export const nodeOracleDriver: OracleDriver = {
  initThickClient(libDir) {
    if (thickClientLoaded) {
      if (libDir !== thickClientLibDir) {
        throw new ConfigurationError(
          `Oracle Client already loaded from ${thickClientLibDir ?? 'the default location'}`,
          'libDir'
        );
      }
      return;
    }

    oracledb.initOracleClient(libDir ? { libDir } : {});
    thickClientLoaded = true;
    thickClientLibDir = libDir;
  },

  async getConnection(attributes) {
    const connection = await oracledb.getConnection(attributes);

    return {
      async execute(sql) {
        const result = await connection.execute<unknown[]>(sql, [], {
          outFormat: oracledb.OUT_FORMAT_ARRAY,
          fetchTypeHandler,
        });
        return result.rows ?? [];
      },
      setCallTimeout(ms) {
        connection.callTimeout = ms;
      },
      close: () => connection.close(),
    };
  },
};

/**
 * Build the connect string for a target
 *
 * Direct targets use Easy Connect (`[tcps://]host:port/service`); alias
 * targets pass the alias through for the driver to resolve.
 */
export function buildConnectString(target: ConnectionTarget): string {
  if (target.kind === 'alias') {
    return target.alias;
  }

  const scheme = target.protocol === 'tcps' ? 'tcps://' : '';
  return `${scheme}${target.host}:${target.port}/${target.service}`;
}

export function buildConnectAttributes(config: OracleConnectorConfig): OracleConnectAttributes {
  const attributes: OracleConnectAttributes = {
    user: config.user,
    password: config.password,
    connectString: buildConnectString(config.target),
  };

  if (config.target.kind === 'alias') {
    if (config.target.configDir) {
      attributes.configDir = config.target.configDir;
    }
    // No server DN matching for alias targets
    attributes.sslServerDNMatch = false;
  }

  return attributes;
}

export interface OracleConnectorOptions {
  driver?: OracleDriver;
  logger?: StructuredLogger;
}

/**
 * Connection plus statement handle for one audit run
 *
 * Statements are executed one at a time; the connector is not safe for
 * concurrent use.
 */
export class OracleConnector implements CheckCursor, ManagedConnection {
  private session: OracleSession | null = null;
  private readonly driver: OracleDriver;
  private readonly logger: StructuredLogger;

  constructor(
    private readonly config: OracleConnectorConfig,
    options: OracleConnectorOptions = {}
  ) {
    if (!config.user) {
      throw ConfigurationError.missingRequired('user');
    }

    this.driver = options.driver ?? nodeOracleDriver;
    this.logger = options.logger ?? createComponentLogger('oracle', {
      baseContext: { target: describeTarget(config.target) },
    });
  }

  get isConnected(): boolean {
    return this.session !== null;
  }

  async connect(): Promise<void> {
    if (this.session) {
      return;
    }

    const target = describeTarget(this.config.target);

    if (this.config.thickClient) {
      this.loadThickClient(this.config.thickClient.libDir, target);
    }

    try {
      this.session = await this.driver.getConnection(buildConnectAttributes(this.config));
    } catch (error) {
      this.logger.error('Failed to connect', error, { operation: 'connect' });
      throw new ConnectionError('Failed to connect to Oracle', target, error);
    }

    if (this.config.callTimeout) {
      this.session.setCallTimeout(this.config.callTimeout);
    }

    this.logger.info('Connected', {
      operation: 'connect',
      kind: this.config.target.kind,
      thick: Boolean(this.config.thickClient),
    });
  }

  private loadThickClient(libDir: string | undefined, target: string): void {
    try {
      this.driver.initThickClient(libDir);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      this.logger.error('Failed to load Oracle Client libraries', error, { operation: 'initThickClient' });
      throw new ConnectionError('Failed to load Oracle Client libraries', target, error);
    }
  }

  async execute(sql: string): Promise<ResultRow[]> {
    if (!this.session) {
      throw new ConnectionError('Database connection not available', describeTarget(this.config.target));
    }

    return this.session.execute(sql);
  }

  /**
   * Close the connection; errors are logged, never thrown
   */
  async close(): Promise<void> {
    if (!this.session) {
      return;
    }

    try {
      await this.session.close();
      this.logger.debug('Connection closed', { operation: 'close' });
    } catch (error) {
      this.logger.warn('Error closing Oracle connection', { error: ErrorHandler.getUserMessage(error) });
    } finally {
      this.session = null;
    }
  }
}

/**
 * Open the connection, run `fn` with it and close it on every exit path
 */
export async function withConnection<C extends ManagedConnection, T>(
  connection: C,
  fn: (connection: C) => Promise<T>
): Promise<T> {
  await connection.connect();
  try {
    return await fn(connection);
  } finally {
    await connection.close();
  }
}
