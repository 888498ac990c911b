/**
 * Password resolution
 *
 * A password of the form `gcp-secret:<name>` is read from Google Secret
 * Manager (latest version of `<name>` in the GOOGLE_CLOUD_PROJECT project);
 * any other value is used as given.
 *
 * @license MIT
 */

import { SecretManagerServiceClient } from '@google-cloud/secret-manager';
import { CredentialError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../observability/logger.js';

export const SECRET_REFERENCE_PREFIX = 'gcp-secret:';

export const PROJECT_ENV_VARIABLE = 'GOOGLE_CLOUD_PROJECT';

/**
 * Source of named secrets
 */
export interface SecretStore {
  getSecret(name: string): Promise<string>;
}

/**
 * The part of the Secret Manager client the store uses
 */
export interface SecretVersionAccessor {
  accessSecretVersion(request: { name: string }): Promise<
    [{ payload?: { data?: Uint8Array | string | null } | null }, ...unknown[]]
  >;
}

export interface GoogleSecretStoreOptions {
  /** Defaults to the GOOGLE_CLOUD_PROJECT environment variable */
  projectId?: string;
  /** Defaults to a SecretManagerServiceClient using application default credentials */
  client?: SecretVersionAccessor;
}

/**
 * Secret store backed by Google Secret Manager
 */
export class GoogleSecretManagerStore implements SecretStore {
  private readonly projectId: string;
  private client: SecretVersionAccessor | undefined;

  constructor(options: GoogleSecretStoreOptions = {}) {
    const projectId = options.projectId ?? process.env[PROJECT_ENV_VARIABLE];
    if (!projectId) {
      throw CredentialError.missingProject(PROJECT_ENV_VARIABLE);
    }
    this.projectId = projectId;
    this.client = options.client;
  }

  secretVersionPath(name: string): string {
    return `projects/${this.projectId}/secrets/${name}/versions/latest`;
  }

  async getSecret(name: string): Promise<string> {
    const client = this.getClient();
    let data: Uint8Array | string | null | undefined;

    try {
      const [version] = await client.accessSecretVersion({ name: this.secretVersionPath(name) });
      data = version.payload?.data;
    } catch (error) {
      throw CredentialError.lookupFailed(name, error);
    }

    if (data === null || data === undefined) {
      throw CredentialError.emptySecret(name);
    }

    return typeof data === 'string' ? data : Buffer.from(data).toString('utf8');
  }

  private getClient(): SecretVersionAccessor {
    if (!this.client) {
      this.client = new SecretManagerServiceClient();
    }
    return this.client;
  }
}

export interface ResolvePasswordOptions {
  /** Store used for secret references; created on demand when omitted */
  secretStore?: SecretStore | (() => SecretStore);
  logger?: StructuredLogger;
}

export function isSecretReference(value: string): boolean {
  return value.startsWith(SECRET_REFERENCE_PREFIX);
}

/**
 * Resolve a password argument to the password itself
 */
export async function resolvePassword(
  value: string,
  options: ResolvePasswordOptions = {}
): Promise<string> {
  if (!isSecretReference(value)) {
    return value;
  }

  const secretName = value.slice(SECRET_REFERENCE_PREFIX.length);
  if (!secretName) {
    throw new CredentialError(`Secret reference "${SECRET_REFERENCE_PREFIX}" names no secret`);
  }

  const logger = options.logger ?? createComponentLogger('credentials');
  const store = typeof options.secretStore === 'function'
    ? options.secretStore()
    : options.secretStore ?? new GoogleSecretManagerStore();

  logger.info('Resolving password from secret store', { name: secretName });
  return store.getSecret(secretName);
}
