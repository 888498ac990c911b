import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  GoogleSecretManagerStore,
  isSecretReference,
  resolvePassword,
  type SecretStore,
  type SecretVersionAccessor,
} from '../../src/credentials/resolver.js';
import { CredentialError } from '../../src/errors/index.js';

function fakeClient(data: Uint8Array | string | null) {
  return {
    accessSecretVersion: vi.fn().mockResolvedValue([{ payload: { data } }]),
  };
}

describe('resolvePassword', () => {
  it('returns a literal password unchanged without touching the store', async () => {
    const store: SecretStore = { getSecret: vi.fn() };

    await expect(resolvePassword('test-password', { secretStore: store })).resolves.toBe('test-password');
    expect(store.getSecret).not.toHaveBeenCalled();
  });

  it('reads a secret reference from the store', async () => {
    const getSecret = vi.fn().mockResolvedValue('test-secret');

    const password = await resolvePassword('gcp-secret:db-password', { secretStore: { getSecret } });

    expect(password).toBe('test-secret');
    expect(getSecret).toHaveBeenCalledWith('db-password');
  });

  it('creates the store lazily from a factory', async () => {
    const factory = vi.fn(() => ({ getSecret: async () => 'test-secret' }));

    await resolvePassword('plain', { secretStore: factory });
    expect(factory).not.toHaveBeenCalled();

    await expect(resolvePassword('gcp-secret:name', { secretStore: factory })).resolves.toBe('test-secret');
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('rejects a reference that names no secret', async () => {
    await expect(resolvePassword('gcp-secret:', { secretStore: { getSecret: vi.fn() } })).rejects.toBeInstanceOf(
      CredentialError
    );
  });

  it('recognizes secret references by prefix', () => {
    expect(isSecretReference('gcp-secret:x')).toBe(true);
    expect(isSecretReference('secret:x')).toBe(false);
  });
});

describe('GoogleSecretManagerStore', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('requires a project', () => {
    vi.stubEnv('GOOGLE_CLOUD_PROJECT', '');

    expect(() => new GoogleSecretManagerStore({ client: fakeClient('x') })).toThrow(
      'GOOGLE_CLOUD_PROJECT environment variable is not set.'
    );
  });

  it('takes the project from the environment', () => {
    vi.stubEnv('GOOGLE_CLOUD_PROJECT', 'test-project');

    const store = new GoogleSecretManagerStore({ client: fakeClient('x') });

    expect(store.secretVersionPath('db-password')).toBe('projects/test-project/secrets/db-password/versions/latest');
  });

  it('reads the latest version and decodes a binary payload', async () => {
    const client = fakeClient(Buffer.from('test-secret', 'utf8'));
    const store = new GoogleSecretManagerStore({ projectId: 'test-project', client });

    await expect(store.getSecret('db-password')).resolves.toBe('test-secret');
    expect(client.accessSecretVersion).toHaveBeenCalledWith({
      name: 'projects/test-project/secrets/db-password/versions/latest',
    });
  });

  it('returns a string payload as is', async () => {
    const store = new GoogleSecretManagerStore({ projectId: 'test-project', client: fakeClient('test-secret') });

    await expect(store.getSecret('db-password')).resolves.toBe('test-secret');
  });

  it('raises a CredentialError for a secret without payload', async () => {
    const store = new GoogleSecretManagerStore({ projectId: 'test-project', client: fakeClient(null) });

    await expect(store.getSecret('db-password')).rejects.toThrow('Secret db-password has no payload');
  });

  it('wraps lookup failures', async () => {
    const failure = new Error('PERMISSION_DENIED');
    const client: SecretVersionAccessor = { accessSecretVersion: vi.fn().mockRejectedValue(failure) };
    const store = new GoogleSecretManagerStore({ projectId: 'test-project', client });

    const lookup = store.getSecret('db-password');

    await expect(lookup).rejects.toThrow('Failed to read secret db-password from the secret store');
    await expect(lookup).rejects.toMatchObject({ secretName: 'db-password', cause: failure });
  });
});
