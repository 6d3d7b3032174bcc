import { describe, it, expect } from 'vitest';
import { deriveEndpoints, hostEndpoints, endpointUrl } from '../endpoints';
import { staticCredentials, envCredentials } from '../credentials';

describe('deriveEndpoints', () => {
  it('should use service names on the compose network', () => {
    const endpoints = deriveEndpoints('compose', 'trino');

    expect(endpoints.network).toBe('compose:trino');
    expect(endpointUrl(endpoints.objectStore)).toBe('http://minio:9000');
    expect(endpointUrl(endpoints.catalog, '/api/v1')).toBe('http://nessie:19120/api/v1');
    expect(endpointUrl(endpoints.queryEngine)).toBe('http://trino:8080');
  });

  it('should scope kubernetes endpoints to the namespace', () => {
    const endpoints = deriveEndpoints('kustomize', 'trino-production');

    expect(endpoints.network).toBe('k8s:trino-production');
    expect(endpoints.objectStoreConsole).toEqual({ host: 'minio', port: 9001 });
  });
});

describe('hostEndpoints', () => {
  it('should keep ports and switch hosts to localhost', () => {
    const local = hostEndpoints(deriveEndpoints('compose', 'trino'));

    expect(local.network).toBe('host');
    expect(endpointUrl(local.catalog)).toBe('http://localhost:19120');
    expect(endpointUrl(local.queryEngine)).toBe('http://localhost:8080');
  });
});

describe('credential sources', () => {
  it('should return a copy of static credentials', () => {
    const source = staticCredentials({ accessKey: 'test-user', secretKey: 'test-secret' });
    const first = source.resolve();
    first.accessKey = 'changed';

    expect(source.resolve()).toEqual({ accessKey: 'test-user', secretKey: 'test-secret' });
    expect(source.description).toBe('configuration');
  });

  it('should prefer environment values', () => {
    const source = envCredentials(
      { accessKey: 'test-user', secretKey: 'test-secret' },
      { LAKESTACK_S3_ACCESS_KEY: 'env-user', LAKESTACK_S3_SECRET_KEY: 'env-secret' }
    );

    expect(source.resolve()).toEqual({ accessKey: 'env-user', secretKey: 'env-secret' });
    expect(source.description).toContain('environment');
  });

  it('should fall back per field', () => {
    const source = envCredentials(
      { accessKey: 'test-user', secretKey: 'test-secret' },
      { LAKESTACK_S3_SECRET_KEY: 'env-secret' }
    );

    expect(source.resolve()).toEqual({ accessKey: 'test-user', secretKey: 'env-secret' });
  });

  it('should use the fallback when the environment is empty', () => {
    const source = envCredentials({ accessKey: 'test-user', secretKey: 'test-secret' }, {});

    expect(source.resolve()).toEqual({ accessKey: 'test-user', secretKey: 'test-secret' });
    expect(source.description).toBe('configuration');
  });
});
