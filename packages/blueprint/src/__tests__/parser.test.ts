import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import {
  findConfigFile,
  parseConfig,
  parseConfigFromDir,
  readStackConfig,
  mergeConfig,
  validateConfig,
  resolveOverlays,
  resolveConfig,
} from '../parser';
import { ConfigNotFoundError, ConfigValidationError } from '../errors';
import type { StackConfig } from '../schema';

async function createTempDir(): Promise<string> {
  const tempDir = path.join(tmpdir(), `lakestack-parser-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(tempDir, { recursive: true });
  return tempDir;
}

async function cleanupTempDir(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

describe('validateConfig', () => {
  describe('mode validation', () => {
    it('should pass an empty config (compose defaults)', () => {
      const result = validateConfig({});

      expect(result.valid).toBe(true);
      expect(result.errors).toHaveLength(0);
    });

    it('should require namespace in kustomize mode', () => {
      const result = validateConfig({ mode: 'kustomize' });

      expect(result.valid).toBe(false);
      expect(result.errors).toContainEqual({
        path: 'namespace',
        message: 'namespace is required in kustomize mode',
      });
    });

    it('should not require namespace in compose mode', () => {
      const result = validateConfig({ mode: 'compose' });

      expect(result.valid).toBe(true);
    });
  });

  describe('identifier validation', () => {
    it('should reject an invalid namespace', () => {
      const result = validateConfig({ mode: 'kustomize', namespace: 'Trino_Prod' });

      expect(result.valid).toBe(false);
      expect(result.errors.some((e) => e.path === 'namespace' && e.message.includes('lowercase'))).toBe(true);
    });

    it('should reject invalid overlay names', () => {
      const result = validateConfig({
        mode: 'kustomize',
        namespace: 'lake-production',
        overlays: [{ name: 'production' }, { name: 'Staging!' }],
      });

      expect(result.valid).toBe(false);
      expect(result.errors.some((e) => e.path === 'overlays[1].name')).toBe(true);
    });

    it('should reject duplicate overlay names', () => {
      const result = validateConfig({
        mode: 'kustomize',
        namespace: 'lake',
        overlays: [
          { name: 'prod', namespace: 'lake' },
          { name: 'prod', namespace: 'lake-other' },
        ],
      });

      expect(result.errors).toContainEqual({
        path: 'overlays[1].name',
        message: 'overlay names must be unique',
        value: 'prod',
      });
    });

    it('should require the primary namespace to belong to an overlay', () => {
      const result = validateConfig({
        mode: 'kustomize',
        namespace: 'lake',
        overlays: [{ name: 'prod', namespace: 'lake-prod' }],
      });

      expect(result.errors.some((e) => e.path === 'namespace' && e.message.includes('one of the overlays'))).toBe(
        true
      );
    });

    it('should reject an empty overlay list', () => {
      const result = validateConfig({ mode: 'kustomize', namespace: 'lake', overlays: [] });

      expect(result.errors).toContainEqual({ path: 'overlays', message: 'at least one overlay is required' });
    });
  });

  describe('value validation', () => {
    it('should reject a short secret key', () => {
      const result = validateConfig({ credentials: { secretKey: 'short' } });

      expect(result.errors).toContainEqual({
        path: 'credentials.secretKey',
        message: 'secretKey must be at least 8 characters',
      });
    });

    it('should reject malformed memory sizes', () => {
      const result = validateConfig({ memory: { heapSize: '2GB', queryMaxMemory: 'lots' } });

      expect(result.errors.map((e) => e.path)).toEqual(['memory.heapSize', 'memory.queryMaxMemory']);
    });

    it('should accept well-formed memory sizes', () => {
      const result = validateConfig({
        memory: { heapSize: '4G', queryMaxMemory: '2GB', queryMaxMemoryPerNode: '1GB' },
      });

      expect(result.valid).toBe(true);
    });

    it('should reject a bad compose project name', () => {
      const result = validateConfig({ compose: { projectName: 'My Project' } });

      expect(result.errors.some((e) => e.path === 'compose.projectName')).toBe(true);
    });

    it('should reject non-positive health settings', () => {
      const result = validateConfig({ health: { timeoutSeconds: 0, settleSeconds: -1 } });

      expect(result.errors.map((e) => e.path)).toEqual(['health.timeoutSeconds', 'health.settleSeconds']);
    });

    it('should reject an invalid bucket name', () => {
      const result = validateConfig({ storage: { bucket: 'No_Caps' } });

      expect(result.errors.some((e) => e.path === 'storage.bucket')).toBe(true);
    });
  });
});

describe('resolveOverlays', () => {
  it('should derive production and development from the primary namespace', () => {
    expect(resolveOverlays('trino-production')).toEqual([
      { name: 'production', namespace: 'trino-production' },
      { name: 'development', namespace: 'trino-development' },
    ]);
  });

  it('should append the overlay name when the namespace has no production suffix', () => {
    expect(resolveOverlays('analytics')).toEqual([
      { name: 'production', namespace: 'analytics' },
      { name: 'development', namespace: 'analytics-development' },
    ]);
  });

  it('should keep explicit overlay namespaces', () => {
    expect(
      resolveOverlays('lake', [
        { name: 'prod', namespace: 'lake' },
        { name: 'qa', namespace: 'lake-qa-env' },
      ])
    ).toEqual([
      { name: 'prod', namespace: 'lake' },
      { name: 'qa', namespace: 'lake-qa-env' },
    ]);
  });
});

describe('resolveConfig', () => {
  it('should fill compose defaults', () => {
    const resolved = resolveConfig({});

    expect(resolved.mode).toBe('compose');
    expect(resolved.outputDir).toBe('trino');
    expect(resolved.namespace).toBeNull();
    expect(resolved.overlays).toEqual([]);
    expect(resolved.credentials).toEqual({ accessKey: 'minioadmin', secretKey: 'minioadmin' });
    expect(resolved.memory).toEqual({ heapSize: '2G', queryMaxMemory: '1GB', queryMaxMemoryPerNode: '512MB' });
    expect(resolved.compose).toEqual({ projectName: 'trino', command: ['docker', 'compose'] });
    expect(resolved.endpoints.network).toBe('compose:trino');
    expect(resolved.endpoints.objectStore).toEqual({ host: 'minio', port: 9000 });
  });

  it('should fill kustomize defaults', () => {
    const resolved = resolveConfig({ mode: 'kustomize', namespace: 'trino-production' });

    expect(resolved.outputDir).toBe('trino-k8s-argocd');
    expect(resolved.namespace).toBe('trino-production');
    expect(resolved.overlays.map((o) => o.namespace)).toEqual(['trino-production', 'trino-development']);
    expect(resolved.endpoints.network).toBe('k8s:trino-production');
  });

  it('should keep partial overrides and default the rest', () => {
    const resolved = resolveConfig({
      memory: { heapSize: '4G' },
      storage: { bucket: 'lake' },
    });

    expect(resolved.memory).toEqual({ heapSize: '4G', queryMaxMemory: '1GB', queryMaxMemoryPerNode: '512MB' });
    expect(resolved.storage).toEqual({ bucket: 'lake', region: 'us-east-1', volumeSize: '10Gi' });
  });

  it('should throw ConfigValidationError with every error', () => {
    const config: StackConfig = { mode: 'kustomize', credentials: { secretKey: 'x' } };

    try {
      resolveConfig(config);
      expect.unreachable('resolveConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.code).toBe('CONFIG_INVALID');
        expect(error.errors.map((e) => e.path)).toEqual(['namespace', 'credentials.secretKey']);
      }
    }
  });
});

describe('readStackConfig', () => {
  it('should reject a non-object document', () => {
    expect(() => readStackConfig([1, 2])).toThrow(ConfigValidationError);
  });

  it('should reject fields of the wrong type', () => {
    try {
      readStackConfig({ mode: 'swarm', namespace: 42, health: { timeoutSeconds: '10' } });
      expect.unreachable('readStackConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.errors.map((e) => e.path)).toEqual(['mode', 'namespace', 'health.timeoutSeconds']);
      }
    }
  });

  it('should read a complete document', () => {
    const config = readStackConfig({
      mode: 'kustomize',
      namespace: 'lake',
      overlays: [{ name: 'prod', namespace: 'lake' }],
      compose: { projectName: 'lake', command: ['docker-compose'] },
    });

    expect(config.mode).toBe('kustomize');
    expect(config.overlays).toEqual([{ name: 'prod', namespace: 'lake' }]);
    expect(config.compose).toEqual({ projectName: 'lake', command: ['docker-compose'] });
  });
});

describe('mergeConfig', () => {
  it('should let overrides win and keep base sections', () => {
    const merged = mergeConfig(
      { mode: 'compose', memory: { heapSize: '4G' }, storage: { bucket: 'lake' } },
      { mode: 'kustomize', namespace: 'lake', memory: { queryMaxMemory: '2GB' } }
    );

    expect(merged.mode).toBe('kustomize');
    expect(merged.namespace).toBe('lake');
    expect(merged.memory).toEqual({ heapSize: '4G', queryMaxMemory: '2GB' });
    expect(merged.storage).toEqual({ bucket: 'lake' });
  });

  it('should not erase base values with missing overrides', () => {
    const merged = mergeConfig({ namespace: 'lake', outputDir: 'out' }, {});

    expect(merged.namespace).toBe('lake');
    expect(merged.outputDir).toBe('out');
  });
});

describe('config files', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should find the config inside .lakestack first', async () => {
    await fs.mkdir(path.join(tempDir, '.lakestack'), { recursive: true });
    await fs.writeFile(path.join(tempDir, '.lakestack', 'lakestack.config.json'), '{}');
    await fs.writeFile(path.join(tempDir, 'lakestack.config.json'), '{}');

    expect(findConfigFile(tempDir)).toBe(path.join(tempDir, '.lakestack', 'lakestack.config.json'));
  });

  it('should return null when no config exists', () => {
    expect(findConfigFile(tempDir)).toBeNull();
  });

  it('should parse a config file', async () => {
    const configPath = path.join(tempDir, 'lakestack.config.json');
    await fs.writeFile(configPath, JSON.stringify({ mode: 'kustomize', namespace: 'lake' }));

    expect(parseConfig(configPath)).toMatchObject({ mode: 'kustomize', namespace: 'lake' });
  });

  it('should throw ConfigNotFoundError for a missing file', () => {
    expect(() => parseConfig(path.join(tempDir, 'missing.json'))).toThrow(ConfigNotFoundError);
  });

  it('should report invalid JSON', async () => {
    const configPath = path.join(tempDir, 'lakestack.config.json');
    await fs.writeFile(configPath, '{ not json');

    expect(() => parseConfig(configPath)).toThrow(/Invalid JSON in config file/);
  });

  it('should fall back to an empty config for a directory without one', () => {
    expect(parseConfigFromDir(tempDir)).toEqual({});
  });
});
