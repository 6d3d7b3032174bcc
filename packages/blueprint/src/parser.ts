/**
 * Lakestack Blueprint Parser
 * Reads, validates and resolves lakestack.config.json
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import {
  DEFAULT_COMPOSE,
  DEFAULT_CREDENTIALS,
  DEFAULT_GITOPS,
  DEFAULT_HEALTH,
  DEFAULT_IMAGES,
  DEFAULT_MEMORY,
  DEFAULT_MODE,
  DEFAULT_OUTPUT_DIRS,
  DEFAULT_OVERLAY_NAMES,
  DEFAULT_STORAGE,
} from './defaults.js';
import { deriveEndpoints } from './endpoints.js';
import { ConfigNotFoundError, ConfigValidationError } from './errors.js';
import { getOverlayNamespace, isValidComposeProjectName, isValidIdentifier } from './naming.js';
import {
  STACK_MODES,
  type OverlayConfig,
  type ResolvedOverlay,
  type ResolvedStackConfig,
  type StackConfig,
  type StackMode,
  type ValidationError,
  type ValidationResult,
} from './schema.js';

export const CONFIG_DIR = '.lakestack';
export const CONFIG_FILENAME = 'lakestack.config.json';

const CONFIG_CANDIDATES = [
  `${CONFIG_DIR}/${CONFIG_FILENAME}`,
  CONFIG_FILENAME,
  '.lakestack.json',
];

const HEAP_SIZE = /^\d+[KMG]$/;
const DATA_SIZE = /^\d+(B|kB|MB|GB|TB)$/;
const QUANTITY = /^\d+(Ki|Mi|Gi|Ti)$/;

const IDENTIFIER_MESSAGE =
  'must be lowercase alphanumeric with hyphens, start and end with an alphanumeric, 1-63 chars';

/**
 * Find the config file in the given directory
 */
export function findConfigFile(dir: string): string | null {
  for (const candidate of CONFIG_CANDIDATES) {
    const filepath = resolve(dir, candidate);
    if (existsSync(filepath)) {
      return filepath;
    }
  }
  return null;
}

/**
 * Parse the config file from a path
 */
export function parseConfig(configPath: string): StackConfig {
  if (!existsSync(configPath)) {
    throw new ConfigNotFoundError(configPath);
  }

  const content = readFileSync(configPath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON in config file: ${reason}`);
  }

  return readStackConfig(parsed);
}

/**
 * Parse config from a directory (auto-discovers config file).
 * Returns an empty config when no file exists, so every field takes its default.
 */
export function parseConfigFromDir(dir: string): StackConfig {
  const configPath = findConfigFile(dir);
  return configPath ? parseConfig(configPath) : {};
}

// =============================================================================
// Structural reading
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStackMode(value: unknown): value is StackMode {
  return typeof value === 'string' && STACK_MODES.some((mode) => mode === value);
}

function readStringFields<K extends string>(
  raw: unknown,
  path: string,
  keys: readonly K[],
  errors: ValidationError[]
): Partial<Record<K, string>> | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    errors.push({ path, message: 'must be an object', value: raw });
    return undefined;
  }

  const result: Partial<Record<K, string>> = {};
  for (const key of keys) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string') {
      errors.push({ path: path ? `${path}.${key}` : key, message: 'must be a string', value });
      continue;
    }
    result[key] = value;
  }
  return result;
}

function readNumberFields<K extends string>(
  raw: unknown,
  path: string,
  keys: readonly K[],
  errors: ValidationError[]
): Partial<Record<K, number>> | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    errors.push({ path, message: 'must be an object', value: raw });
    return undefined;
  }

  const result: Partial<Record<K, number>> = {};
  for (const key of keys) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'number') {
      errors.push({ path: `${path}.${key}`, message: 'must be a number', value });
      continue;
    }
    result[key] = value;
  }
  return result;
}

function readOverlays(raw: unknown, errors: ValidationError[]): OverlayConfig[] | undefined {
  if (raw === undefined) return undefined;
  if (!Array.isArray(raw)) {
    errors.push({ path: 'overlays', message: 'must be an array', value: raw });
    return undefined;
  }

  const overlays: OverlayConfig[] = [];
  raw.forEach((item: unknown, i) => {
    const fields = readStringFields(item, `overlays[${i}]`, ['name', 'namespace'] as const, errors);
    if (!fields) return;
    if (fields.name === undefined) {
      errors.push({ path: `overlays[${i}].name`, message: 'name is required' });
      return;
    }
    overlays.push({ name: fields.name, namespace: fields.namespace });
  });
  return overlays;
}

function readCommand(raw: unknown, errors: ValidationError[]): string[] | undefined {
  if (raw === undefined) return undefined;
  if (!Array.isArray(raw) || !raw.every((part): part is string => typeof part === 'string')) {
    errors.push({ path: 'compose.command', message: 'must be an array of strings', value: raw });
    return undefined;
  }
  return raw;
}

/**
 * Turn parsed JSON into a StackConfig, rejecting fields of the wrong type
 */
export function readStackConfig(raw: unknown): StackConfig {
  const errors: ValidationError[] = [];

  if (!isRecord(raw)) {
    throw new ConfigValidationError([{ path: '', message: 'config must be a JSON object' }]);
  }

  const config: StackConfig = {};

  if (raw.mode !== undefined) {
    if (isStackMode(raw.mode)) {
      config.mode = raw.mode;
    } else {
      errors.push({ path: 'mode', message: `mode must be one of: ${STACK_MODES.join(', ')}`, value: raw.mode });
    }
  }

  const top = readStringFields(raw, '', ['outputDir', 'namespace'] as const, errors);
  if (top?.outputDir !== undefined) config.outputDir = top.outputDir;
  if (top?.namespace !== undefined) config.namespace = top.namespace;

  config.overlays = readOverlays(raw.overlays, errors);
  config.credentials = readStringFields(raw.credentials, 'credentials', ['accessKey', 'secretKey'] as const, errors);
  config.memory = readStringFields(
    raw.memory,
    'memory',
    ['heapSize', 'queryMaxMemory', 'queryMaxMemoryPerNode'] as const,
    errors
  );
  config.storage = readStringFields(raw.storage, 'storage', ['bucket', 'region', 'volumeSize'] as const, errors);
  config.images = readStringFields(raw.images, 'images', ['objectStore', 'catalog', 'queryEngine'] as const, errors);
  config.gitops = readStringFields(
    raw.gitops,
    'gitops',
    ['repoUrl', 'targetRevision', 'project', 'server', 'appNamespace'] as const,
    errors
  );
  config.health = readNumberFields(
    raw.health,
    'health',
    ['timeoutSeconds', 'intervalSeconds', 'settleSeconds', 'logTail'] as const,
    errors
  );

  if (raw.compose !== undefined) {
    const compose = readStringFields(raw.compose, 'compose', ['projectName'] as const, errors);
    const command = isRecord(raw.compose) ? readCommand(raw.compose.command, errors) : undefined;
    config.compose = { ...compose, ...(command ? { command } : {}) };
  }

  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }

  return config;
}

/**
 * Layer overrides (CLI flags) on top of a base config
 */
export function mergeConfig(base: StackConfig, overrides: StackConfig): StackConfig {
  return {
    ...base,
    ...dropUndefined({
      mode: overrides.mode,
      outputDir: overrides.outputDir,
      namespace: overrides.namespace,
      overlays: overrides.overlays,
    }),
    credentials: { ...base.credentials, ...overrides.credentials },
    memory: { ...base.memory, ...overrides.memory },
    storage: { ...base.storage, ...overrides.storage },
    images: { ...base.images, ...overrides.images },
    gitops: { ...base.gitops, ...overrides.gitops },
    compose: { ...base.compose, ...overrides.compose },
    health: { ...base.health, ...overrides.health },
  };
}

function dropUndefined(values: Partial<StackConfig>): Partial<StackConfig> {
  const result: Partial<StackConfig> = {};
  if (values.mode !== undefined) result.mode = values.mode;
  if (values.outputDir !== undefined) result.outputDir = values.outputDir;
  if (values.namespace !== undefined) result.namespace = values.namespace;
  if (values.overlays !== undefined) result.overlays = values.overlays;
  return result;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate the entire config
 */
export function validateConfig(config: StackConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const mode = config.mode ?? DEFAULT_MODE;

  if (!isStackMode(mode)) {
    errors.push({ path: 'mode', message: `mode must be one of: ${STACK_MODES.join(', ')}`, value: mode });
    return { valid: false, errors };
  }

  if (config.outputDir !== undefined && config.outputDir.trim() === '') {
    errors.push({ path: 'outputDir', message: 'outputDir must not be empty' });
  }

  if (mode === 'kustomize') {
    validateKubernetes(config, errors);
  }

  validateCredentials(config, errors);
  validateMemory(config, errors);
  validateStorage(config, errors);
  validateCompose(config, errors);
  validateHealth(config, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

function validateKubernetes(config: StackConfig, errors: ValidationError[]): void {
  if (!config.namespace) {
    errors.push({ path: 'namespace', message: 'namespace is required in kustomize mode' });
    return;
  }

  if (!isValidIdentifier(config.namespace)) {
    errors.push({ path: 'namespace', message: `namespace ${IDENTIFIER_MESSAGE}`, value: config.namespace });
    return;
  }

  const overlays = resolveOverlays(config.namespace, config.overlays);
  const names = new Set<string>();
  const namespaces = new Set<string>();

  if (config.overlays !== undefined && config.overlays.length === 0) {
    errors.push({ path: 'overlays', message: 'at least one overlay is required' });
  }

  overlays.forEach((overlay, i) => {
    const path = `overlays[${i}]`;
    if (!isValidIdentifier(overlay.name)) {
      errors.push({ path: `${path}.name`, message: `overlay name ${IDENTIFIER_MESSAGE}`, value: overlay.name });
    } else if (names.has(overlay.name)) {
      errors.push({ path: `${path}.name`, message: 'overlay names must be unique', value: overlay.name });
    }
    names.add(overlay.name);

    if (!isValidIdentifier(overlay.namespace)) {
      errors.push({ path: `${path}.namespace`, message: `namespace ${IDENTIFIER_MESSAGE}`, value: overlay.namespace });
    } else if (namespaces.has(overlay.namespace)) {
      errors.push({ path: `${path}.namespace`, message: 'overlay namespaces must be unique', value: overlay.namespace });
    }
    namespaces.add(overlay.namespace);
  });

  if (overlays.length > 0 && !namespaces.has(config.namespace)) {
    errors.push({
      path: 'namespace',
      message: 'namespace must match the namespace of one of the overlays',
      value: config.namespace,
    });
  }

  const appNamespace = config.gitops?.appNamespace;
  if (appNamespace !== undefined && !isValidIdentifier(appNamespace)) {
    errors.push({ path: 'gitops.appNamespace', message: `namespace ${IDENTIFIER_MESSAGE}`, value: appNamespace });
  }
}

function validateCredentials(config: StackConfig, errors: ValidationError[]): void {
  const accessKey = config.credentials?.accessKey;
  const secretKey = config.credentials?.secretKey;

  if (accessKey !== undefined && accessKey.length < 3) {
    errors.push({ path: 'credentials.accessKey', message: 'accessKey must be at least 3 characters' });
  }

  if (secretKey !== undefined && secretKey.length < 8) {
    errors.push({ path: 'credentials.secretKey', message: 'secretKey must be at least 8 characters' });
  }
}

function validateMemory(config: StackConfig, errors: ValidationError[]): void {
  const memory = config.memory;
  if (!memory) return;

  if (memory.heapSize !== undefined && !HEAP_SIZE.test(memory.heapSize)) {
    errors.push({ path: 'memory.heapSize', message: 'heapSize must be a JVM size like 2G or 512M', value: memory.heapSize });
  }

  for (const key of ['queryMaxMemory', 'queryMaxMemoryPerNode'] as const) {
    const value = memory[key];
    if (value !== undefined && !DATA_SIZE.test(value)) {
      errors.push({ path: `memory.${key}`, message: `${key} must be a data size like 1GB or 512MB`, value });
    }
  }
}

function validateStorage(config: StackConfig, errors: ValidationError[]): void {
  const storage = config.storage;
  if (!storage) return;

  if (storage.bucket !== undefined && !/^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/.test(storage.bucket)) {
    errors.push({
      path: 'storage.bucket',
      message: 'bucket name must be 3-63 chars, lowercase alphanumeric with dots/hyphens',
      value: storage.bucket,
    });
  }

  if (storage.volumeSize !== undefined && !QUANTITY.test(storage.volumeSize)) {
    errors.push({ path: 'storage.volumeSize', message: 'volumeSize must be a quantity like 10Gi', value: storage.volumeSize });
  }
}

function validateCompose(config: StackConfig, errors: ValidationError[]): void {
  const projectName = config.compose?.projectName;
  if (projectName !== undefined && !isValidComposeProjectName(projectName)) {
    errors.push({
      path: 'compose.projectName',
      message: 'projectName must be lowercase alphanumeric with hyphens/underscores',
      value: projectName,
    });
  }

  const command = config.compose?.command;
  if (command !== undefined && command.length === 0) {
    errors.push({ path: 'compose.command', message: 'command must not be empty' });
  }
}

function validateHealth(config: StackConfig, errors: ValidationError[]): void {
  const health = config.health;
  if (!health) return;

  for (const key of ['timeoutSeconds', 'intervalSeconds', 'logTail'] as const) {
    const value = health[key];
    if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
      errors.push({ path: `health.${key}`, message: `${key} must be a positive integer`, value });
    }
  }

  const settle = health.settleSeconds;
  if (settle !== undefined && (!Number.isInteger(settle) || settle < 0)) {
    errors.push({ path: 'health.settleSeconds', message: 'settleSeconds must be a non-negative integer', value: settle });
  }
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Expand overlays: the first one defaults to the primary namespace,
 * the others to ${stem}-${name}.
 */
export function resolveOverlays(namespace: string, overlays?: OverlayConfig[]): ResolvedOverlay[] {
  const declared: OverlayConfig[] =
    overlays ?? DEFAULT_OVERLAY_NAMES.map((name) => ({ name }));

  return declared.map((overlay, i) => ({
    name: overlay.name,
    namespace: overlay.namespace ?? (i === 0 ? namespace : getOverlayNamespace(namespace, overlay.name)),
  }));
}

/**
 * Validate a config and fill every default
 */
export function resolveConfig(config: StackConfig): ResolvedStackConfig {
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigValidationError(validation.errors);
  }

  const mode = config.mode ?? DEFAULT_MODE;
  const compose = {
    projectName: config.compose?.projectName ?? DEFAULT_COMPOSE.projectName,
    command: config.compose?.command ?? [...DEFAULT_COMPOSE.command],
  };
  const namespace = mode === 'kustomize' ? config.namespace ?? null : null;
  const overlays = namespace ? resolveOverlays(namespace, config.overlays) : [];

  return {
    mode,
    outputDir: config.outputDir ?? DEFAULT_OUTPUT_DIRS[mode],
    namespace,
    overlays,
    credentials: { ...DEFAULT_CREDENTIALS, ...config.credentials },
    memory: { ...DEFAULT_MEMORY, ...config.memory },
    storage: { ...DEFAULT_STORAGE, ...config.storage },
    images: { ...DEFAULT_IMAGES, ...config.images },
    gitops: { ...DEFAULT_GITOPS, ...config.gitops },
    compose,
    health: { ...DEFAULT_HEALTH, ...config.health },
    endpoints: deriveEndpoints(mode, namespace ?? compose.projectName),
  };
}
