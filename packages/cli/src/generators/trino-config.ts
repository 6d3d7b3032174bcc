/**
 * Query engine configuration records
 *
 * Both modes render the same records: Compose writes them as files under
 * trino/etc, Kustomize embeds them in ConfigMaps mounted at /etc/trino.
 */

import { endpointUrl, HEALTH_PATHS } from '@lakestack/blueprint';
import type { Credentials, MemoryConfig, ResolvedStackConfig } from '@lakestack/blueprint';
import { toJvmConfig, toProperties } from './format/properties';

export const TRINO_FILES = {
  jvm: 'jvm.config',
  server: 'config.properties',
  node: 'node.properties',
  log: 'log.properties',
  catalog: 'iceberg.properties',
} as const;

/** Mount points inside the query engine container */
export const TRINO_ETC = '/etc/trino';
export const TRINO_CATALOG_ETC = '/etc/trino/catalog';

const JVM_TUNING_OPTIONS = [
  '-XX:+UseG1GC',
  '-XX:G1HeapRegionSize=32M',
  '-XX:+ExplicitGCInvokesConcurrent',
  '-XX:+ExitOnOutOfMemoryError',
  '-XX:+HeapDumpOnOutOfMemoryError',
  '-XX:-OmitStackTraceInFastThrow',
  '-XX:ReservedCodeCacheSize=512M',
  '-XX:PerMethodRecompilationCutoff=10000',
  '-XX:PerBytecodeRecompilationCutoff=10000',
  '-Djdk.attach.allowAttachSelf=true',
  '-Djdk.nio.maxCachedBufferSize=2000000',
  '-XX:+UnlockDiagnosticVMOptions',
  '-XX:+UseAESCTRIntrinsics',
] as const;

// ============================================================================
// Records
// ============================================================================

export interface TrinoServerProperties {
  coordinator: boolean;
  includeCoordinator: boolean;
  httpPort: number;
  queryMaxMemory: string;
  queryMaxMemoryPerNode: string;
  discoveryUri: string;
}

export interface TrinoNodeProperties {
  environment: string;
  nodeId: string;
  dataDir: string;
}

export type TrinoLogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type TrinoLogProperties = Record<string, TrinoLogLevel>;

export interface IcebergCatalogProperties {
  nessieUri: string;
  warehouseDir: string;
  s3Endpoint: string;
  s3AccessKey: string;
  s3SecretKey: string;
  s3PathStyleAccess: boolean;
  s3Region: string;
}

export function buildJvmOptions(memory: MemoryConfig): string[] {
  return ['-server', `-Xmx${memory.heapSize}`, ...JVM_TUNING_OPTIONS];
}

/**
 * Single-node cluster: the coordinator also schedules work and discovers itself
 */
export function buildServerProperties(config: ResolvedStackConfig): TrinoServerProperties {
  const httpPort = config.endpoints.queryEngine.port;
  return {
    coordinator: true,
    includeCoordinator: true,
    httpPort,
    queryMaxMemory: config.memory.queryMaxMemory,
    queryMaxMemoryPerNode: config.memory.queryMaxMemoryPerNode,
    discoveryUri: `http://localhost:${httpPort}`,
  };
}

export function buildNodeProperties(): TrinoNodeProperties {
  return {
    environment: 'demo',
    nodeId: 'trino-demo',
    dataDir: '/data/trino',
  };
}

export function buildLogProperties(): TrinoLogProperties {
  return { 'io.trino': 'INFO' };
}

/**
 * Connector URIs come from the derived endpoints only
 */
export function buildCatalogProperties(
  config: ResolvedStackConfig,
  credentials: Credentials
): IcebergCatalogProperties {
  return {
    nessieUri: endpointUrl(config.endpoints.catalog, HEALTH_PATHS.catalogApi),
    warehouseDir: `s3://${config.storage.bucket}/`,
    s3Endpoint: endpointUrl(config.endpoints.objectStore),
    s3AccessKey: credentials.accessKey,
    s3SecretKey: credentials.secretKey,
    s3PathStyleAccess: true,
    s3Region: config.storage.region,
  };
}

// ============================================================================
// Rendering
// ============================================================================

export function renderJvmConfig(options: readonly string[]): string {
  return toJvmConfig(options);
}

export function renderServerProperties(props: TrinoServerProperties): string {
  return toProperties({
    coordinator: props.coordinator,
    'node-scheduler.include-coordinator': props.includeCoordinator,
    'http-server.http.port': props.httpPort,
    'query.max-memory': props.queryMaxMemory,
    'query.max-memory-per-node': props.queryMaxMemoryPerNode,
    'discovery.uri': props.discoveryUri,
  });
}

export function renderNodeProperties(props: TrinoNodeProperties): string {
  return toProperties({
    'node.environment': props.environment,
    'node.id': props.nodeId,
    'node.data-dir': props.dataDir,
  });
}

export function renderLogProperties(props: TrinoLogProperties): string {
  return toProperties(props);
}

export function renderCatalogProperties(props: IcebergCatalogProperties): string {
  return toProperties({
    'connector.name': 'iceberg',
    'iceberg.catalog.type': 'nessie',
    'iceberg.nessie-catalog.uri': props.nessieUri,
    'iceberg.nessie-catalog.default-warehouse-dir': props.warehouseDir,
    'fs.hadoop.enabled': false,
    'fs.native-s3.enabled': true,
    's3.endpoint': props.s3Endpoint,
    's3.aws-access-key': props.s3AccessKey,
    's3.aws-secret-key': props.s3SecretKey,
    's3.path-style-access': props.s3PathStyleAccess,
    's3.region': props.s3Region,
  });
}
