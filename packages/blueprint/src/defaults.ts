/**
 * Default values for every optional field of lakestack.config.json
 */

import type {
  ComposeConfig,
  Credentials,
  GitOpsConfig,
  HealthConfig,
  ImageConfig,
  MemoryConfig,
  StackMode,
  StorageConfig,
} from './schema.js';

export const DEFAULT_MODE: StackMode = 'compose';

export const DEFAULT_OUTPUT_DIRS: Record<StackMode, string> = {
  compose: 'trino',
  kustomize: 'trino-k8s-argocd',
};

export const DEFAULT_OVERLAY_NAMES = ['production', 'development'] as const;

export const DEFAULT_CREDENTIALS: Credentials = {
  accessKey: 'minioadmin',
  secretKey: 'minioadmin',
};

export const DEFAULT_MEMORY: MemoryConfig = {
  heapSize: '2G',
  queryMaxMemory: '1GB',
  queryMaxMemoryPerNode: '512MB',
};

export const DEFAULT_STORAGE: StorageConfig = {
  bucket: 'warehouse',
  region: 'us-east-1',
  volumeSize: '10Gi',
};

export const DEFAULT_IMAGES: ImageConfig = {
  objectStore: 'minio/minio:latest',
  catalog: 'projectnessie/nessie:latest',
  queryEngine: 'trinodb/trino:latest',
};

export const DEFAULT_GITOPS: GitOpsConfig = {
  repoUrl: 'https://github.com/your-org/trino-k8s-argocd.git',
  targetRevision: 'HEAD',
  project: 'default',
  server: 'https://kubernetes.default.svc',
  appNamespace: 'argocd',
};

export const DEFAULT_COMPOSE: ComposeConfig = {
  projectName: 'trino',
  command: ['docker', 'compose'],
};

export const DEFAULT_HEALTH: HealthConfig = {
  timeoutSeconds: 180,
  intervalSeconds: 5,
  settleSeconds: 0,
  logTail: 50,
};

/** Service names double as Compose service names and Kubernetes Service names */
export const SERVICE_NAMES = {
  objectStore: 'minio',
  catalog: 'nessie',
  queryEngine: 'trino',
} as const;

export const CONTAINER_NAMES = {
  objectStore: 'trino-minio',
  catalog: 'trino-nessie',
  queryEngine: 'trino-coordinator',
} as const;

export const SERVICE_PORTS = {
  objectStore: 9000,
  objectStoreConsole: 9001,
  catalog: 19120,
  queryEngine: 8080,
} as const;

export const HEALTH_PATHS = {
  objectStoreLive: '/minio/health/live',
  objectStoreReady: '/minio/health/ready',
  catalog: '/api/v1/config',
  catalogApi: '/api/v1',
  queryEngineCommand: '/usr/lib/trino/bin/health-check',
} as const;
