/**
 * Lakestack Blueprint Schema
 * TypeScript interfaces for lakestack.config.json
 */

// =============================================================================
// Modes
// =============================================================================

export type StackMode = 'compose' | 'kustomize';

export const STACK_MODES: readonly StackMode[] = ['compose', 'kustomize'];

// =============================================================================
// Config Sections
// =============================================================================

export interface Credentials {
  accessKey: string;
  secretKey: string;
}

export interface MemoryConfig {
  /** Query engine JVM heap, rendered as -Xmx<heapSize> */
  heapSize: string;
  queryMaxMemory: string;
  queryMaxMemoryPerNode: string;
}

export interface StorageConfig {
  bucket: string;
  region: string;
  /** Size requested by the object store's PersistentVolumeClaim */
  volumeSize: string;
}

export interface ImageConfig {
  objectStore: string;
  catalog: string;
  queryEngine: string;
}

export interface GitOpsConfig {
  repoUrl: string;
  targetRevision: string;
  project: string;
  server: string;
  appNamespace: string;
}

export interface ComposeConfig {
  projectName: string;
  /** Compose invocation, e.g. ['docker', 'compose'] or ['docker-compose'] */
  command: string[];
}

export interface HealthConfig {
  timeoutSeconds: number;
  intervalSeconds: number;
  settleSeconds: number;
  logTail: number;
}

export interface OverlayConfig {
  name: string;
  namespace?: string;
}

export interface ResolvedOverlay {
  name: string;
  namespace: string;
}

// =============================================================================
// Root Config
// =============================================================================

/**
 * Shape of lakestack.config.json. Every field is optional; missing values are
 * filled from defaults by resolveConfig().
 */
export interface StackConfig {
  mode?: StackMode;
  outputDir?: string;
  namespace?: string;
  overlays?: OverlayConfig[];
  credentials?: Partial<Credentials>;
  memory?: Partial<MemoryConfig>;
  storage?: Partial<StorageConfig>;
  images?: Partial<ImageConfig>;
  gitops?: Partial<GitOpsConfig>;
  compose?: Partial<ComposeConfig>;
  health?: Partial<HealthConfig>;
}

// =============================================================================
// Endpoints
// =============================================================================

export interface ServiceEndpoint {
  host: string;
  port: number;
}

export interface ServiceEndpoints {
  /** compose:<project> or k8s:<namespace> */
  network: string;
  objectStore: ServiceEndpoint;
  objectStoreConsole: ServiceEndpoint;
  catalog: ServiceEndpoint;
  queryEngine: ServiceEndpoint;
}

// =============================================================================
// Resolved Config
// =============================================================================

export interface ResolvedStackConfig {
  mode: StackMode;
  outputDir: string;
  /** Primary namespace; null in compose mode */
  namespace: string | null;
  overlays: ResolvedOverlay[];
  credentials: Credentials;
  memory: MemoryConfig;
  storage: StorageConfig;
  images: ImageConfig;
  gitops: GitOpsConfig;
  compose: ComposeConfig;
  health: HealthConfig;
  endpoints: ServiceEndpoints;
}

// =============================================================================
// Validation
// =============================================================================

export interface ValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}
