/**
 * Artifact types shared by the template catalog and the layout planner
 */

export const ARTIFACT_KINDS = [
  'minio-deployment',
  'minio-service',
  'minio-pvc',
  'nessie-deployment',
  'nessie-service',
  'trino-jvm-config',
  'trino-server-config',
  'trino-node-config',
  'trino-log-config',
  'trino-catalog-config',
  'trino-deployment',
  'trino-service',
  'compose-file',
  'kustomize-base',
  'kustomize-overlay',
  'argocd-application',
  'setup-buckets-script',
  'verify-script',
  'readme',
] as const;

export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

export type ArtifactCategory =
  | 'manifest'
  | 'compose-service'
  | 'properties-file'
  | 'script'
  | 'document';

export interface Artifact {
  /** Relative to the working directory, forward slashes */
  path: string;
  content: string;
  kind: ArtifactKind;
  category: ArtifactCategory;
  executable: boolean;
}

export interface RenderTarget {
  /** Overlay name, for per-overlay kinds */
  overlay?: string;
}

export function isArtifactKind(value: string): value is ArtifactKind {
  return ARTIFACT_KINDS.some((kind) => kind === value);
}
