/**
 * Layout planner
 *
 * Turns a resolved config into the full list of artifacts for one mode.
 * Planning is pure; nothing touches the filesystem until materialize().
 */

import * as path from 'path';
import { DuplicateArtifactPathError, assertIdentifier } from '@lakestack/blueprint';
import type { ResolvedStackConfig, StackMode } from '@lakestack/blueprint';
import { BASE_RESOURCES, artifactCategory } from '../generators/catalog';
import type { TemplateCatalog } from '../generators/catalog';
import { COMPOSE_FILE, TRINO_CATALOG_DIR, TRINO_ETC_DIR } from '../generators/compose/docker-compose';
import {
  ARGO_APPLICATION_FILE,
  BASE_DIR,
  KUSTOMIZATION_FILE,
  overlayDir,
} from '../generators/k8s/kustomize';
import { SETUP_BUCKETS_SCRIPT, VERIFY_SCRIPT } from '../generators/scripts';
import { TRINO_FILES } from '../generators/trino-config';
import type { Artifact, ArtifactKind, RenderTarget } from '../generators/types';

export interface LayoutPlan {
  mode: StackMode;
  /** Working directory the plan is written into */
  rootDir: string;
  /** Every parent directory of an artifact, parents before children */
  directories: string[];
  artifacts: Artifact[];
}

interface PlannedArtifact {
  kind: ArtifactKind;
  path: string;
  target?: RenderTarget;
}

const EXECUTABLE_KINDS: ReadonlySet<ArtifactKind> = new Set(['setup-buckets-script', 'verify-script']);

function planCompose(): PlannedArtifact[] {
  return [
    { kind: 'compose-file', path: COMPOSE_FILE },
    { kind: 'trino-jvm-config', path: `${TRINO_ETC_DIR}/${TRINO_FILES.jvm}` },
    { kind: 'trino-server-config', path: `${TRINO_ETC_DIR}/${TRINO_FILES.server}` },
    { kind: 'trino-node-config', path: `${TRINO_ETC_DIR}/${TRINO_FILES.node}` },
    { kind: 'trino-log-config', path: `${TRINO_ETC_DIR}/${TRINO_FILES.log}` },
    { kind: 'trino-catalog-config', path: `${TRINO_CATALOG_DIR}/${TRINO_FILES.catalog}` },
  ];
}

function planKustomize(config: ResolvedStackConfig): PlannedArtifact[] {
  const planned: PlannedArtifact[] = [
    { kind: 'kustomize-base', path: `${BASE_DIR}/${KUSTOMIZATION_FILE}` },
    ...BASE_RESOURCES.map((resource) => ({
      kind: resource.kind,
      path: `${BASE_DIR}/${resource.path}`,
    })),
  ];

  for (const overlay of config.overlays) {
    assertIdentifier(overlay.name, 'overlay name');
    const dir = overlayDir(overlay.name);
    planned.push(
      { kind: 'kustomize-overlay', path: `${dir}/${KUSTOMIZATION_FILE}`, target: { overlay: overlay.name } },
      { kind: 'argocd-application', path: `${dir}/${ARGO_APPLICATION_FILE}`, target: { overlay: overlay.name } }
    );
  }

  planned.push(
    { kind: 'setup-buckets-script', path: SETUP_BUCKETS_SCRIPT },
    { kind: 'verify-script', path: VERIFY_SCRIPT },
    { kind: 'readme', path: 'README.md' }
  );

  return planned;
}

/**
 * Relative, normalized, forward-slash paths only
 */
export function isSafeRelativePath(filePath: string): boolean {
  return (
    filePath.length > 0 &&
    !path.posix.isAbsolute(filePath) &&
    !filePath.includes('\\') &&
    path.posix.normalize(filePath) === filePath &&
    filePath !== '..' &&
    !filePath.startsWith('../')
  );
}

/**
 * Parent directories of every artifact, in first-seen order with parents first
 */
export function collectDirectories(paths: string[]): string[] {
  const directories: string[] = [];
  const seen = new Set<string>();

  for (const filePath of paths) {
    const parts = filePath.split('/').slice(0, -1);
    for (let i = 1; i <= parts.length; i++) {
      const dir = parts.slice(0, i).join('/');
      if (!seen.has(dir)) {
        seen.add(dir);
        directories.push(dir);
      }
    }
  }

  return directories;
}

export function planLayout(
  config: ResolvedStackConfig,
  catalog: TemplateCatalog,
  mode: StackMode = config.mode
): LayoutPlan {
  const planned = mode === 'compose' ? planCompose() : planKustomize(config);
  const seen = new Set<string>();
  const artifacts: Artifact[] = [];

  for (const entry of planned) {
    if (!isSafeRelativePath(entry.path)) {
      throw new Error(`Artifact path must be relative and normalized: ${entry.path}`);
    }
    if (seen.has(entry.path)) {
      throw new DuplicateArtifactPathError(entry.path);
    }
    seen.add(entry.path);

    artifacts.push({
      path: entry.path,
      content: catalog.render(entry.kind, mode, config, entry.target),
      kind: entry.kind,
      category: artifactCategory(entry.kind, mode),
      executable: EXECUTABLE_KINDS.has(entry.kind),
    });
  }

  return {
    mode,
    rootDir: config.outputDir,
    directories: collectDirectories(artifacts.map((artifact) => artifact.path)),
    artifacts,
  };
}
