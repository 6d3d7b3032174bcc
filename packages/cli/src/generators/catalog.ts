/**
 * Template catalog
 *
 * Maps (artifact kind, mode) to a pure render function. Every template that
 * needs credentials gets them from the catalog's CredentialSource.
 */

import { MissingRequiredFieldError, UnknownArtifactKindError } from '@lakestack/blueprint';
import type {
  CredentialSource,
  Credentials,
  ResolvedOverlay,
  ResolvedStackConfig,
  StackMode,
} from '@lakestack/blueprint';
import { ARTIFACT_KINDS, isArtifactKind } from './types';
import type { ArtifactCategory, ArtifactKind, RenderTarget } from './types';
import { generateYamlDocument } from './format/yaml';
import { generateComposeConfig, renderComposeFile } from './compose/docker-compose';
import { generateMinioDeployment, generateMinioPvc, generateMinioService } from './k8s/minio';
import { generateNessieDeployment, generateNessieService } from './k8s/nessie';
import {
  generateTrinoCatalogConfigMap,
  generateTrinoDeployment,
  generateTrinoJvmConfigMap,
  generateTrinoServerConfigMap,
  generateTrinoService,
} from './k8s/trino';
import {
  generateArgoApplication,
  generateBaseKustomization,
  generateOverlayKustomization,
} from './k8s/kustomize';
import { renderSetupBucketsScript, renderVerifyScript } from './scripts';
import { renderReadme } from './readme';
import {
  buildCatalogProperties,
  buildJvmOptions,
  buildLogProperties,
  buildNodeProperties,
  buildServerProperties,
  renderCatalogProperties,
  renderJvmConfig,
  renderLogProperties,
  renderNodeProperties,
  renderServerProperties,
} from './trino-config';

interface RenderContext {
  kind: ArtifactKind;
  config: ResolvedStackConfig;
  credentials: Credentials;
  target: RenderTarget;
}

type Template = (ctx: RenderContext) => string;

/**
 * Base manifests in apply order, relative to the base directory
 */
export const BASE_RESOURCES: ReadonlyArray<{ kind: ArtifactKind; path: string }> = [
  { kind: 'minio-deployment', path: 'minio/deployment.yaml' },
  { kind: 'minio-service', path: 'minio/service.yaml' },
  { kind: 'minio-pvc', path: 'minio/pvc.yaml' },
  { kind: 'nessie-deployment', path: 'nessie/deployment.yaml' },
  { kind: 'nessie-service', path: 'nessie/service.yaml' },
  { kind: 'trino-jvm-config', path: 'trino/configmap-jvm.yaml' },
  { kind: 'trino-server-config', path: 'trino/configmap-main.yaml' },
  { kind: 'trino-catalog-config', path: 'trino/configmap-catalog.yaml' },
  { kind: 'trino-deployment', path: 'trino/deployment.yaml' },
  { kind: 'trino-service', path: 'trino/service.yaml' },
];

function manifest(resource: object): string {
  return generateYamlDocument(resource);
}

function requireNamespace({ config, kind }: RenderContext): string {
  if (!config.namespace) {
    throw new MissingRequiredFieldError('namespace', `to render ${kind}`);
  }
  return config.namespace;
}

function requireOverlay({ config, kind, target }: RenderContext): ResolvedOverlay {
  if (!target.overlay) {
    throw new MissingRequiredFieldError('overlay', `to render ${kind}`);
  }
  const overlay = config.overlays.find((o) => o.name === target.overlay);
  if (!overlay) {
    throw new MissingRequiredFieldError(`overlays.${target.overlay}`, `to render ${kind}`);
  }
  return overlay;
}

function primaryOverlay(ctx: RenderContext): ResolvedOverlay {
  const namespace = requireNamespace(ctx);
  const overlay =
    ctx.config.overlays.find((o) => o.namespace === namespace) ?? ctx.config.overlays[0];
  if (!overlay) {
    throw new MissingRequiredFieldError('overlays', `to render ${ctx.kind}`);
  }
  return overlay;
}

// ============================================================================
// Templates
// ============================================================================

const COMPOSE_TEMPLATES: Partial<Record<ArtifactKind, Template>> = {
  'compose-file': ({ config, credentials }) =>
    renderComposeFile(config, generateComposeConfig(config, credentials)),
  'trino-jvm-config': ({ config }) => renderJvmConfig(buildJvmOptions(config.memory)),
  'trino-server-config': ({ config }) => renderServerProperties(buildServerProperties(config)),
  'trino-node-config': () => renderNodeProperties(buildNodeProperties()),
  'trino-log-config': () => renderLogProperties(buildLogProperties()),
  'trino-catalog-config': ({ config, credentials }) =>
    renderCatalogProperties(buildCatalogProperties(config, credentials)),
};

const KUSTOMIZE_TEMPLATES: Partial<Record<ArtifactKind, Template>> = {
  'minio-deployment': ({ config, credentials }) =>
    manifest(generateMinioDeployment(config, credentials)),
  'minio-service': ({ config }) => manifest(generateMinioService(config)),
  'minio-pvc': ({ config }) => manifest(generateMinioPvc(config)),
  'nessie-deployment': ({ config }) => manifest(generateNessieDeployment(config)),
  'nessie-service': ({ config }) => manifest(generateNessieService(config)),
  'trino-jvm-config': ({ config }) => manifest(generateTrinoJvmConfigMap(config)),
  'trino-server-config': ({ config }) => manifest(generateTrinoServerConfigMap(config)),
  'trino-catalog-config': ({ config, credentials }) =>
    manifest(generateTrinoCatalogConfigMap(config, credentials)),
  'trino-deployment': ({ config }) => manifest(generateTrinoDeployment(config)),
  'trino-service': ({ config }) => manifest(generateTrinoService(config)),
  'kustomize-base': () =>
    manifest(generateBaseKustomization(BASE_RESOURCES.map((resource) => resource.path))),
  'kustomize-overlay': (ctx) => manifest(generateOverlayKustomization(requireOverlay(ctx))),
  'argocd-application': (ctx) =>
    manifest(generateArgoApplication(ctx.config, requireOverlay(ctx))),
  'setup-buckets-script': (ctx) => renderSetupBucketsScript(ctx.config, requireNamespace(ctx)),
  'verify-script': (ctx) => renderVerifyScript(requireNamespace(ctx)),
  readme: (ctx) => renderReadme(ctx.config, requireNamespace(ctx), primaryOverlay(ctx)),
};

const TEMPLATES: Record<StackMode, Partial<Record<ArtifactKind, Template>>> = {
  compose: COMPOSE_TEMPLATES,
  kustomize: KUSTOMIZE_TEMPLATES,
};

/**
 * How an artifact of this kind is filed in a plan
 */
export function artifactCategory(kind: ArtifactKind, mode: StackMode): ArtifactCategory {
  switch (kind) {
    case 'compose-file':
      return 'compose-service';
    case 'setup-buckets-script':
    case 'verify-script':
      return 'script';
    case 'readme':
      return 'document';
    case 'trino-jvm-config':
    case 'trino-server-config':
    case 'trino-node-config':
    case 'trino-log-config':
    case 'trino-catalog-config':
      return mode === 'compose' ? 'properties-file' : 'manifest';
    default:
      return 'manifest';
  }
}

// ============================================================================
// Catalog
// ============================================================================

export interface TemplateCatalog {
  readonly credentials: CredentialSource;
  has(kind: string, mode: StackMode): boolean;
  kinds(mode: StackMode): ArtifactKind[];
  render(kind: string, mode: StackMode, config: ResolvedStackConfig, target?: RenderTarget): string;
}

export function createTemplateCatalog(credentials: CredentialSource): TemplateCatalog {
  const lookup = (kind: string, mode: StackMode): Template | undefined =>
    isArtifactKind(kind) ? TEMPLATES[mode][kind] : undefined;

  return {
    credentials,

    has: (kind, mode) => lookup(kind, mode) !== undefined,

    kinds: (mode) => ARTIFACT_KINDS.filter((kind) => TEMPLATES[mode][kind] !== undefined),

    render(kind, mode, config, target = {}) {
      const template = lookup(kind, mode);
      if (!template || !isArtifactKind(kind)) {
        throw new UnknownArtifactKindError(kind, mode);
      }

      const ctx: RenderContext = { kind, config, credentials: credentials.resolve(), target };
      if (mode === 'kustomize') {
        requireNamespace(ctx);
      }
      return template(ctx);
    },
  };
}
