/**
 * Artifact generators for both deployment modes
 */

export { createTemplateCatalog, artifactCategory, BASE_RESOURCES } from './catalog';
export type { TemplateCatalog } from './catalog';
export { ARTIFACT_KINDS, isArtifactKind } from './types';
export type { Artifact, ArtifactKind, ArtifactCategory, RenderTarget } from './types';
export { toYaml, generateYamlDocument, formatYamlString } from './format/yaml';
export { toProperties, toJvmConfig } from './format/properties';
