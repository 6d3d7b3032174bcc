/**
 * Naming rules for namespaces, overlays and Compose projects.
 *
 * All identifier checks go through these functions so the parser,
 * the layout planner and the CLI prompts agree on what is valid.
 */

import { InvalidIdentifierError } from './errors.js';

const DNS_LABEL = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;
const COMPOSE_PROJECT = /^[a-z0-9][a-z0-9_-]*$/;
const PRODUCTION_SUFFIX = '-production';

/**
 * Check a Kubernetes DNS-1123 label (namespaces, overlay directory names).
 */
export function isValidIdentifier(value: string): boolean {
  return value.length > 0 && value.length <= 63 && DNS_LABEL.test(value);
}

export function assertIdentifier(value: string, what: string): void {
  if (!isValidIdentifier(value)) {
    throw new InvalidIdentifierError(value, what);
  }
}

export function isValidComposeProjectName(value: string): boolean {
  return COMPOSE_PROJECT.test(value);
}

/**
 * Namespace stem shared by all overlays.
 * Pattern: trino-production -> trino
 */
export function getNamespaceStem(namespace: string): string {
  return namespace.endsWith(PRODUCTION_SUFFIX)
    ? namespace.slice(0, -PRODUCTION_SUFFIX.length)
    : namespace;
}

/**
 * Namespace for an overlay that does not declare one.
 * Pattern: ${stem}-${overlayName}
 */
export function getOverlayNamespace(primaryNamespace: string, overlayName: string): string {
  return `${getNamespaceStem(primaryNamespace)}-${overlayName}`;
}

/**
 * Argo CD Application name for an overlay.
 * Pattern: the overlay's namespace
 */
export function getApplicationName(overlayNamespace: string): string {
  return overlayNamespace;
}
