/**
 * Service endpoint derivation.
 *
 * The query engine's catalog connector, the Compose services and the Kubernetes
 * Services all take their host names from here, so the catalog URI and the
 * object-store URI always point into the same network.
 */

import { SERVICE_NAMES, SERVICE_PORTS } from './defaults.js';
import type { ServiceEndpoint, ServiceEndpoints, StackMode } from './schema.js';

/**
 * Derive in-network endpoints for a mode.
 * `scope` is the Compose project name or the Kubernetes namespace.
 */
export function deriveEndpoints(mode: StackMode, scope: string): ServiceEndpoints {
  return {
    network: mode === 'compose' ? `compose:${scope}` : `k8s:${scope}`,
    objectStore: { host: SERVICE_NAMES.objectStore, port: SERVICE_PORTS.objectStore },
    objectStoreConsole: { host: SERVICE_NAMES.objectStore, port: SERVICE_PORTS.objectStoreConsole },
    catalog: { host: SERVICE_NAMES.catalog, port: SERVICE_PORTS.catalog },
    queryEngine: { host: SERVICE_NAMES.queryEngine, port: SERVICE_PORTS.queryEngine },
  };
}

/**
 * Same ports, reached from the host through published ports
 */
export function hostEndpoints(endpoints: ServiceEndpoints): ServiceEndpoints {
  const local = (endpoint: ServiceEndpoint): ServiceEndpoint => ({
    host: 'localhost',
    port: endpoint.port,
  });

  return {
    network: 'host',
    objectStore: local(endpoints.objectStore),
    objectStoreConsole: local(endpoints.objectStoreConsole),
    catalog: local(endpoints.catalog),
    queryEngine: local(endpoints.queryEngine),
  };
}

export function endpointUrl(endpoint: ServiceEndpoint, path = ''): string {
  return `http://${endpoint.host}:${endpoint.port}${path}`;
}
