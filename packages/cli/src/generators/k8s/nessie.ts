/**
 * Catalog service (Nessie) manifests
 */

import { HEALTH_PATHS, SERVICE_NAMES } from '@lakestack/blueprint';
import type { ResolvedStackConfig } from '@lakestack/blueprint';
import type { K8sDeployment, K8sService } from './types';
import { resourceLabels, selectorLabels } from './labels';

export function generateNessieDeployment(config: ResolvedStackConfig): K8sDeployment {
  const name = SERVICE_NAMES.catalog;
  const port = config.endpoints.catalog.port;

  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: {
      name,
      labels: resourceLabels(name),
    },
    spec: {
      replicas: 1,
      selector: {
        matchLabels: selectorLabels(name),
      },
      template: {
        metadata: {
          labels: selectorLabels(name),
        },
        spec: {
          containers: [
            {
              name,
              image: config.images.catalog,
              ports: [{ containerPort: port }],
              // Catalog state does not survive a restart
              env: [{ name: 'NESSIE_VERSION_STORE_TYPE', value: 'IN_MEMORY' }],
              readinessProbe: {
                httpGet: { path: HEALTH_PATHS.catalog, port },
                initialDelaySeconds: 5,
                periodSeconds: 10,
              },
            },
          ],
        },
      },
    },
  };
}

export function generateNessieService(config: ResolvedStackConfig): K8sService {
  const name = SERVICE_NAMES.catalog;
  const port = config.endpoints.catalog.port;

  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name,
      labels: resourceLabels(name),
    },
    spec: {
      selector: selectorLabels(name),
      ports: [{ port, targetPort: port }],
    },
  };
}
