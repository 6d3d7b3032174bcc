/**
 * Object store (MinIO) manifests
 */

import { HEALTH_PATHS, SERVICE_NAMES } from '@lakestack/blueprint';
import type { Credentials, ResolvedStackConfig } from '@lakestack/blueprint';
import type { K8sDeployment, K8sPersistentVolumeClaim, K8sService } from './types';
import { resourceLabels, selectorLabels } from './labels';

export const MINIO_PVC_NAME = 'minio-pvc';
const DATA_VOLUME = 'minio-data';

/** Kubernetes expands `$(VAR)` in env values; `$$(` keeps it literal */
export function escapeEnvReference(value: string): string {
  return value.replace(/\$\(/g, '$$$$(');
}

export function generateMinioDeployment(
  config: ResolvedStackConfig,
  credentials: Credentials
): K8sDeployment {
  const name = SERVICE_NAMES.objectStore;
  const apiPort = config.endpoints.objectStore.port;
  const consolePort = config.endpoints.objectStoreConsole.port;

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
              image: config.images.objectStore,
              args: ['server', '/data', '--console-address', `:${consolePort}`],
              env: [
                { name: 'MINIO_ROOT_USER', value: escapeEnvReference(credentials.accessKey) },
                { name: 'MINIO_ROOT_PASSWORD', value: escapeEnvReference(credentials.secretKey) },
              ],
              ports: [
                { containerPort: apiPort, name: 'api' },
                { containerPort: consolePort, name: 'console' },
              ],
              volumeMounts: [{ name: DATA_VOLUME, mountPath: '/data' }],
              readinessProbe: {
                httpGet: { path: HEALTH_PATHS.objectStoreReady, port: apiPort },
                initialDelaySeconds: 5,
                periodSeconds: 10,
              },
            },
          ],
          volumes: [
            {
              name: DATA_VOLUME,
              persistentVolumeClaim: { claimName: MINIO_PVC_NAME },
            },
          ],
        },
      },
    },
  };
}

export function generateMinioService(config: ResolvedStackConfig): K8sService {
  const name = SERVICE_NAMES.objectStore;
  const apiPort = config.endpoints.objectStore.port;
  const consolePort = config.endpoints.objectStoreConsole.port;

  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name,
      labels: resourceLabels(name),
    },
    spec: {
      selector: selectorLabels(name),
      ports: [
        { name: 'api', port: apiPort, targetPort: apiPort },
        { name: 'console', port: consolePort, targetPort: consolePort },
      ],
    },
  };
}

export function generateMinioPvc(config: ResolvedStackConfig): K8sPersistentVolumeClaim {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: {
      name: MINIO_PVC_NAME,
      labels: resourceLabels(SERVICE_NAMES.objectStore),
    },
    spec: {
      accessModes: ['ReadWriteOnce'],
      resources: {
        requests: { storage: config.storage.volumeSize },
      },
    },
  };
}
