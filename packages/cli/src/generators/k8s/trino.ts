/**
 * Query engine (Trino) manifests
 */

import { HEALTH_PATHS, SERVICE_NAMES } from '@lakestack/blueprint';
import type { Credentials, ResolvedStackConfig } from '@lakestack/blueprint';
import type { K8sConfigMap, K8sDeployment, K8sService, K8sVolumeMount } from './types';
import { resourceLabels, selectorLabels } from './labels';
import {
  TRINO_CATALOG_ETC,
  TRINO_ETC,
  TRINO_FILES,
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
} from '../trino-config';

export const TRINO_CONFIG_MAPS = {
  jvm: 'trino-jvm-config',
  server: 'trino-config',
  catalog: 'trino-catalog-config',
} as const;

const VOLUMES = {
  jvm: 'jvm-config',
  server: 'trino-config',
  catalog: 'catalog-config',
} as const;

function configMap(name: string, data: Record<string, string>): K8sConfigMap {
  return {
    apiVersion: 'v1',
    kind: 'ConfigMap',
    metadata: {
      name,
      labels: resourceLabels(SERVICE_NAMES.queryEngine),
    },
    data,
  };
}

export function generateTrinoJvmConfigMap(config: ResolvedStackConfig): K8sConfigMap {
  return configMap(TRINO_CONFIG_MAPS.jvm, {
    [TRINO_FILES.jvm]: renderJvmConfig(buildJvmOptions(config.memory)),
  });
}

/**
 * Server, node and log properties share one ConfigMap
 */
export function generateTrinoServerConfigMap(config: ResolvedStackConfig): K8sConfigMap {
  return configMap(TRINO_CONFIG_MAPS.server, {
    [TRINO_FILES.server]: renderServerProperties(buildServerProperties(config)),
    [TRINO_FILES.node]: renderNodeProperties(buildNodeProperties()),
    [TRINO_FILES.log]: renderLogProperties(buildLogProperties()),
  });
}

export function generateTrinoCatalogConfigMap(
  config: ResolvedStackConfig,
  credentials: Credentials
): K8sConfigMap {
  return configMap(TRINO_CONFIG_MAPS.catalog, {
    [TRINO_FILES.catalog]: renderCatalogProperties(buildCatalogProperties(config, credentials)),
  });
}

function fileMount(volume: string, dir: string, file: string): K8sVolumeMount {
  return { name: volume, mountPath: `${dir}/${file}`, subPath: file };
}

export function generateTrinoDeployment(config: ResolvedStackConfig): K8sDeployment {
  const name = SERVICE_NAMES.queryEngine;
  const port = config.endpoints.queryEngine.port;

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
              image: config.images.queryEngine,
              ports: [{ containerPort: port }],
              volumeMounts: [
                fileMount(VOLUMES.jvm, TRINO_ETC, TRINO_FILES.jvm),
                fileMount(VOLUMES.server, TRINO_ETC, TRINO_FILES.server),
                fileMount(VOLUMES.server, TRINO_ETC, TRINO_FILES.node),
                fileMount(VOLUMES.server, TRINO_ETC, TRINO_FILES.log),
                fileMount(VOLUMES.catalog, TRINO_CATALOG_ETC, TRINO_FILES.catalog),
              ],
              readinessProbe: {
                exec: { command: [HEALTH_PATHS.queryEngineCommand] },
                initialDelaySeconds: 60,
                periodSeconds: 30,
              },
            },
          ],
          volumes: [
            { name: VOLUMES.jvm, configMap: { name: TRINO_CONFIG_MAPS.jvm } },
            { name: VOLUMES.server, configMap: { name: TRINO_CONFIG_MAPS.server } },
            { name: VOLUMES.catalog, configMap: { name: TRINO_CONFIG_MAPS.catalog } },
          ],
        },
      },
    },
  };
}

export function generateTrinoService(config: ResolvedStackConfig): K8sService {
  const name = SERVICE_NAMES.queryEngine;
  const port = config.endpoints.queryEngine.port;

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
