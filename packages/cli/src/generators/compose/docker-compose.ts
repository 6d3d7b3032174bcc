/**
 * Docker Compose generator
 * Generates docker-compose.yml for the local data-lake stack
 */

import {
  CONTAINER_NAMES,
  HEALTH_PATHS,
  SERVICE_NAMES,
  endpointUrl,
  hostEndpoints,
} from '@lakestack/blueprint';
import type { Credentials, ResolvedStackConfig, ServiceEndpoint } from '@lakestack/blueprint';
import { generateYamlDocument } from '../format/yaml';
import { TRINO_ETC } from '../trino-config';
import type { DockerComposeConfig, DockerService } from './types';

export const COMPOSE_FILE = 'docker-compose.yml';
export const TRINO_ETC_DIR = 'trino/etc';
export const TRINO_CATALOG_DIR = 'trino/etc/catalog';
export const MINIO_VOLUME = 'minio_data';

/** Compose interpolates `$`; `$$` is a literal dollar */
export function escapeInterpolation(value: string): string {
  return value.replace(/\$/g, '$$$$');
}

function publish(endpoint: ServiceEndpoint): string {
  return `${endpoint.port}:${endpoint.port}`;
}

/**
 * Build the Compose model: three services, Trino waits for both others to be healthy
 */
export function generateComposeConfig(
  config: ResolvedStackConfig,
  credentials: Credentials
): DockerComposeConfig {
  const { endpoints, images } = config;
  // Health checks run inside each container
  const local = hostEndpoints(endpoints);

  const minio: DockerService = {
    image: escapeInterpolation(images.objectStore),
    container_name: CONTAINER_NAMES.objectStore,
    ports: [publish(endpoints.objectStore), publish(endpoints.objectStoreConsole)],
    environment: {
      MINIO_ROOT_USER: escapeInterpolation(credentials.accessKey),
      MINIO_ROOT_PASSWORD: escapeInterpolation(credentials.secretKey),
    },
    command: ['server', '/data', '--console-address', `:${endpoints.objectStoreConsole.port}`],
    volumes: [`${MINIO_VOLUME}:/data`],
    healthcheck: {
      test: ['CMD', 'curl', '-f', endpointUrl(local.objectStore, HEALTH_PATHS.objectStoreLive)],
      interval: '30s',
      timeout: '20s',
      retries: 3,
    },
  };

  const nessie: DockerService = {
    image: escapeInterpolation(images.catalog),
    container_name: CONTAINER_NAMES.catalog,
    ports: [publish(endpoints.catalog)],
    environment: {
      NESSIE_VERSION_STORE_TYPE: 'IN_MEMORY',
    },
    healthcheck: {
      test: ['CMD', 'curl', '-f', endpointUrl(local.catalog, HEALTH_PATHS.catalog)],
      interval: '30s',
      timeout: '10s',
      retries: 3,
    },
  };

  const trino: DockerService = {
    image: escapeInterpolation(images.queryEngine),
    container_name: CONTAINER_NAMES.queryEngine,
    ports: [publish(endpoints.queryEngine)],
    volumes: [`./${TRINO_ETC_DIR}:${TRINO_ETC}:ro`],
    depends_on: {
      [SERVICE_NAMES.objectStore]: { condition: 'service_healthy' },
      [SERVICE_NAMES.catalog]: { condition: 'service_healthy' },
    },
    healthcheck: {
      test: ['CMD-SHELL', HEALTH_PATHS.queryEngineCommand],
      interval: '30s',
      timeout: '10s',
      retries: 5,
      start_period: '60s',
    },
  };

  return {
    version: '3.8',
    services: {
      [SERVICE_NAMES.objectStore]: minio,
      [SERVICE_NAMES.catalog]: nessie,
      [SERVICE_NAMES.queryEngine]: trino,
    },
    volumes: {
      [MINIO_VOLUME]: {},
    },
  };
}

export function renderComposeFile(config: ResolvedStackConfig, compose: DockerComposeConfig): string {
  const cli = config.compose.command.join(' ');
  const header = [
    'lakestack data-lake services',
    'Generated by: lakestack generate',
    '',
    'Usage:',
    `  ${cli} -p ${config.compose.projectName} up -d      Start all services`,
    `  ${cli} -p ${config.compose.projectName} down -v    Stop and remove volumes`,
  ].join('\n');

  return generateYamlDocument(compose, header);
}
