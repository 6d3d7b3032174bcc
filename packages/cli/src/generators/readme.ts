/**
 * README for the Kubernetes layout
 */

import { SERVICE_NAMES } from '@lakestack/blueprint';
import type { ResolvedOverlay, ResolvedStackConfig, ServiceEndpoint } from '@lakestack/blueprint';
import { ARGO_APPLICATION_FILE, overlayDir } from './k8s/kustomize';
import { SETUP_BUCKETS_SCRIPT, VERIFY_SCRIPT } from './scripts';

function portForward(namespace: string, service: string, endpoint: ServiceEndpoint): string {
  return `kubectl port-forward -n ${namespace} svc/${service} ${endpoint.port}:${endpoint.port}`;
}

export function renderReadme(
  config: ResolvedStackConfig,
  namespace: string,
  primary: ResolvedOverlay
): string {
  const { endpoints, gitops } = config;
  const overlayLines = config.overlays.map(
    (overlay) => `- \`${overlayDir(overlay.name)}/\` deploys into \`${overlay.namespace}\``
  );

  const lines = [
    '# Trino + Nessie + MinIO on Kubernetes',
    '',
    'Generated by `lakestack generate`. Re-running the command replaces this directory.',
    '',
    '## Layout',
    '',
    '- `base/` holds the MinIO, Nessie and Trino manifests',
    ...overlayLines,
    '',
    '## Deploy with kubectl',
    '',
    '```bash',
    `kubectl apply -k ${overlayDir(primary.name)}`,
    '```',
    '',
    '## Deploy with Argo CD',
    '',
    `Push this directory to \`${gitops.repoUrl}\` (revision \`${gitops.targetRevision}\`), then:`,
    '',
    '```bash',
    `kubectl apply -f ${overlayDir(primary.name)}/${ARGO_APPLICATION_FILE}`,
    '```',
    '',
    '## After deployment',
    '',
    '```bash',
    `./${SETUP_BUCKETS_SCRIPT}`,
    `./${VERIFY_SCRIPT}`,
    '```',
    '',
    `Both scripts default to \`${namespace}\`; set \`NAMESPACE\` to target another overlay.`,
    '',
    '## Access',
    '',
    '```bash',
    portForward(namespace, SERVICE_NAMES.queryEngine, endpoints.queryEngine),
    portForward(namespace, SERVICE_NAMES.objectStore, endpoints.objectStoreConsole),
    portForward(namespace, SERVICE_NAMES.catalog, endpoints.catalog),
    '```',
  ];

  return lines.join('\n') + '\n';
}
