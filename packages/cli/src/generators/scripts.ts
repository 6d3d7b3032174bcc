/**
 * Helper shell scripts for the Kubernetes layout
 */

import { SERVICE_NAMES, endpointUrl } from '@lakestack/blueprint';
import type { ResolvedStackConfig } from '@lakestack/blueprint';

export const SCRIPTS_DIR = 'scripts';
export const SETUP_BUCKETS_SCRIPT = `${SCRIPTS_DIR}/setup-minio-buckets.sh`;
export const VERIFY_SCRIPT = `${SCRIPTS_DIR}/verify-installation.sh`;

const MC_ALIAS = 'lakestack';

/**
 * Quote a value for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function shellScript(description: string, body: string[]): string {
  return (
    [
      '#!/usr/bin/env bash',
      `# ${description}`,
      '# Generated by: lakestack generate',
      'set -euo pipefail',
      '',
      ...body,
    ].join('\n') + '\n'
  );
}

function podLookup(app: string): string {
  return `POD=$(kubectl get pods -n "$NAMESPACE" -l app=${app} -o jsonpath='{.items[0].metadata.name}')`;
}

export function renderSetupBucketsScript(config: ResolvedStackConfig, namespace: string): string {
  const bucket = config.storage.bucket;
  const aliasCommand = `mc alias set ${MC_ALIAS} ${endpointUrl(config.endpoints.objectStore)} "$MINIO_ROOT_USER" "$MINIO_ROOT_PASSWORD"`;

  return shellScript('Create the warehouse bucket in the object store', [
    `NAMESPACE="\${NAMESPACE:-${namespace}}"`,
    podLookup(SERVICE_NAMES.objectStore),
    '',
    '# Credentials are read from the container environment',
    `kubectl exec -n "$NAMESPACE" "$POD" -- sh -c ${shellQuote(aliasCommand)}`,
    `kubectl exec -n "$NAMESPACE" "$POD" -- mc mb --ignore-existing ${MC_ALIAS}/${bucket}`,
    '',
    `echo "Bucket ${bucket} is ready in $NAMESPACE"`,
  ]);
}

export function renderVerifyScript(namespace: string): string {
  return shellScript('Check that the data-lake stack is running', [
    `NAMESPACE="\${NAMESPACE:-${namespace}}"`,
    '',
    'echo "Checking pods in $NAMESPACE..."',
    'kubectl get pods -n "$NAMESPACE"',
    '',
    'echo "Checking services..."',
    'kubectl get svc -n "$NAMESPACE"',
    '',
    'echo "Testing query engine connectivity..."',
    podLookup(SERVICE_NAMES.queryEngine),
    'kubectl exec -n "$NAMESPACE" "$POD" -- trino --execute "SELECT 1"',
  ]);
}
