/**
 * Kustomize base/overlay and Argo CD Application generation
 */

import { getApplicationName } from '@lakestack/blueprint';
import type { ResolvedOverlay, ResolvedStackConfig } from '@lakestack/blueprint';
import type { ArgoApplication, Kustomization } from './types';
import { MANAGED_BY_LABEL } from './labels';

export const BASE_DIR = 'base';
export const OVERLAYS_DIR = 'overlays';
export const KUSTOMIZATION_FILE = 'kustomization.yaml';
export const ARGO_APPLICATION_FILE = 'argocd-app.yaml';

export function overlayDir(overlay: string): string {
  return `${OVERLAYS_DIR}/${overlay}`;
}

/**
 * @param resources paths relative to the base directory, in apply order
 */
export function generateBaseKustomization(resources: string[]): Kustomization {
  return {
    apiVersion: 'kustomize.config.k8s.io/v1beta1',
    kind: 'Kustomization',
    resources: [...resources],
  };
}

export function generateOverlayKustomization(overlay: ResolvedOverlay): Kustomization {
  return {
    apiVersion: 'kustomize.config.k8s.io/v1beta1',
    kind: 'Kustomization',
    namespace: overlay.namespace,
    resources: [`../../${BASE_DIR}`],
  };
}

export function generateArgoApplication(
  config: ResolvedStackConfig,
  overlay: ResolvedOverlay
): ArgoApplication {
  const { gitops } = config;

  return {
    apiVersion: 'argoproj.io/v1alpha1',
    kind: 'Application',
    metadata: {
      name: getApplicationName(overlay.namespace),
      namespace: gitops.appNamespace,
      labels: { [MANAGED_BY_LABEL]: 'lakestack' },
    },
    spec: {
      project: gitops.project,
      source: {
        repoURL: gitops.repoUrl,
        targetRevision: gitops.targetRevision,
        path: overlayDir(overlay.name),
      },
      destination: {
        server: gitops.server,
        namespace: overlay.namespace,
      },
      syncPolicy: {
        automated: {
          prune: true,
          selfHeal: true,
        },
        syncOptions: ['CreateNamespace=true'],
      },
    },
  };
}
