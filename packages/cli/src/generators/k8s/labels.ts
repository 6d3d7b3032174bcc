/**
 * Shared label helpers for generated manifests
 */

export const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';

/** Pod selector labels */
export function selectorLabels(app: string): Record<string, string> {
  return { app };
}

/** Object labels: the selector plus the managed-by marker */
export function resourceLabels(app: string): Record<string, string> {
  return {
    ...selectorLabels(app),
    [MANAGED_BY_LABEL]: 'lakestack',
  };
}
