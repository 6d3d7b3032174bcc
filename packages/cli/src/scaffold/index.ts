/**
 * Workspace scaffolding: plan a layout, then write it to disk
 */

export { planLayout, isSafeRelativePath, collectDirectories } from './planner';
export type { LayoutPlan } from './planner';
export { materialize, assertSafeReset, acquireLock, releaseLock, lockPathFor } from './materializer';
export type { MaterializeOptions, MaterializeResult } from './materializer';
