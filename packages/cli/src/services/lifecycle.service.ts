/**
 * Compose environment lifecycle
 *
 * absent -> cleaning -> materializing -> starting -> verifying -> ready | failed
 *
 * Cleanup is best effort and classified per step; start failures are fatal and
 * carry the orchestrator's exit code; verification problems are warnings.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  CONTAINER_NAMES,
  InvalidTransitionError,
  SERVICE_NAMES,
  endpointUrl,
  hostEndpoints,
} from '@lakestack/blueprint';
import type {
  CredentialSource,
  Credentials,
  ResolvedStackConfig,
  ServiceEndpoints,
} from '@lakestack/blueprint';
import { createTemplateCatalog } from '../generators/catalog';
import { planLayout } from '../scaffold/planner';
import { acquireLock, assertSafeReset, materialize, releaseLock } from '../scaffold/materializer';
import { logInfo, logWarn } from '../logger';
import { classifyCleanup, outputTail, runCommand } from './command.service';
import type { CleanupOutcome, CommandResult, CommandRunner } from './command.service';
import { createComposeClient, createDockerClient } from './docker.service';
import type { ComposeClient, DockerClient } from './docker.service';
import { SERVICE_LABELS, createHealthVerifier, sleep } from './health.service';
import type { FetchLike, HealthStatus, HealthVerifier, StackService, WaitResult } from './health.service';

export type LifecycleState =
  | 'absent'
  | 'cleaning'
  | 'materializing'
  | 'starting'
  | 'verifying'
  | 'ready'
  | 'failed';

export const VALID_LIFECYCLE_TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  absent: ['cleaning'],
  cleaning: ['absent', 'materializing', 'failed'],
  materializing: ['starting', 'failed'],
  starting: ['verifying', 'failed'],
  verifying: ['ready', 'failed'],
  ready: ['cleaning'],
  failed: ['cleaning'],
};

export interface LifecycleHooks {
  onTransition?: (from: LifecycleState, to: LifecycleState) => void;
  onLog?: (message: string) => void;
  onWarn?: (message: string) => void;
}

export interface LifecycleDeps {
  runner?: CommandRunner;
  compose?: ComposeClient;
  docker?: DockerClient;
  health?: HealthVerifier;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  /** Base for the relative output directory */
  cwd?: string;
}

export interface CleanupStep {
  step: string;
  outcome: CleanupOutcome;
}

export interface CleanupReport {
  steps: CleanupStep[];
  warnings: string[];
  /** What cleanup deliberately leaves in place */
  notes: string[];
}

export interface LifecycleReport {
  state: 'ready' | 'failed';
  exitCode: number;
  failedAt?: LifecycleState;
  error?: string;
  logs?: string;
  health: HealthStatus[];
  warnings: string[];
  /** Host-side URLs of the running services */
  endpoints: ServiceEndpoints;
}

/** Alias name for the object-store client inside its container */
const MC_ALIAS = 'local';

class PhaseFailure extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
    readonly logs?: string
  ) {
    super(message);
    this.name = 'PhaseFailure';
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class EnvironmentLifecycle {
  private current: LifecycleState = 'absent';
  private warnings: string[] = [];
  private readonly projectDir: string;
  private readonly compose: ComposeClient;
  private readonly docker: DockerClient;
  private readonly health: HealthVerifier;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    private readonly config: ResolvedStackConfig,
    private readonly credentials: CredentialSource,
    private readonly hooks: LifecycleHooks = {},
    private readonly deps: LifecycleDeps = {}
  ) {
    const runner = deps.runner ?? runCommand;
    this.projectDir = path.resolve(deps.cwd ?? process.cwd(), config.outputDir);
    this.compose =
      deps.compose ??
      createComposeClient({
        command: config.compose.command,
        projectName: config.compose.projectName,
        projectDir: this.projectDir,
        runner,
      });
    this.docker = deps.docker ?? createDockerClient({ runner });
    this.health =
      deps.health ??
      createHealthVerifier(config, {
        compose: this.compose,
        fetch: deps.fetch,
        sleep: deps.sleep,
        now: deps.now,
      });
    this.wait = deps.sleep ?? sleep;
  }

  get state(): LifecycleState {
    return this.current;
  }

  private transition(to: LifecycleState): void {
    const from = this.current;
    if (!VALID_LIFECYCLE_TRANSITIONS[from].includes(to)) {
      throw new InvalidTransitionError(from, to);
    }
    this.current = to;
    logInfo(`Lifecycle ${from} -> ${to}`);
    this.hooks.onTransition?.(from, to);
  }

  /**
   * Hold the workspace lock for a whole phase sequence
   */
  private async withLock<T>(body: () => Promise<T>): Promise<T> {
    const lockPath = await acquireLock(this.projectDir);
    try {
      return await body();
    } finally {
      await releaseLock(lockPath);
    }
  }

  private log(message: string): void {
    logInfo(message);
    this.hooks.onLog?.(message);
  }

  private warn(message: string): void {
    logWarn(message);
    this.warnings.push(message);
    this.hooks.onWarn?.(message);
  }

  // ==========================================================================
  // Cleaning
  // ==========================================================================

  private record(steps: CleanupStep[], step: string, result: CommandResult): void {
    const outcome = classifyCleanup(result);
    steps.push({ step, outcome });

    if (outcome === 'done') {
      this.log(`${step}: done`);
    } else if (outcome === 'absent') {
      this.log(`${step}: nothing to remove`);
    } else {
      const detail = outputTail(result, 3) || `exit code ${result.exitCode}`;
      this.warn(`${step} did not complete: ${detail}`);
    }
  }

  private async removeProjectDir(steps: CleanupStep[]): Promise<void> {
    const step = `Remove ${this.projectDir}`;
    try {
      await fs.access(this.projectDir);
    } catch {
      steps.push({ step, outcome: 'absent' });
      this.log(`${step}: nothing to remove`);
      return;
    }

    // Refusing an unsafe directory is fatal, not a degraded cleanup
    assertSafeReset(this.projectDir, this.deps.cwd ?? process.cwd());
    try {
      await fs.rm(this.projectDir, { recursive: true, force: true });
      steps.push({ step, outcome: 'done' });
      this.log(`${step}: done`);
    } catch (error) {
      steps.push({ step, outcome: 'degraded' });
      this.warn(`${step} did not complete: ${errorMessage(error)}`);
    }
  }

  private async runCleaning(): Promise<CleanupStep[]> {
    const steps: CleanupStep[] = [];

    this.record(steps, 'Stop compose project', await this.compose.down());

    const images = [this.config.images.objectStore, this.config.images.catalog, this.config.images.queryEngine];
    for (const image of images) {
      const listed = await this.docker.containersByImage(image);
      if (!listed.result.ok) {
        this.record(steps, `List containers of ${image}`, listed.result);
        continue;
      }
      this.record(steps, `Remove containers of ${image}`, await this.docker.removeContainers(listed.items));
    }

    const volumes = await this.docker.danglingVolumes(this.config.compose.projectName);
    if (!volumes.result.ok) {
      this.record(steps, 'List dangling volumes', volumes.result);
    } else {
      this.record(steps, 'Remove dangling volumes', await this.docker.removeVolumes(volumes.items));
    }

    await this.removeProjectDir(steps);
    return steps;
  }

  private cleanupNotes(): string[] {
    return [
      `Dangling volumes outside compose project ${this.config.compose.projectName} are left alone; run docker volume prune to remove them`,
    ];
  }

  /**
   * Run only the cleaning phase
   */
  async clean(): Promise<CleanupReport> {
    this.warnings = [];
    this.transition('cleaning');

    let steps: CleanupStep[];
    try {
      steps = await this.withLock(() => this.runCleaning());
    } catch (error) {
      this.transition('failed');
      throw error;
    }

    this.transition('absent');
    return { steps, warnings: [...this.warnings], notes: this.cleanupNotes() };
  }

  // ==========================================================================
  // Starting & verifying
  // ==========================================================================

  private waitOptions(): { timeoutMs: number; intervalMs: number } {
    return {
      timeoutMs: this.config.health.timeoutSeconds * 1000,
      intervalMs: this.config.health.intervalSeconds * 1000,
    };
  }

  private async start(): Promise<void> {
    const up = await this.compose.up();
    if (!up.ok) {
      const logs = await this.compose.logs(undefined, this.config.health.logTail);
      const captured = [outputTail(up, this.config.health.logTail), outputTail(logs, this.config.health.logTail)]
        .filter(Boolean)
        .join('\n');
      throw new PhaseFailure(`compose up failed with exit code ${up.exitCode}`, up.exitCode, captured);
    }
    this.log('Services started');

    if (this.config.health.settleSeconds > 0) {
      await this.wait(this.config.health.settleSeconds * 1000);
    }

    for (const service of ['objectStore', 'catalog'] as const) {
      const result = await this.health.waitFor(service, this.waitOptions());
      await this.reportWait(result);
    }
  }

  private async recentLogs(service: StackService): Promise<string> {
    const logs = await this.compose.logs(SERVICE_NAMES[service], this.config.health.logTail);
    return outputTail(logs, this.config.health.logTail);
  }

  private async reportWait(result: WaitResult): Promise<void> {
    const label = SERVICE_LABELS[result.service];
    if (result.outcome === 'healthy') {
      this.log(`${label} is healthy`);
      return;
    }

    const tail = await this.recentLogs(result.service);
    const message = `${label} is not healthy (${result.outcome}): ${result.status.detail}`;
    this.warn(tail ? `${message}\nRecent ${label} logs:\n${tail}` : message);
  }

  /**
   * Create the warehouse bucket, falling back to a plain data directory
   */
  private async createBucket(): Promise<void> {
    const { bucket } = this.config.storage;
    const container = SERVICE_NAMES.objectStore;
    const inContainer = endpointUrl(hostEndpoints(this.config.endpoints).objectStore);

    // Credentials come from the container environment, not the command line
    const alias = await this.compose.exec(container, [
      'sh',
      '-c',
      `mc alias set ${MC_ALIAS} ${inContainer} "$MINIO_ROOT_USER" "$MINIO_ROOT_PASSWORD"`,
    ]);
    const created = alias.ok
      ? await this.compose.exec(container, ['mc', 'mb', '--ignore-existing', `${MC_ALIAS}/${bucket}`])
      : alias;

    if (created.ok) {
      this.log(`Bucket ${bucket} is ready`);
      return;
    }

    this.warn(`Could not create bucket ${bucket} with mc, creating /data/${bucket} instead`);
    const fallback = await this.compose.exec(container, ['mkdir', '-p', `/data/${bucket}`]);
    if (!fallback.ok) {
      this.warn(`Could not create /data/${bucket}: ${outputTail(fallback, 3) || `exit code ${fallback.exitCode}`}`);
    }
  }

  private async verifyQueryEngine(): Promise<void> {
    const first = await this.health.waitFor('queryEngine', this.waitOptions());
    if (first.outcome === 'healthy') {
      await this.reportWait(first);
      return;
    }

    const tail = await this.recentLogs('queryEngine');
    if (tail) {
      this.log(`Recent ${SERVICE_LABELS.queryEngine} logs:\n${tail}`);
    }

    await this.wait(this.config.health.intervalSeconds * 1000);
    const status = await this.health.verify('queryEngine');
    if (status.healthy) {
      this.log(`${SERVICE_LABELS.queryEngine} is healthy`);
    } else {
      this.warn(`${SERVICE_LABELS.queryEngine} is not healthy yet: ${status.detail}`);
    }
  }

  private async collectHealth(): Promise<HealthStatus[]> {
    const statuses: HealthStatus[] = [];
    const services: StackService[] = ['objectStore', 'catalog', 'queryEngine'];
    for (const service of services) {
      statuses.push(await this.health.verify(service));
    }
    return statuses;
  }

  // ==========================================================================
  // Full run
  // ==========================================================================

  private fail(error: unknown): LifecycleReport {
    const failedAt = this.current;
    this.transition('failed');

    const exitCode = error instanceof PhaseFailure ? error.exitCode || 1 : 1;
    const logs = error instanceof PhaseFailure ? error.logs : undefined;

    return {
      state: 'failed',
      exitCode,
      failedAt,
      error: errorMessage(error),
      logs,
      health: [],
      warnings: [...this.warnings],
      endpoints: hostEndpoints(this.config.endpoints),
    };
  }

  private async runPhases(): Promise<LifecycleReport> {
    await this.runCleaning();

    this.transition('materializing');
    const plan = planLayout(this.config, createTemplateCatalog(this.credentials), 'compose');
    const written = await materialize(plan, this.projectDir, {
      cwd: this.deps.cwd,
      lock: false,
      onWarn: (message) => this.warn(message),
    });
    this.log(`Wrote ${written.written.length} files to ${written.rootDir}`);

    this.transition('starting');
    await this.start();

    this.transition('verifying');
    await this.createBucket();
    await this.verifyQueryEngine();
    const health = await this.collectHealth();

    this.transition('ready');
    return {
      state: 'ready',
      exitCode: 0,
      health,
      warnings: [...this.warnings],
      endpoints: hostEndpoints(this.config.endpoints),
    };
  }

  async run(): Promise<LifecycleReport> {
    this.warnings = [];
    this.transition('cleaning');

    try {
      return await this.withLock(() => this.runPhases());
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        throw error;
      }
      return this.fail(error);
    }
  }
}

// ============================================================================
// Summaries
// ============================================================================

export function formatReadySummary(
  report: LifecycleReport,
  config: ResolvedStackConfig,
  credentials: Credentials
): string {
  const { endpoints } = report;
  const lines = [
    `Trino UI:    ${endpointUrl(endpoints.queryEngine)}`,
    `MinIO UI:    ${endpointUrl(endpoints.objectStoreConsole)} (${credentials.accessKey} / ${credentials.secretKey})`,
    `Nessie API:  ${endpointUrl(endpoints.catalog, '/api/v1')}`,
    '',
    `Connect:     docker exec -it ${CONTAINER_NAMES.queryEngine} trino`,
    `Try:         CREATE SCHEMA iceberg.nessie WITH (location = 's3://${config.storage.bucket}/');`,
    '             CREATE TABLE iceberg.nessie.demo (id int, name varchar);',
    '',
    `Clean up:    lakestack down  (or ${config.compose.command.join(' ')} -p ${config.compose.projectName} down -v)`,
  ];

  if (report.warnings.length > 0) {
    lines.push('', 'Warnings:', ...report.warnings.map((warning) => `  - ${warning}`));
  }

  return lines.join('\n');
}

export function formatFailureSummary(report: LifecycleReport): string {
  const lines = [`Failed during ${report.failedAt ?? report.state} (exit code ${report.exitCode})`];

  if (report.error) {
    lines.push(`Error: ${report.error}`);
  }
  if (report.logs) {
    lines.push('', 'Logs:', report.logs);
  }
  if (report.warnings.length > 0) {
    lines.push('', 'Warnings:', ...report.warnings.map((warning) => `  - ${warning}`));
  }

  return lines.join('\n');
}
