/**
 * Health verification for the running Compose stack
 *
 * HTTP services are probed through their published ports; the query engine is
 * checked inside its container.
 */

import { HEALTH_PATHS, SERVICE_NAMES, endpointUrl, hostEndpoints } from '@lakestack/blueprint';
import type { ResolvedStackConfig } from '@lakestack/blueprint';
import { EXIT_NOT_EXECUTABLE, EXIT_NOT_FOUND, outputTail } from './command.service';
import type { CommandResult } from './command.service';
import type { ComposeClient } from './docker.service';

export type StackService = 'objectStore' | 'catalog' | 'queryEngine';

export const STACK_SERVICES: readonly StackService[] = ['objectStore', 'catalog', 'queryEngine'];

export const SERVICE_LABELS: Record<StackService, string> = {
  objectStore: 'MinIO',
  catalog: 'Nessie',
  queryEngine: 'Trino',
};

export type UnhealthyReason = 'unreachable' | 'unhealthy' | 'missing';

export type HealthStatus =
  | { service: StackService; healthy: true; detail: string }
  | { service: StackService; healthy: false; reason: UnhealthyReason; detail: string };

export interface HttpResponseLike {
  ok: boolean;
  status: number;
}

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<HttpResponseLike>;

export interface HealthVerifierDeps {
  compose: ComposeClient;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  requestTimeoutMs?: number;
}

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
}

export type WaitOutcome = 'healthy' | 'failed' | 'timeout';

export interface WaitResult {
  service: StackService;
  outcome: WaitOutcome;
  attempts: number;
  status: HealthStatus;
}

export interface HealthVerifier {
  verify(service: StackService): Promise<HealthStatus>;
  verifyAll(): Promise<HealthStatus[]>;
  /** Poll until healthy, until the check is missing, or until the deadline */
  waitFor(service: StackService, options: WaitOptions): Promise<WaitResult>;
}

export const HTTP_TIMEOUT_MS = 5000;
export const TRIAL_QUERY = 'SELECT 1';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingCommand(result: CommandResult): boolean {
  return result.exitCode === EXIT_NOT_FOUND || result.exitCode === EXIT_NOT_EXECUTABLE;
}

export function createHealthVerifier(
  config: ResolvedStackConfig,
  deps: HealthVerifierDeps
): HealthVerifier {
  const fetchFn: FetchLike = deps.fetch ?? ((url, init) => fetch(url, init));
  const wait = deps.sleep ?? sleep;
  const now = deps.now ?? Date.now;
  const requestTimeoutMs = deps.requestTimeoutMs ?? HTTP_TIMEOUT_MS;
  const local = hostEndpoints(config.endpoints);

  const urls: Record<'objectStore' | 'catalog', string> = {
    objectStore: endpointUrl(local.objectStore, HEALTH_PATHS.objectStoreLive),
    catalog: endpointUrl(local.catalog, HEALTH_PATHS.catalog),
  };

  async function checkHttp(service: 'objectStore' | 'catalog'): Promise<HealthStatus> {
    const url = urls[service];
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), requestTimeoutMs);

    try {
      const response = await fetchFn(url, { signal: controller.signal });
      const detail = `${url} responded ${response.status}`;
      return response.ok
        ? { service, healthy: true, detail }
        : { service, healthy: false, reason: 'unhealthy', detail };
    } catch (error) {
      return { service, healthy: false, reason: 'unreachable', detail: `${url}: ${errorMessage(error)}` };
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Run the image's health-check command; images without it get a trial query
   */
  async function checkQueryEngine(): Promise<HealthStatus> {
    const service = 'queryEngine';
    const container = SERVICE_NAMES.queryEngine;

    const check = await deps.compose.exec(container, [HEALTH_PATHS.queryEngineCommand]);
    if (check.ok) {
      return { service, healthy: true, detail: `${HEALTH_PATHS.queryEngineCommand} passed` };
    }
    if (!isMissingCommand(check)) {
      return { service, healthy: false, reason: 'unhealthy', detail: outputTail(check, 5) };
    }

    const trial = await deps.compose.exec(container, ['trino', '--execute', TRIAL_QUERY]);
    if (trial.ok) {
      return { service, healthy: true, detail: `trial query "${TRIAL_QUERY}" succeeded` };
    }
    return {
      service,
      healthy: false,
      reason: isMissingCommand(trial) ? 'missing' : 'unhealthy',
      detail: outputTail(trial, 5) || `exit code ${trial.exitCode}`,
    };
  }

  const verify = (service: StackService): Promise<HealthStatus> =>
    service === 'queryEngine' ? checkQueryEngine() : checkHttp(service);

  return {
    verify,

    async verifyAll() {
      const statuses: HealthStatus[] = [];
      for (const service of STACK_SERVICES) {
        statuses.push(await verify(service));
      }
      return statuses;
    },

    async waitFor(service, options) {
      const deadline = now() + options.timeoutMs;
      let attempts = 0;

      for (;;) {
        attempts++;
        const status = await verify(service);

        if (status.healthy) {
          return { service, outcome: 'healthy', attempts, status };
        }
        if (status.reason === 'missing') {
          return { service, outcome: 'failed', attempts, status };
        }
        if (now() + options.intervalMs > deadline) {
          return { service, outcome: 'timeout', attempts, status };
        }
        await wait(options.intervalMs);
      }
    },
  };
}
