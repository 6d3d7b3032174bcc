/**
 * In-process stand-ins for docker, HTTP and time used by the service tests
 */

import type { CommandOptions, CommandResult, CommandRunner } from '../services/command.service';
import type { FetchLike, HttpResponseLike } from '../services/health.service';

export function ok(stdout = ''): CommandResult {
  return { ok: true, exitCode: 0, stdout, stderr: '' };
}

export function fail(exitCode: number, stderr = ''): CommandResult {
  return { ok: false, exitCode, stdout: '', stderr };
}

export interface RecordedCall {
  command: string;
  args: string[];
  options?: CommandOptions;
}

export interface FakeRunner {
  runner: CommandRunner;
  calls: RecordedCall[];
}

/**
 * Records every invocation and answers with `respond`
 */
export function createFakeRunner(
  respond: (args: string[], command: string) => CommandResult = () => ok()
): FakeRunner {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    return respond(args, command);
  };
  return { runner, calls };
}

export interface FakeClock {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
  slept: number[];
}

export function createFakeClock(start = 0): FakeClock {
  let current = start;
  const slept: number[] = [];
  return {
    now: () => current,
    sleep: async (ms) => {
      slept.push(ms);
      current += ms;
    },
    slept,
  };
}

/**
 * `respond` gets the URL and the call count for that URL, starting at 1
 */
export function createFakeFetch(respond: (url: string, call: number) => number | Error): {
  fetch: FetchLike;
  urls: string[];
} {
  const urls: string[] = [];
  const counts = new Map<string, number>();

  const fetch: FetchLike = async (url) => {
    urls.push(url);
    const call = (counts.get(url) ?? 0) + 1;
    counts.set(url, call);

    const outcome = respond(url, call);
    if (outcome instanceof Error) {
      throw outcome;
    }
    const response: HttpResponseLike = { ok: outcome >= 200 && outcome < 300, status: outcome };
    return response;
  };

  return { fetch, urls };
}
