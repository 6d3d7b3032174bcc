/**
 * External command execution
 *
 * Commands never throw on failure: a non-zero exit, a missing binary or a
 * timeout all come back as a CommandResult for the caller to classify.
 */

import { spawn } from 'child_process';
import { logCommand, logOutput } from '../logger';

export interface CommandResult {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/** Shell convention for "command not found" */
export const EXIT_NOT_FOUND = 127;
/** Shell convention for "found but not executable" */
export const EXIT_NOT_EXECUTABLE = 126;
const EXIT_TIMEOUT = 124;

/**
 * Run a command without a shell and capture its output
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  logCommand([command, ...args].join(' '), options.cwd ? { cwd: options.cwd } : undefined);

  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const finish = (result: CommandResult): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      logOutput('stdout', result.stdout);
      logOutput('stderr', result.stderr);
      resolve(result);
    };

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const timer = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          proc.kill('SIGTERM');
        }, options.timeoutMs)
      : null;

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('error', (error: NodeJS.ErrnoException) => {
      const exitCode = error.code === 'ENOENT' ? EXIT_NOT_FOUND : EXIT_NOT_EXECUTABLE;
      finish({ ok: false, exitCode, stdout, stderr: stderr || `${command}: ${error.message}` });
    });

    proc.on('close', (code) => {
      if (timedOut) {
        finish({
          ok: false,
          exitCode: EXIT_TIMEOUT,
          stdout,
          stderr: `${stderr}${command} timed out after ${options.timeoutMs}ms`,
        });
        return;
      }
      const exitCode = code ?? 1;
      finish({ ok: exitCode === 0, exitCode, stdout, stderr });
    });
  });
};

// ============================================================================
// Cleanup classification
// ============================================================================

export type CleanupOutcome = 'done' | 'absent' | 'degraded';

const ABSENT_PATTERNS = [
  /no such/i,
  /not found/i,
  /no configuration file/i,
  /no resource found/i,
];

/**
 * Cleanup steps are best effort: "nothing to remove" is success,
 * anything else unexpected is reported but never fatal
 */
export function classifyCleanup(result: CommandResult): CleanupOutcome {
  if (result.ok) return 'done';
  if (result.exitCode === EXIT_NOT_FOUND) return 'degraded';

  const output = `${result.stderr}\n${result.stdout}`;
  return ABSENT_PATTERNS.some((pattern) => pattern.test(output)) ? 'absent' : 'degraded';
}

/**
 * Last few lines of a command's output for failure reports
 */
export function outputTail(result: CommandResult, lines = 20): string {
  const combined = [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join('\n');
  return combined.split('\n').slice(-lines).join('\n');
}
