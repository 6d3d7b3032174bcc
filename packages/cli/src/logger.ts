/**
 * Debug log for the lakestack CLI
 *
 * Entries go to `debug.log` under `LAKESTACK_LOG_DIR`, a `.lakestack`
 * directory in the current directory, or `~/.lakestack`, in that order.
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';

const LOG_DIR_NAME = '.lakestack';
const LOG_FILE_NAME = 'debug.log';
const ROTATE_AT_BYTES = 5 * 1024 * 1024;

/** Overrides the log directory (used by tests and CI) */
export const LOG_DIR_ENV = 'LAKESTACK_LOG_DIR';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG' | 'CMD' | 'STDOUT' | 'STDERR';

interface LogSession {
  file: string | null;
  started: boolean;
  /** Set once a write fails; the command keeps running without a log */
  disabled: boolean;
}

const session: LogSession = { file: null, started: false, disabled: false };

function resolveLogDir(): string {
  const override = process.env[LOG_DIR_ENV];
  if (override) return override;

  const local = path.join(process.cwd(), LOG_DIR_NAME);
  return fs.existsSync(local) ? local : path.join(homedir(), LOG_DIR_NAME);
}

export function getLogPath(): string {
  if (session.file === null) {
    const dir = resolveLogDir();
    fs.mkdirSync(dir, { recursive: true });
    session.file = path.join(dir, LOG_FILE_NAME);
  }
  return session.file;
}

/** Keeps one previous log as `debug.log.old` */
function rotate(file: string): void {
  if (!fs.existsSync(file) || fs.statSync(file).size <= ROTATE_AT_BYTES) return;
  fs.rmSync(`${file}.old`, { force: true });
  fs.renameSync(file, `${file}.old`);
}

function append(text: string): void {
  try {
    fs.appendFileSync(getLogPath(), text);
  } catch {
    session.disabled = true;
  }
}

function startSession(): void {
  if (session.started) return;
  session.started = true;

  const rule = '='.repeat(80);
  try {
    rotate(getLogPath());
  } catch {
    session.disabled = true;
    return;
  }
  append(`\n${rule}\n[${new Date().toISOString()}] lakestack session started (pid ${process.pid})\n${rule}\n`);
}

function renderData(data: unknown): string {
  if (data instanceof Error) {
    return data.stack ? `\n  Error: ${data.message}\n  Stack: ${data.stack}` : `\n  Error: ${data.message}`;
  }
  if (typeof data === 'object' && data !== null) {
    let json: string;
    try {
      json = JSON.stringify(data, null, 2);
    } catch {
      json = '[unserializable]';
    }
    return `\n  Data: ${json.replace(/\n/g, '\n  ')}`;
  }
  return `\n  Data: ${String(data)}`;
}

function write(level: LogLevel, message: string, data?: unknown): void {
  startSession();
  if (session.disabled) return;

  const suffix = data === undefined ? '' : renderData(data);
  append(`[${new Date().toISOString()}] [${level}] ${message}${suffix}\n`);
}

export function logInfo(message: string, data?: unknown): void {
  write('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  write('WARN', message, data);
}

export function logDebug(message: string, data?: unknown): void {
  write('DEBUG', message, data);
}

/** A spawned command line, before it runs */
export function logCommand(commandLine: string, context?: Record<string, unknown>): void {
  write('CMD', commandLine, context);
}

export function logOutput(stream: 'stdout' | 'stderr', output: string): void {
  const trimmed = output.trim();
  if (trimmed) {
    write(stream === 'stdout' ? 'STDOUT' : 'STDERR', trimmed);
  }
}

/**
 * Record a fatal error with its name, stack and any stable error code
 */
export function logFullError(context: string, error: unknown, extra: Record<string, unknown> = {}): void {
  const details: Record<string, unknown> = { context, ...extra };

  if (error instanceof Error) {
    details.errorName = error.name;
    details.errorMessage = error.message;
    if ('code' in error) details.errorCode = error.code;
    details.errorStack = error.stack;
  } else {
    details.rawError = String(error);
  }

  write('ERROR', `Error in ${context}`, details);
}

/** Scoped to one CLI command; every entry carries the command name */
export interface CommandLogger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function createCommandLogger(commandName: string): CommandLogger {
  const scoped = (level: LogLevel) => (message: string, data?: unknown) =>
    write(level, `[${commandName}] ${message}`, data);

  return {
    info: scoped('INFO'),
    warn: scoped('WARN'),
    error: scoped('ERROR'),
  };
}
