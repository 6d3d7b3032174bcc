/**
 * Docker and Docker Compose clients
 *
 * Thin wrappers that build argument lists and hand them to a CommandRunner.
 */

import * as path from 'path';
import { COMPOSE_FILE } from '../generators/compose/docker-compose';
import { runCommand } from './command.service';
import type { CommandResult, CommandRunner } from './command.service';

const UP_TIMEOUT_MS = 10 * 60 * 1000;
const DEFAULT_TIMEOUT_MS = 2 * 60 * 1000;

export interface ListResult {
  result: CommandResult;
  items: string[];
}

function toList(result: CommandResult): ListResult {
  const items = result.ok
    ? result.stdout
        .split('\n')
        .map((line) => line.trim())
        .filter(Boolean)
    : [];
  return { result, items };
}

// ============================================================================
// Compose
// ============================================================================

export interface ComposeClientOptions {
  /** Compose invocation, e.g. ['docker', 'compose'] or ['docker-compose'] */
  command: string[];
  projectName: string;
  /** Directory holding docker-compose.yml */
  projectDir: string;
  runner?: CommandRunner;
}

export interface ComposeClient {
  /** Stop the project and remove its volumes and orphans */
  down(): Promise<CommandResult>;
  /** Start the project detached */
  up(): Promise<CommandResult>;
  /** Run a command in a service container without a TTY */
  exec(service: string, args: string[]): Promise<CommandResult>;
  logs(service?: string, tail?: number): Promise<CommandResult>;
}

export function createComposeClient(options: ComposeClientOptions): ComposeClient {
  const runner = options.runner ?? runCommand;
  const [binary, ...prefix] = options.command;
  if (!binary) {
    throw new Error('Compose command must not be empty');
  }

  const composeFile = path.join(options.projectDir, COMPOSE_FILE);
  const project = ['-p', options.projectName];
  const withFile = [...project, '-f', composeFile];

  const run = (args: string[], timeoutMs = DEFAULT_TIMEOUT_MS): Promise<CommandResult> =>
    runner(binary, [...prefix, ...args], { timeoutMs });

  return {
    // Down works from the project name alone, so it also runs after the directory is gone
    down: () => run([...project, 'down', '-v', '--remove-orphans']),
    up: () => run([...withFile, 'up', '-d'], UP_TIMEOUT_MS),
    exec: (service, args) => run([...withFile, 'exec', '-T', service, ...args]),
    logs: (service, tail) =>
      run([
        ...withFile,
        'logs',
        '--no-color',
        ...(tail !== undefined ? ['--tail', String(tail)] : []),
        ...(service ? [service] : []),
      ]),
  };
}

// ============================================================================
// Docker
// ============================================================================

export interface DockerClientOptions {
  binary?: string;
  runner?: CommandRunner;
}

export interface DockerClient {
  /** IDs of all containers, running or not, created from an image */
  containersByImage(image: string): Promise<ListResult>;
  removeContainers(ids: string[]): Promise<CommandResult>;
  /** Dangling volumes, optionally limited to one Compose project */
  danglingVolumes(projectName?: string): Promise<ListResult>;
  removeVolumes(names: string[]): Promise<CommandResult>;
}

const NOTHING_TO_DO: CommandResult = { ok: true, exitCode: 0, stdout: '', stderr: '' };

export function createDockerClient(options: DockerClientOptions = {}): DockerClient {
  const runner = options.runner ?? runCommand;
  const binary = options.binary ?? 'docker';
  const run = (args: string[]): Promise<CommandResult> =>
    runner(binary, args, { timeoutMs: DEFAULT_TIMEOUT_MS });

  return {
    containersByImage: async (image) =>
      toList(await run(['ps', '-aq', '--filter', `ancestor=${image}`])),

    removeContainers: async (ids) => (ids.length === 0 ? NOTHING_TO_DO : run(['rm', '-f', ...ids])),

    danglingVolumes: async (projectName) =>
      toList(
        await run([
          'volume',
          'ls',
          '-q',
          '--filter',
          'dangling=true',
          ...(projectName ? ['--filter', `label=com.docker.compose.project=${projectName}`] : []),
        ])
      ),

    removeVolumes: async (names) =>
      names.length === 0 ? NOTHING_TO_DO : run(['volume', 'rm', ...names]),
  };
}
