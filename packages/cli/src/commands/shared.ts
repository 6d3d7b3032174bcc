/**
 * Helpers shared by the lakestack commands
 */

import * as path from 'path';
import chalk from 'chalk';
import {
  ConfigValidationError,
  StackError,
  envCredentials,
  findConfigFile,
  mergeConfig,
  parseConfig,
  readStackConfig,
  resolveConfig,
} from '@lakestack/blueprint';
import type { CredentialSource, ResolvedStackConfig, StackConfig } from '@lakestack/blueprint';
import { logFullError } from '../logger';

export interface ConfigOptions {
  config?: string;
  mode?: string;
  namespace?: string;
  output?: string;
}

export interface LoadedStackConfig {
  config: ResolvedStackConfig;
  credentials: CredentialSource;
  /** Config file that was read, or null when running on defaults */
  source: string | null;
}

/**
 * Command-line overrides, type-checked like a config file
 */
export function optionsToConfig(options: ConfigOptions): StackConfig {
  const raw: Record<string, string> = {};
  if (options.mode !== undefined) raw.mode = options.mode;
  if (options.namespace !== undefined) raw.namespace = options.namespace;
  if (options.output !== undefined) raw.outputDir = options.output;
  return readStackConfig(raw);
}

/**
 * defaults < config file < command-line options < environment credentials
 */
export function loadStackConfig(options: ConfigOptions, cwd: string = process.cwd()): LoadedStackConfig {
  const source = options.config ? path.resolve(cwd, options.config) : findConfigFile(cwd);
  const fileConfig = source ? parseConfig(source) : {};
  const config = resolveConfig(mergeConfig(fileConfig, optionsToConfig(options)));

  return {
    config,
    credentials: envCredentials(config.credentials),
    source,
  };
}

/**
 * Print a fatal error; configuration errors list every problem
 */
export function printError(context: string, error: unknown): void {
  logFullError(context, error);

  if (error instanceof ConfigValidationError) {
    console.log(chalk.red('\n  Invalid configuration:\n'));
    for (const e of error.errors) {
      console.log(chalk.red(`    ${e.path}: ${e.message}`));
    }
    console.log('');
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof StackError ? chalk.gray(` [${error.code}]`) : '';
  console.log(chalk.red(`\n  ${message}`) + code + '\n');
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ! ${message}`));
}

export function indent(text: string, prefix = '  '): string {
  return text
    .split('\n')
    .map((line) => (line ? `${prefix}${line}` : line))
    .join('\n');
}
