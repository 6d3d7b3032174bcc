/**
 * lakestack init
 *
 * Create .lakestack/lakestack.config.json for the current directory.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  CONFIG_DIR,
  CONFIG_FILENAME,
  DEFAULT_CREDENTIALS,
  DEFAULT_MODE,
  STACK_MODES,
  isValidIdentifier,
  validateConfig,
} from '@lakestack/blueprint';
import type { Credentials, StackConfig, StackMode } from '@lakestack/blueprint';
import { createCommandLogger } from '../logger';
import { printError } from './shared';

const DEFAULT_NAMESPACE = 'trino-production';
const MIN_SECRET_LENGTH = 8;

interface InitOptions {
  yes?: boolean;
  mode?: string;
  namespace?: string;
}

export interface InitAnswers {
  mode: StackMode;
  namespace?: string;
  credentials: Credentials;
}

function isStackMode(value: string): value is StackMode {
  return STACK_MODES.some((mode) => mode === value);
}

/**
 * Only non-default values are written, so later default changes still apply
 */
export function buildInitConfig(answers: InitAnswers): StackConfig {
  const config: StackConfig = { mode: answers.mode };

  if (answers.mode === 'kustomize' && answers.namespace) {
    config.namespace = answers.namespace;
  }
  if (
    answers.credentials.accessKey !== DEFAULT_CREDENTIALS.accessKey ||
    answers.credentials.secretKey !== DEFAULT_CREDENTIALS.secretKey
  ) {
    config.credentials = { ...answers.credentials };
  }

  return config;
}

export async function writeInitConfig(cwd: string, config: StackConfig): Promise<string> {
  const dir = path.join(cwd, CONFIG_DIR);
  const configPath = path.join(dir, CONFIG_FILENAME);
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  return configPath;
}

async function configExists(configPath: string): Promise<boolean> {
  try {
    await fs.access(configPath);
    return true;
  } catch {
    return false;
  }
}

async function promptAnswers(options: InitOptions): Promise<InitAnswers> {
  let mode: StackMode = DEFAULT_MODE;
  if (options.mode) {
    if (!isStackMode(options.mode)) {
      throw new Error(`Unknown mode "${options.mode}". Use one of: ${STACK_MODES.join(', ')}`);
    }
    mode = options.mode;
  } else if (!options.yes) {
    const answers = await inquirer.prompt<{ mode: StackMode }>([
      {
        type: 'list',
        name: 'mode',
        message: 'Deployment mode:',
        choices: [
          { name: 'Docker Compose (run locally)', value: 'compose' },
          { name: 'Kustomize + Argo CD (generate manifests)', value: 'kustomize' },
        ],
      },
    ]);
    mode = answers.mode;
  }

  let namespace = options.namespace;
  if (mode === 'kustomize' && !namespace) {
    if (options.yes) {
      namespace = DEFAULT_NAMESPACE;
    } else {
      const answers = await inquirer.prompt<{ namespace: string }>([
        {
          type: 'input',
          name: 'namespace',
          message: 'Primary namespace:',
          default: DEFAULT_NAMESPACE,
          validate: (input: string) =>
            isValidIdentifier(input) || 'Must be lowercase letters, numbers and hyphens (max 63)',
        },
      ]);
      namespace = answers.namespace;
    }
  }

  let credentials: Credentials = { ...DEFAULT_CREDENTIALS };
  if (!options.yes) {
    credentials = await inquirer.prompt<{ accessKey: string; secretKey: string }>([
      {
        type: 'input',
        name: 'accessKey',
        message: 'Object store access key:',
        default: DEFAULT_CREDENTIALS.accessKey,
      },
      {
        type: 'password',
        name: 'secretKey',
        message: 'Object store secret key:',
        default: DEFAULT_CREDENTIALS.secretKey,
        mask: '*',
        validate: (input: string) =>
          input.length >= MIN_SECRET_LENGTH || `Must be at least ${MIN_SECRET_LENGTH} characters`,
      },
    ]);
  }

  return { mode, namespace, credentials };
}

export const initCommand = new Command('init')
  .description('Create a lakestack config for this directory')
  .option('-y, --yes', 'Skip prompts and use defaults')
  .option('--mode <mode>', 'Deployment mode (compose | kustomize)')
  .option('--namespace <namespace>', 'Primary Kubernetes namespace (kustomize)')
  .action(async (options: InitOptions) => {
    const log = createCommandLogger('init');
    const cwd = process.cwd();
    const configPath = path.join(cwd, CONFIG_DIR, CONFIG_FILENAME);
    console.log(chalk.bold('\n  lakestack init\n'));

    try {
      if ((await configExists(configPath)) && !options.yes) {
        console.log(chalk.yellow(`  ${CONFIG_DIR}/${CONFIG_FILENAME} already exists.\n`));
        const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
          {
            type: 'confirm',
            name: 'overwrite',
            message: 'Overwrite it?',
            default: false,
          },
        ]);
        if (!overwrite) {
          console.log(chalk.gray('  Cancelled.\n'));
          return;
        }
      }

      const config = buildInitConfig(await promptAnswers(options));
      const validation = validateConfig(config);
      if (!validation.valid) {
        console.log(chalk.red('  Invalid configuration:\n'));
        for (const error of validation.errors) {
          console.log(chalk.red(`    ${error.path}: ${error.message}`));
        }
        console.log('');
        process.exit(1);
      }

      const written = await writeInitConfig(cwd, config);
      log.info('Wrote config', { path: written, mode: config.mode });

      console.log(chalk.green(`\n  Created ${path.relative(cwd, written)}\n`));
      console.log(chalk.gray('  Next steps:'));
      if (config.mode === 'kustomize') {
        console.log(chalk.gray('    lakestack generate   Write the Kustomize + Argo CD layout'));
      } else {
        console.log(chalk.gray('    lakestack up         Start MinIO, Nessie and Trino'));
        console.log(chalk.gray('    lakestack generate   Only write the Compose files'));
      }
      console.log('');
    } catch (error) {
      printError('init', error);
      process.exit(1);
    }
  });
