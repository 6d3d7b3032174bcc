/**
 * lakestack health
 *
 * Check each service of the running Compose stack once.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import { createComposeClient } from '../services/docker.service';
import { SERVICE_LABELS, createHealthVerifier } from '../services/health.service';
import type { HealthStatus } from '../services/health.service';
import { createCommandLogger } from '../logger';
import { loadStackConfig, printError } from './shared';
import type { ConfigOptions } from './shared';

export function formatHealthLine(status: HealthStatus): string {
  const label = SERVICE_LABELS[status.service].padEnd(8);
  return status.healthy
    ? `${chalk.green('✓')} ${label} ${chalk.gray(status.detail)}`
    : `${chalk.red('✗')} ${label} ${chalk.red(status.reason)} ${chalk.gray(status.detail)}`;
}

export const healthCommand = new Command('health')
  .description('Check MinIO, Nessie and Trino')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: Pick<ConfigOptions, 'config'>) => {
    const log = createCommandLogger('health');
    console.log(chalk.bold('\n  lakestack health\n'));

    try {
      const { config } = loadStackConfig({ config: options.config, mode: 'compose' });
      const compose = createComposeClient({
        command: config.compose.command,
        projectName: config.compose.projectName,
        projectDir: path.resolve(config.outputDir),
      });

      const spinner = ora('Checking services...').start();
      const statuses = await createHealthVerifier(config, { compose }).verifyAll();
      spinner.stop();
      log.info('Health', statuses);

      for (const status of statuses) {
        console.log(`  ${formatHealthLine(status)}`);
      }
      console.log('');

      const unhealthy = statuses.filter((status) => !status.healthy);
      if (unhealthy.length > 0) {
        log.warn('Unhealthy services', unhealthy.map((status) => status.service));
        process.exit(1);
      }
    } catch (error) {
      printError('health', error);
      process.exit(1);
    }
  });
