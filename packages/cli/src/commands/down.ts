/**
 * lakestack down
 *
 * Stop the Compose stack and remove its containers, volumes and files.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { EnvironmentLifecycle } from '../services/lifecycle.service';
import { createCommandLogger } from '../logger';
import { loadStackConfig, printError, printWarning } from './shared';
import type { ConfigOptions } from './shared';

export const downCommand = new Command('down')
  .description('Stop the Compose stack and remove everything it created')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: Pick<ConfigOptions, 'config'>) => {
    const log = createCommandLogger('down');
    console.log(chalk.bold('\n  lakestack down\n'));

    try {
      const { config, credentials } = loadStackConfig({ config: options.config, mode: 'compose' });
      const spinner = ora('Cleaning up...').start();

      const lifecycle = new EnvironmentLifecycle(config, credentials);
      const report = await lifecycle.clean().catch((error: unknown) => {
        spinner.fail('Cleanup failed');
        log.error('Cleanup failed', error);
        throw error;
      });
      log.info('Cleanup finished', report.steps);

      if (report.warnings.length > 0) {
        spinner.warn('Cleaned up with warnings');
        for (const warning of report.warnings) {
          printWarning(warning);
        }
      } else {
        spinner.succeed('Cleaned up');
      }
      for (const note of report.notes) {
        console.log(chalk.gray(`  ${note}`));
      }
      console.log('');
    } catch (error) {
      printError('down', error);
      process.exit(1);
    }
  });
