/**
 * lakestack up
 *
 * Clean, generate, start and verify the Compose stack.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  EnvironmentLifecycle,
  formatFailureSummary,
  formatReadySummary,
} from '../services/lifecycle.service';
import type { LifecycleState } from '../services/lifecycle.service';
import { createCommandLogger } from '../logger';
import { indent, loadStackConfig, printError } from './shared';
import type { ConfigOptions } from './shared';

interface UpOptions extends Pick<ConfigOptions, 'config'> {
  verbose?: boolean;
}

export const STATE_LABELS: Record<LifecycleState, string> = {
  absent: 'Stopped',
  cleaning: 'Cleaning up previous environment...',
  materializing: 'Writing Compose files...',
  starting: 'Starting services...',
  verifying: 'Verifying services...',
  ready: 'Stack is ready',
  failed: 'Stack failed',
};

export const upCommand = new Command('up')
  .description('Start MinIO, Nessie and Trino with Docker Compose')
  .option('-c, --config <path>', 'Path to config file')
  .option('-v, --verbose', 'Show progress messages')
  .action(async (options: UpOptions) => {
    const log = createCommandLogger('up');
    console.log(chalk.bold('\n  lakestack up\n'));

    try {
      const { config, credentials } = loadStackConfig({ config: options.config, mode: 'compose' });
      const spinner = ora(STATE_LABELS.cleaning);

      const lifecycle = new EnvironmentLifecycle(config, credentials, {
        onTransition: (from, to) => {
          log.info(`${from} -> ${to}`);
          if (to === 'ready' || to === 'failed') return;
          if (spinner.isSpinning) {
            spinner.succeed(STATE_LABELS[from].replace('...', ''));
          }
          spinner.start(STATE_LABELS[to]);
        },
        onLog: (message) => {
          if (!options.verbose) return;
          spinner.clear();
          console.log(chalk.gray(indent(message, '    ')));
          spinner.render();
        },
        onWarn: (message) => {
          spinner.clear();
          console.log(chalk.yellow(`  ! ${message}`));
          spinner.render();
        },
      });

      const report = await lifecycle.run();

      if (report.state === 'ready') {
        spinner.succeed(STATE_LABELS.ready);
        console.log('\n' + indent(formatReadySummary(report, config, credentials.resolve())) + '\n');
        return;
      }

      log.error('Run failed', { failedAt: report.failedAt, exitCode: report.exitCode, error: report.error });
      spinner.fail(STATE_LABELS.failed);
      console.log(chalk.red('\n' + indent(formatFailureSummary(report)) + '\n'));
      process.exit(report.exitCode);
    } catch (error) {
      printError('up', error);
      process.exit(1);
    }
  });
