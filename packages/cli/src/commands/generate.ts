/**
 * lakestack generate
 *
 * Write the Compose or Kustomize layout into the working directory.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'fs';
import * as path from 'path';
import type { ResolvedStackConfig } from '@lakestack/blueprint';
import { createTemplateCatalog } from '../generators';
import { ARGO_APPLICATION_FILE, overlayDir } from '../generators/k8s/kustomize';
import { SETUP_BUCKETS_SCRIPT, VERIFY_SCRIPT } from '../generators/scripts';
import { materialize, planLayout } from '../scaffold';
import type { LayoutPlan } from '../scaffold';
import { createCommandLogger } from '../logger';
import { loadStackConfig, printError, printWarning } from './shared';
import type { ConfigOptions } from './shared';

interface GenerateOptions extends ConfigOptions {
  dryRun?: boolean;
}

/**
 * Follow-up commands for a generated layout, relative to the working directory
 */
export function nextSteps(config: ResolvedStackConfig): string[] {
  const steps = [`cd ${config.outputDir}`];

  if (config.mode === 'kustomize') {
    const primary = config.overlays.find((o) => o.namespace === config.namespace) ?? config.overlays[0];
    if (primary) {
      steps.push(
        `kubectl apply -k ${overlayDir(primary.name)}`,
        `# or, with Argo CD: kubectl apply -f ${overlayDir(primary.name)}/${ARGO_APPLICATION_FILE}`
      );
    }
    steps.push(`./${SETUP_BUCKETS_SCRIPT}`, `./${VERIFY_SCRIPT}`);
  } else {
    const cli = config.compose.command.join(' ');
    steps.push(`${cli} -p ${config.compose.projectName} up -d`, '# or run everything with: lakestack up');
  }

  return steps;
}

function printPlan(plan: LayoutPlan): void {
  for (const artifact of plan.artifacts) {
    const marker = artifact.executable ? chalk.cyan(' (executable)') : '';
    console.log(chalk.gray(`    ${artifact.path}`) + marker);
  }
}

export const generateCommand = new Command('generate')
  .description('Generate the deployment files for the configured mode')
  .option('-c, --config <path>', 'Path to config file')
  .option('--mode <mode>', 'Deployment mode (compose | kustomize)')
  .option('--namespace <namespace>', 'Primary Kubernetes namespace (kustomize)')
  .option('-o, --output <dir>', 'Output directory')
  .option('--dry-run', 'List the files without writing them')
  .action(async (options: GenerateOptions) => {
    const log = createCommandLogger('generate');
    console.log(chalk.bold('\n  lakestack generate\n'));

    try {
      const { config, credentials, source } = loadStackConfig(options);
      log.info('Resolved config', { source, mode: config.mode, outputDir: config.outputDir });
      console.log(chalk.gray(`  Mode:        ${config.mode}`));
      console.log(chalk.gray(`  Config:      ${source ?? 'defaults'}`));
      console.log(chalk.gray(`  Credentials: ${credentials.description}\n`));

      const plan = planLayout(config, createTemplateCatalog(credentials));

      if (options.dryRun) {
        console.log(chalk.white(`  Would write ${plan.artifacts.length} files to ${config.outputDir}/:\n`));
        printPlan(plan);
        console.log('');
        return;
      }

      const rootDir = path.resolve(config.outputDir);
      if (fs.existsSync(rootDir)) {
        printWarning(`${config.outputDir}/ exists and will be replaced`);
      }

      const spinner = ora(`Writing ${plan.artifacts.length} files...`).start();
      const result = await materialize(plan, config.outputDir);
      spinner.succeed(`Wrote ${result.written.length} files to ${config.outputDir}/`);
      log.info('Materialized layout', { rootDir: result.rootDir, files: result.written.length });

      console.log('');
      printPlan(plan);

      console.log(chalk.gray('\n  Next steps:'));
      for (const step of nextSteps(config)) {
        console.log(chalk.gray(`    ${step}`));
      }
      console.log('');
    } catch (error) {
      printError('generate', error);
      process.exit(1);
    }
  });
