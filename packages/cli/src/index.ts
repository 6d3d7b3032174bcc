/**
 * @lakestack/cli
 *
 * CLI entry point for lakestack commands.
 */

import { Command } from 'commander';
import { initCommand, generateCommand, upCommand, downCommand, healthCommand } from './commands';

const program = new Command();

program
  .name('lakestack')
  .description('Scaffold and run a MinIO + Nessie + Trino data lake')
  .version('0.1.0');

// Setup
program.addCommand(initCommand);
program.addCommand(generateCommand);

// Compose stack
program.addCommand(upCommand);
program.addCommand(downCommand);
program.addCommand(healthCommand);

await program.parseAsync();
