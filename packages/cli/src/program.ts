/**
 * @tidemark/cli - Command-line interface for tidemark
 *
 * Provides commands for creating, running, rolling back and inspecting
 * migrations of a SQLite database.
 */

import { Command } from 'commander';
import { VERSION } from '@tidemark/core';
import { createInstallCommand } from './commands/install.ts';
import { createMakeCommand } from './commands/make.ts';
import { createMigrateCommand } from './commands/migrate.ts';
import { createRollbackCommand } from './commands/rollback.ts';
import { createStatusCommand } from './commands/status.ts';
import { createTemplatesCommand } from './commands/templates.ts';

export type { GlobalOptions } from './utils/project.ts';

/**
 * Build a fresh program. Commander keeps parsed option values on command
 * instances, so every parse gets its own tree.
 */
export function createProgram(): Command {
   const program = new Command();

   program
      .name('tidemark')
      .description('Create, run and roll back timestamped SQLite migrations')
      .version(VERSION, '-V, --cli-version', 'Output the CLI version')
      .option('-c, --config <path>', 'Path to the config file (default: ./tidemark.config.json)')
      .option('--verbose', 'Log diagnostics to stderr');

   // Register commands
   program.addCommand(createInstallCommand());
   program.addCommand(createMakeCommand());
   program.addCommand(createMigrateCommand());
   program.addCommand(createRollbackCommand());
   program.addCommand(createStatusCommand());
   program.addCommand(createTemplatesCommand());

   return program;
}
