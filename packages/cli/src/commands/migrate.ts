/**
 * Migrate command - Run all pending migrations
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { MigrationIdentifier, RunPendingResult } from '@tidemark/core';
import { pluralize, reportError, withProject } from '../utils/project.ts';
import { createProgressReporter } from '../utils/progress.ts';

interface MigrateOptions {
   dryRun?: boolean;
}

export function createMigrateCommand(): Command {
   return new Command('migrate')
      .description('Run all pending migrations in order')
      .option('--dry-run', 'List pending migrations without running them')
      .action(async (options: MigrateOptions, command: Command) => {
         const spinner = ora();

         try {
            await withProject(
               command,
               async (project) => {
                  if (options.dryRun) {
                     printPending(await project.migrator.computePending());
                     return;
                  }

                  printResult(await project.migrator.runPending());
               },
               { onProgress: createProgressReporter(spinner) }
            );
         } catch(error) {
            spinner.stop();
            reportError(error);
         }
      });
}

function printPending(pending: MigrationIdentifier[]): void {
   if (pending.length === 0) {
      console.log(chalk.dim('Nothing to migrate.'));
      return;
   }

   console.log(chalk.bold(`Pending migrations (${pending.length}):`));

   for (const identifier of pending) {
      console.log(`  - ${identifier}`);
   }
}

function printResult(result: RunPendingResult): void {
   if (result.ran.length === 0 && !result.error) {
      console.log(chalk.dim('Nothing to migrate.'));
      return;
   }

   if (result.ran.length > 0) {
      console.log(chalk.green(`✓ Ran ${pluralize(result.ran.length, 'migration')}`));
   }

   if (result.error) {
      reportError(result.error);
      console.log(chalk.dim(`  ${pluralize(result.remaining.length, 'pending migration')} not applied`));
   }
}
