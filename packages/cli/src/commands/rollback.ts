/**
 * Rollback command - Revert one applied migration
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { reportError, withProject } from '../utils/project.ts';
import { createProgressReporter } from '../utils/progress.ts';

interface RollbackOptions {
   deleteMissing?: boolean;
}

export function createRollbackCommand(): Command {
   return new Command('rollback')
      .description('Roll back a migration (default: the most recently applied one)')
      .argument('[identifier]', 'Identifier of an applied migration')
      .option('--delete-missing', 'Remove the ledger entry if the migration file no longer exists')
      .action(async (identifier: string | undefined, options: RollbackOptions, command: Command) => {
         const spinner = ora();

         try {
            await withProject(
               command,
               async (project) => {
                  const target = identifier ?? (await project.migrator.listApplied()).at(-1);

                  if (target === undefined) {
                     console.log(chalk.dim('Nothing to roll back.'));
                     return;
                  }

                  if (options.deleteMissing && !await project.migrator.hasScript(target)) {
                     await project.migrator.forget(target);
                     console.log(chalk.green(`✓ Removed ledger entry for ${target} (migration file missing)`));
                     return;
                  }

                  await project.migrator.rollback(target);
                  console.log(chalk.green(`✓ Rolled back ${target}`));
               },
               { onProgress: createProgressReporter(spinner) }
            );
         } catch(error) {
            spinner.stop();
            reportError(error);
         }
      });
}
