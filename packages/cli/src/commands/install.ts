/**
 * Install command - Create the migration ledger table
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import { reportError, withProject } from '../utils/project.ts';

export function createInstallCommand(): Command {
   return new Command('install')
      .description('Create the migration ledger table')
      .action(async (_options: Record<string, never>, command: Command) => {
         try {
            await withProject(command, async (project) => {
               const table = project.ledger.getTable();

               if (await project.migrator.install()) {
                  console.log(chalk.green(`✓ Created migration ledger table ${chalk.bold(table)}`));
               } else {
                  console.log(chalk.dim(`Migration ledger table ${table} already exists`));
               }
            });
         } catch(error) {
            reportError(error);
         }
      });
}
