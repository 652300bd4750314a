/**
 * Status command - Show applied, pending and missing migrations
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import type { MigrationState, MigrationStatus } from '@tidemark/core';
import { pluralize, reportError, withProject } from '../utils/project.ts';

interface StatusOptions {
   json?: boolean;
}

function formatState(state: MigrationState): string {
   switch (state) {
      case 'applied': {
         return chalk.green('Applied');
      }
      case 'pending': {
         return chalk.yellow('Pending');
      }
      case 'missing': {
         return chalk.red('Missing');
      }
   }
}

export function createStatusCommand(): Command {
   return new Command('status')
      .description('Show which migrations have been applied')
      .option('--json', 'Output as JSON')
      .action(async (options: StatusOptions, command: Command) => {
         try {
            const statuses = await withProject(command, (project) => { return project.migrator.status(); });

            if (options.json) {
               console.log(JSON.stringify(statuses, null, 2));
               return;
            }

            printStatus(statuses);
         } catch(error) {
            reportError(error);
         }
      });
}

function printStatus(statuses: MigrationStatus[]): void {
   if (statuses.length === 0) {
      console.log(chalk.dim('No migrations found.'));
      return;
   }

   for (const status of statuses) {
      console.log(`  ${formatState(status.state)}  ${status.identifier}`);
   }

   const pending = statuses.filter((status) => { return status.state === 'pending'; }).length,
         missing = statuses.filter((status) => { return status.state === 'missing'; }).length;

   console.log('');
   console.log(chalk.dim(`${pluralize(pending, 'pending migration')}, ${pluralize(missing, 'missing file')}`));
}
