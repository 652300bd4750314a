import { LedgerWriteError } from '@tidemark/core';
import type { MigrationProgressCallback } from '@tidemark/core';

/**
 * The part of an ora spinner the reporter drives.
 */
export interface ProgressSpinner {
   start(text?: string): unknown;
   succeed(text?: string): unknown;
   fail(text?: string): unknown;
   warn(text?: string): unknown;
}

/**
 * Drive a spinner from migrator progress events. A ledger write that fails
 * after the script ran is shown as a warning, since the script's changes are
 * in place.
 */
export function createProgressReporter(spinner: ProgressSpinner): MigrationProgressCallback {
   return (progress) => {
      const { identifier } = progress,
            ledgerFailed = progress.error instanceof LedgerWriteError;

      switch (progress.phase) {
         case 'applying': {
            spinner.start(`Applying ${identifier}...`);
            break;
         }
         case 'applied': {
            spinner.succeed(`Applied ${identifier}`);
            break;
         }
         case 'apply-failed': {
            if (ledgerFailed) {
               spinner.warn(`Applied ${identifier} but could not record it in the ledger`);
            } else {
               spinner.fail(`Failed to apply ${identifier}`);
            }
            break;
         }
         case 'reverting': {
            spinner.start(`Rolling back ${identifier}...`);
            break;
         }
         case 'reverted': {
            spinner.succeed(`Rolled back ${identifier}`);
            break;
         }
         case 'revert-failed': {
            if (ledgerFailed) {
               spinner.warn(`Rolled back ${identifier} but could not remove its ledger entry`);
            } else {
               spinner.fail(`Failed to roll back ${identifier}`);
            }
            break;
         }
      }
   };
}
