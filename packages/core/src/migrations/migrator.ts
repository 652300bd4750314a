/**
 * Migrator - Computes pending migrations, applies and reverts them, and keeps
 * the ledger in step.
 *
 * Each migration is its own unit of work: the script runs first, and the
 * ledger is written only after it reports success. The two steps are not
 * atomic together; a crash between them leaves an applied migration without a
 * ledger entry, which has to be inspected by hand.
 */

import type { LedgerStore } from '../ledger.ts';
import type { ScriptStore } from '../script-store.ts';
import { isMigrationScript } from '../script-store.ts';
import { createLogger, type Logger } from '../logger.ts';
import type {
   LedgerOperation,
   MigrationContext,
   MigrationIdentifier,
   MigrationOutcome,
   MigrationProgress,
   MigrationProgressCallback,
   MigrationScript,
   MigrationStatus,
   RunPendingResult,
} from './types.ts';
import {
   AlreadyAppliedError,
   LedgerReadError,
   LedgerWriteError,
   MigrationError,
   MigrationFailedError,
   NotAppliedError,
   RollbackFailedError,
   UnresolvableMigrationError,
} from './types.ts';

/**
 * Collaborators and settings of a migrator.
 */
export interface MigratorConfig<TContext = MigrationContext> {

   /** Where applied identifiers are recorded */
   ledger: LedgerStore;

   /** Where scripts are discovered and loaded */
   scripts: ScriptStore<TContext>;

   /** Value passed to every `up` and `down` call */
   context: TContext;

   /** Diagnostics logger (default: `createLogger('migrator')`) */
   logger?: Logger;

   /** Called on every state transition of a migration */
   onProgress?: MigrationProgressCallback;
}

function describeError(error: unknown): string {
   return error instanceof Error ? error.message : String(error);
}

export class Migrator<TContext = MigrationContext> {

   private readonly _ledger: LedgerStore;
   private readonly _scripts: ScriptStore<TContext>;
   private readonly _context: TContext;
   private readonly _logger: Logger;
   private readonly _onProgress?: MigrationProgressCallback;

   public constructor(config: MigratorConfig<TContext>) {
      this._ledger = config.ledger;
      this._scripts = config.scripts;
      this._context = config.context;
      this._logger = config.logger ?? createLogger('migrator');
      this._onProgress = config.onProgress;
   }

   /**
    * Create the ledger medium if it does not exist yet.
    *
    * @returns true if the ledger was created by this call
    */
   public async install(): Promise<boolean> {
      if (await this._ledgerExists()) {
         return false;
      }

      try {
         await this._ledger.initialize();
      } catch(error) {
         throw this._asLedgerWriteError(error, 'initialize', undefined);
      }

      this._logger.info('Created migration ledger');

      return true;
   }

   /**
    * Applied identifiers in application order. An uninitialized ledger is empty.
    */
   public async listApplied(): Promise<MigrationIdentifier[]> {
      if (!await this._ledgerExists()) {
         return [];
      }

      try {
         return await this._ledger.listApplied();
      } catch(error) {
         throw error instanceof MigrationError
            ? error
            : new LedgerReadError(describeError(error), { cause: error });
      }
   }

   /**
    * Identifiers known to the script store but absent from the ledger, in
    * script store order.
    */
   public async computePending(): Promise<MigrationIdentifier[]> {
      const [ all, applied ] = await Promise.all([
         this._scripts.listAll(),
         this.listApplied(),
      ]);

      const appliedSet = new Set(applied);

      return all.filter((identifier) => { return !appliedSet.has(identifier); });
   }

   public async hasScript(identifier: MigrationIdentifier): Promise<boolean> {
      return this._scripts.exists(identifier);
   }

   /**
    * Load the script for an identifier and check that it can be run.
    *
    * @throws UnresolvableMigrationError if it cannot be found, built or run
    */
   public async resolveScript(identifier: MigrationIdentifier): Promise<MigrationScript<TContext>> {
      let script: unknown;

      try {
         script = await this._scripts.load(identifier);
      } catch(error) {
         if (error instanceof UnresolvableMigrationError) {
            throw error;
         }

         throw new UnresolvableMigrationError(identifier, describeError(error), { cause: error });
      }

      if (!isMigrationScript<TContext>(script)) {
         throw new UnresolvableMigrationError(identifier, 'script does not implement up() and down()');
      }

      return script;
   }

   /**
    * Run a migration's `up` and record it in the ledger.
    *
    * @throws AlreadyAppliedError if the ledger already holds the identifier
    * @throws UnresolvableMigrationError if the script cannot be resolved
    * @throws MigrationFailedError if `up` returned false or threw; the ledger is untouched
    * @throws LedgerWriteError if the ledger could not record the migration
    */
   public async apply(identifier: MigrationIdentifier): Promise<void> {
      const applied = await this.listApplied();

      if (applied.includes(identifier)) {
         throw new AlreadyAppliedError(identifier);
      }

      const script = await this.resolveScript(identifier);

      this._report({ phase: 'applying', identifier });
      this._logger.info({ migration: identifier }, 'Applying migration');

      const failure = await this._execute(identifier, 'up', script);

      if (failure) {
         const error = new MigrationFailedError(identifier, failure.reason, { cause: failure.cause });

         this._report({ phase: 'apply-failed', identifier, error });
         this._logger.error({ migration: identifier, err: failure.cause }, error.message);
         throw error;
      }

      await this.install();

      try {
         await this._ledger.recordApplied(identifier);
      } catch(error) {
         const ledgerError = this._asLedgerWriteError(error, 'record', identifier);

         this._report({ phase: 'apply-failed', identifier, error: ledgerError });
         this._logger.error(
            { migration: identifier, err: error },
            'Migration ran but could not be recorded; it will run again unless recorded by hand'
         );
         throw ledgerError;
      }

      this._report({ phase: 'applied', identifier });
      this._logger.info({ migration: identifier }, 'Applied migration');
   }

   /**
    * Apply every pending migration in order, stopping at the first failure.
    * A later call resumes from the migration that failed.
    */
   public async runPending(): Promise<RunPendingResult> {
      await this.install();

      const pending = await this.computePending(),
            ran: MigrationIdentifier[] = [];

      if (pending.length === 0) {
         this._logger.debug('No pending migrations');
         return { ran, remaining: [] };
      }

      this._logger.info({ pending }, `Found ${pending.length} pending migration(s)`);

      for (const identifier of pending) {
         try {
            await this.apply(identifier);
         } catch(error) {
            if (!(error instanceof MigrationError)) {
               throw error;
            }

            return { ran, remaining: pending.slice(ran.length), error };
         }

         ran.push(identifier);
      }

      return { ran, remaining: [] };
   }

   /**
    * Run a migration's `down` and remove it from the ledger. Any applied
    * migration may be targeted, not only the latest.
    *
    * @throws NotAppliedError if the ledger does not hold the identifier
    * @throws UnresolvableMigrationError if the script cannot be resolved
    * @throws RollbackFailedError if `down` returned false or threw; the entry is kept
    * @throws LedgerWriteError if the entry could not be removed
    */
   public async rollback(identifier: MigrationIdentifier): Promise<void> {
      const applied = await this.listApplied();

      if (!applied.includes(identifier)) {
         throw new NotAppliedError(identifier);
      }

      const script = await this.resolveScript(identifier);

      this._report({ phase: 'reverting', identifier });
      this._logger.info({ migration: identifier }, 'Rolling back migration');

      const failure = await this._execute(identifier, 'down', script);

      if (failure) {
         const error = new RollbackFailedError(identifier, failure.reason, { cause: failure.cause });

         this._report({ phase: 'revert-failed', identifier, error });
         this._logger.error({ migration: identifier, err: failure.cause }, error.message);
         throw error;
      }

      try {
         await this._ledger.removeApplied(identifier);
      } catch(error) {
         const ledgerError = this._asLedgerWriteError(error, 'remove', identifier);

         this._report({ phase: 'revert-failed', identifier, error: ledgerError });
         this._logger.error(
            { migration: identifier, err: error },
            'Migration was reverted but is still recorded as applied'
         );
         throw ledgerError;
      }

      this._report({ phase: 'reverted', identifier });
      this._logger.info({ migration: identifier }, 'Rolled back migration');
   }

   /**
    * Remove a ledger entry without running its script, for migrations whose
    * file no longer exists.
    *
    * @throws NotAppliedError if the ledger does not hold the identifier
    */
   public async forget(identifier: MigrationIdentifier): Promise<void> {
      const applied = await this.listApplied();

      if (!applied.includes(identifier)) {
         throw new NotAppliedError(identifier);
      }

      try {
         await this._ledger.removeApplied(identifier);
      } catch(error) {
         throw this._asLedgerWriteError(error, 'remove', identifier);
      }

      this._logger.warn({ migration: identifier }, 'Removed ledger entry without running down()');
   }

   /**
    * Applied migrations in ledger order, then pending ones in script order.
    */
   public async status(): Promise<MigrationStatus[]> {
      const [ all, applied ] = await Promise.all([
         this._scripts.listAll(),
         this.listApplied(),
      ]);

      const known = new Set(all),
            appliedSet = new Set(applied);

      const appliedStatus = applied.map((identifier): MigrationStatus => {
         return { identifier, state: known.has(identifier) ? 'applied' : 'missing' };
      });

      const pendingStatus = all
         .filter((identifier) => { return !appliedSet.has(identifier); })
         .map((identifier): MigrationStatus => {
            return { identifier, state: 'pending' };
         });

      return [ ...appliedStatus, ...pendingStatus ];
   }

   /**
    * Run one direction of a script. Returns the failure, if any.
    */
   private async _execute(
      identifier: MigrationIdentifier,
      direction: 'up' | 'down',
      script: MigrationScript<TContext>
   ): Promise<{ reason: string; cause?: unknown } | undefined> {
      let outcome: MigrationOutcome;

      try {
         outcome = await script[direction](this._context);
      } catch(error) {
         return { reason: `${direction}() threw: ${describeError(error)}`, cause: error };
      }

      if (outcome === false) {
         this._logger.debug({ migration: identifier }, `${direction}() returned false`);
         return { reason: `${direction}() returned false` };
      }

      return undefined;
   }

   private async _ledgerExists(): Promise<boolean> {
      try {
         return await this._ledger.exists();
      } catch(error) {
         throw error instanceof MigrationError
            ? error
            : new LedgerReadError(describeError(error), { cause: error });
      }
   }

   private _asLedgerWriteError(
      error: unknown,
      operation: LedgerOperation,
      identifier: MigrationIdentifier | undefined
   ): LedgerWriteError {
      if (error instanceof LedgerWriteError) {
         return error;
      }

      return new LedgerWriteError(operation, identifier, describeError(error), { cause: error });
   }

   private _report(progress: MigrationProgress): void {
      this._onProgress?.(progress);
   }

}
