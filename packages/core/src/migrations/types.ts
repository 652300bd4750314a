/**
 * Migration types, the script contract, and the error taxonomy of the engine.
 */

import type Database from 'better-sqlite3';
import type { Logger } from '../logger.ts';

export type MaybePromise<T> = T | Promise<T>;

/**
 * Opaque, lexically sortable name of one migration, by convention
 * `YYYY_MM_DD_HHMMSS_uuuuuu_<name>`.
 */
export type MigrationIdentifier = string;

/**
 * What `up` and `down` report. Only an explicit `false` counts as failure.
 */
export type MigrationOutcome = boolean | void;

/**
 * Context handed to scripts loaded from a project directory.
 */
export interface MigrationContext {

   /** Open handle to the project database */
   db: Database.Database;

   /** Child logger bound to the running migration */
   logger: Logger;
}

/**
 * An executable migration with a forward and a backward operation.
 */
export interface MigrationScript<TContext = MigrationContext> {
   up(context: TContext): MaybePromise<MigrationOutcome>;
   down(context: TContext): MaybePromise<MigrationOutcome>;
}

export type MigrationFactory<TContext = MigrationContext> = () => MigrationScript<TContext>;

export type MigrationState = 'applied' | 'pending' | 'missing';

export interface MigrationStatus {
   identifier: MigrationIdentifier;

   /**
    * `missing` means the ledger holds the identifier but the script store no
    * longer knows it.
    */
   state: MigrationState;
}

/**
 * Outcome of running every pending migration.
 */
export interface RunPendingResult {

   /** Identifiers applied during this run, in order */
   ran: MigrationIdentifier[];

   /** Identifiers left pending, starting with the one that failed */
   remaining: MigrationIdentifier[];

   /** The condition that stopped the run, if any */
   error?: MigrationError;
}

export type MigrationPhase =
   | 'applying'
   | 'applied'
   | 'apply-failed'
   | 'reverting'
   | 'reverted'
   | 'revert-failed';

export interface MigrationProgress {
   phase: MigrationPhase;
   identifier: MigrationIdentifier;
   error?: MigrationError;
}

export type MigrationProgressCallback = (progress: MigrationProgress) => void;

/**
 * Base class of every condition raised by the migration engine and its stores.
 */
export class MigrationError extends Error {

   public readonly name: string = 'MigrationError';

   public constructor(
      message: string,
      public readonly identifier?: MigrationIdentifier,
      options?: ErrorOptions
   ) {
      super(message, options);
   }

}

/**
 * The script for an identifier cannot be found, loaded, or does not implement
 * `up` and `down`. Authoring errors like this are never retried.
 */
export class UnresolvableMigrationError extends MigrationError {

   public readonly name: string = 'UnresolvableMigrationError';

   public constructor(identifier: MigrationIdentifier, reason: string, options?: ErrorOptions) {
      super(`Cannot resolve migration ${identifier}: ${reason}`, identifier, options);
   }

}

/**
 * A migration's `up` returned false or threw. Nothing was written to the ledger.
 */
export class MigrationFailedError extends MigrationError {

   public readonly name: string = 'MigrationFailedError';

   public constructor(identifier: MigrationIdentifier, reason: string, options?: ErrorOptions) {
      super(`Migration ${identifier} failed: ${reason}`, identifier, options);
   }

}

/**
 * A migration's `down` returned false or threw. Its ledger entry was kept.
 */
export class RollbackFailedError extends MigrationError {

   public readonly name: string = 'RollbackFailedError';

   public constructor(identifier: MigrationIdentifier, reason: string, options?: ErrorOptions) {
      super(`Rollback of ${identifier} failed: ${reason}`, identifier, options);
   }

}

export type LedgerOperation = 'initialize' | 'record' | 'remove';

/**
 * The ledger medium refused a write. Losing one would make an applied migration
 * run again, so this always propagates.
 */
export class LedgerWriteError extends MigrationError {

   public readonly name: string = 'LedgerWriteError';

   public constructor(
      public readonly operation: LedgerOperation,
      identifier: MigrationIdentifier | undefined,
      reason: string,
      options?: ErrorOptions
   ) {
      super(
         identifier
            ? `Ledger ${operation} failed for ${identifier}: ${reason}`
            : `Ledger ${operation} failed: ${reason}`,
         identifier,
         options
      );
   }

}

export class LedgerReadError extends MigrationError {

   public readonly name: string = 'LedgerReadError';

   public constructor(reason: string, options?: ErrorOptions) {
      super(`Ledger read failed: ${reason}`, undefined, options);
   }

}

export class AlreadyAppliedError extends MigrationError {

   public readonly name: string = 'AlreadyAppliedError';

   public constructor(identifier: MigrationIdentifier) {
      super(`Migration ${identifier} has already been applied`, identifier);
   }

}

export class NotAppliedError extends MigrationError {

   public readonly name: string = 'NotAppliedError';

   public constructor(identifier: MigrationIdentifier) {
      super(`Migration ${identifier} has not been applied`, identifier);
   }

}

export class DuplicateMigrationError extends MigrationError {

   public readonly name: string = 'DuplicateMigrationError';

   public constructor(identifier: MigrationIdentifier) {
      super(`Migration ${identifier} is already registered`, identifier);
   }

}
