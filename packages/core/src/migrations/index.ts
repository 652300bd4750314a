/**
 * Migration engine exports.
 */

export type {
   LedgerOperation,
   MaybePromise,
   MigrationContext,
   MigrationFactory,
   MigrationIdentifier,
   MigrationOutcome,
   MigrationPhase,
   MigrationProgress,
   MigrationProgressCallback,
   MigrationScript,
   MigrationState,
   MigrationStatus,
   RunPendingResult,
} from './types.ts';
export {
   AlreadyAppliedError,
   DuplicateMigrationError,
   LedgerReadError,
   LedgerWriteError,
   MigrationError,
   MigrationFailedError,
   NotAppliedError,
   RollbackFailedError,
   UnresolvableMigrationError,
} from './types.ts';
export { Migrator } from './migrator.ts';
export type { MigratorConfig } from './migrator.ts';
export { RegistryScriptStore } from './registry.ts';
