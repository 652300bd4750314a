/**
 * @tidemark/core - Migration engine for tidemark
 *
 * This package computes pending migrations, applies and rolls them back in
 * order, records them in a ledger, and scaffolds new migration files from
 * templates.
 */

export const VERSION = '0.1.0';

// ============================================================================
// Engine
// ============================================================================

export {
   Migrator,
   RegistryScriptStore,
   AlreadyAppliedError,
   DuplicateMigrationError,
   LedgerReadError,
   LedgerWriteError,
   MigrationError,
   MigrationFailedError,
   NotAppliedError,
   RollbackFailedError,
   UnresolvableMigrationError,
} from './migrations/index.ts';
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
   MigratorConfig,
   RunPendingResult,
} from './migrations/index.ts';

// ============================================================================
// Stores
// ============================================================================

export { SqliteLedgerStore, MemoryLedgerStore, DEFAULT_LEDGER_TABLE, isSqlIdentifier } from './ledger.ts';
export type { LedgerStore } from './ledger.ts';

export {
   DirectoryScriptStore,
   MIGRATION_EXTENSIONS,
   compareIdentifiers,
   isMigrationScript,
   toMigrationScript,
} from './script-store.ts';
export type { ScriptStore, DirectoryScriptStoreOptions, MigrationExtension } from './script-store.ts';

// ============================================================================
// Identifiers
// ============================================================================

export {
   IdentifierClock,
   TIMESTAMP_SEGMENTS,
   constructMigrationIdentifier,
   formatMigrationTimestamp,
   getMigrationClassName,
   normalizeMigrationName,
   parseMigrationTimestamp,
   studly,
} from './identifier.ts';

// ============================================================================
// Scaffolding
// ============================================================================

export { TemplateCollection, DEFAULT_TEMPLATE, BUILTIN_TEMPLATES_DIR } from './templates.ts';
export type { MigrationTemplate } from './templates.ts';

export { Scaffolder, replacePlaceholders } from './scaffolder.ts';
export type { Substitutions } from './scaffolder.ts';

export { MigrationCreator, SCAFFOLD_EXTENSIONS } from './creator.ts';
export type { MigrationCreatorConfig, CreatedMigration, ScaffoldExtension } from './creator.ts';

// ============================================================================
// Configuration
// ============================================================================

export { loadConfig, parseConfig, CONFIG_FILE_NAME, MEMORY_DATABASE } from './config.ts';
export type { TidemarkConfig, TidemarkConfigInput, LoadConfigOptions } from './config.ts';

export { loadTemplates, openProject } from './project.ts';
export type { Project, OpenProjectOptions } from './project.ts';

// ============================================================================
// Errors & Logging
// ============================================================================

export { ConfigError, InvalidMigrationNameError, TemplateNotFoundError } from './errors.ts';

export { createLogger, getLogLevel, isLogLevel } from './logger.ts';
export type { Logger, LogLevel, LoggerOptions } from './logger.ts';
