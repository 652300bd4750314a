/**
 * Project - wires the database, stores, templates and migrator for one
 * configured project.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import Database from 'better-sqlite3';
import type { TidemarkConfig } from './config.ts';
import { MEMORY_DATABASE } from './config.ts';
import { SqliteLedgerStore } from './ledger.ts';
import { DirectoryScriptStore } from './script-store.ts';
import { TemplateCollection } from './templates.ts';
import { Scaffolder } from './scaffolder.ts';
import { MigrationCreator } from './creator.ts';
import { Migrator } from './migrations/migrator.ts';
import type { MigrationContext, MigrationProgressCallback } from './migrations/types.ts';
import { createLogger, type Logger } from './logger.ts';

export interface OpenProjectOptions {

   /** Diagnostics logger (default: `createLogger('tidemark')`) */
   logger?: Logger;

   /** Forwarded to the migrator */
   onProgress?: MigrationProgressCallback;
}

export interface Project {
   config: TidemarkConfig;
   db: Database.Database;
   ledger: SqliteLedgerStore;
   scripts: DirectoryScriptStore<MigrationContext>;
   templates: TemplateCollection;
   creator: MigrationCreator;
   migrator: Migrator<MigrationContext>;

   /** Close the database handle */
   close(): void;
}

/**
 * Built-in templates plus those found in the configured templates directory.
 * Does not touch the database.
 */
export async function loadTemplates(
   config: Pick<TidemarkConfig, 'templatesDir'>,
   logger: Logger = createLogger('tidemark')
): Promise<TemplateCollection> {
   const templates = TemplateCollection.withBuiltins();

   if (config.templatesDir) {
      const count = await templates.registerDirectory(config.templatesDir);

      logger.debug({ dir: config.templatesDir, count }, 'Registered custom templates');
   }

   return templates;
}

/**
 * Open the project database and build its migrator and creator.
 */
export async function openProject(config: TidemarkConfig, options: OpenProjectOptions = {}): Promise<Project> {
   const logger = options.logger ?? createLogger('tidemark');

   const templates = await loadTemplates(config, logger);

   if (config.database !== MEMORY_DATABASE) {
      await fs.mkdir(path.dirname(config.database), { recursive: true });
   }

   const db = new Database(config.database);

   const ledger = new SqliteLedgerStore(db, config.table),
         scripts = new DirectoryScriptStore<MigrationContext>({ dir: config.dir });

   const migrator = new Migrator<MigrationContext>({
      ledger,
      scripts,
      context: { db, logger: logger.child({ component: 'migration' }) },
      logger: logger.child({ component: 'migrator' }),
      onProgress: options.onProgress,
   });

   const creator = new MigrationCreator({
      dir: config.dir,
      scaffolder: new Scaffolder(templates),
      scripts,
      extension: config.extension,
   });

   return {
      config,
      db,
      ledger,
      scripts,
      templates,
      creator,
      migrator,
      close: () => {
         db.close();
      },
   };
}
