/**
 * Ledger stores - durable record of which migrations have been applied
 *
 * The SQLite ledger keeps one row per applied migration:
 *
 *   id        INTEGER PRIMARY KEY AUTOINCREMENT  (application order)
 *   migration TEXT NOT NULL, unique             (the migration identifier)
 */

import type Database from 'better-sqlite3';
import type { MaybePromise, MigrationIdentifier } from './migrations/types.ts';
import { LedgerReadError, LedgerWriteError } from './migrations/types.ts';
import { ConfigError } from './errors.ts';

/**
 * Storage for the applied-migration ledger.
 */
export interface LedgerStore {

   /** Whether the ledger medium has been created */
   exists(): MaybePromise<boolean>;

   /** Create the ledger medium. Callers check {@link exists} first. */
   initialize(): MaybePromise<void>;

   /** Applied identifiers in application order */
   listApplied(): MaybePromise<MigrationIdentifier[]>;

   /** Append an identifier; throws LedgerWriteError on failure or duplicate */
   recordApplied(identifier: MigrationIdentifier): MaybePromise<void>;

   /** Delete an identifier; does nothing if it is absent */
   removeApplied(identifier: MigrationIdentifier): MaybePromise<void>;
}

export const DEFAULT_LEDGER_TABLE = 'migrations';

const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isSqlIdentifier(value: string): boolean {
   return SQL_IDENTIFIER.test(value);
}

function describeError(error: unknown): string {
   return error instanceof Error ? error.message : String(error);
}

/**
 * Ledger kept in a table of a better-sqlite3 database.
 */
export class SqliteLedgerStore implements LedgerStore {

   private readonly _db: Database.Database;
   private readonly _table: string;

   public constructor(db: Database.Database, table: string = DEFAULT_LEDGER_TABLE) {
      if (!isSqlIdentifier(table)) {
         throw new ConfigError(`Invalid ledger table name '${table}'`);
      }

      this._db = db;
      this._table = table;
   }

   public getTable(): string {
      return this._table;
   }

   public exists(): boolean {
      try {
         const row = this._db
            .prepare('SELECT name FROM sqlite_master WHERE type = ? AND name = ?')
            .get('table', this._table);

         return row !== undefined;
      } catch(error) {
         throw new LedgerReadError(describeError(error), { cause: error });
      }
   }

   public initialize(): void {
      const createTable = this._db.transaction(() => {
         this._db.exec(`
            CREATE TABLE ${this._table} (
               id INTEGER PRIMARY KEY AUTOINCREMENT,
               migration TEXT NOT NULL
            )
         `);

         this._db.exec(`
            CREATE UNIQUE INDEX ${this._table}_migration_unique
            ON ${this._table}(migration)
         `);
      });

      try {
         createTable();
      } catch(error) {
         throw new LedgerWriteError('initialize', undefined, describeError(error), { cause: error });
      }
   }

   public listApplied(): MigrationIdentifier[] {
      try {
         const rows = this._db
            .prepare(`SELECT migration FROM ${this._table} ORDER BY id ASC`)
            .pluck()
            .all();

         return rows.map(String);
      } catch(error) {
         throw new LedgerReadError(describeError(error), { cause: error });
      }
   }

   public recordApplied(identifier: MigrationIdentifier): void {
      try {
         this._db
            .prepare(`INSERT INTO ${this._table} (migration) VALUES (?)`)
            .run(identifier);
      } catch(error) {
         throw new LedgerWriteError('record', identifier, describeError(error), { cause: error });
      }
   }

   public removeApplied(identifier: MigrationIdentifier): void {
      try {
         this._db
            .prepare(`DELETE FROM ${this._table} WHERE migration = ?`)
            .run(identifier);
      } catch(error) {
         throw new LedgerWriteError('remove', identifier, describeError(error), { cause: error });
      }
   }

}

/**
 * Ledger held in process memory. Useful for tests and for callers that keep
 * their own persistence.
 */
export class MemoryLedgerStore implements LedgerStore {

   private _initialized: boolean;
   private readonly _applied: MigrationIdentifier[];

   /**
    * @param applied - Identifiers to start with; passing any marks the ledger as initialized
    */
   public constructor(applied?: MigrationIdentifier[]) {
      this._initialized = applied !== undefined;
      this._applied = applied ? [ ...applied ] : [];
   }

   public exists(): boolean {
      return this._initialized;
   }

   public initialize(): void {
      this._initialized = true;
   }

   public listApplied(): MigrationIdentifier[] {
      return [ ...this._applied ];
   }

   public recordApplied(identifier: MigrationIdentifier): void {
      if (!this._initialized) {
         throw new LedgerWriteError('record', identifier, 'ledger is not initialized');
      }

      if (this._applied.includes(identifier)) {
         throw new LedgerWriteError('record', identifier, 'identifier is already recorded');
      }

      this._applied.push(identifier);
   }

   public removeApplied(identifier: MigrationIdentifier): void {
      const index = this._applied.indexOf(identifier);

      if (index !== -1) {
         this._applied.splice(index, 1);
      }
   }

}
