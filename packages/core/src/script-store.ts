/**
 * Script stores - enumerate migration identifiers and materialize their scripts
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { pathToFileURL } from 'url';
import fg from 'fast-glob';
import type {
   MaybePromise,
   MigrationContext,
   MigrationIdentifier,
   MigrationScript,
} from './migrations/types.ts';
import { UnresolvableMigrationError } from './migrations/types.ts';
import { getMigrationClassName } from './identifier.ts';

/**
 * Source of migration scripts consumed by the migrator.
 */
export interface ScriptStore<TContext = MigrationContext> {

   /** Every known identifier, sorted lexically */
   listAll(): MaybePromise<MigrationIdentifier[]>;

   exists(identifier: MigrationIdentifier): MaybePromise<boolean>;

   /** Materialize the script; throws UnresolvableMigrationError */
   load(identifier: MigrationIdentifier): MaybePromise<MigrationScript<TContext>>;
}

export const MIGRATION_EXTENSIONS = [ 'ts', 'mts', 'js', 'mjs' ] as const;

export type MigrationExtension = typeof MIGRATION_EXTENSIONS[number];

/**
 * Order identifiers by code unit, independent of locale.
 */
export function compareIdentifiers(a: MigrationIdentifier, b: MigrationIdentifier): number {
   if (a === b) {
      return 0;
   }

   return a < b ? -1 : 1;
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null;
}

function isMissingPathError(error: unknown): boolean {
   return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Whether a value satisfies the migration script contract.
 */
export function isMigrationScript<TContext = MigrationContext>(value: unknown): value is MigrationScript<TContext> {
   return isRecord(value) && typeof value.up === 'function' && typeof value.down === 'function';
}

/**
 * Turn an exported value into a script: classes are constructed with no
 * arguments, objects are used as they are.
 *
 * @throws UnresolvableMigrationError if construction fails or the result lacks `up`/`down`
 */
export function toMigrationScript<TContext = MigrationContext>(
   identifier: MigrationIdentifier,
   exported: unknown,
   label: string
): MigrationScript<TContext> {
   let script: unknown = exported;

   if (typeof exported === 'function') {
      try {
         script = Reflect.construct(exported, []);
      } catch(error) {
         throw new UnresolvableMigrationError(identifier, `${label} could not be constructed`, { cause: error });
      }
   }

   if (!isMigrationScript<TContext>(script)) {
      throw new UnresolvableMigrationError(identifier, `${label} does not implement up() and down()`);
   }

   return script;
}

export interface DirectoryScriptStoreOptions {

   /** Directory holding one module per migration */
   dir: string;

   /** File extensions to consider (default: ts, mts, js, mjs) */
   extensions?: readonly MigrationExtension[];
}

/**
 * Script store backed by a directory of ES modules named `<identifier>.<ext>`.
 *
 * A module provides its script as a named export called after the derived
 * class name (see {@link getMigrationClassName}), or as its default export.
 */
export class DirectoryScriptStore<TContext = MigrationContext> implements ScriptStore<TContext> {

   private readonly _dir: string;
   private readonly _extensions: readonly MigrationExtension[];

   public constructor(options: DirectoryScriptStoreOptions) {
      this._dir = path.resolve(options.dir);
      this._extensions = options.extensions ?? MIGRATION_EXTENSIONS;
   }

   public getDirectory(): string {
      return this._dir;
   }

   public async listAll(): Promise<MigrationIdentifier[]> {
      const files = await this._findFiles();

      return [ ...files.keys() ].sort(compareIdentifiers);
   }

   public async exists(identifier: MigrationIdentifier): Promise<boolean> {
      const files = await this._findFiles();

      return files.has(identifier);
   }

   /**
    * Resolve the file path for an identifier.
    *
    * @throws UnresolvableMigrationError if there is no file, or more than one
    */
   public async resolvePath(identifier: MigrationIdentifier): Promise<string> {
      const candidates = (await this._findFiles()).get(identifier) ?? [];

      if (candidates.length === 0) {
         throw new UnresolvableMigrationError(identifier, `no migration file in ${this._dir}`);
      }

      if (candidates.length > 1) {
         const names = candidates.map((file) => { return path.basename(file); });

         throw new UnresolvableMigrationError(identifier, `ambiguous migration files: ${names.join(', ')}`);
      }

      return candidates[0];
   }

   public async load(identifier: MigrationIdentifier): Promise<MigrationScript<TContext>> {
      const filePath = await this.resolvePath(identifier);

      let loaded: unknown;

      try {
         loaded = await import(pathToFileURL(filePath).href);
      } catch(error) {
         const reason = error instanceof Error ? error.message : String(error);

         throw new UnresolvableMigrationError(identifier, `failed to import ${filePath}: ${reason}`, { cause: error });
      }

      if (!isRecord(loaded)) {
         throw new UnresolvableMigrationError(identifier, `${filePath} is not a module`);
      }

      const className = getMigrationClassName(identifier);

      if (loaded[className] !== undefined) {
         return toMigrationScript<TContext>(identifier, loaded[className], `export ${className}`);
      }

      if (loaded.default !== undefined) {
         return toMigrationScript<TContext>(identifier, loaded.default, 'default export');
      }

      throw new UnresolvableMigrationError(
         identifier,
         `${path.basename(filePath)} exports neither ${className} nor a default export`
      );
   }

   /**
    * Map each identifier in the directory to the files that carry it.
    */
   private async _findFiles(): Promise<Map<MigrationIdentifier, string[]>> {
      const files = new Map<MigrationIdentifier, string[]>();

      try {
         const stats = await fs.stat(this._dir);

         if (!stats.isDirectory()) {
            return files;
         }
      } catch(error) {
         if (isMissingPathError(error)) {
            return files;
         }

         throw error;
      }

      const entries = await fg(
         this._extensions.map((extension) => { return `*.${extension}`; }),
         {
            cwd: this._dir,
            onlyFiles: true,
            ignore: [ '*.d.ts', '*.d.mts' ],
         }
      );

      for (const entry of entries.sort()) {
         const identifier = path.basename(entry, path.extname(entry)),
               existing = files.get(identifier) ?? [];

         existing.push(path.join(this._dir, entry));
         files.set(identifier, existing);
      }

      return files;
   }

}
