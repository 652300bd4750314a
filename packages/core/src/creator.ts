/**
 * MigrationCreator - writes new migration files from templates
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { MigrationIdentifier } from './migrations/types.ts';
import type { Scaffolder, Substitutions } from './scaffolder.ts';
import type { ScriptStore } from './script-store.ts';
import {
   IdentifierClock,
   constructMigrationIdentifier,
   getMigrationClassName,
   normalizeMigrationName,
   parseMigrationTimestamp,
} from './identifier.ts';

/**
 * Extensions new migration files may have. The built-in templates use type
 * syntax, so only TypeScript extensions can load what they render.
 */
export const SCAFFOLD_EXTENSIONS = [ 'ts', 'mts' ] as const;

export type ScaffoldExtension = typeof SCAFFOLD_EXTENSIONS[number];

export interface MigrationCreatorConfig {

   /** Directory new migration files are written to */
   dir: string;

   scaffolder: Scaffolder;

   /** Existing scripts; new identifiers always sort after the newest one */
   scripts?: ScriptStore<unknown>;

   /** Timestamp source (default: a clock on the system time) */
   clock?: IdentifierClock;

   /** Extension of written files (default: ts) */
   extension?: ScaffoldExtension;
}

/**
 * A migration file produced by {@link MigrationCreator.create}.
 */
export interface CreatedMigration {
   identifier: MigrationIdentifier;
   className: string;
   path: string;
   template: string;
}

export class MigrationCreator {

   private readonly _dir: string;
   private readonly _scaffolder: Scaffolder;
   private readonly _scripts?: ScriptStore<unknown>;
   private readonly _clock: IdentifierClock;
   private readonly _extension: ScaffoldExtension;

   public constructor(config: MigrationCreatorConfig) {
      this._dir = path.resolve(config.dir);
      this._scaffolder = config.scaffolder;
      this._scripts = config.scripts;
      this._clock = config.clock ?? new IdentifierClock();
      this._extension = config.extension ?? 'ts';
   }

   /**
    * Render a template into a new migration file.
    *
    * The values `className`, `name` and `identifier` are always substituted and
    * take precedence over caller-provided ones.
    *
    * @param name - Human part of the identifier, e.g. `add_users_table`
    * @param templateName - Template name or alias (default template when omitted)
    * @param substitutions - Extra `__key__` replacements
    * @throws InvalidMigrationNameError if the name is not usable
    * @throws TemplateNotFoundError if the template is not registered
    */
   public async create(
      name: string,
      templateName?: string,
      substitutions: Substitutions = {}
   ): Promise<CreatedMigration> {
      const normalizedName = normalizeMigrationName(name),
            template = this._scaffolder.getTemplates().select(templateName);

      await fs.mkdir(this._dir, { recursive: true });

      const identifier = constructMigrationIdentifier(
         normalizedName,
         this._clock.next(await this._latestTimestamp())
      );

      const className = getMigrationClassName(identifier);

      const content = await this._scaffolder.render(template.name, {
         ...substitutions,
         className,
         name: normalizedName,
         identifier,
      });

      const filePath = path.join(this._dir, `${identifier}.${this._extension}`);

      // 'wx' refuses to overwrite an existing file
      await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });

      return { identifier, className, path: filePath, template: template.name };
   }

   private async _latestTimestamp(): Promise<number | undefined> {
      if (!this._scripts) {
         return undefined;
      }

      const timestamps = (await this._scripts.listAll())
         .map(parseMigrationTimestamp)
         .filter((value): value is number => { return value !== undefined; });

      return timestamps.length > 0 ? Math.max(...timestamps) : undefined;
   }

}
