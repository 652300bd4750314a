/**
 * Template collection - named migration templates and their aliases
 *
 * Built-in templates live in `packages/core/templates/` as `<name>.tpl` files.
 * Projects can add their own with {@link TemplateCollection.registerDirectory}.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import fg from 'fast-glob';
import { TemplateNotFoundError } from './errors.ts';

export interface MigrationTemplate {

   /** Name used to select the template */
   name: string;

   /** Absolute path to the template file */
   path: string;

   /** One-line description shown by `tidemark templates` */
   description: string;

   /** Alternative names */
   aliases: string[];
}

export const DEFAULT_TEMPLATE = 'default';

export const BUILTIN_TEMPLATES_DIR = path.resolve(
   path.dirname(fileURLToPath(import.meta.url)),
   '../templates'
);

const BUILTIN_TEMPLATES: Omit<MigrationTemplate, 'path'>[] = [
   {
      name: DEFAULT_TEMPLATE,
      description: 'Empty migration with up() and down()',
      aliases: [],
   },
   {
      name: 'create_table',
      description: 'Create a table (__table__) and drop it on rollback',
      aliases: [ 'table' ],
   },
   {
      name: 'add_column',
      description: 'Add a column (__column__ __type__) to a table (__table__)',
      aliases: [ 'column' ],
   },
   {
      name: 'sql',
      description: 'Run raw SQL statements in up() and down()',
      aliases: [ 'raw' ],
   },
];

export class TemplateCollection {

   private readonly _templates = new Map<string, MigrationTemplate>();
   private readonly _aliases = new Map<string, string>();

   /**
    * Create a collection holding the built-in templates.
    */
   public static withBuiltins(): TemplateCollection {
      const collection = new TemplateCollection();

      for (const template of BUILTIN_TEMPLATES) {
         collection.register({
            ...template,
            path: path.join(BUILTIN_TEMPLATES_DIR, `${template.name}.tpl`),
         });
      }

      return collection;
   }

   /**
    * Register a template. A template with the same name replaces the earlier one.
    */
   public register(template: MigrationTemplate): void {
      const existing = this._templates.get(template.name);

      if (existing) {
         for (const alias of existing.aliases) {
            this._aliases.delete(alias);
         }
      }

      this._templates.set(template.name, template);

      for (const alias of template.aliases) {
         this._aliases.set(alias, template.name);
      }
   }

   /**
    * Register every `*.tpl` file in a directory under its base name.
    *
    * @returns Number of templates registered
    */
   public async registerDirectory(dir: string): Promise<number> {
      const absoluteDir = path.resolve(dir);

      const stats = await fs.stat(absoluteDir);

      if (!stats.isDirectory()) {
         throw new Error(`Template directory is not a directory: ${absoluteDir}`);
      }

      const files = await fg('*.tpl', { cwd: absoluteDir, onlyFiles: true });

      for (const file of files.sort()) {
         this.register({
            name: path.basename(file, '.tpl'),
            path: path.join(absoluteDir, file),
            description: `Custom template from ${absoluteDir}`,
            aliases: [],
         });
      }

      return files.length;
   }

   public all(): MigrationTemplate[] {
      return [ ...this._templates.values() ].sort((a, b) => {
         return a.name.localeCompare(b.name);
      });
   }

   public has(name: string): boolean {
      return this._templates.has(name) || this._aliases.has(name);
   }

   /**
    * Resolve a name or alias, falling back to the default template.
    *
    * @throws TemplateNotFoundError if nothing matches
    */
   public select(name?: string): MigrationTemplate {
      const requested = name ?? DEFAULT_TEMPLATE,
            resolvedName = this._aliases.get(requested) ?? requested;

      const template = this._templates.get(resolvedName);

      if (!template) {
         throw new TemplateNotFoundError(requested, this.all().map((t) => { return t.name; }));
      }

      return template;
   }

}
