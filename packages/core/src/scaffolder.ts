/**
 * Scaffolder - renders migration source from templates
 */

import * as fs from 'fs/promises';
import type { TemplateCollection } from './templates.ts';

export type Substitutions = Record<string, string>;

/**
 * Replace every `__key__` token with its value. Tokens without a value stay as
 * they are.
 *
 * @example
 * replacePlaceholders('CREATE TABLE __table__', { table: 'users' }) // → "CREATE TABLE users"
 */
export function replacePlaceholders(template: string, substitutions: Substitutions): string {
   let rendered = template;

   for (const [ placeholder, value ] of Object.entries(substitutions)) {
      rendered = rendered.split(`__${placeholder}__`).join(value);
   }

   return rendered;
}

export class Scaffolder {

   private readonly _templates: TemplateCollection;

   public constructor(templates: TemplateCollection) {
      this._templates = templates;
   }

   public getTemplates(): TemplateCollection {
      return this._templates;
   }

   /**
    * Render a template by name or alias (default template when omitted).
    *
    * @throws TemplateNotFoundError if the template is not registered
    */
   public async render(templateName: string | undefined, substitutions: Substitutions): Promise<string> {
      const template = this._templates.select(templateName);

      const content = await fs.readFile(template.path, 'utf-8');

      return replacePlaceholders(content, substitutions);
   }

}
