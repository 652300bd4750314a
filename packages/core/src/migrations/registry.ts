/**
 * Migration registry - a script store filled explicitly in code.
 */

import type { MigrationContext, MigrationFactory, MigrationIdentifier, MigrationScript } from './types.ts';
import { DuplicateMigrationError, UnresolvableMigrationError } from './types.ts';
import type { ScriptStore } from '../script-store.ts';
import { compareIdentifiers, toMigrationScript } from '../script-store.ts';

/**
 * Script store that maps identifiers to factories registered in code.
 * When adding a migration:
 * 1. Write a factory returning an object with `up` and `down`
 * 2. Register it under an identifier that sorts after the existing ones
 */
export class RegistryScriptStore<TContext = MigrationContext> implements ScriptStore<TContext> {

   private readonly _factories = new Map<MigrationIdentifier, MigrationFactory<TContext>>();

   public constructor(entries: Record<MigrationIdentifier, MigrationFactory<TContext>> = {}) {
      for (const [ identifier, factory ] of Object.entries(entries)) {
         this.register(identifier, factory);
      }
   }

   /**
    * @throws DuplicateMigrationError if the identifier is already registered
    */
   public register(identifier: MigrationIdentifier, factory: MigrationFactory<TContext>): this {
      if (this._factories.has(identifier)) {
         throw new DuplicateMigrationError(identifier);
      }

      this._factories.set(identifier, factory);

      return this;
   }

   public listAll(): MigrationIdentifier[] {
      return [ ...this._factories.keys() ].sort(compareIdentifiers);
   }

   public exists(identifier: MigrationIdentifier): boolean {
      return this._factories.has(identifier);
   }

   public load(identifier: MigrationIdentifier): MigrationScript<TContext> {
      const factory = this._factories.get(identifier);

      if (!factory) {
         throw new UnresolvableMigrationError(identifier, 'not registered');
      }

      let script: unknown;

      try {
         script = factory();
      } catch(error) {
         throw new UnresolvableMigrationError(identifier, 'factory threw', { cause: error });
      }

      return toMigrationScript<TContext>(identifier, script, 'factory result');
   }

}
