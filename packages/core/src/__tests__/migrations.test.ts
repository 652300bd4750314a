/**
 * Tests for the migration engine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import {
   AlreadyAppliedError,
   LedgerWriteError,
   MigrationFailedError,
   Migrator,
   NotAppliedError,
   RegistryScriptStore,
   RollbackFailedError,
   UnresolvableMigrationError,
} from '../migrations/index.ts';
import type { MigrationFactory, MigrationIdentifier, MigrationPhase } from '../migrations/index.ts';
import { MemoryLedgerStore, SqliteLedgerStore } from '../ledger.ts';
import type { LedgerStore } from '../ledger.ts';
import { createLogger } from '../logger.ts';

interface TestContext {
   calls: string[];
}

type Behaviour = 'ok' | 'false' | 'throw';

const logger = createLogger('migrations-test', { level: 'silent' });

function outcome(behaviour: Behaviour, label: string): boolean {
   if (behaviour === 'throw') {
      throw new Error(`boom in ${label}`);
   }

   return behaviour === 'ok';
}

function scriptFor(
   identifier: MigrationIdentifier,
   behaviours: { up?: Behaviour; down?: Behaviour } = {}
): MigrationFactory<TestContext> {
   return () => {
      return {
         up: (context: TestContext) => {
            context.calls.push(`up:${identifier}`);
            return outcome(behaviours.up ?? 'ok', identifier);
         },
         down: (context: TestContext) => {
            context.calls.push(`down:${identifier}`);
            return outcome(behaviours.down ?? 'ok', identifier);
         },
      };
   };
}

class FailingWriteLedger extends MemoryLedgerStore {

   public recordApplied(): void {
      throw new Error('disk full');
   }

}

class FailingRemoveLedger extends MemoryLedgerStore {

   public removeApplied(): void {
      throw new Error('disk full');
   }

}

describe('Migrator', () => {
   let context: TestContext,
       scripts: RegistryScriptStore<TestContext>,
       ledger: MemoryLedgerStore;

   function createMigrator(store: LedgerStore = ledger, phases?: MigrationPhase[]): Migrator<TestContext> {
      return new Migrator<TestContext>({
         ledger: store,
         scripts,
         context,
         logger,
         onProgress: phases
            ? (progress) => { phases.push(progress.phase); }
            : undefined,
      });
   }

   beforeEach(() => {
      context = { calls: [] };
      scripts = new RegistryScriptStore<TestContext>();
      ledger = new MemoryLedgerStore();

      // Registered out of order on purpose
      scripts
         .register('D', scriptFor('D'))
         .register('A', scriptFor('A'))
         .register('C', scriptFor('C'))
         .register('B', scriptFor('B'));
   });

   describe('computePending', () => {
      it('returns all script identifiers minus applied ones, in script order', async () => {
         const migrator = createMigrator(new MemoryLedgerStore([ 'D', 'B' ]));

         expect(await migrator.computePending()).toEqual([ 'A', 'C' ]);
      });

      it('treats an uninitialized ledger as empty without creating it', async () => {
         const migrator = createMigrator();

         expect(await migrator.computePending()).toEqual([ 'A', 'B', 'C', 'D' ]);
         expect(ledger.exists()).toBe(false);
      });

      it('returns the same result when called twice', async () => {
         const migrator = createMigrator(new MemoryLedgerStore([ 'C' ]));

         const first = await migrator.computePending(),
               second = await migrator.computePending();

         expect(second).toEqual(first);
         expect(first).toEqual([ 'A', 'B', 'D' ]);
      });

      it('returns nothing when every migration is applied', async () => {
         const migrator = createMigrator(new MemoryLedgerStore([ 'A', 'B', 'C', 'D' ]));

         expect(await migrator.computePending()).toEqual([]);
      });
   });

   describe('apply', () => {
      it('runs up() and records the identifier once', async () => {
         const migrator = createMigrator();

         await migrator.apply('B');

         expect(context.calls).toEqual([ 'up:B' ]);
         expect(await migrator.listApplied()).toEqual([ 'B' ]);
         expect(await migrator.computePending()).toEqual([ 'A', 'C', 'D' ]);
      });

      it('fails with MigrationFailedError and leaves the ledger alone when up() returns false', async () => {
         scripts.register('E', scriptFor('E', { up: 'false' }));

         const migrator = createMigrator(new MemoryLedgerStore([ 'A' ]));

         await expect(migrator.apply('E')).rejects.toThrow('Migration E failed: up() returned false');
         expect(await migrator.listApplied()).toEqual([ 'A' ]);
         expect(await migrator.computePending()).toContain('E');
      });

      it('keeps the thrown error as the cause when up() throws', async () => {
         scripts.register('E', scriptFor('E', { up: 'throw' }));

         const migrator = createMigrator();

         const error = await migrator.apply('E').catch((err: unknown) => { return err; });

         expect(error).toBeInstanceOf(MigrationFailedError);
         expect(error).toMatchObject({
            identifier: 'E',
            message: 'Migration E failed: up() threw: boom in E',
            cause: expect.any(Error),
         });
         expect(await migrator.listApplied()).toEqual([]);
      });

      it('refuses to apply an identifier that is already applied', async () => {
         const migrator = createMigrator(new MemoryLedgerStore([ 'A' ]));

         await expect(migrator.apply('A')).rejects.toBeInstanceOf(AlreadyAppliedError);
         expect(context.calls).toEqual([]);
      });

      it('propagates ledger failures as LedgerWriteError after running up()', async () => {
         const migrator = createMigrator(new FailingWriteLedger([]));

         const error = await migrator.apply('A').catch((err: unknown) => { return err; });

         expect(error).toBeInstanceOf(LedgerWriteError);
         expect(error).toMatchObject({ operation: 'record', identifier: 'A' });
         expect(context.calls).toEqual([ 'up:A' ]);
      });

      it('reports progress phases', async () => {
         scripts.register('E', scriptFor('E', { up: 'false' }));

         const phases: MigrationPhase[] = [],
               migrator = createMigrator(ledger, phases);

         await migrator.apply('A');
         await expect(migrator.apply('E')).rejects.toBeInstanceOf(MigrationFailedError);

         expect(phases).toEqual([ 'applying', 'applied', 'applying', 'apply-failed' ]);
      });
   });

   describe('runPending', () => {
      it('stops at the first failure and resumes from it on the next run', async () => {
         let bFails = true;

         scripts = new RegistryScriptStore<TestContext>({
            A: scriptFor('A'),
            B: () => {
               return {
                  up: (ctx: TestContext) => {
                     ctx.calls.push('up:B');
                     return !bFails;
                  },
                  down: () => { return true; },
               };
            },
            C: scriptFor('C'),
         });

         const migrator = createMigrator();

         const first = await migrator.runPending();

         expect(first.ran).toEqual([ 'A' ]);
         expect(first.remaining).toEqual([ 'B', 'C' ]);
         expect(first.error).toBeInstanceOf(MigrationFailedError);
         expect(first.error?.identifier).toBe('B');
         expect(await migrator.listApplied()).toEqual([ 'A' ]);
         expect(context.calls).toEqual([ 'up:A', 'up:B' ]);

         bFails = false;

         const second = await migrator.runPending();

         expect(second).toEqual({ ran: [ 'B', 'C' ], remaining: [] });
         expect(context.calls).toEqual([ 'up:A', 'up:B', 'up:B', 'up:C' ]);
         expect(await migrator.listApplied()).toEqual([ 'A', 'B', 'C' ]);
      });

      it('installs the ledger and returns an empty result when nothing is pending', async () => {
         const empty = new RegistryScriptStore<TestContext>();

         const migrator = new Migrator<TestContext>({ ledger, scripts: empty, context, logger });

         expect(await migrator.runPending()).toEqual({ ran: [], remaining: [] });
         expect(ledger.exists()).toBe(true);
      });

      it('stops on an unresolvable migration', async () => {
         scripts.register('BB', () => { throw new Error('bad factory'); });

         const migrator = createMigrator();

         const result = await migrator.runPending();

         expect(result.ran).toEqual([ 'A', 'B' ]);
         expect(result.remaining).toEqual([ 'BB', 'C', 'D' ]);
         expect(result.error).toBeInstanceOf(UnresolvableMigrationError);
      });
   });

   describe('rollback', () => {
      it('runs down() and removes the entry so the migration is pending again', async () => {
         const migrator = createMigrator(new MemoryLedgerStore([ 'A', 'B' ]));

         await migrator.rollback('B');

         expect(context.calls).toEqual([ 'down:B' ]);
         expect(await migrator.listApplied()).toEqual([ 'A' ]);
         expect(await migrator.computePending()).toEqual([ 'B', 'C', 'D' ]);
      });

      it('keeps the entry when down() returns false', async () => {
         scripts.register('E', scriptFor('E', { down: 'false' }));

         const migrator = createMigrator(new MemoryLedgerStore([ 'A', 'E' ]));

         await expect(migrator.rollback('E')).rejects.toBeInstanceOf(RollbackFailedError);
         expect(await migrator.listApplied()).toEqual([ 'A', 'E' ]);
      });

      it('keeps the entry when down() throws', async () => {
         scripts.register('E', scriptFor('E', { down: 'throw' }));

         const migrator = createMigrator(new MemoryLedgerStore([ 'E' ]));

         await expect(migrator.rollback('E')).rejects.toThrow('Rollback of E failed: down() threw: boom in E');
         expect(await migrator.listApplied()).toEqual([ 'E' ]);
      });

      it('may target a migration that is not the latest', async () => {
         const migrator = createMigrator();

         await migrator.runPending();
         await migrator.rollback('B');

         expect(await migrator.listApplied()).toEqual([ 'A', 'C', 'D' ]);
      });

      it('refuses to roll back a migration that is not applied', async () => {
         const migrator = createMigrator(new MemoryLedgerStore([ 'A' ]));

         await expect(migrator.rollback('B')).rejects.toBeInstanceOf(NotAppliedError);
         expect(context.calls).toEqual([]);
      });

      it('reports progress phases', async () => {
         const phases: MigrationPhase[] = [],
               migrator = createMigrator(new MemoryLedgerStore([ 'A' ]), phases);

         await migrator.rollback('A');

         expect(phases).toEqual([ 'reverting', 'reverted' ]);
      });

      it('propagates ledger failures as LedgerWriteError after running down()', async () => {
         const phases: MigrationPhase[] = [],
               migrator = createMigrator(new FailingRemoveLedger([ 'A' ]), phases);

         const error = await migrator.rollback('A').catch((err: unknown) => { return err; });

         expect(error).toBeInstanceOf(LedgerWriteError);
         expect(error).toMatchObject({ operation: 'remove', identifier: 'A', cause: expect.any(Error) });
         expect(context.calls).toEqual([ 'down:A' ]);
         expect(phases).toEqual([ 'reverting', 'revert-failed' ]);
         expect(await migrator.listApplied()).toEqual([ 'A' ]);
      });
   });

   describe('resolveScript', () => {
      it('fails with UnresolvableMigrationError for an unknown identifier', async () => {
         const migrator = createMigrator(new MemoryLedgerStore([ 'A' ]));

         await expect(migrator.resolveScript('nonexistent_id')).rejects.toBeInstanceOf(UnresolvableMigrationError);
         await expect(migrator.apply('nonexistent_id')).rejects.toBeInstanceOf(UnresolvableMigrationError);
         expect(await migrator.listApplied()).toEqual([ 'A' ]);
      });

      it('returns a script that satisfies the contract', async () => {
         const migrator = createMigrator();

         const script = await migrator.resolveScript('C');

         expect(typeof script.up).toBe('function');
         expect(typeof script.down).toBe('function');
      });
   });

   describe('forget', () => {
      it('removes the ledger entry without running down()', async () => {
         const migrator = createMigrator(new MemoryLedgerStore([ 'A', 'gone' ]));

         await migrator.forget('gone');

         expect(await migrator.listApplied()).toEqual([ 'A' ]);
         expect(context.calls).toEqual([]);
      });

      it('refuses identifiers that are not applied', async () => {
         const migrator = createMigrator(new MemoryLedgerStore([]));

         await expect(migrator.forget('A')).rejects.toBeInstanceOf(NotAppliedError);
      });
   });

   describe('status', () => {
      it('lists applied entries in ledger order, then pending ones', async () => {
         const migrator = createMigrator(new MemoryLedgerStore([ 'C', 'gone', 'A' ]));

         expect(await migrator.status()).toEqual([
            { identifier: 'C', state: 'applied' },
            { identifier: 'gone', state: 'missing' },
            { identifier: 'A', state: 'applied' },
            { identifier: 'B', state: 'pending' },
            { identifier: 'D', state: 'pending' },
         ]);
      });
   });

   describe('install', () => {
      it('creates the ledger only once', async () => {
         const migrator = createMigrator();

         expect(await migrator.install()).toBe(true);
         expect(await migrator.install()).toBe(false);
      });
   });

   describe('with a SQLite ledger', () => {
      it('keeps state across migrator instances sharing a database', async () => {
         const db = new Database(':memory:');

         const first = createMigrator(new SqliteLedgerStore(db));

         await first.apply('A');
         await first.apply('C');

         const second = createMigrator(new SqliteLedgerStore(db));

         expect(await second.listApplied()).toEqual([ 'A', 'C' ]);
         expect(await second.computePending()).toEqual([ 'B', 'D' ]);

         db.close();
      });
   });
});
