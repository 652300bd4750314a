import { describe, it, expect } from 'vitest';
import {
   IdentifierClock,
   constructMigrationIdentifier,
   formatMigrationTimestamp,
   getMigrationClassName,
   normalizeMigrationName,
   parseMigrationTimestamp,
   studly,
} from '../identifier.ts';
import { InvalidMigrationNameError } from '../errors.ts';

// 2023-05-01 10:11:12.123456 UTC
const MICROS = Date.UTC(2023, 4, 1, 10, 11, 12) * 1000 + 123456;

describe('formatMigrationTimestamp', () => {
   it('formats UTC date, time and microseconds', () => {
      expect(formatMigrationTimestamp(MICROS)).toBe('2023_05_01_101112_123456');
   });

   it('pads every part', () => {
      expect(formatMigrationTimestamp(Date.UTC(2024, 0, 2, 3, 4, 5) * 1000 + 7)).toBe('2024_01_02_030405_000007');
   });
});

describe('parseMigrationTimestamp', () => {
   it('reads the timestamp prefix back', () => {
      expect(parseMigrationTimestamp('2023_05_01_101112_123456_add_users_table')).toBe(MICROS);
   });

   it('accepts a bare timestamp', () => {
      expect(parseMigrationTimestamp('2023_05_01_101112_123456')).toBe(MICROS);
   });

   it('returns undefined for other identifiers', () => {
      expect(parseMigrationTimestamp('A')).toBeUndefined();
      expect(parseMigrationTimestamp('2023_05_01_add_users')).toBeUndefined();
      expect(parseMigrationTimestamp('2023_05_01_101112_123456x')).toBeUndefined();
   });
});

describe('normalizeMigrationName', () => {
   it('turns whitespace and dashes into underscores', () => {
      expect(normalizeMigrationName('  add users-table ')).toBe('add_users_table');
   });

   it('rejects names that do not start with a letter', () => {
      expect(() => { normalizeMigrationName('1_add_users'); }).toThrow(InvalidMigrationNameError);
      expect(() => { normalizeMigrationName(''); }).toThrow(InvalidMigrationNameError);
   });

   it('rejects punctuation', () => {
      expect(() => { normalizeMigrationName('add.users'); }).toThrow(
         'Invalid migration name \'add.users\': use letters, digits and underscores, starting with a letter'
      );
   });
});

describe('constructMigrationIdentifier', () => {
   it('joins the timestamp and the normalized name', () => {
      expect(constructMigrationIdentifier('add users table', MICROS)).toBe('2023_05_01_101112_123456_add_users_table');
   });
});

describe('studly', () => {
   it('capitalizes and joins words', () => {
      expect(studly('add_users_table')).toBe('AddUsersTable');
      expect(studly('add-users table')).toBe('AddUsersTable');
      expect(studly('__leading')).toBe('Leading');
   });
});

describe('getMigrationClassName', () => {
   it('puts the studly name before the timestamp', () => {
      expect(getMigrationClassName('2023_05_01_101112_123456_add_users_table'))
         .toBe('AddUsersTable2023_05_01_101112_123456');
   });

   it('studly-cases identifiers without a timestamp', () => {
      expect(getMigrationClassName('seed_roles')).toBe('SeedRoles');
   });

   it('studly-cases a bare timestamp', () => {
      expect(getMigrationClassName('2023_05_01_101112_123456')).toBe('20230501101112123456');
   });
});

describe('IdentifierClock', () => {
   it('returns the current time when it is ahead', () => {
      const clock = new IdentifierClock(() => { return MICROS; });

      expect(clock.next()).toBe(MICROS);
   });

   it('never repeats a value within the same microsecond', () => {
      const clock = new IdentifierClock(() => { return MICROS; });

      expect([ clock.next(), clock.next(), clock.next() ]).toEqual([ MICROS, MICROS + 1, MICROS + 2 ]);
   });

   it('stays after the floor when the system clock is behind', () => {
      const clock = new IdentifierClock(() => { return MICROS; });

      expect(clock.next(MICROS + 500)).toBe(MICROS + 501);
      expect(clock.next()).toBe(MICROS + 502);
   });
});
