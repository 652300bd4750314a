/**
 * Migration identifiers
 *
 * Identifiers look like `2023_05_01_101112_123456_add_users_table`: a UTC
 * timestamp down to the microsecond, followed by a human name. Lexical order
 * of identifiers equals their creation order as long as every new one is
 * built through an {@link IdentifierClock}.
 */

import type { MigrationIdentifier } from './migrations/types.ts';
import { InvalidMigrationNameError } from './errors.ts';

/** Number of `_`-separated segments that make up the timestamp prefix */
export const TIMESTAMP_SEGMENTS = 5;

const TIMESTAMP_PATTERN = /^(\d{4})_(\d{2})_(\d{2})_(\d{2})(\d{2})(\d{2})_(\d{6})(?:_|$)/;

const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

const MICROS_PER_SECOND = 1_000_000;

function pad(value: number, length: number): string {
   return String(value).padStart(length, '0');
}

/**
 * Format microseconds since the epoch as `YYYY_MM_DD_HHMMSS_uuuuuu` (UTC).
 *
 * @example
 * formatMigrationTimestamp(Date.UTC(2024, 0, 10, 9, 0, 0) * 1000 + 1) // → "2024_01_10_090000_000001"
 */
export function formatMigrationTimestamp(micros: number): string {
   const date = new Date(Math.floor(micros / 1000)),
         usec = micros % MICROS_PER_SECOND;

   const day = [
      pad(date.getUTCFullYear(), 4),
      pad(date.getUTCMonth() + 1, 2),
      pad(date.getUTCDate(), 2),
   ].join('_');

   const time = pad(date.getUTCHours(), 2) + pad(date.getUTCMinutes(), 2) + pad(date.getUTCSeconds(), 2);

   return `${day}_${time}_${pad(usec, 6)}`;
}

/**
 * Read the timestamp prefix of an identifier back into microseconds since the
 * epoch. Returns undefined for identifiers that do not follow the convention.
 */
export function parseMigrationTimestamp(identifier: MigrationIdentifier): number | undefined {
   const match = TIMESTAMP_PATTERN.exec(identifier);

   if (!match) {
      return undefined;
   }

   const [ year, month, day, hours, minutes, seconds, usec ] = match.slice(1).map(Number);

   const millis = Date.UTC(year, month - 1, day, hours, minutes, seconds);

   return millis * 1000 + usec;
}

/**
 * Normalize a human migration name: whitespace and dashes become underscores.
 *
 * @throws InvalidMigrationNameError if the result is not a valid name
 */
export function normalizeMigrationName(name: string): string {
   const normalized = name.trim().replace(/[\s-]+/g, '_');

   if (!NAME_PATTERN.test(normalized)) {
      throw new InvalidMigrationNameError(name);
   }

   return normalized;
}

export function constructMigrationIdentifier(name: string, micros: number): MigrationIdentifier {
   return `${formatMigrationTimestamp(micros)}_${normalizeMigrationName(name)}`;
}

/**
 * Capitalize each `_`, `-` or whitespace separated word and join them.
 *
 * @example
 * studly('add_users_table') // → "AddUsersTable"
 */
export function studly(value: string): string {
   return value
      .split(/[_\-\s]+/)
      .filter((word) => { return word.length > 0; })
      .map((word) => { return word.charAt(0).toUpperCase() + word.slice(1); })
      .join('');
}

/**
 * Derive the export name a migration module uses for its class: the name
 * words studly-cased, followed by the timestamp segments.
 *
 * @example
 * getMigrationClassName('2023_05_01_101112_123456_add_users_table')
 * // → "AddUsersTable2023_05_01_101112_123456"
 */
export function getMigrationClassName(identifier: MigrationIdentifier): string {
   const segments = identifier.split('_');

   const timestamp = segments.slice(0, TIMESTAMP_SEGMENTS),
         name = segments.slice(TIMESTAMP_SEGMENTS);

   if (!TIMESTAMP_PATTERN.test(identifier) || name.length === 0) {
      return studly(identifier);
   }

   return studly(name.join('_')) + timestamp.join('_');
}

/**
 * Hands out strictly increasing microsecond timestamps, even when called
 * several times within the resolution of the system clock.
 */
export class IdentifierClock {

   private readonly _now: () => number;
   private _last = 0;

   public constructor(now: () => number = currentMicros) {
      this._now = now;
   }

   /**
    * Next timestamp, strictly after everything returned so far and after `floor`.
    */
   public next(floor?: number): number {
      const minimum = Math.max(this._last, floor ?? 0) + 1,
            micros = Math.max(Math.floor(this._now()), minimum);

      this._last = micros;

      return micros;
   }

}

function currentMicros(): number {
   return Math.floor((performance.timeOrigin + performance.now()) * 1000);
}
