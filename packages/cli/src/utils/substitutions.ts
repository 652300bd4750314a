import { InvalidArgumentError } from 'commander';
import type { Substitutions } from '@tidemark/core';

const PLACEHOLDER_KEY = /^[A-Za-z0-9_]+$/;

/**
 * Commander collector for repeated `-r key=value` options.
 */
export function collectSubstitution(value: string, previous: Substitutions): Substitutions {
   const separator = value.indexOf('=');

   if (separator === -1) {
      throw new InvalidArgumentError(`Expected key=value, got '${value}'.`);
   }

   const key = value.slice(0, separator);

   if (!PLACEHOLDER_KEY.test(key)) {
      throw new InvalidArgumentError(`Invalid placeholder name '${key}'.`);
   }

   return { ...previous, [key]: value.slice(separator + 1) };
}
