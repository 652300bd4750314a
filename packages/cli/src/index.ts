#!/usr/bin/env tsx
/**
 * tidemark command-line entry point
 */

import { createProgram } from './program.ts';

await createProgram().parseAsync();
