/**
 * Configuration - project settings from tidemark.config.json and the environment
 *
 * Example tidemark.config.json:
 *   {
 *     "dir": "database/migrations",
 *     "table": "migrations",
 *     "database": "var/app.db",
 *     "templatesDir": "database/templates",
 *     "extension": "ts"
 *   }
 *
 * Environment variables (override the file):
 *   TIDEMARK_DIR           - Directory holding migration files
 *   TIDEMARK_TABLE         - Ledger table name
 *   TIDEMARK_DATABASE      - SQLite database path, or :memory:
 *   TIDEMARK_TEMPLATES_DIR - Directory with additional *.tpl templates
 *
 * Relative paths resolve against the directory of the config file, or the
 * working directory when there is none.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.ts';
import { DEFAULT_LEDGER_TABLE, isSqlIdentifier } from './ledger.ts';
import { SCAFFOLD_EXTENSIONS } from './creator.ts';
import type { ScaffoldExtension } from './creator.ts';

export const CONFIG_FILE_NAME = 'tidemark.config.json';

export const MEMORY_DATABASE = ':memory:';

const configSchema = z.object({
   dir: z.string().min(1).default('migrations'),
   table: z.string()
      .refine(isSqlIdentifier, { message: 'must be a plain SQL identifier' })
      .default(DEFAULT_LEDGER_TABLE),
   database: z.string().min(1).default('tidemark.db'),
   templatesDir: z.string().min(1).optional(),
   extension: z.enum(SCAFFOLD_EXTENSIONS).default('ts'),
}).strict();

export type TidemarkConfigInput = z.input<typeof configSchema>;

/**
 * Fully resolved project configuration. Paths are absolute.
 */
export interface TidemarkConfig {

   /** Directory holding migration files */
   dir: string;

   /** Ledger table name */
   table: string;

   /** SQLite database path, or `:memory:` */
   database: string;

   /** Directory with additional templates */
   templatesDir?: string;

   /** Extension of newly created migration files */
   extension: ScaffoldExtension;

   /** Config file the settings were read from, if any */
   configFile?: string;
}

export interface LoadConfigOptions {

   /** Working directory (defaults to process.cwd()) */
   cwd?: string;

   /** Explicit config file; unlike the default one it must exist */
   configPath?: string;

   /** Environment to read overrides from (defaults to process.env) */
   env?: NodeJS.ProcessEnv;
}

const ENV_OVERRIDES: Record<string, 'dir' | 'table' | 'database' | 'templatesDir'> = {
   TIDEMARK_DIR: 'dir',
   TIDEMARK_TABLE: 'table',
   TIDEMARK_DATABASE: 'database',
   TIDEMARK_TEMPLATES_DIR: 'templatesDir',
};

async function readConfigFile(filePath: string, required: boolean): Promise<unknown> {
   let content: string;

   try {
      content = await fs.readFile(filePath, 'utf-8');
   } catch(error) {
      const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';

      if (missing && !required) {
         return undefined;
      }

      throw new ConfigError(`Cannot read config file ${filePath}`, [], { cause: error });
   }

   try {
      return JSON.parse(content);
   } catch(error) {
      throw new ConfigError(`Config file ${filePath} is not valid JSON`, [], { cause: error });
   }
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate raw settings and resolve their paths against `baseDir`.
 *
 * @throws ConfigError listing every invalid setting
 */
export function parseConfig(raw: unknown, baseDir: string, configFile?: string): TidemarkConfig {
   const result = configSchema.safeParse(raw ?? {});

   if (!result.success) {
      const issues = result.error.issues.map((issue) => {
         const key = issue.path.join('.');

         return key ? `${key}: ${issue.message}` : issue.message;
      });

      throw new ConfigError(`Invalid configuration${configFile ? ` in ${configFile}` : ''}`, issues);
   }

   const settings = result.data;

   return {
      dir: path.resolve(baseDir, settings.dir),
      table: settings.table,
      database: settings.database === MEMORY_DATABASE
         ? MEMORY_DATABASE
         : path.resolve(baseDir, settings.database),
      templatesDir: settings.templatesDir ? path.resolve(baseDir, settings.templatesDir) : undefined,
      extension: settings.extension,
      configFile,
   };
}

/**
 * Load the project configuration.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<TidemarkConfig> {
   const cwd = path.resolve(options.cwd ?? process.cwd()),
         env = options.env ?? process.env;

   const configFile = path.resolve(cwd, options.configPath ?? CONFIG_FILE_NAME);

   const fromFile = await readConfigFile(configFile, options.configPath !== undefined);

   let fileSettings: Record<string, unknown> | undefined;

   if (fromFile !== undefined) {
      if (!isRecord(fromFile)) {
         throw new ConfigError(`Config file ${configFile} must contain a JSON object`);
      }

      fileSettings = fromFile;
   }

   const raw: Record<string, unknown> = { ...fileSettings };

   for (const [ variable, key ] of Object.entries(ENV_OVERRIDES)) {
      const value = env[variable];

      if (value) {
         raw[key] = value;
      }
   }

   return fileSettings === undefined
      ? parseConfig(raw, cwd)
      : parseConfig(raw, path.dirname(configFile), configFile);
}
