/**
 * Shared plumbing for commands: global options, opening the project and
 * reporting failures.
 */

/* eslint-disable no-console */

import type { Command } from 'commander';
import chalk from 'chalk';
import { createLogger, getLogLevel, loadConfig, openProject } from '@tidemark/core';
import type { Logger, MigrationProgressCallback, Project, ScaffoldExtension, TidemarkConfig } from '@tidemark/core';

// A type alias rather than an interface, so it satisfies commander's OptionValues
export type GlobalOptions = {
   config?: string;
   verbose?: boolean;
};

export interface WithProjectOptions {

   /** Overrides the configured extension for new migration files */
   extension?: ScaffoldExtension;

   onProgress?: MigrationProgressCallback;
}

export interface LoadedConfig {
   config: TidemarkConfig;
   logger: Logger;
}

/**
 * Load the configuration named by the global options and create the logger
 * the `--verbose` flag asks for.
 */
export async function loadProjectConfig(command: Command): Promise<LoadedConfig> {
   const globals = command.optsWithGlobals<GlobalOptions>();

   const config = await loadConfig({ configPath: globals.config }),
         logger = createLogger('tidemark', { level: globals.verbose ? 'debug' : getLogLevel() });

   logger.debug({ config }, 'Loaded configuration');

   return { config, logger };
}

/**
 * Load the configuration named by the global options, open the project, run
 * `action` and close the database again.
 */
export async function withProject<T>(
   command: Command,
   action: (project: Project) => Promise<T>,
   options: WithProjectOptions = {}
): Promise<T> {
   const { config, logger } = await loadProjectConfig(command);

   const project = await openProject(
      options.extension ? { ...config, extension: options.extension } : config,
      { logger, onProgress: options.onProgress }
   );

   try {
      return await action(project);
   } finally {
      project.close();
   }
}

/**
 * Print an error and mark the process as failed.
 */
export function reportError(error: unknown): void {
   console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : String(error)}`));
   process.exitCode = 1;
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
   return `${count} ${count === 1 ? singular : plural}`;
}
