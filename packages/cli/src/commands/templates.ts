/**
 * Templates command - List the templates `make` can use
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadTemplates } from '@tidemark/core';
import { loadProjectConfig, reportError } from '../utils/project.ts';

interface TemplatesOptions {
   json?: boolean;
}

export function createTemplatesCommand(): Command {
   return new Command('templates')
      .description('List available migration templates')
      .option('--json', 'Output as JSON')
      .action(async (options: TemplatesOptions, command: Command) => {
         try {
            const { config, logger } = await loadProjectConfig(command),
                  templates = (await loadTemplates(config, logger)).all();

            if (options.json) {
               console.log(JSON.stringify(templates, null, 2));
               return;
            }

            console.log(chalk.bold(`Available templates (${templates.length}):`));

            for (const template of templates) {
               const aliases = template.aliases.length > 0
                  ? chalk.dim(` (aliases: ${template.aliases.join(', ')})`)
                  : '';

               console.log(`  ${chalk.bold(template.name)}${aliases}`);
               console.log(`    ${template.description}`);
            }
         } catch(error) {
            reportError(error);
         }
      });
}
