/**
 * Make command - Scaffold a new migration file from a template
 */

/* eslint-disable no-console */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { SCAFFOLD_EXTENSIONS } from '@tidemark/core';
import type { ScaffoldExtension, Substitutions } from '@tidemark/core';
import { reportError, withProject } from '../utils/project.ts';
import { collectSubstitution } from '../utils/substitutions.ts';

interface MakeOptions {
   template?: string;
   replace: Substitutions;
   extension?: ScaffoldExtension;
}

export function createMakeCommand(): Command {
   return new Command('make')
      .alias('create')
      .description('Create a new migration file')
      .argument('<name>', 'Migration name, e.g. add_users_table')
      .option('-t, --template <name>', 'Template name or alias (default: default)')
      .option('-r, --replace <key=value>', 'Value for a __key__ placeholder (repeatable)', collectSubstitution, {})
      .addOption(
         new Option('-e, --extension <ext>', 'File extension of the new migration')
            .choices(SCAFFOLD_EXTENSIONS)
      )
      .action(async (name: string, options: MakeOptions, command: Command) => {
         try {
            const created = await withProject(
               command,
               (project) => { return project.creator.create(name, options.template, options.replace); },
               { extension: options.extension }
            );

            console.log(chalk.green(`✓ Created migration ${chalk.bold(created.identifier)}`));
            console.log(`  ${chalk.dim('Template:')} ${created.template}`);
            console.log(`  ${chalk.dim('Path:')} ${created.path}`);
         } catch(error) {
            reportError(error);
         }
      });
}
