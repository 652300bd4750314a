/**
 * Errors raised outside the migration engine: configuration, naming and
 * templates. Engine conditions live in `migrations/types.ts`.
 */

/**
 * Error thrown when the project configuration is missing or invalid.
 */
export class ConfigError extends Error {

   public readonly name = 'ConfigError';

   public constructor(message: string, public readonly issues: string[] = [], options?: ErrorOptions) {
      super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message, options);
   }

}

/**
 * Error thrown when a migration name cannot be used in an identifier.
 */
export class InvalidMigrationNameError extends Error {

   public readonly name = 'InvalidMigrationNameError';

   public constructor(public readonly migrationName: string) {
      super(
         `Invalid migration name '${migrationName}': use letters, digits and underscores, ` +
         'starting with a letter'
      );
   }

}

/**
 * Error thrown when a template name or alias is not registered.
 */
export class TemplateNotFoundError extends Error {

   public readonly name = 'TemplateNotFoundError';

   public constructor(public readonly templateName: string, public readonly available: string[]) {
      super(`Template '${templateName}' not found. Available templates: ${available.join(', ')}`);
   }

}
