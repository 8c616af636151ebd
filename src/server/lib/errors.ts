/**
 * Startup error classes.
 *
 * Per-request conditions are returned as tagged results and never thrown;
 * these errors only stop the service from becoming ready.
 */

/** The database could not be introspected. Fatal at startup. */
export class SchemaUnavailableError extends Error {
  override name = 'SchemaUnavailableError';
}

/** The access policy file is missing, unreadable or invalid. */
export class PolicyConfigError extends Error {
  override name = 'PolicyConfigError';
}

/** An environment variable holds a value that cannot be used. */
export class ConfigError extends Error {
  override name = 'ConfigError';
}

/** The language model could not produce a usable reply. */
export class GenerationError extends Error {
  override name = 'GenerationError';
}

/** Best-effort message extraction for logging and user-facing errors. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
