/** Invalid or inconsistent configuration. Fatal before any ingestion starts. */
export class ConfigError extends Error {
  override name = 'ConfigError';
}

/** Credentials or store unavailable at startup. */
export class SetupError extends Error {
  override name = 'SetupError';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
