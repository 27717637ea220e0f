import { resolve } from "path";

function normalizeOptionalPath(path: string | undefined): string | undefined {
  if (!path) {
    return undefined;
  }
  const trimmed = path.trim();
  return trimmed.length > 0 ? resolve(trimmed) : undefined;
}

/**
 * Explicit `--config` wins over `CPGSLICE_CONFIG`. Undefined means the
 * bundled default applies.
 */
export function resolveCliConfigPath(configPath?: string): string | undefined {
  return (
    normalizeOptionalPath(configPath) ??
    normalizeOptionalPath(process.env.CPGSLICE_CONFIG)
  );
}

/** Makes the CLI's config visible to code that calls `loadConfig()` later. */
export function activateCliConfigPath(configPath?: string): string | undefined {
  const resolvedPath = resolveCliConfigPath(configPath);
  if (resolvedPath) {
    process.env.CPGSLICE_CONFIG = resolvedPath;
  }
  return resolvedPath;
}
