import { readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { type CpgSliceConfig, CpgSliceConfigSchema } from "./types.js";
import { CONFIG_FILE_NAME } from "./constants.js";
import { findPackageRoot } from "../util/findPackageRoot.js";
import { ConfigError } from "../mcp/errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function expandEnvVars(obj: unknown): unknown {
  if (typeof obj === "string") {
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not set`);
      }
      return value;
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => expandEnvVars(item));
  }

  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = expandEnvVars(value);
    }
    return result;
  }

  return obj;
}

export function defaultConfigPath(): string {
  return resolve(findPackageRoot(__dirname), "config", CONFIG_FILE_NAME);
}

export function defaultConfig(): CpgSliceConfig {
  return CpgSliceConfigSchema.parse({});
}

/**
 * Loads and validates the configuration.
 *
 * An explicit path or `CPGSLICE_CONFIG` must point at a readable file. The
 * bundled default file is optional: without it the schema defaults apply.
 */
export function loadConfig(configPath?: string): CpgSliceConfig {
  const envConfigPath = process.env.CPGSLICE_CONFIG;
  const explicitPath = configPath ?? envConfigPath;
  const filePath = explicitPath ? resolve(explicitPath) : defaultConfigPath();

  let rawContent: string;
  try {
    rawContent = readFileSync(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      if (!explicitPath) {
        return defaultConfig();
      }
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    throw err;
  }

  let parsedConfig: unknown;
  try {
    parsedConfig = JSON.parse(rawContent);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file: ${filePath}`);
    }
    throw err;
  }

  const result = CpgSliceConfigSchema.safeParse(expandEnvVars(parsedConfig));

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => {
        const path = e.path.join(".");
        return `  - ${path}: ${e.message}`;
      })
      .join("\n");
    throw new ConfigError(`Config validation failed:\n${errors}`);
  }

  return result.data;
}
