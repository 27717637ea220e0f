import { activateCliConfigPath } from "../../config/configPath.js";
import { loadConfig } from "../../config/loadConfig.js";
import type { CpgSliceConfig } from "../../config/types.js";
import { initTracing, logger } from "../../util/logger.js";
import type { CLIOptions } from "../types.js";

/**
 * Loads config and applies logging and tracing settings. Command-line log
 * options override the config file.
 */
export function prepareCommand(options: CLIOptions): CpgSliceConfig {
  const configPath = activateCliConfigPath(options.config);
  const config = loadConfig(configPath);

  logger.setLevel(options.logLevel ?? config.logging.level);
  logger.setFormat(options.logFormat ?? config.logging.format);
  initTracing(config.tracing);

  return config;
}
