import type { Config } from "../schemas/config.schema.js";
import { loadConfig } from "../core/config-loader.js";
import { configureLogger, type LogLevel } from "../utils/logger.js";
import { DEFAULT_CONFIG_PATH } from "../utils/paths.js";

/** Options shared by every command */
export interface GlobalOptions {
  config?: string;
  platform?: string;
  log?: LogLevel;
}

export interface CliContext {
  config: Config;
  configPath: string;
}

/** Load the configuration and set up logging from it and the global flags */
export function loadCliContext(options: GlobalOptions): CliContext {
  const configPath = options.config ?? DEFAULT_CONFIG_PATH;
  const config = loadConfig(configPath, { platform: options.platform });
  // colours only on a terminal
  configureLogger(options.log ?? config.logging.level, config.logging.color && (process.stdout.isTTY ?? false));
  return { config, configPath };
}
