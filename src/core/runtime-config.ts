import type { Config } from "../schemas/config.schema.js";
import { ConfigurationError } from "../utils/errors.js";
import { generateHwid } from "./hwid.js";

export const MINER_MAC = "ethaddr";
export const MINER_HWID = "miner_hwid";
export const MINER_FIRMWARE = "firmware";

/** Identity fields a conversion bundle leaves for stage 1 to fill in */
export const IDENTITY_FIELDS: ReadonlySet<string> = new Set([MINER_MAC, MINER_HWID]);

export const UENV_TXT = "uEnv.txt";

export interface RuntimeField {
  name: string;
  /** dotted path in the configuration file, for error messages */
  configPath: string;
  read: (config: Config) => string | undefined;
  /** used when the configuration has no value; a field without one is required */
  fallback?: string | (() => string);
}

/** Runtime configuration written to the environment blob and the miner_cfg partition, in order */
export const RUNTIME_CONFIG_RECORD: readonly RuntimeField[] = [
  { name: MINER_MAC, configPath: "miner.mac", read: (c) => c.miner.mac },
  { name: MINER_HWID, configPath: "miner.hwid", read: (c) => c.miner.hwid, fallback: () => generateHwid() },
  { name: "miner_pool_host", configPath: "miner.pool.host", read: (c) => c.miner.pool.host },
  { name: "miner_pool_port", configPath: "miner.pool.port", read: (c) => c.miner.pool.port },
  { name: "miner_pool_user", configPath: "miner.pool.user", read: (c) => c.miner.pool.user },
  { name: "miner_pool_pass", configPath: "miner.pool.pass", read: (c) => c.miner.pool.pass, fallback: "" },
];

function missing(field: { name: string; configPath: string }): ConfigurationError {
  return new ConfigurationError(
    `Missing miner configuration for '${field.name}' in '${field.configPath}'`,
    field.configPath,
  );
}

/** Value of one record field, applying its fallback */
export function fieldValue(config: Config, field: RuntimeField): string {
  const value = field.read(config);
  if (value !== undefined) return value;
  if (field.fallback === undefined) throw missing(field);
  return typeof field.fallback === "function" ? field.fallback() : field.fallback;
}

/**
 * Render the runtime configuration as `name=value` lines.
 * Fields named in `excluded` are skipped; empty values are omitted.
 */
export function renderRuntimeConfig(config: Config, excluded: ReadonlySet<string> = new Set()): string {
  let out = "";
  for (const field of RUNTIME_CONFIG_RECORD) {
    if (excluded.has(field.name)) continue;
    const value = fieldValue(config, field);
    if (value) out += `${field.name}=${value}\n`;
  }
  return out;
}

/** Configured value of an identity field set through fw_setenv; never generated */
export function requiredValue(config: Config, name: typeof MINER_MAC | typeof MINER_HWID): string {
  const field = RUNTIME_CONFIG_RECORD.find((f) => f.name === name);
  const value = field?.read(config);
  if (value === undefined) throw missing(field ?? { name, configPath: name });
  return value;
}

/** Content of uEnv.txt, the U-Boot configuration file on the SD card */
export function renderUenv(config: Config): string {
  let out = "";
  if (config.uenv.mac) {
    if (!config.miner.mac) throw missing({ name: MINER_MAC, configPath: "miner.mac" });
    out += `${MINER_MAC}=${config.miner.mac}\n`;
  }
  const flags = ["factory_reset", "sd_images", "sd_boot"] as const;
  for (const flag of flags) {
    if (config.uenv[flag]) out += `${flag}=yes\n`;
  }
  return out;
}
