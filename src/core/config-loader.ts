import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { ZodError } from "zod";
import {
  ConfigSchema,
  type ArtifactsConfig,
  type Config,
  type DeployFlag,
  type LocalConfig,
  type LocalSlot,
} from "../schemas/config.schema.js";
import { interpolate, type TemplateVariables } from "../utils/interpolate.js";
import { localOverridePath } from "../utils/paths.js";
import { ConfigurationError } from "../utils/errors.js";
import { splitPlatform } from "./platform.js";
import * as log from "../utils/logger.js";

/** Try to load a YAML file, return undefined if not found */
function tryLoadYaml(filePath: string): Record<string, unknown> | undefined {
  if (!fs.existsSync(filePath)) return undefined;
  const raw = fs.readFileSync(filePath, "utf-8");
  let data: unknown;
  try {
    data = parseYaml(raw);
  } catch (err) {
    throw new ConfigurationError(
      `Cannot parse '${filePath}': ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }
  if (data === null || data === undefined) return {};
  if (!isRecord(data)) {
    throw new ConfigurationError(`Configuration '${filePath}' must be a mapping`, filePath);
  }
  return data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep merge objects: b overrides a, arrays are replaced */
export function deepMerge(
  a: Record<string, unknown>,
  b: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...a };
  for (const key of Object.keys(b)) {
    const bVal = b[key];
    const aVal = a[key];
    if (isRecord(bVal) && isRecord(aVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}

export interface LoadOptions {
  /** replaces miner.platform from the file (--platform) */
  platform?: string;
  /** base for relative paths in the file; defaults to process.cwd() */
  cwd?: string;
}

function formatZodError(err: ZodError, source: string): ConfigurationError {
  const issues = err.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`).join("\n");
  const first = err.issues[0];
  return new ConfigurationError(
    `Configuration '${source}' is invalid:\n${issues}`,
    first ? first.path.join(".") : undefined,
  );
}

/**
 * Validate raw configuration data and resolve it:
 * schema defaults, absolute build directory, path templates expanded.
 */
export function parseConfig(data: Record<string, unknown>, source = "<inline>", cwd?: string): Config {
  let parsed: Config;
  try {
    parsed = ConfigSchema.parse(data);
  } catch (err) {
    if (err instanceof ZodError) throw formatZodError(err, source);
    throw err;
  }
  return resolveConfig(parsed, cwd);
}

/**
 * Load configuration with 3-layer resolution:
 * 1. Configuration file (configs/default.yml unless --config)
 * 2. Sibling local overrides (configs/default.local.yml), gitignored
 * 3. Command line overrides (--platform)
 *
 * Each layer deep-merges over the previous; the result is validated through
 * the zod schema, which also supplies defaults.
 */
export function loadConfig(configPath: string, options: LoadOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();
  const absPath = path.resolve(cwd, configPath);

  const fileConfig = tryLoadYaml(absPath);
  if (!fileConfig) {
    throw new ConfigurationError(`Configuration file '${absPath}' does not exist`, absPath);
  }
  let merged = fileConfig;
  log.debug(`Loaded configuration from '${absPath}'`);

  const localPath = localOverridePath(absPath);
  const localConfig = tryLoadYaml(localPath);
  if (localConfig) {
    merged = deepMerge(merged, localConfig);
    log.debug(`Loaded local overrides from '${localPath}'`);
  }

  if (options.platform) {
    merged = deepMerge(merged, { miner: { platform: options.platform } });
    log.debug(`Platform overridden to '${options.platform}'`);
  }

  return parseConfig(merged, absPath, cwd);
}

/** Template variables for the current platform and build directory */
export function templateVariables(config: Config, cwd?: string): TemplateVariables {
  const parts = splitPlatform(config.miner.platform);
  const buildDir = path.resolve(cwd ?? process.cwd(), config.build.dir, config.build.name);
  return {
    platform: parts.platform,
    target: parts.target,
    subtarget: parts.subtarget,
    subtarget_family: parts.subtargetFamily,
    build_dir: buildDir,
    lede_dir: path.join(buildDir, config.build.lede),
  };
}

/** Every local slot that can name a target directory */
export const LOCAL_SLOTS: readonly LocalSlot[] = [
  "sd",
  "sd_config",
  "sd_recovery",
  "sd_recovery_config",
  "nand_recovery",
  "nand_dm_v1",
  "nand_dm_v2",
  "nand_dm_v3",
  "feeds",
];

function resolveConfig(config: Config, cwd?: string): Config {
  const vars = templateVariables(config, cwd);
  const resolvePath = (key: Exclude<keyof ArtifactsConfig, "image_prefix">): string =>
    path.resolve(vars.build_dir, interpolate(config.artifacts[key], vars, `artifacts.${key}`));

  const artifacts: ArtifactsConfig = {
    generic_dir: resolvePath("generic_dir"),
    // a file name fragment, not a path
    image_prefix: interpolate(config.artifacts.image_prefix, vars, "artifacts.image_prefix"),
    bitstream: resolvePath("bitstream"),
    feeds_key: resolvePath("feeds_key"),
    feeds_packages: resolvePath("feeds_packages"),
    mkenvimage: resolvePath("mkenvimage"),
    usign: resolvePath("usign"),
    system_loader: resolvePath("system_loader"),
    system_sftp_server: resolvePath("system_sftp_server"),
    system_fw_printenv: resolvePath("system_fw_printenv"),
  };

  const local: LocalConfig = { ...config.local };
  for (const slot of LOCAL_SLOTS) {
    const dir = local[slot];
    if (dir) local[slot] = path.resolve(cwd ?? process.cwd(), interpolate(dir, vars, `local.${slot}`));
  }

  return {
    ...config,
    build: { ...config.build, dir: path.dirname(vars.build_dir) },
    artifacts,
    local,
  };
}

export interface ConfigPatch {
  flag: DeployFlag;
  value: boolean;
}

/** Return a new configuration with deploy flags assigned; the input is not modified */
export function applyPatches(config: Config, patches: readonly ConfigPatch[]): Config {
  if (patches.length === 0) return config;
  const deploy = { ...config.deploy };
  for (const patch of patches) {
    log.debug(`Setting deploy.${patch.flag}=${patch.value ? "yes" : "no"}`);
    deploy[patch.flag] = patch.value;
  }
  return { ...config, deploy };
}
