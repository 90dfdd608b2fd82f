import fs from "node:fs";
import path from "node:path";
import { gzipSync } from "node:zlib";
import type { Config } from "../schemas/config.schema.js";
import type { ConversionImage } from "./images.js";
import { MINER_CFG_SIZE, UBOOT_ENV_SIZE, type HostTools } from "./host-tools.js";
import { hardwareVersion } from "./platform.js";
import { IDENTITY_FIELDS, renderRuntimeConfig } from "./runtime-config.js";
import { putImageSet, type Sink } from "./sink.js";
import { createTarGz, type TarInput } from "./tar.js";
import type { ConversionVersion } from "./targets.js";
import { ConfigurationError } from "../utils/errors.js";
import { getUpgradeTemplatesDir } from "../utils/paths.js";
import * as log from "../utils/logger.js";

export const FIRMWARE_DIR = "firmware";
export const SYSTEM_DIR = "system";
export const STAGE2_ARCHIVE = "stage2.tgz";

export interface BundleContext {
  config: Config;
  tools: HostTools;
  /** directory of the static bundle files; the packaged templates when omitted */
  templatesDir?: string;
}

function templatePath(ctx: BundleContext, name: string): string {
  const file = path.join(ctx.templatesDir ?? getUpgradeTemplatesDir(), name);
  if (!fs.existsSync(file)) {
    throw new ConfigurationError(`Missing upgrade template '${file}'`, file);
  }
  return file;
}

function readTemplate(ctx: BundleContext, name: string): Buffer {
  return fs.readFileSync(templatePath(ctx, name));
}

/** Binaries the newest vendor firmware lacks, installed by the bootstrap driver */
function systemBinaries(config: Config): [string, string][] {
  return [
    [config.artifacts.system_loader, "ld-musl-armhf.so.1"],
    [config.artifacts.system_sftp_server, "sftp-server"],
    [config.artifacts.system_fw_printenv, "fw_printenv"],
  ];
}

/** U-Boot environment of the converted device: runtime configuration without identity, then the defaults */
export async function createUbootEnv(ctx: BundleContext): Promise<Buffer> {
  const input = Buffer.concat([
    Buffer.from(renderRuntimeConfig(ctx.config, IDENTITY_FIELDS)),
    readTemplate(ctx, "uboot_env.txt"),
  ]);
  return ctx.tools.envImage(input, UBOOT_ENV_SIZE);
}

/** miner_cfg partition image without identity; stage 2 copies MAC and hardware id from the old environment */
export function createMinerCfg(ctx: BundleContext): Promise<Buffer> {
  return ctx.tools.envImage(renderRuntimeConfig(ctx.config, IDENTITY_FIELDS), MINER_CFG_SIZE);
}

/**
 * Inner stage 2 archive. Compressed members are compressed before their
 * header is written, so each header records the compressed length.
 */
export async function createStage2(image: ConversionImage, ctx: BundleContext): Promise<Buffer> {
  log.info("Creating stage2 tarball...");
  const entries: TarInput[] = [
    { name: "fit.itb", data: await fs.promises.readFile(image.recoveryKernel) },
    { name: "system.bit.gz", data: gzipSync(await fs.promises.readFile(image.bitstream)) },
    { name: "factory.bin.gz", data: gzipSync(await fs.promises.readFile(image.factoryImage)) },
    { name: "miner_cfg.config", data: readTemplate(ctx, "miner_cfg.config") },
    { name: "miner_cfg.bin", data: await createMinerCfg(ctx) },
    { name: "stage2.sh", data: readTemplate(ctx, "stage2.sh"), mode: 0o755 },
  ];
  return createTarGz(entries);
}

/** Variables sourced by stage1.sh: hardware version followed by the per-version constants */
export function stage1Control(platform: string, version: ConversionVersion, ctx: BundleContext): Buffer {
  return Buffer.concat([
    Buffer.from(`FW_MINER_HWVER=${hardwareVersion(platform)}\n\n`),
    readTemplate(ctx, `CONTROL_v${version}`),
  ]);
}

/**
 * Write the conversion bundle for vendor firmware `version` into `sink`:
 *
 *   firmware/   images, U-Boot environment, stage2.tgz, CONTROL, stage1.sh
 *   system/     loader, sftp-server, fw_printenv (version 3)
 *   transport.sh (versions 2 and 3), hwid.sh, restore.sh, upgrade.sh, requirements.txt
 */
export async function buildUpgradeBundle(
  sink: Sink,
  image: ConversionImage,
  version: ConversionVersion,
  ctx: BundleContext,
): Promise<void> {
  // everything that can fail on configuration is checked before the first write
  const control = stage1Control(ctx.config.miner.platform, version, ctx);
  const system = version === 3 ? systemBinaries(ctx.config) : [];
  for (const [file] of system) {
    if (!fs.existsSync(file)) throw new ConfigurationError(`Missing system binary '${file}'`, file);
  }
  const driverVersion = version === 3 ? 2 : version;

  log.info(`Creating conversion bundle v${version} in '${sink.location}'...`);
  const firmware = await sink.at(FIRMWARE_DIR);
  await putImageSet(firmware, image, { compressed: new Set(["system.bit"]) });
  await firmware.put(templatePath(ctx, "uboot_env.config"), "uboot_env.config");
  await firmware.put(await createUbootEnv(ctx), "uboot_env.bin");
  await firmware.put(await createStage2(image, ctx), STAGE2_ARCHIVE);
  await firmware.put(control, "CONTROL");
  await firmware.put(templatePath(ctx, "stage1.sh"), "stage1.sh");

  if (version === 2 || version === 3) {
    await sink.put(templatePath(ctx, "transport.sh"), "transport.sh");
  }

  if (system.length > 0) {
    const systemSink = await sink.at(SYSTEM_DIR);
    for (const [file, name] of system) await systemSink.put(file, name);
  }

  await sink.put(templatePath(ctx, "hwid.sh"), "hwid.sh");
  await sink.put(templatePath(ctx, "restore.sh"), "restore.sh");
  await sink.put(templatePath(ctx, `upgrade_v${driverVersion}.sh`), "upgrade.sh");
  await sink.put(templatePath(ctx, `requirements_v${driverVersion}.txt`), "requirements.txt");
}
