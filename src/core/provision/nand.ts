import fs from "node:fs";
import path from "node:path";
import type { Config } from "../../schemas/config.schema.js";
import type { RemoteShell } from "../../transport/ssh.js";
import { writeAll } from "../../transport/command.js";
import type { NandImage, RecoveryImage } from "../images.js";
import { MINER_CFG_SIZE, type HostTools } from "../host-tools.js";
import { bitstreamMtd, firmwareMtd, type FirmwareSlot } from "../platform.js";
import {
  MINER_FIRMWARE,
  MINER_HWID,
  MINER_MAC,
  renderRuntimeConfig,
  requiredValue,
} from "../runtime-config.js";
import { findTarMember, openTarMember } from "../tar.js";
import { mtdWrite, mtdWriteData } from "./mtd.js";
import * as log from "../../utils/logger.js";

export const RECOVERY_MTD = "recovery";
/** Fixed layout of the recovery partition: kernel at 0, then the compressed images */
export const RECOVERY_FACTORY_OFFSET = 0x800000;
export const RECOVERY_BITSTREAM_OFFSET = 0x1400000;

/** UBI volumes updated from the sysupgrade archive */
export const SYSUPGRADE_VOLUMES: ReadonlyArray<{ volume: string; member: string; device: string }> = [
  { volume: "kernel", member: "sysupgrade-miner-nand/kernel", device: "/dev/ubi0_0" },
  { volume: "rootfs", member: "sysupgrade-miner-nand/root", device: "/dev/ubi0_1" },
];

/** Overlay volume of the attached firmware */
export const OVERLAY_VOLUME = "/dev/ubi0_2";

/** Write SPL and U-Boot to their NAND partitions */
export async function writeBootloader(shell: RemoteShell, image: { boot: string; bootloader: string }): Promise<void> {
  const partitions: [string, string][] = [
    [image.boot, "boot"],
    [image.bootloader, "uboot"],
  ];
  for (const [file, mtd] of partitions) {
    log.info(`Writing '${path.basename(file)}' to NAND partition '${mtd}'...`);
    await mtdWrite(shell, file, mtd);
  }
}

/**
 * Install the recovery set. The device must run from SD or from the
 * recovery partition itself.
 */
export async function deployNandRecovery(shell: RemoteShell, image: RecoveryImage): Promise<void> {
  await writeBootloader(shell, image);

  await shell.run(["mtd", "erase", RECOVERY_MTD]);

  log.info(`Writing '${path.basename(image.kernel)}' to NAND partition '${RECOVERY_MTD}'...`);
  await mtdWrite(shell, image.kernel, RECOVERY_MTD);

  log.info(`Writing '${path.basename(image.factoryImage)}' to NAND partition '${RECOVERY_MTD}'...`);
  await mtdWrite(shell, image.factoryImage, RECOVERY_MTD, {
    offset: RECOVERY_FACTORY_OFFSET,
    compress: true,
    erase: false,
  });

  log.info(`Writing '${path.basename(image.bitstream)}' to NAND partition '${RECOVERY_MTD}'...`);
  await mtdWrite(shell, image.bitstream, RECOVERY_MTD, {
    offset: RECOVERY_BITSTREAM_OFFSET,
    compress: true,
    erase: false,
  });
}

export interface NandFirmwareOptions {
  /** write the compressed bitstream to fpga<slot> */
  writeBitstream: boolean;
  /** format the slot with the factory image instead of updating its volumes */
  factoryImage: boolean;
}

/** Format mode: erase the region and format it with the factory image, dropping the overlay */
async function formatSlot(shell: RemoteShell, image: NandImage, mtd: string): Promise<void> {
  await shell.run(["mtd", "erase", mtd]);
  const { size } = await fs.promises.stat(image.factoryImage);
  await shell.pipe(["ubiformat", mtd, "-f", "-", "-S", String(size)], async ({ stdin }) => {
    await writeAll(stdin, fs.createReadStream(image.factoryImage));
  });
}

/** Update mode: replace kernel and rootfs volumes, keeping the overlay */
async function updateSlot(shell: RemoteShell, image: NandImage, mtd: string): Promise<void> {
  const volumes = await Promise.all(
    SYSUPGRADE_VOLUMES.map(async (volume) => ({
      ...volume,
      entry: await findTarMember(image.sysupgradeArchive, volume.member),
    })),
  );

  await shell.run(["ubiattach", "-p", mtd]);
  for (const { volume, member, device, entry } of volumes) {
    log.info(`Updating volume '${volume}' (${device}) with '${member}'...`);
    await shell.pipe(["ubiupdatevol", device, "-", "-s", String(entry.size)], async ({ stdin }) => {
      await writeAll(stdin, openTarMember(image.sysupgradeArchive, entry));
    });
  }
  await shell.run(["ubidetach", "-p", mtd]);
}

/**
 * Install firmware into the requested slots, one after another.
 * A failure stops the run; later slots are not attempted.
 */
export async function deployNandFirmware(
  shell: RemoteShell,
  image: NandImage,
  slots: readonly FirmwareSlot[],
  options: NandFirmwareOptions,
): Promise<void> {
  await writeBootloader(shell, image);

  if (options.writeBitstream) {
    for (const slot of slots) {
      const mtd = bitstreamMtd(slot);
      log.info(`Writing bitstream to NAND partition '${mtd}'...`);
      await mtdWrite(shell, image.bitstream, mtd, { compress: true });
    }
  }

  for (const slot of slots) {
    const mtd = firmwareMtd(slot);
    if (options.factoryImage) {
      log.info(`Formatting 'firmware${slot}' (${mtd}) with 'factory.bin'...`);
      await formatSlot(shell, image, mtd);
    } else {
      log.info(`Updating 'firmware${slot}' (${mtd}) volumes with 'sysupgrade.tar'...`);
      await updateSlot(shell, image, mtd);
    }
  }
}

/**
 * Change configuration stored in NAND. Every step is gated by its own
 * deploy flag; the steps compose in a fixed order.
 */
export async function configureNand(shell: RemoteShell, config: Config, tools: HostTools): Promise<void> {
  const { deploy } = config;

  if (deploy.write_miner_cfg) {
    const image = await tools.envImage(renderRuntimeConfig(config), MINER_CFG_SIZE);
    log.info("Writing miner configuration to NAND partition 'miner_cfg'...");
    await mtdWriteData(shell, image, "miner_cfg");
  }

  // an erased environment would drop the values again
  if (deploy.set_miner_env && !deploy.reset_uboot_env) {
    log.info("Writing miner configuration to U-Boot env in NAND...");
    await shell.run(["fw_setenv", MINER_MAC, requiredValue(config, MINER_MAC)]);
    await shell.run(["fw_setenv", MINER_HWID, requiredValue(config, MINER_HWID)]);
    await shell.run(["fw_setenv", MINER_FIRMWARE, String(config.miner.firmware)]);
  }

  const firmware = firmwareMtd(config.miner.firmware);
  if (deploy.reset_overlay) {
    await shell.run(["ubiattach", "-p", firmware]);
  }

  if (deploy.reset_uboot_env) {
    log.info("Erasing NAND partition 'uboot_env'...");
    await shell.run(["mtd", "erase", "uboot_env"]);
  }

  if (deploy.reset_overlay) {
    log.info("Truncating UBI volume 'rootfs_data'...");
    await shell.run(["ubiupdatevol", OVERLAY_VOLUME, "-t"]);
    await shell.run(["ubidetach", "-p", firmware]);
  }
}
