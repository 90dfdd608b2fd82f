import type { Config } from "../../schemas/config.schema.js";
import type { RemoteShell } from "../../transport/ssh.js";
import type { FileTransfer } from "../../transport/sftp.js";
import type { HostTools } from "../host-tools.js";
import type { RemotePlan } from "../targets.js";
import { configureNand, deployNandFirmware, deployNandRecovery } from "./nand.js";
import { configureSd, deploySd } from "./sd.js";
import * as log from "../../utils/logger.js";

/**
 * Run the device part of a plan over one session, in a fixed order:
 * SD images, SD configuration, NAND recovery, NAND firmware slots,
 * NAND configuration, reboot.
 */
export async function runRemotePlan(
  shell: RemoteShell,
  plan: RemotePlan,
  config: Config,
  tools: HostTools,
): Promise<void> {
  const { deploy } = config;
  // a transfer handle is only needed for SD work
  let transfer: FileTransfer | undefined;
  try {
    if (plan.sd) {
      log.heading(`Deploying ${plan.sd.kind === "recovery" ? "SD recovery" : "SD"} images`);
      transfer = await shell.sftp();
      await deploySd(shell, transfer, plan.sd);
    }
    if (plan.sdConfig) {
      log.heading("Configuring SD");
      transfer ??= await shell.sftp();
      await configureSd(shell, transfer, config);
    }
  } finally {
    transfer?.close();
  }

  if (plan.nandRecovery) {
    log.heading("Deploying NAND recovery");
    await deployNandRecovery(shell, plan.nandRecovery);
  }
  if (plan.nand && plan.nandFirmwareSlots.length > 0) {
    log.heading(`Deploying NAND firmware (${plan.nandFirmwareSlots.map((slot) => `firmware${slot}`).join(", ")})`);
    await deployNandFirmware(shell, plan.nand, plan.nandFirmwareSlots, {
      writeBitstream: deploy.write_bitstream,
      factoryImage: deploy.factory_image,
    });
  }
  if (plan.nandConfig) {
    log.heading("Configuring NAND");
    await configureNand(shell, config, tools);
  }

  if (deploy.reboot) {
    log.info("Rebooting...");
    await shell.run(["reboot"]);
  }
}
