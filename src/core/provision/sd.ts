import type { Config } from "../../schemas/config.schema.js";
import type { RemoteShell } from "../../transport/ssh.js";
import type { FileTransfer } from "../../transport/sftp.js";
import type { RecoveryImage, SdImage } from "../images.js";
import { renderUenv, UENV_TXT } from "../runtime-config.js";
import { putImageSet, RemoteSink } from "../sink.js";
import { errorMessage } from "../../utils/errors.js";
import * as log from "../../utils/logger.js";

export const SD_BOOT_PARTITION = "/dev/mmcblk0p1";
export const SD_EXTROOT_PARTITION = "/dev/mmcblk0p2";
export const MOUNT_POINT = "/mnt";

const EXTROOT_UUID = ".extroot-uuid";

/**
 * Mount `device`, run `body`, unmount. The unmount runs on failure too;
 * its own failure is then only reported, the body's error wins.
 */
export async function withMount<T>(shell: RemoteShell, device: string, body: () => Promise<T>): Promise<T> {
  await shell.run(["mount", device, MOUNT_POINT]);
  let result: T;
  try {
    result = await body();
  } catch (err) {
    try {
      await shell.run(["umount", MOUNT_POINT]);
    } catch (umountErr) {
      log.warn(`Cannot unmount '${MOUNT_POINT}': ${errorMessage(umountErr)}`);
    }
    throw err;
  }
  await shell.run(["umount", MOUNT_POINT]);
  return result;
}

/** Copy an SD or SD recovery set to the boot partition of the card */
export async function deploySd(
  shell: RemoteShell,
  transfer: FileTransfer,
  image: SdImage | RecoveryImage,
): Promise<void> {
  await withMount(shell, SD_BOOT_PARTITION, async () => {
    transfer.chdir(MOUNT_POINT);
    await putImageSet(new RemoteSink(transfer, MOUNT_POINT), image);
  });
}

/** Write uEnv.txt and optionally reset the extroot partition */
export async function configureSd(shell: RemoteShell, transfer: FileTransfer, config: Config): Promise<void> {
  const uenv = renderUenv(config);
  await withMount(shell, SD_BOOT_PARTITION, async () => {
    transfer.chdir(MOUNT_POINT);
    log.info(`Creating '${UENV_TXT}'...`);
    await transfer.writeFile(UENV_TXT, uenv);
  });

  const { reset_extroot: resetExtroot, remove_extroot_uuid: removeUuid } = config.deploy;
  if (!resetExtroot && !removeUuid) return;

  await withMount(shell, SD_EXTROOT_PARTITION, async () => {
    transfer.chdir(MOUNT_POINT);
    if (resetExtroot) {
      log.info("Removing all data from extroot...");
      await shell.run(["rm", "-fr", `${MOUNT_POINT}/*`]);
    } else if ((await transfer.listdir("etc")).includes(EXTROOT_UUID)) {
      log.info("Removing extroot UUID...");
      await transfer.remove(`etc/${EXTROOT_UUID}`);
    }
  });
}
