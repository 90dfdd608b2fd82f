import { restoreBackup, runBootstrap } from "../core/bootstrap.js";
import { promptPassword } from "../utils/ui.js";
import { waitForReboot, withSession, type ConnectOptions } from "../transport/ssh.js";
import * as log from "../utils/logger.js";

/** Vendor firmware accepts root without a password */
const VENDOR_USER = "root";

function vendorLogin(hostname: string): ConnectOptions {
  return { hostname, username: VENDOR_USER, password: "", prompt: promptPassword };
}

export interface UpgradeOptions {
  bundle: string;
  backup: boolean;
}

/** `fwdeploy upgrade <hostname>`: convert a device from its vendor firmware */
export async function handleUpgrade(hostname: string, opts: UpgradeOptions): Promise<void> {
  log.info(`Connecting to '${hostname}'...`);
  await withSession(vendorLogin(hostname), (session) =>
    runBootstrap(session, { bundleDir: opts.bundle, backup: opts.backup }),
  );
}

export interface RestoreCommandOptions {
  sdRecovery: boolean;
}

/** `fwdeploy restore <backup-dir> <hostname>`: write a NAND backup back */
export async function handleRestore(backupDir: string, hostname: string, opts: RestoreCommandOptions): Promise<void> {
  await restoreBackup({
    backupDir,
    sdRecovery: opts.sdRecovery,
    session: (fn) => {
      log.info(`Connecting to '${hostname}'...`);
      return withSession(vendorLogin(hostname), fn);
    },
    waitForReboot: () => waitForReboot(hostname),
  });
}
