import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { RemoteShell } from "../transport/ssh.js";
import type { FileTransfer } from "../transport/sftp.js";
import { formatCommand, quoteArg, writeAll, type CommandOutput } from "../transport/command.js";
import { generateHwid } from "./hwid.js";
import { FIRMWARE_DIR, SYSTEM_DIR } from "./upgrade-bundle.js";
import { ConfigurationError, RemoteCommandError } from "../utils/errors.js";
import { transferProgress } from "../utils/ui.js";
import * as log from "../utils/logger.js";

/** Staging directory of the conversion on the device */
export const TARGET_DIR = "/tmp/firmware";
export const BACKUP_DIR = "backup";
export const RECOVERY_MTDPARTS = "recovery_mtdparts";
const NAND_MTDPARTS_PREFIX = "mtdparts=pl35x-nand:";

/** Binaries of the bundle's system/ directory and where the vendor firmware needs them */
const SYSTEM_BINARIES: ReadonlyArray<[string, string]> = [
  ["ld-musl-armhf.so.1", "/lib"],
  ["sftp-server", "/usr/lib/openssh"],
  ["fw_printenv", "/usr/sbin"],
];

export interface MtdPartition {
  /** device name, e.g. mtd3 */
  device: string;
  size: number;
  name: string;
}

/** Size in mtdparts notation: 0x20000 -> "128k", 0x1000000 -> "16m" */
export function mtdpartsSize(value: number): string {
  const units = ["", "k", "m", "g"];
  let unit = 0;
  while (unit < units.length - 1 && value % 1024 === 0) {
    value /= 1024;
    unit++;
  }
  return `${value}${units[unit]}`;
}

/** Inverse of mtdpartsSize */
export function parseMtdpartsSize(value: string): number {
  const multipliers: Record<string, number> = { k: 1024, m: 1024 ** 2, g: 1024 ** 3 };
  const multiplier = multipliers[value.slice(-1)];
  const digits = multiplier ? value.slice(0, -1) : value;
  if (!/^\d+$/.test(digits)) throw new ConfigurationError(`Invalid MTD partition size '${value}'`);
  return Number(digits) * (multiplier ?? 1);
}

/**
 * Parse /proc/mtd. The first line is a header; each following line reads
 * `mtd0: 01000000 00020000 "boot"` (device, hex size, hex erase size, quoted name).
 */
export function parseProcMtd(text: string): MtdPartition[] {
  const partitions: MtdPartition[] = [];
  for (const line of text.split("\n").slice(1)) {
    if (line.trim() === "") continue;
    const match = /^(mtd\d+):\s+([0-9a-fA-F]+)\s+[0-9a-fA-F]+\s+"(.*)"$/.exec(line.trim());
    if (!match) throw new ConfigurationError(`Invalid /proc/mtd entry '${line}'`);
    partitions.push({ device: match[1], size: parseInt(match[2], 16), name: match[3] });
  }
  return partitions;
}

export function formatMtdparts(partitions: readonly MtdPartition[]): string {
  return NAND_MTDPARTS_PREFIX + partitions.map((p) => `${mtdpartsSize(p.size)}(${p.name})`).join(",");
}

/** Parse `mtdparts=<id>:<size>(<name>),...`; devices are numbered in order */
export function parseMtdparts(value: string): MtdPartition[] {
  const start = value.indexOf(":");
  if (start === -1) throw new ConfigurationError(`Invalid mtdparts '${value}'`);
  return value
    .slice(start + 1)
    .split(",")
    .map((part, index) => {
      const match = /^(\w+)\((.+)\)$/.exec(part);
      if (!match) throw new ConfigurationError(`Invalid MTD partition '${part}'`);
      return { device: `mtd${index}`, size: parseMtdpartsSize(match[1]), name: match[2] };
    });
}

/** YYYY-MM-DD in local time */
function formatDate(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Copy a local file to the device through the shell; works before an SFTP server exists */
export async function pushFile(shell: RemoteShell, localPath: string, remotePath: string): Promise<void> {
  await shell.pipe(["sh", "-c", `cat > ${quoteArg(remotePath)}`], async ({ stdin }) => {
    await writeAll(stdin, fs.createReadStream(localPath));
  });
}

/**
 * Install the binaries the vendor firmware lacks (bundles for version 3).
 * Runs before the first SFTP transfer since sftp-server is one of them.
 */
export async function prepareSystem(shell: RemoteShell, systemDir: string): Promise<void> {
  log.info("Preparing remote system...");
  for (const [name, remoteDir] of SYSTEM_BINARIES) {
    const remoteFile = `${remoteDir}/${name}`;
    await shell.run(["mkdir", "-p", remoteDir]);
    log.info(`Copying '${name}' to '${remoteFile}'...`);
    await pushFile(shell, path.join(systemDir, name), remoteFile);
    await shell.run(["chmod", "+x", remoteFile]);
  }
  await shell.run(["ln", "-fs", "/usr/sbin/fw_printenv", "/usr/sbin/fw_setenv"]);
}

/**
 * Dump every MTD partition into `<backupRoot>/<mac>-<date>/<dev>.bin` and
 * write a uEnv.txt that boots the recovery image with the old layout.
 * Returns the backup directory.
 */
export async function backupFirmware(shell: RemoteShell, backupRoot: string, now: Date): Promise<string> {
  log.info("Processing miner backup...");
  const mac = (await shell.run(["cat", "/sys/class/net/eth0/address"])).stdout.toString("utf-8").trim();
  const backupDir = path.join(backupRoot, `${mac.replace(/:/g, "")}-${formatDate(now)}`);
  await fs.promises.mkdir(backupDir, { recursive: true });

  const partitions = parseProcMtd((await shell.run(["cat", "/proc/mtd"])).stdout.toString("utf-8"));
  for (const partition of partitions) {
    log.info(`Backup ${partition.device} (${partition.name})`);
    const dumpPath = path.join(backupDir, `${partition.device}.bin`);
    await shell.pipe(["/usr/sbin/nanddump", `/dev/${partition.device}`], ({ stdout }) =>
      pipeline(stdout, fs.createWriteStream(dumpPath)),
    );
  }

  await fs.promises.writeFile(
    path.join(backupDir, "uEnv.txt"),
    `recovery=yes\n${RECOVERY_MTDPARTS}=${formatMtdparts(partitions)}\nethaddr=${mac}\n`,
  );
  return backupDir;
}

/** Upload a local directory tree below the transfer's working directory */
export async function uploadDirectory(transfer: FileTransfer, localDir: string, remoteDir = "."): Promise<void> {
  const entries = fs.readdirSync(localDir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const localPath = path.join(localDir, entry.name);
    const remotePath = path.posix.join(remoteDir, entry.name);
    if (entry.isDirectory()) {
      await transfer.mkdir(remotePath);
      await uploadDirectory(transfer, localPath, remotePath);
      continue;
    }
    const progress = transferProgress(remotePath);
    try {
      await transfer.put(localPath, remotePath, progress.onProgress);
      progress.done(true);
    } catch (err) {
      progress.done(false);
      throw err;
    }
  }
}

export interface BootstrapOptions {
  /** directory holding the conversion bundle (firmware/, optional system/) */
  bundleDir: string;
  backup: boolean;
  /** defaults to backup/ inside the bundle */
  backupRoot?: string;
  hwid?: () => string;
  now?: () => Date;
}

function logLines(data: Buffer, write: (line: string) => void): void {
  for (const line of data.toString("utf-8").split("\n")) {
    if (line.length > 0) write(line);
  }
}

/**
 * Convert a device running its vendor firmware: stage the bundle in
 * /tmp/firmware, back up NAND, run stage 1 and reboot into the upgrade
 * kernel. A stage 1 failure is reported with its error output and rethrown.
 */
export async function runBootstrap(shell: RemoteShell, options: BootstrapOptions): Promise<void> {
  const firmwareDir = path.join(options.bundleDir, FIRMWARE_DIR);
  if (!fs.existsSync(firmwareDir)) {
    throw new ConfigurationError(`Missing bundle directory '${firmwareDir}'`, firmwareDir);
  }
  const systemDir = path.join(options.bundleDir, SYSTEM_DIR);

  await shell.run(["rm", "-fr", TARGET_DIR]);
  await shell.run(["mkdir", "-p", TARGET_DIR]);

  if (fs.existsSync(systemDir)) await prepareSystem(shell, systemDir);

  if (options.backup) {
    const backupRoot = options.backupRoot ?? path.join(options.bundleDir, BACKUP_DIR);
    const backupDir = await backupFirmware(shell, backupRoot, (options.now ?? (() => new Date()))());
    log.success(`Backup stored in '${backupDir}'`);
  }

  const transfer = await shell.sftp();
  try {
    log.info("Uploading firmware...");
    transfer.chdir(TARGET_DIR);
    await uploadDirectory(transfer, firmwareDir);
  } finally {
    transfer.close();
  }

  const hwid = (options.hwid ?? generateHwid)();
  log.info("Upgrading firmware...");
  const stage1 = `${formatCommand(["cd", TARGET_DIR])} && ls -l && ${formatCommand(["/bin/sh", "stage1.sh", hwid])}`;
  let output: CommandOutput;
  try {
    output = await shell.run(["sh", "-c", stage1]);
  } catch (err) {
    if (err instanceof RemoteCommandError) logLines(err.stderr, log.error);
    throw err;
  }
  logLines(output.stdout, log.output);
  log.success("Upgrade was successful!");

  log.info("Rebooting...");
  try {
    await shell.run(["/sbin/reboot"]);
  } catch (err) {
    // the connection drops while reboot runs
    if (!(err instanceof RemoteCommandError)) throw err;
    log.debug(`Reboot ended with: ${err.message}`);
  }
}

/** recovery_mtdparts value stored in a backup's uEnv.txt */
export function readBackupMtdparts(backupDir: string): string {
  const uenvPath = path.join(backupDir, "uEnv.txt");
  if (!fs.existsSync(uenvPath)) throw new ConfigurationError(`Missing '${uenvPath}'`, uenvPath);
  const prefix = `${RECOVERY_MTDPARTS}=`;
  const line = fs
    .readFileSync(uenvPath, "utf-8")
    .split("\n")
    .find((l) => l.startsWith(prefix));
  if (!line) throw new ConfigurationError(`No ${RECOVERY_MTDPARTS} in '${uenvPath}'`, uenvPath);
  return line.slice(prefix.length).trim();
}

export interface RestoreOptions {
  backupDir: string;
  /** device booted from an SD recovery card: skip the switch to recovery, halt at the end */
  sdRecovery: boolean;
  /** open a session and run `fn` on it */
  session: <T>(fn: (shell: RemoteShell) => Promise<T>) => Promise<T>;
  /** resolves once the device is reachable again after a reboot */
  waitForReboot: () => Promise<void>;
}

/** Write a backup taken by the bootstrap driver back to NAND from recovery mode */
export async function restoreBackup(options: RestoreOptions): Promise<void> {
  const mtdparts = readBackupMtdparts(options.backupDir);
  const partitions = parseMtdparts(mtdparts);
  for (const { device } of partitions) {
    const dump = path.join(options.backupDir, `${device}.bin`);
    if (!fs.existsSync(dump)) throw new ConfigurationError(`Missing partition dump '${dump}'`, dump);
  }

  if (!options.sdRecovery) {
    await options.session(async (shell) => {
      await shell.run(["fw_setenv", RECOVERY_MTDPARTS, mtdparts]);
      await shell.run(["miner", "run_recovery"]);
    });
    log.info("Waiting for recovery mode...");
    await options.waitForReboot();
  }

  await options.session(async (shell) => {
    for (const { device, name } of partitions) {
      log.info(`Restore ${device} (${name})`);
      await shell.pipe(["mtd", "-e", name, "write", "-", name], async ({ stdin }) => {
        await writeAll(stdin, fs.createReadStream(path.join(options.backupDir, `${device}.bin`)));
      });
    }
    log.success("Restore finished successfully");
    if (options.sdRecovery) {
      log.info("Halting system...");
      log.warn("Turn off the miner and change the jumper to boot it from NAND");
      await shell.run(["/sbin/halt"]);
    } else {
      log.info("Rebooting to restored firmware...");
      await shell.run(["/sbin/reboot"]);
    }
  });
}
