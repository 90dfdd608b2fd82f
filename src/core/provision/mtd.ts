import fs from "node:fs";
import { gzipSync } from "node:zlib";
import type { RemoteShell } from "../../transport/ssh.js";
import { writeAll, type Argv } from "../../transport/command.js";

export interface MtdWriteOptions {
  /** skip the first bytes of the partition */
  offset?: number;
  /** gzip the data before it is sent; the device side cannot compress */
  compress?: boolean;
  /** erase blocks before writing (default) */
  erase?: boolean;
}

/** Argument vector of the on-device raw write reading from stdin */
export function mtdWriteCommand(device: string, options: MtdWriteOptions = {}): Argv {
  const argv = ["mtd"];
  if (options.erase === false) argv.push("-n");
  if (options.offset) argv.push("-p", String(options.offset));
  argv.push("write", "-", device);
  return argv;
}

/** Stream a local image file into a NAND partition */
export async function mtdWrite(
  shell: RemoteShell,
  file: string,
  device: string,
  options: MtdWriteOptions = {},
): Promise<void> {
  // compression happens before the command starts receiving data
  const data = options.compress ? gzipSync(await fs.promises.readFile(file)) : undefined;
  await shell.pipe(mtdWriteCommand(device, options), async ({ stdin }) => {
    await writeAll(stdin, data ?? fs.createReadStream(file));
  });
}

/** Write generated content into a NAND partition */
export async function mtdWriteData(shell: RemoteShell, data: Buffer, device: string): Promise<void> {
  await shell.pipe(mtdWriteCommand(device), async ({ stdin }) => {
    await writeAll(stdin, data);
  });
}
