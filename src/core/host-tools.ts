import { spawn } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { MissingUtilityError, UtilityExecutionError } from "../utils/errors.js";
import * as log from "../utils/logger.js";

/** Size of the miner_cfg NAND partition image and of the U-Boot environment */
export const MINER_CFG_SIZE = 0x20000;
export const UBOOT_ENV_SIZE = 0x20000;

/** Utilities of the build tree the provisioning engine calls on the host */
export interface HostTools {
  /** key=value text -> fixed-size U-Boot environment image */
  envImage(input: Buffer | string, size: number): Promise<Buffer>;
  /** Sign a feeds index in place (writes <index>.sig) */
  sign(indexPath: string, keyPath: string): Promise<void>;
  /** Generate a new signing key pair */
  keygen(secretPath: string, publicPath: string): Promise<void>;
}

export interface HostToolPaths {
  mkenvimage: string;
  usign: string;
}

/**
 * Run a host utility, feed it `input` on stdin and return its stdout.
 * Missing executable -> MissingUtilityError, non-zero exit -> UtilityExecutionError.
 */
export function runUtility(utility: string, args: string[], input?: Buffer | string): Promise<Buffer> {
  if (!fs.existsSync(utility)) {
    return Promise.reject(new MissingUtilityError(utility));
  }
  const name = path.basename(utility);
  log.debug(`Running ${name} ${args.join(" ")}`);

  return new Promise((resolve, reject) => {
    const child = spawn(utility, args, { stdio: ["pipe", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", (err) => {
      reject(new UtilityExecutionError(`Cannot run '${utility}': ${err.message}`, name, null));
    });
    child.on("close", (code) => {
      if (code === 0) {
        resolve(Buffer.concat(stdout));
        return;
      }
      const detail = Buffer.concat(stderr).toString("utf-8").trim();
      reject(
        new UtilityExecutionError(
          `'${name} ${args.join(" ")}' failed with exit status ${code ?? "unknown"}${detail ? `: ${detail}` : ""}`,
          name,
          code,
        ),
      );
    });

    child.stdin.on("error", (err) => log.debug(`${name} stdin: ${err.message}`));
    child.stdin.end(input);
  });
}

/** Host utilities located in the build tree */
export class BuildHostTools implements HostTools {
  constructor(private readonly paths: HostToolPaths) {}

  envImage(input: Buffer | string, size: number): Promise<Buffer> {
    return runUtility(this.paths.mkenvimage, ["-r", "-p", "0", "-s", String(size), "-"], input);
  }

  async sign(indexPath: string, keyPath: string): Promise<void> {
    await runUtility(this.paths.usign, ["-S", "-m", indexPath, "-s", keyPath]);
  }

  async keygen(secretPath: string, publicPath: string): Promise<void> {
    await runUtility(this.paths.usign, ["-G", "-s", secretPath, "-p", publicPath]);
  }
}
