#!/usr/bin/env node

import { Command, Option } from "commander";
import { loadCliContext, type GlobalOptions } from "./commands/context.js";
import { FwdeployError, errorMessage } from "./utils/errors.js";
import * as log from "./utils/logger.js";

const program = new Command();

program
  .name("fwdeploy")
  .description("Deploy and provision firmware on FPGA appliances")
  .version("0.1.0")
  .option("-c, --config <path>", "configuration file (default: configs/default.yml)")
  .option("-p, --platform <platform>", "override miner.platform, e.g. zynq-dm1-g9")
  .addOption(new Option("--log <level>", "log level").choices(["debug", "info", "warn", "error"]));

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

// fwdeploy deploy [targets...]
program
  .command("deploy [targets...]")
  .description("Deploy targets to a device or to local directories")
  .action(async (targets: string[]) => {
    const ctx = loadCliContext(globals());
    const { handleDeploy } = await import("./commands/deploy.js");
    await handleDeploy(targets, ctx);
  });

// fwdeploy targets
program
  .command("targets")
  .description("List supported targets and aliases")
  .action(async () => {
    const { handleTargets } = await import("./commands/targets.js");
    handleTargets();
  });

// fwdeploy key <secret> [public]
program
  .command("key <secret> [public]")
  .description("Generate a key pair for signing package feeds")
  .action(async (secret: string, publicKey: string | undefined) => {
    const ctx = loadCliContext(globals());
    const { handleKey } = await import("./commands/key.js");
    await handleKey(secret, publicKey, ctx);
  });

// fwdeploy upgrade <hostname>
program
  .command("upgrade <hostname>")
  .description("Convert a device running its vendor firmware using a conversion bundle")
  .option("-b, --bundle <dir>", "conversion bundle directory", ".")
  .option("--no-backup", "skip the NAND backup before the conversion")
  .action(async (hostname: string, opts: { bundle: string; backup: boolean }) => {
    loadCliContext(globals());
    const { handleUpgrade } = await import("./commands/upgrade.js");
    await handleUpgrade(hostname, opts);
  });

// fwdeploy restore <backup-dir> <hostname>
program
  .command("restore <backup-dir> <hostname>")
  .description("Write a NAND backup taken by `upgrade` back to the device")
  .option("--sd-recovery", "device runs the SD recovery image; halt instead of reboot", false)
  .action(async (backupDir: string, hostname: string, opts: { sdRecovery: boolean }) => {
    loadCliContext(globals());
    const { handleRestore } = await import("./commands/upgrade.js");
    await handleRestore(backupDir, hostname, opts);
  });

// fwdeploy config show
const config = program.command("config").description("Inspect the configuration");
config
  .command("show")
  .description("Print the resolved configuration as YAML")
  .action(async () => {
    log.setQuiet(true);
    const ctx = loadCliContext(globals());
    const { handleConfigShow } = await import("./commands/config.js");
    handleConfigShow(ctx);
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof FwdeployError) {
    log.error(err.message);
    log.debug(`[${err.code}]${err.cause ? ` caused by: ${errorMessage(err.cause)}` : ""}`);
  } else {
    log.error(`Unexpected error: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}`);
  }
  process.exitCode = 1;
});
