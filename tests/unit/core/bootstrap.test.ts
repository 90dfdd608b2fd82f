import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  formatMtdparts,
  mtdpartsSize,
  parseMtdparts,
  parseMtdpartsSize,
  parseProcMtd,
  restoreBackup,
  runBootstrap,
} from "../../../src/core/bootstrap.js";
import type { RemoteShell } from "../../../src/transport/ssh.js";
import { FakeShell } from "../../helpers/fake-remote.js";

const PROC_MTD =
  "dev:    size   erasesize  name\n" +
  'mtd0: 01000000 00020000 "boot"\n' +
  'mtd1: 00020000 00020000 "uboot_env"\n';

const MTDPARTS = "mtdparts=pl35x-nand:16m(boot),128k(uboot_env)";
const STAGE1 = "sh -c 'cd /tmp/firmware && ls -l && /bin/sh stage1.sh hwid-test'";

describe("bootstrap", () => {
  describe("mtdparts", () => {
    it("formats sizes with the largest exact unit", () => {
      assert.equal(mtdpartsSize(0x20000), "128k");
      assert.equal(mtdpartsSize(0x1000000), "16m");
      assert.equal(mtdpartsSize(0x40000000), "1g");
      assert.equal(mtdpartsSize(1000), "1000");
    });

    it("parses sizes back", () => {
      assert.equal(parseMtdpartsSize("128k"), 131072);
      assert.equal(parseMtdpartsSize("16m"), 16777216);
      assert.equal(parseMtdpartsSize("512"), 512);
      assert.throws(() => parseMtdpartsSize("12x"), { name: "ConfigurationError" });
    });

    it("reads /proc/mtd", () => {
      assert.deepEqual(parseProcMtd(PROC_MTD), [
        { device: "mtd0", size: 0x1000000, name: "boot" },
        { device: "mtd1", size: 0x20000, name: "uboot_env" },
      ]);
    });

    it("rejects a malformed /proc/mtd row", () => {
      assert.throws(() => parseProcMtd(PROC_MTD + "mtd2: 00020000\n"), {
        name: "ConfigurationError",
        message: "Invalid /proc/mtd entry 'mtd2: 00020000'",
      });
    });

    it("formats and parses the kernel argument", () => {
      const partitions = parseProcMtd(PROC_MTD);
      assert.equal(formatMtdparts(partitions), MTDPARTS);
      assert.deepEqual(parseMtdparts(MTDPARTS), partitions);
      assert.throws(() => parseMtdparts("16m(boot)"), { name: "ConfigurationError" });
      assert.throws(() => parseMtdparts("mtdparts=nand:16m"), {
        message: "Invalid MTD partition '16m'",
      });
    });
  });

  describe("runBootstrap", () => {
    let tmpDir: string;
    let bundleDir: string;
    let backupRoot: string;

    function bundleFile(rel: string, content: string): void {
      const p = path.join(bundleDir, rel);
      fs.mkdirSync(path.dirname(p), { recursive: true });
      fs.writeFileSync(p, content);
    }

    function deviceShell(): FakeShell {
      return new FakeShell()
        .respond("cat /sys/class/net/eth0/address", { stdout: "00:0a:35:aa:bb:cc\n" })
        .respond("cat /proc/mtd", { stdout: PROC_MTD })
        .respond("/usr/sbin/nanddump /dev/mtd0", { stdout: "dump-boot" })
        .respond("/usr/sbin/nanddump /dev/mtd1", { stdout: "dump-env" })
        .respond(STAGE1, { stdout: "stage1: ok\n" });
    }

    const options = () => ({
      bundleDir,
      backup: true,
      backupRoot,
      hwid: () => "hwid-test",
      now: () => new Date(2024, 0, 5),
    });

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fwdeploy-bootstrap-test-"));
      bundleDir = path.join(tmpDir, "bundle");
      backupRoot = path.join(tmpDir, "backups");
      bundleFile("firmware/CONTROL", "control");
      bundleFile("firmware/stage1.sh", "stage1");
      bundleFile("firmware/keys/a.pub", "key");
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("stages the bundle, backs up NAND, runs stage 1 and reboots", async () => {
      const shell = deviceShell();
      await runBootstrap(shell, options());

      assert.deepEqual(shell.commands, [
        "rm -fr /tmp/firmware",
        "mkdir -p /tmp/firmware",
        "cat /sys/class/net/eth0/address",
        "cat /proc/mtd",
        "/usr/sbin/nanddump /dev/mtd0",
        "/usr/sbin/nanddump /dev/mtd1",
        STAGE1,
        "/sbin/reboot",
      ]);
      assert.deepEqual(shell.transfer.ops, [
        "put /tmp/firmware/CONTROL",
        "mkdir /tmp/firmware/keys",
        "put /tmp/firmware/keys/a.pub",
        "put /tmp/firmware/stage1.sh",
      ]);
      assert.equal(shell.transfer.closed, 1);

      const backupDir = path.join(backupRoot, "000a35aabbcc-2024-01-05");
      assert.equal(fs.readFileSync(path.join(backupDir, "mtd0.bin"), "utf-8"), "dump-boot");
      assert.equal(fs.readFileSync(path.join(backupDir, "mtd1.bin"), "utf-8"), "dump-env");
      assert.equal(
        fs.readFileSync(path.join(backupDir, "uEnv.txt"), "utf-8"),
        `recovery=yes\nrecovery_mtdparts=${MTDPARTS}\nethaddr=00:0a:35:aa:bb:cc\n`,
      );
    });

    it("installs the system binaries over the shell before any transfer", async () => {
      for (const name of ["ld-musl-armhf.so.1", "sftp-server", "fw_printenv"]) {
        bundleFile(`system/${name}`, `<${name}>`);
      }
      const shell = deviceShell();
      await runBootstrap(shell, { ...options(), backup: false });

      assert.deepEqual(shell.commands.slice(2, 12), [
        "mkdir -p /lib",
        "sh -c 'cat > /lib/ld-musl-armhf.so.1'",
        "chmod +x /lib/ld-musl-armhf.so.1",
        "mkdir -p /usr/lib/openssh",
        "sh -c 'cat > /usr/lib/openssh/sftp-server'",
        "chmod +x /usr/lib/openssh/sftp-server",
        "mkdir -p /usr/sbin",
        "sh -c 'cat > /usr/sbin/fw_printenv'",
        "chmod +x /usr/sbin/fw_printenv",
        "ln -fs /usr/sbin/fw_printenv /usr/sbin/fw_setenv",
      ]);
      assert.equal(shell.input("sh -c 'cat > /usr/lib/openssh/sftp-server'").toString(), "<sftp-server>");
      assert.ok(!shell.transfer.ops.some((op) => op.includes("sftp-server")));
      assert.equal(fs.existsSync(backupRoot), false);
    });

    it("rethrows a stage 1 failure without rebooting", async () => {
      const shell = deviceShell().respond(STAGE1, { code: 1, stderr: "flash failed\n" });
      await assert.rejects(runBootstrap(shell, options()), {
        name: "RemoteCommandError",
        exitCode: 1,
      });
      assert.equal(shell.commands.at(-1), STAGE1);
    });

    it("ignores the reboot dropping the connection", async () => {
      const shell = deviceShell().respond("/sbin/reboot", { code: 255 });
      await runBootstrap(shell, options());
      assert.equal(shell.commands.at(-1), "/sbin/reboot");
    });

    it("requires the firmware directory", async () => {
      fs.rmSync(path.join(bundleDir, "firmware"), { recursive: true });
      const shell = deviceShell();
      await assert.rejects(runBootstrap(shell, options()), { name: "ConfigurationError" });
      assert.deepEqual(shell.commands, []);
    });
  });

  describe("restoreBackup", () => {
    let backupDir: string;
    let events: string[];
    let shells: FakeShell[];

    const session = async <T>(fn: (shell: RemoteShell) => Promise<T>): Promise<T> => {
      const shell = new FakeShell();
      shells.push(shell);
      events.push("session");
      return fn(shell);
    };
    const waitForReboot = async (): Promise<void> => {
      events.push("wait");
    };

    beforeEach(() => {
      backupDir = fs.mkdtempSync(path.join(os.tmpdir(), "fwdeploy-restore-test-"));
      fs.writeFileSync(path.join(backupDir, "uEnv.txt"), `recovery=yes\nrecovery_mtdparts=${MTDPARTS}\n`);
      fs.writeFileSync(path.join(backupDir, "mtd0.bin"), "dump-boot");
      fs.writeFileSync(path.join(backupDir, "mtd1.bin"), "dump-env");
      events = [];
      shells = [];
    });

    afterEach(() => {
      fs.rmSync(backupDir, { recursive: true, force: true });
    });

    it("switches to recovery mode, writes every partition and reboots", async () => {
      await restoreBackup({ backupDir, sdRecovery: false, session, waitForReboot });

      assert.deepEqual(events, ["session", "wait", "session"]);
      assert.deepEqual(shells[0].commands, [
        `fw_setenv recovery_mtdparts '${MTDPARTS}'`,
        "miner run_recovery",
      ]);
      assert.deepEqual(shells[1].commands, [
        "mtd -e boot write - boot",
        "mtd -e uboot_env write - uboot_env",
        "/sbin/reboot",
      ]);
      assert.equal(shells[1].input("mtd -e uboot_env write - uboot_env").toString(), "dump-env");
    });

    it("halts a device booted from the SD recovery card", async () => {
      await restoreBackup({ backupDir, sdRecovery: true, session, waitForReboot });

      assert.deepEqual(events, ["session"]);
      assert.equal(shells[0].commands.at(-1), "/sbin/halt");
    });

    it("checks every partition dump before touching the device", async () => {
      fs.rmSync(path.join(backupDir, "mtd1.bin"));
      await assert.rejects(restoreBackup({ backupDir, sdRecovery: false, session, waitForReboot }), {
        name: "ConfigurationError",
        message: `Missing partition dump '${path.join(backupDir, "mtd1.bin")}'`,
      });
      assert.deepEqual(events, []);
    });
  });
});
