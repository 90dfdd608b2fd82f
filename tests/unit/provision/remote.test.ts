import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import type { RecoveryImage } from "../../../src/core/images.js";
import { runRemotePlan } from "../../../src/core/provision/remote.js";
import type { RemotePlan } from "../../../src/core/targets.js";
import { FakeHostTools, FakeShell } from "../../helpers/fake-remote.js";
import { testConfig } from "../../helpers/config.js";

describe("remote", () => {
  let tmpDir: string;
  let recovery: RecoveryImage;

  const emptyPlan: RemotePlan = { nandFirmwareSlots: [], sdConfig: false, nandConfig: false };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fwdeploy-remote-test-"));
    const write = (name: string): string => {
      const p = path.join(tmpDir, name);
      fs.writeFileSync(p, name);
      return p;
    };
    recovery = {
      kind: "recovery",
      boot: write("spl"),
      bootloader: write("uboot"),
      bitstream: write("bit"),
      kernel: write("kernel"),
      factoryImage: write("factory"),
    };
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("opens one transfer for SD images and configuration and closes it", async () => {
    const shell = new FakeShell();
    await runRemotePlan(shell, { ...emptyPlan, sd: recovery, sdConfig: true }, testConfig(tmpDir), new FakeHostTools());

    assert.equal(shell.sftpOpened, 1);
    assert.equal(shell.transfer.closed, 1);
    assert.deepEqual(shell.transfer.ops, [
      "put /mnt/boot.bin",
      "put /mnt/u-boot.img",
      "put /mnt/system.bit",
      "put /mnt/fit.itb",
      "put /mnt/factory.bin",
      "write /mnt/uEnv.txt",
    ]);
  });

  it("does not open a transfer for NAND work", async () => {
    const shell = new FakeShell();
    const config = testConfig(tmpDir, { deploy: { reboot: true } });
    await runRemotePlan(shell, { ...emptyPlan, nandRecovery: recovery }, config, new FakeHostTools());

    assert.equal(shell.sftpOpened, 0);
    assert.equal(shell.commands[0], "mtd write - boot");
    assert.equal(shell.commands.at(-1), "reboot");
  });

  it("closes the transfer when the SD copy fails", async () => {
    const shell = new FakeShell().respond("umount /mnt", { code: 1 });
    await assert.rejects(
      runRemotePlan(shell, { ...emptyPlan, sd: recovery }, testConfig(tmpDir), new FakeHostTools()),
      { name: "RemoteCommandError" },
    );
    assert.equal(shell.transfer.closed, 1);
  });
});
