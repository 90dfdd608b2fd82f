import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { gunzipSync } from "node:zlib";
import { mtdWrite, mtdWriteCommand, mtdWriteData } from "../../../src/core/provision/mtd.js";
import { FakeShell } from "../../helpers/fake-remote.js";

describe("mtd", () => {
  let tmpDir: string;
  let image: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fwdeploy-mtd-test-"));
    image = path.join(tmpDir, "factory.bin");
    fs.writeFileSync(image, Buffer.alloc(4096, 0xab));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("builds the raw write command", () => {
    assert.deepEqual(mtdWriteCommand("boot"), ["mtd", "write", "-", "boot"]);
    assert.deepEqual(mtdWriteCommand("recovery", { offset: 0x800000, erase: false }), [
      "mtd",
      "-n",
      "-p",
      "8388608",
      "write",
      "-",
      "recovery",
    ]);
  });

  it("streams the file unchanged", async () => {
    const shell = new FakeShell();
    await mtdWrite(shell, image, "boot");
    assert.deepEqual(shell.commands, ["mtd write - boot"]);
    assert.deepEqual(shell.input("mtd write - boot"), Buffer.alloc(4096, 0xab));
  });

  it("sends gzip data when compressing", async () => {
    const shell = new FakeShell();
    await mtdWrite(shell, image, "fpga1", { compress: true });
    const sent = shell.input("mtd write - fpga1");
    assert.deepEqual(sent.subarray(0, 2), Buffer.from([0x1f, 0x8b]));
    assert.deepEqual(gunzipSync(sent), Buffer.alloc(4096, 0xab));
  });

  it("writes generated data", async () => {
    const shell = new FakeShell();
    await mtdWriteData(shell, Buffer.from("ENV"), "miner_cfg");
    assert.equal(shell.input("mtd write - miner_cfg").toString(), "ENV");
  });

  it("fails when the write command exits non-zero", async () => {
    const shell = new FakeShell().respond("mtd write - boot", { code: 1, stderr: "Could not open mtd device: boot" });
    await assert.rejects(mtdWrite(shell, image, "boot"), {
      name: "RemoteCommandError",
      exitCode: 1,
      message: "Remote command 'mtd write - boot' failed with exit status 1: Could not open mtd device: boot",
    });
  });
});
