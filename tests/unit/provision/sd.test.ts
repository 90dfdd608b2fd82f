import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import type { SdImage } from "../../../src/core/images.js";
import { configureSd, deploySd, withMount } from "../../../src/core/provision/sd.js";
import { FakeShell } from "../../helpers/fake-remote.js";
import { testConfig } from "../../helpers/config.js";

describe("sd", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fwdeploy-sd-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("withMount", () => {
    it("unmounts when the body fails and keeps the body's error", async () => {
      const shell = new FakeShell().respond("umount /mnt", { code: 1, stderr: "target is busy" });
      await assert.rejects(
        withMount(shell, "/dev/mmcblk0p1", async () => {
          throw new Error("copy failed");
        }),
        { message: "copy failed" },
      );
      assert.deepEqual(shell.commands, ["mount /dev/mmcblk0p1 /mnt", "umount /mnt"]);
    });

    it("returns the body's result", async () => {
      const shell = new FakeShell();
      assert.equal(await withMount(shell, "/dev/mmcblk0p2", async () => 42), 42);
      assert.deepEqual(shell.commands, ["mount /dev/mmcblk0p2 /mnt", "umount /mnt"]);
    });
  });

  it("copies the image set to the boot partition", async () => {
    const names = ["boot.bin", "u-boot.img", "system.bit", "fit.itb"];
    const [boot, bootloader, bitstream, kernel] = names.map((name) => {
      const p = path.join(tmpDir, `src-${name}`);
      fs.writeFileSync(p, name);
      return p;
    });
    const image: SdImage = { kind: "sd", boot, bootloader, bitstream, kernel };
    const shell = new FakeShell();

    await deploySd(shell, shell.transfer, image);

    assert.deepEqual(shell.commands, ["mount /dev/mmcblk0p1 /mnt", "umount /mnt"]);
    assert.deepEqual(shell.transfer.ops, names.map((name) => `put /mnt/${name}`));
    assert.equal(shell.transfer.files.get("/mnt/u-boot.img")?.toString(), "u-boot.img");
  });

  describe("configureSd", () => {
    it("writes uEnv.txt only", async () => {
      const shell = new FakeShell();
      await configureSd(shell, shell.transfer, testConfig(tmpDir, { uenv: { mac: true, sd_images: "yes" } }));

      assert.deepEqual(shell.commands, ["mount /dev/mmcblk0p1 /mnt", "umount /mnt"]);
      assert.equal(
        shell.transfer.files.get("/mnt/uEnv.txt")?.toString(),
        "ethaddr=00:0a:35:12:34:56\nsd_images=yes\n",
      );
    });

    it("wipes the extroot partition", async () => {
      const shell = new FakeShell();
      await configureSd(shell, shell.transfer, testConfig(tmpDir, { deploy: { reset_extroot: true } }));

      assert.deepEqual(shell.commands, [
        "mount /dev/mmcblk0p1 /mnt",
        "umount /mnt",
        "mount /dev/mmcblk0p2 /mnt",
        "rm -fr /mnt/*",
        "umount /mnt",
      ]);
    });

    it("removes the extroot UUID when present", async () => {
      const shell = new FakeShell();
      shell.transfer.files.set("/mnt/etc/.extroot-uuid", Buffer.from("uuid"));
      await configureSd(shell, shell.transfer, testConfig(tmpDir, { deploy: { remove_extroot_uuid: true } }));

      assert.deepEqual(shell.transfer.ops, ["write /mnt/uEnv.txt", "remove /mnt/etc/.extroot-uuid"]);
      assert.equal(shell.transfer.files.has("/mnt/etc/.extroot-uuid"), false);
    });

    it("leaves the extroot alone when no UUID exists", async () => {
      const shell = new FakeShell();
      await configureSd(shell, shell.transfer, testConfig(tmpDir, { deploy: { remove_extroot_uuid: true } }));

      assert.deepEqual(shell.transfer.ops, ["write /mnt/uEnv.txt"]);
      assert.equal(shell.commands.length, 4);
    });
  });
});
