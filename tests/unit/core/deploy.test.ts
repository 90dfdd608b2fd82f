import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { deploy, deviceHostname, type SessionRunner } from "../../../src/core/deploy.js";
import type { ConnectOptions, RemoteShell } from "../../../src/transport/ssh.js";
import { FakeHostTools, FakeShell } from "../../helpers/fake-remote.js";
import { TEST_MINER, testConfig } from "../../helpers/config.js";

describe("deploy", () => {
  let tmpDir: string;
  let shell: FakeShell;
  let connected: ConnectOptions[];

  const session: SessionRunner = async <T>(options: ConnectOptions, fn: (shell: RemoteShell) => Promise<T>) => {
    connected.push(options);
    return fn(shell);
  };

  /** Create the NAND recovery artifacts of the default layout */
  function writeRecoveryArtifacts(): void {
    const lede = path.join(tmpDir, "build", "default", "lede");
    const generic = path.join(lede, "bin", "targets", "zynq");
    const files = [
      path.join(generic, "uboot-zynq-dm1-g9", "boot.bin"),
      path.join(generic, "uboot-zynq-dm1-g9", "u-boot.img"),
      path.join(generic, "lede-zynq-dm1-g9-recovery-squashfs-fit.itb"),
      path.join(generic, "lede-zynq-dm1-g9-nand-squashfs-factory.bin"),
      path.join(tmpDir, "build", "default", "platform", "dm1-g9", "system.bit"),
    ];
    for (const file of files) {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, path.basename(file));
    }
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fwdeploy-deploy-test-"));
    shell = new FakeShell();
    connected = [];
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("deviceHostname", () => {
    it("prefers the configured hostname", () => {
      const config = testConfig(tmpDir, { deploy: { ssh: { hostname: "miner-test.lan" } } });
      assert.equal(deviceHostname(config), "miner-test.lan");
    });

    it("derives the hostname from the MAC address", () => {
      const config = testConfig(tmpDir, { deploy: { ssh: { hostname_suffix: ".lan" } } });
      assert.equal(deviceHostname(config), "miner-123456.lan");
    });

    it("needs a MAC address when no hostname is set", () => {
      const { mac: _mac, ...miner } = TEST_MINER;
      const config = testConfig(tmpDir, { miner });
      assert.throws(() => deviceHostname(config), {
        name: "ConfigurationError",
        path: "deploy.ssh.hostname",
      });
    });
  });

  it("runs the nand alias over one session with the alias flags applied", async () => {
    writeRecoveryArtifacts();
    const tools = new FakeHostTools();
    const resolution = await deploy(["nand"], testConfig(tmpDir), { session, tools });

    assert.deepEqual(resolution.targets, ["nand_config", "nand_recovery"]);
    assert.deepEqual(
      connected.map((c) => [c.hostname, c.username, c.port]),
      [["miner-123456", "root", 22]],
    );
    assert.deepEqual(shell.commands, [
      "mtd write - boot",
      "mtd write - uboot",
      "mtd erase recovery",
      "mtd write - recovery",
      "mtd -n -p 8388608 write - recovery",
      "mtd -n -p 20971520 write - recovery",
      "mtd write - miner_cfg",
      "mtd erase uboot_env",
      "reboot",
    ]);
    assert.equal(tools.envImages.length, 1);
  });

  it("checks every artifact before connecting", async () => {
    await assert.rejects(deploy(["sd", "nand_config"], testConfig(tmpDir), { session, tools: new FakeHostTools() }), {
      name: "ConfigurationError",
    });
    assert.deepEqual(connected, []);
  });

  it("checks local target directories before connecting", async () => {
    await assert.rejects(
      deploy(["nand_config", "local_sd_config"], testConfig(tmpDir), { session, tools: new FakeHostTools() }),
      { name: "ConfigurationError", message: "Missing path for local target 'sd_config'" },
    );
    assert.deepEqual(connected, []);
  });

  it("rejects unknown targets", async () => {
    await assert.rejects(deploy(["nand_firmware3"], testConfig(tmpDir), { session }), {
      name: "UnsupportedTargetError",
    });
  });

  it("treats an empty target list as a configuration-only run", async () => {
    const resolution = await deploy([], testConfig(tmpDir), { session, tools: new FakeHostTools() });
    assert.deepEqual(resolution.targets, []);
    assert.deepEqual(resolution.patches, []);
    assert.deepEqual(connected, []);
  });

  it("writes local targets without opening a session", async () => {
    const config = testConfig(tmpDir, { local: { sd_config: "out/sd" }, uenv: { sd_boot: true } });
    await deploy(["local_sd_config"], config, { session, tools: new FakeHostTools() });

    assert.deepEqual(connected, []);
    assert.equal(fs.readFileSync(path.join(tmpDir, "out", "sd", "uEnv.txt"), "utf-8"), "sd_boot=yes\n");
  });
});
