import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { BuildHostTools, UBOOT_ENV_SIZE, runUtility } from "../../../src/core/host-tools.js";
import { MissingUtilityError, UtilityExecutionError } from "../../../src/utils/errors.js";

describe("host-tools", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fwdeploy-tools-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  /** Executable stand-in that prints its arguments, then echoes stdin */
  function script(name: string, body: string): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    return file;
  }

  it("feeds stdin and returns stdout", async () => {
    const tool = script("mkenvimage", 'echo "$*"; cat');
    const tools = new BuildHostTools({ mkenvimage: tool, usign: path.join(tmpDir, "usign") });
    const out = await tools.envImage("ethaddr=00:0a:35:12:34:56\n", UBOOT_ENV_SIZE);
    assert.equal(out.toString(), "-r -p 0 -s 131072 -\nethaddr=00:0a:35:12:34:56\n");
  });

  it("passes the signing arguments", async () => {
    const log = path.join(tmpDir, "args");
    const tool = script("usign", `echo "$*" > ${log}`);
    const tools = new BuildHostTools({ mkenvimage: path.join(tmpDir, "mkenvimage"), usign: tool });
    await tools.sign("/feeds/Packages", "/keys/key-build");
    assert.equal(fs.readFileSync(log, "utf-8"), "-S -m /feeds/Packages -s /keys/key-build\n");
    await tools.keygen("/keys/test", "/keys/test.pub");
    assert.equal(fs.readFileSync(log, "utf-8"), "-G -s /keys/test -p /keys/test.pub\n");
  });

  it("reports a missing utility", async () => {
    const missing = path.join(tmpDir, "none");
    await assert.rejects(
      runUtility(missing, []),
      (err: unknown) => err instanceof MissingUtilityError && err.utilityPath === missing,
    );
  });

  it("reports a non-zero exit with the error output", async () => {
    const tool = script("failing", "echo 'bad size' >&2; exit 3");
    await assert.rejects(
      runUtility(tool, ["-s", "1"]),
      (err: unknown) =>
        err instanceof UtilityExecutionError &&
        err.exitCode === 3 &&
        err.message === "'failing -s 1' failed with exit status 3: bad size",
    );
  });
});
