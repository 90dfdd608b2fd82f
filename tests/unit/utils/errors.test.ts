import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  FwdeployError,
  ConfigurationError,
  UnsupportedTargetError,
  RemoteCommandError,
  AuthenticationError,
  NetworkError,
  MissingUtilityError,
  UtilityExecutionError,
  errorMessage,
} from "../../../src/utils/errors.js";

describe("FwdeployError", () => {
  it("sets code and message", () => {
    const err = new FwdeployError("something broke", "TEST_CODE");
    assert.equal(err.message, "something broke");
    assert.equal(err.code, "TEST_CODE");
    assert.equal(err.name, "FwdeployError");
  });

  it("is instanceof Error", () => {
    const err = new ConfigurationError("bad", "miner.mac");
    assert.ok(err instanceof Error);
    assert.ok(err instanceof FwdeployError);
    assert.equal(err.code, "CONFIGURATION_ERROR");
    assert.equal(err.path, "miner.mac");
  });
});

describe("RemoteCommandError", () => {
  it("names the command, status and last stderr line", () => {
    const err = new RemoteCommandError("mtd erase recovery", 1, Buffer.alloc(0), Buffer.from("first\nCould not open mtd device\n"));
    assert.equal(err.message, "Remote command 'mtd erase recovery' failed with exit status 1: Could not open mtd device");
    assert.equal(err.exitCode, 1);
    assert.equal(err.code, "REMOTE_COMMAND_FAILED");
  });

  it("reports the signal when there is no exit status", () => {
    const err = new RemoteCommandError("reboot", null, Buffer.alloc(0), Buffer.alloc(0), "TERM");
    assert.equal(err.message, "Remote command 'reboot' failed with signal TERM");
  });
});

describe("other errors", () => {
  it("carry their context fields", () => {
    assert.deepEqual(new UnsupportedTargetError("x", ["foo"]).targets, ["foo"]);
    const auth = new AuthenticationError("denied", "miner-123456", "root");
    assert.equal(auth.hostname, "miner-123456");
    assert.equal(auth.username, "root");
    assert.equal(new NetworkError("down", "miner-1").code, "NETWORK_ERROR");
    const missing = new MissingUtilityError("/opt/usign");
    assert.equal(missing.message, "Missing utility '/opt/usign'");
    assert.equal(new UtilityExecutionError("failed", "usign", 2).exitCode, 2);
  });
});

describe("errorMessage", () => {
  it("handles errors and other values", () => {
    assert.equal(errorMessage(new Error("boom")), "boom");
    assert.equal(errorMessage("plain"), "plain");
  });
});
