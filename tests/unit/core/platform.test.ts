import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  bitstreamMtd,
  firmwareMtd,
  hardwareVersion,
  hostnameFromMac,
  splitPlatform,
} from "../../../src/core/platform.js";
import { ConfigurationError } from "../../../src/utils/errors.js";

describe("platform", () => {
  it("splits target and sub-target", () => {
    assert.deepEqual(splitPlatform("zynq-dm1-g9"), {
      platform: "zynq-dm1-g9",
      target: "zynq",
      subtarget: "dm1-g9",
      subtargetFamily: "dm1",
    });
  });

  it("rejects a platform without sub-target", () => {
    assert.throws(() => splitPlatform("zynq"), ConfigurationError);
    assert.throws(() => splitPlatform("zynq-"), ConfigurationError);
  });

  it("derives the hostname from the last three MAC octets", () => {
    assert.equal(hostnameFromMac("00:0A:35:AB:CD:EF"), "miner-abcdef");
  });

  it("maps firmware slots to MTD devices", () => {
    assert.equal(firmwareMtd(1), "/dev/mtd7");
    assert.equal(firmwareMtd(2), "/dev/mtd8");
    assert.equal(bitstreamMtd(2), "fpga2");
  });

  it("knows the hardware version of each platform", () => {
    assert.equal(hardwareVersion("zynq-dm1-g9"), "G9");
    assert.equal(hardwareVersion("zynq-dm1-g19"), "G19");
    assert.equal(hardwareVersion("zynq-am1-s9"), "S9");
    assert.throws(() => hardwareVersion("zynq-xx1-z1"), /No hardware version known for platform 'zynq-xx1-z1'/);
  });
});
