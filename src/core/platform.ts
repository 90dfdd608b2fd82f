import { ConfigurationError } from "../utils/errors.js";

export interface PlatformParts {
  platform: string;
  target: string;
  subtarget: string;
  subtargetFamily: string;
}

/** zynq-dm1-g9 -> { target: "zynq", subtarget: "dm1-g9", subtargetFamily: "dm1" } */
export function splitPlatform(platform: string): PlatformParts {
  const idx = platform.indexOf("-");
  if (idx <= 0 || idx === platform.length - 1) {
    throw new ConfigurationError(
      `Invalid platform '${platform}', expected <target>-<subtarget>`,
      "miner.platform",
    );
  }
  const subtarget = platform.slice(idx + 1);
  return {
    platform,
    target: platform.slice(0, idx),
    subtarget,
    subtargetFamily: subtarget.split("-")[0],
  };
}

/** Device hostname derived from the last three MAC octets: miner-123456 */
export function hostnameFromMac(mac: string): string {
  return "miner-" + mac.split(":").slice(-3).join("").toLowerCase();
}

export type FirmwareSlot = 1 | 2;

const FIRMWARE_MTD: Record<FirmwareSlot, string> = {
  1: "/dev/mtd7",
  2: "/dev/mtd8",
};

/** MTD device holding the UBI region of a firmware slot */
export function firmwareMtd(slot: FirmwareSlot): string {
  return FIRMWARE_MTD[slot];
}

/** MTD partition name of the bitstream belonging to a firmware slot */
export function bitstreamMtd(slot: FirmwareSlot): string {
  return `fpga${slot}`;
}

const HARDWARE_VERSIONS: Record<string, string> = {
  "zynq-dm1-g9": "G9",
  "zynq-dm1-g19": "G19",
  "zynq-am1-s9": "S9",
};

/** Hardware version string expected by the conversion stage-1 script */
export function hardwareVersion(platform: string): string {
  const hwver = HARDWARE_VERSIONS[platform];
  if (!hwver) {
    throw new ConfigurationError(
      `No hardware version known for platform '${platform}' (supported: ${Object.keys(HARDWARE_VERSIONS).join(", ")})`,
      "miner.platform",
    );
  }
  return hwver;
}
