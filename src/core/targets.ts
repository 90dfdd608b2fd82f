import path from "node:path";
import type { Config } from "../schemas/config.schema.js";
import type { ConfigPatch } from "./config-loader.js";
import type { FirmwareSlot } from "./platform.js";
import type {
  ConversionImage,
  FeedImage,
  ImageDescriptor,
  NandImage,
  RecoveryImage,
  SdImage,
} from "./images.js";
import { UnsupportedTargetError } from "../utils/errors.js";

/** Vendor firmware generations a conversion bundle can be built for */
export type ConversionVersion = 1 | 2 | 3;
export const CONVERSION_VERSIONS: readonly ConversionVersion[] = [1, 2, 3];

export const SUPPORTED_TARGETS: readonly string[] = [
  "sd_config",
  "sd",
  "sd_recovery",
  "nand_config",
  "nand_recovery",
  "nand_firmware1",
  "nand_firmware2",
  "local_sd_config",
  "local_sd_recovery_config",
  "local_nand_recovery",
  "local_feeds",
  "local_nand_dm_v1",
  "local_nand_dm_v2",
  "local_nand_dm_v3",
  "local_nand_am",
];

export interface TargetAlias {
  targets: readonly string[];
  patches: readonly ConfigPatch[];
}

export const TARGET_ALIASES: Readonly<Record<string, TargetAlias>> = {
  nand: {
    targets: ["nand_recovery", "nand_config"],
    patches: [
      { flag: "write_miner_cfg", value: true },
      { flag: "reset_uboot_env", value: true },
      { flag: "reboot", value: true },
    ],
  },
  local_sd: {
    targets: ["local_sd", "local_sd_config"],
    patches: [],
  },
  local_sd_recovery: {
    targets: ["local_sd_recovery", "local_sd_recovery_config"],
    patches: [],
  },
};

const CONVERSION_TARGETS: ReadonlyArray<[string, ConversionVersion]> = [
  ["local_nand_dm_v1", 1],
  ["local_nand_dm_v2", 2],
  ["local_nand_dm_v3", 3],
  ["local_nand_am", 3],
];

const FIRMWARE_TARGETS: ReadonlyArray<[string, FirmwareSlot]> = [
  ["nand_firmware1", 1],
  ["nand_firmware2", 2],
];

/** Where the build leaves its artifacts, resolved from the configuration */
export interface ArtifactLayout {
  genericDir: string;
  imagePrefix: string;
  platform: string;
  bitstream: string;
  feedsKey: string;
  feedsPackages: string;
}

export function artifactLayout(config: Config): ArtifactLayout {
  return {
    genericDir: config.artifacts.generic_dir,
    imagePrefix: config.artifacts.image_prefix,
    platform: config.miner.platform,
    bitstream: config.artifacts.bitstream,
    feedsKey: config.artifacts.feeds_key,
    feedsPackages: config.artifacts.feeds_packages,
  };
}

export interface RemotePlan {
  readonly sd?: SdImage | RecoveryImage;
  readonly nandRecovery?: RecoveryImage;
  readonly nand?: NandImage;
  readonly nandFirmwareSlots: readonly FirmwareSlot[];
  readonly sdConfig: boolean;
  readonly nandConfig: boolean;
}

export interface LocalPlan {
  readonly sd?: SdImage;
  readonly sdRecovery?: RecoveryImage;
  readonly nandRecovery?: RecoveryImage;
  readonly conversion: Readonly<Partial<Record<ConversionVersion, ConversionImage>>>;
  readonly sdConfig: boolean;
  readonly sdRecoveryConfig: boolean;
}

export interface FeedPlan {
  readonly local?: FeedImage;
}

export interface DeploymentPlan {
  readonly remote: RemotePlan;
  readonly local: LocalPlan;
  readonly feeds: FeedPlan;
}

export interface Resolution {
  plan: DeploymentPlan;
  /** deploy flag assignments carried by aliases, each flag once */
  patches: ConfigPatch[];
  /** expanded target names, sorted */
  targets: string[];
}

/**
 * Expand aliases and validate target names.
 * Unknown names and the sd / sd_recovery pair raise UnsupportedTargetError.
 */
export function expandTargets(requested: readonly string[]): { targets: Set<string>; patches: ConfigPatch[] } {
  const targets = new Set<string>();
  const patches = new Map<ConfigPatch["flag"], boolean>();

  for (const target of requested) {
    const alias = Object.hasOwn(TARGET_ALIASES, target) ? TARGET_ALIASES[target] : undefined;
    if (alias) {
      for (const member of alias.targets) targets.add(member);
      for (const patch of alias.patches) patches.set(patch.flag, patch.value);
    } else if (SUPPORTED_TARGETS.includes(target)) {
      targets.add(target);
    } else {
      throw new UnsupportedTargetError(`Unsupported target '${target}' for firmware image`, [target]);
    }
  }

  if (targets.has("sd") && targets.has("sd_recovery")) {
    throw new UnsupportedTargetError("Targets 'sd' and 'sd_recovery' are mutually exclusive", ["sd", "sd_recovery"]);
  }

  return {
    targets,
    patches: [...patches.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([flag, value]) => ({ flag, value })),
  };
}

function bootloaderDir(layout: ArtifactLayout, sd: boolean): string {
  return path.join(layout.genericDir, `uboot-${layout.platform}${sd ? "-sd" : ""}`);
}

function imagePath(layout: ArtifactLayout, device: string, format: string): string {
  return path.join(layout.genericDir, `${layout.imagePrefix}-${layout.platform}-${device}-squashfs-${format}`);
}

function recoveryImage(layout: ArtifactLayout, sd: boolean): RecoveryImage {
  const uboot = bootloaderDir(layout, sd);
  return {
    kind: "recovery",
    boot: path.join(uboot, "boot.bin"),
    bootloader: path.join(uboot, "u-boot.img"),
    bitstream: layout.bitstream,
    kernel: imagePath(layout, "recovery", "fit.itb"),
    factoryImage: imagePath(layout, "nand", "factory.bin"),
  };
}

/**
 * Map requested targets to a deployment plan.
 *
 * Pure: the configuration is not touched. Flag assignments of aliases are
 * returned as patches for the caller to apply.
 */
export function resolveTargets(requested: readonly string[], layout: ArtifactLayout): Resolution {
  const { targets, patches } = expandTargets(requested);
  const has = (...names: string[]): boolean => names.some((name) => targets.has(name));

  let remoteSd: SdImage | RecoveryImage | undefined;
  let localSd: SdImage | undefined;
  let localSdRecovery: RecoveryImage | undefined;

  if (has("sd", "local_sd")) {
    const uboot = bootloaderDir(layout, true);
    const sd: SdImage = {
      kind: "sd",
      boot: path.join(uboot, "boot.bin"),
      bootloader: path.join(uboot, "u-boot.img"),
      bitstream: layout.bitstream,
      kernel: imagePath(layout, "sd", "fit.itb"),
    };
    if (has("sd")) remoteSd = sd;
    if (has("local_sd")) localSd = sd;
  }
  if (has("sd_recovery", "local_sd_recovery")) {
    const sdRecovery = recoveryImage(layout, true);
    if (has("sd_recovery")) remoteSd = sdRecovery;
    if (has("local_sd_recovery")) localSdRecovery = sdRecovery;
  }

  const nandRecovery = has("nand_recovery", "local_nand_recovery") ? recoveryImage(layout, false) : undefined;

  const slots = FIRMWARE_TARGETS.filter(([name]) => has(name)).map(([, slot]) => slot);
  let nand: NandImage | undefined;
  if (slots.length > 0) {
    const uboot = bootloaderDir(layout, false);
    nand = {
      kind: "nand",
      boot: path.join(uboot, "boot.bin"),
      bootloader: path.join(uboot, "u-boot.img"),
      bitstream: layout.bitstream,
      factoryImage: imagePath(layout, "nand", "factory.bin"),
      sysupgradeArchive: imagePath(layout, "nand", "sysupgrade.tar"),
    };
  }

  const conversion: Partial<Record<ConversionVersion, ConversionImage>> = {};
  const versions = CONVERSION_TARGETS.filter(([name]) => has(name)).map(([, version]) => version);
  if (versions.length > 0) {
    const uboot = bootloaderDir(layout, false);
    const image: ConversionImage = {
      kind: "conversion",
      boot: path.join(uboot, "boot.bin"),
      bootloader: path.join(uboot, "u-boot.img"),
      bitstream: layout.bitstream,
      kernel: imagePath(layout, "upgrade", "fit.itb"),
      recoveryKernel: imagePath(layout, "recovery", "fit.itb"),
      factoryImage: imagePath(layout, "nand", "factory.bin"),
    };
    for (const version of versions) conversion[version] = image;
  }

  const feeds: FeedPlan = has("local_feeds")
    ? {
        local: {
          kind: "feeds",
          signingKey: layout.feedsKey,
          packagesDir: layout.feedsPackages,
          sysupgradeArchive: imagePath(layout, "nand", "sysupgrade.tar"),
        },
      }
    : {};

  return {
    plan: {
      remote: {
        sd: remoteSd,
        nandRecovery: has("nand_recovery") ? nandRecovery : undefined,
        nand,
        nandFirmwareSlots: slots,
        sdConfig: has("sd_config"),
        nandConfig: has("nand_config"),
      },
      local: {
        sd: localSd,
        sdRecovery: localSdRecovery,
        nandRecovery: has("local_nand_recovery") ? nandRecovery : undefined,
        conversion,
        sdConfig: has("local_sd_config"),
        sdRecoveryConfig: has("local_sd_recovery_config"),
      },
      feeds,
    },
    patches,
    targets: [...targets].sort(),
  };
}

export function hasRemoteWork(plan: DeploymentPlan): boolean {
  const { remote } = plan;
  return Boolean(remote.sd || remote.nandRecovery || remote.nand || remote.sdConfig || remote.nandConfig);
}

export function hasLocalWork(plan: DeploymentPlan): boolean {
  const { local } = plan;
  return Boolean(
    local.sd ||
      local.sdRecovery ||
      local.nandRecovery ||
      Object.keys(local.conversion).length > 0 ||
      local.sdConfig ||
      local.sdRecoveryConfig,
  );
}

/** Every descriptor of the plan, each once */
export function planImages(plan: DeploymentPlan): ImageDescriptor[] {
  const images = new Set<ImageDescriptor>();
  const add = (image: ImageDescriptor | undefined): void => {
    if (image) images.add(image);
  };
  add(plan.remote.sd);
  add(plan.remote.nandRecovery);
  add(plan.remote.nand);
  add(plan.local.sd);
  add(plan.local.sdRecovery);
  add(plan.local.nandRecovery);
  for (const version of CONVERSION_VERSIONS) add(plan.local.conversion[version]);
  add(plan.feeds.local);
  return [...images];
}
