import { z } from "zod";

/** Accepts YAML booleans and the legacy "yes"/"no" strings */
const YesNo = z
  .union([z.boolean(), z.enum(["yes", "no"])])
  .transform((v) => v === true || v === "yes");

const flag = () => YesNo.default(false);

const MacSchema = z
  .string()
  .regex(/^([0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2}$/, "expected MAC address like 00:0a:35:12:34:56");

export const PlatformSchema = z
  .string()
  .regex(/^[a-z0-9]+-[a-z0-9-]+$/, "expected <target>-<subtarget>, e.g. zynq-dm1-g9");

export const PoolSchema = z.object({
  host: z.string().optional(),
  port: z.union([z.number().int().positive(), z.string()]).transform(String).optional(),
  user: z.string().optional(),
  pass: z.string().optional(),
});

export const MinerSchema = z.object({
  platform: PlatformSchema.default("zynq-dm1-g9"),
  mac: MacSchema.optional(),
  hwid: z.string().optional(),
  firmware: z.union([z.literal(1), z.literal(2)]).default(1),
  pool: PoolSchema.default({}),
});

export const BuildSchema = z.object({
  dir: z.string().default("build"),
  name: z.string().default("default"),
  /** build-system checkout inside <dir>/<name> */
  lede: z.string().default("lede"),
});

const TARGET_BUILD_DIR = "${lede_dir}/build_dir/target-arm_cortex-a9+neon_musl-1.1.16_eabi";

/**
 * Path templates of the build artifacts. Every value may use
 * ${platform}, ${target}, ${subtarget}, ${subtarget_family}, ${build_dir}, ${lede_dir}.
 */
export const ArtifactsSchema = z.object({
  generic_dir: z.string().default("${lede_dir}/bin/targets/${target}"),
  image_prefix: z.string().default("lede"),
  bitstream: z.string().default("${build_dir}/platform/${subtarget}/system.bit"),
  feeds_key: z.string().default("${lede_dir}/key-build"),
  feeds_packages: z.string().default("${lede_dir}/staging_dir/packages/${target}"),
  mkenvimage: z.string().default("${lede_dir}/build_dir/host/u-boot-2014.10/tools/mkenvimage"),
  usign: z.string().default("${lede_dir}/staging_dir/host/bin/usign"),
  system_loader: z
    .string()
    .default(`${TARGET_BUILD_DIR}/toolchain/ipkg-arm_cortex-a9_neon/libc/lib/ld-musl-armhf.so.1`),
  system_sftp_server: z
    .string()
    .default(`${TARGET_BUILD_DIR}/openssh-without-pam/openssh-7.4p1/sftp-server`),
  system_fw_printenv: z
    .string()
    .default(`${TARGET_BUILD_DIR}/u-boot-2018.03/ipkg-arm_cortex-a9_neon/uboot-envtools/usr/sbin/fw_printenv`),
});

export const SshConfigSchema = z.object({
  hostname: z.string().optional(),
  hostname_suffix: z.string().default(""),
  username: z.string().default("root"),
  password: z.string().optional(),
  port: z.number().int().positive().default(22),
});

export const DeploySchema = z.object({
  targets: z.array(z.string()).default([]),
  ssh: SshConfigSchema.default({}),
  write_bitstream: flag(),
  factory_image: flag(),
  write_miner_cfg: flag(),
  set_miner_env: flag(),
  reset_uboot_env: flag(),
  reset_overlay: flag(),
  reset_extroot: flag(),
  remove_extroot_uuid: flag(),
  reboot: flag(),
  feeds_base: z.string().optional(),
});

export const UenvSchema = z.object({
  mac: flag(),
  factory_reset: flag(),
  sd_images: flag(),
  sd_boot: flag(),
});

export const LocalSchema = z.object({
  sd: z.string().optional(),
  sd_config: z.string().optional(),
  sd_recovery: z.string().optional(),
  sd_recovery_config: z.string().optional(),
  nand_recovery: z.string().optional(),
  nand_dm_v1: z.string().optional(),
  nand_dm_v2: z.string().optional(),
  nand_dm_v3: z.string().optional(),
  feeds: z.string().optional(),
});

export const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  color: z.boolean().default(true),
});

export const ConfigSchema = z.object({
  miner: MinerSchema.default({}),
  build: BuildSchema.default({}),
  artifacts: ArtifactsSchema.default({}),
  deploy: DeploySchema.default({}),
  uenv: UenvSchema.default({}),
  local: LocalSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type MinerConfig = z.infer<typeof MinerSchema>;
export type PoolConfig = z.infer<typeof PoolSchema>;
export type ArtifactsConfig = z.infer<typeof ArtifactsSchema>;
export type DeployConfig = z.infer<typeof DeploySchema>;
export type SshConfig = z.infer<typeof SshConfigSchema>;
export type UenvConfig = z.infer<typeof UenvSchema>;
export type LocalConfig = z.infer<typeof LocalSchema>;

/** Boolean toggles of the deploy section, the only keys target aliases may assign */
export type DeployFlag = {
  [K in keyof DeployConfig]-?: DeployConfig[K] extends boolean ? K : never;
}[keyof DeployConfig];

/** Local slot names that map to a target directory */
export type LocalSlot = keyof LocalConfig;
