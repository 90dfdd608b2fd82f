/**
 * Public API surface for the fwdeploy library.
 * Re-exports key functions and types for programmatic use.
 */

// Config & loading
export { loadConfig, parseConfig, applyPatches, type ConfigPatch } from "./core/config-loader.js";
export type { Config } from "./schemas/config.schema.js";

// Targets
export {
  resolveTargets,
  expandTargets,
  artifactLayout,
  SUPPORTED_TARGETS,
  TARGET_ALIASES,
  type DeploymentPlan,
  type Resolution,
} from "./core/targets.js";
export { assertImageFiles, type ImageDescriptor } from "./core/images.js";

// Deployment
export { deploy, deviceHostname, hostTools, type DeployOptions } from "./core/deploy.js";
export { runRemotePlan } from "./core/provision/remote.js";
export { runLocalPlan } from "./core/provision/local.js";
export { exportFeeds } from "./core/provision/feeds.js";
export { buildUpgradeBundle } from "./core/upgrade-bundle.js";
export { runBootstrap, restoreBackup } from "./core/bootstrap.js";

// Device access
export { SshSession, withSession, type RemoteShell, type ConnectOptions, type SshClient } from "./transport/ssh.js";
export type { FileTransfer } from "./transport/sftp.js";

// Host utilities
export { BuildHostTools, type HostTools } from "./core/host-tools.js";
export { generateHwid } from "./core/hwid.js";

// Errors
export * from "./utils/errors.js";
