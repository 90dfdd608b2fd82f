import type { Config } from "../schemas/config.schema.js";
import { withSession, type ConnectOptions, type RemoteShell } from "../transport/ssh.js";
import { applyPatches } from "./config-loader.js";
import { BuildHostTools, type HostTools } from "./host-tools.js";
import { assertImageFiles } from "./images.js";
import { hostnameFromMac } from "./platform.js";
import { exportFeeds } from "./provision/feeds.js";
import { assertLocalTargets, localSlots, localTargetDir, runLocalPlan } from "./provision/local.js";
import { runRemotePlan } from "./provision/remote.js";
import { LocalSink } from "./sink.js";
import { artifactLayout, hasRemoteWork, planImages, resolveTargets, type Resolution } from "./targets.js";
import { ConfigurationError } from "../utils/errors.js";
import { promptPassword } from "../utils/ui.js";
import * as log from "../utils/logger.js";

/** Opens the device session for the remote part of a run */
export type SessionRunner = <T>(options: ConnectOptions, fn: (shell: RemoteShell) => Promise<T>) => Promise<T>;

export interface DeployOptions {
  /** defaults to an SSH session */
  session?: SessionRunner;
  /** defaults to the utilities of the build tree */
  tools?: HostTools;
}

export function hostTools(config: Config): HostTools {
  return new BuildHostTools({ mkenvimage: config.artifacts.mkenvimage, usign: config.artifacts.usign });
}

/** Device hostname: deploy.ssh.hostname, or derived from miner.mac plus the suffix */
export function deviceHostname(config: Config): string {
  const { ssh } = config.deploy;
  if (ssh.hostname) return ssh.hostname;
  if (!config.miner.mac) {
    throw new ConfigurationError(
      "Missing deploy.ssh.hostname; set it or miner.mac to derive the hostname",
      "deploy.ssh.hostname",
    );
  }
  return hostnameFromMac(config.miner.mac) + ssh.hostname_suffix;
}

export function connectOptions(config: Config): ConnectOptions {
  const { ssh } = config.deploy;
  return {
    hostname: deviceHostname(config),
    username: ssh.username,
    password: ssh.password,
    port: ssh.port,
    prompt: promptPassword,
  };
}

/**
 * Deploy the requested targets: resolve them into a plan, check every
 * artifact exists, then run the device part over one session, the local
 * mirror and the feed export. The first failure aborts the run.
 */
export async function deploy(
  requested: readonly string[],
  baseConfig: Config,
  options: DeployOptions = {},
): Promise<Resolution> {
  const resolution = resolveTargets(requested, artifactLayout(baseConfig));
  const config = applyPatches(baseConfig, resolution.patches);
  const { plan } = resolution;
  log.debug(`Targets: ${resolution.targets.join(", ")}`);

  for (const image of planImages(plan)) assertImageFiles(image);
  const slots = localSlots(plan.local);
  if (plan.feeds.local) slots.push("feeds");
  assertLocalTargets(config, slots);

  const tools = options.tools ?? hostTools(config);
  const session = options.session ?? withSession;

  if (hasRemoteWork(plan)) {
    const connect = connectOptions(config);
    log.info(`Connecting to '${connect.hostname}'...`);
    await session(connect, (shell) => runRemotePlan(shell, plan.remote, config, tools));
  }

  await runLocalPlan(plan.local, config, tools);

  if (plan.feeds.local) {
    log.heading("Exporting feeds");
    const sink = new LocalSink(localTargetDir(config, "feeds"));
    await exportFeeds(plan.feeds.local, sink, { feedsBase: config.deploy.feeds_base, tools });
  }

  if (resolution.targets.length === 0) {
    log.info("No targets requested, nothing deployed");
  } else {
    log.success(`Deployed ${resolution.targets.join(", ")}`);
  }
  return resolution;
}
