import { deploy } from "../core/deploy.js";
import type { CliContext } from "./context.js";

/**
 * `fwdeploy deploy [targets...]`; without arguments the configured
 * deploy.targets are used. An empty list is a configuration-only run.
 */
export async function handleDeploy(targets: string[], ctx: CliContext): Promise<void> {
  const requested = targets.length > 0 ? targets : ctx.config.deploy.targets;
  await deploy(requested, ctx.config);
}
