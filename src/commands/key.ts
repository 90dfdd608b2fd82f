import { hostTools } from "../core/deploy.js";
import type { CliContext } from "./context.js";
import * as log from "../utils/logger.js";

/** `fwdeploy key <secret> [public]`: generate a feed signing key pair */
export async function handleKey(secret: string, publicKey: string | undefined, ctx: CliContext): Promise<void> {
  const target = publicKey ?? `${secret}.pub`;
  await hostTools(ctx.config).keygen(secret, target);
  log.success(`Created key pair '${secret}' / '${target}'`);
}
