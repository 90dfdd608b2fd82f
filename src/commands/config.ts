import { stringify } from "yaml";
import type { CliContext } from "./context.js";

/** `fwdeploy config show`: the resolved configuration as YAML on stdout */
export function handleConfigShow(ctx: CliContext): void {
  process.stdout.write(`# ${ctx.configPath}\n${stringify(ctx.config)}`);
}
