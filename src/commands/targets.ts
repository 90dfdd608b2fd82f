import { SUPPORTED_TARGETS, TARGET_ALIASES } from "../core/targets.js";
import * as log from "../utils/logger.js";

/** `fwdeploy targets`: list target names and what each alias expands to */
export function handleTargets(): void {
  log.heading("Targets:");
  for (const target of SUPPORTED_TARGETS) log.output(`  ${target}`);
  log.line();
  log.heading("Aliases:");
  for (const [name, alias] of Object.entries(TARGET_ALIASES)) {
    const patches = alias.patches.map((p) => `${p.flag}=${p.value ? "yes" : "no"}`);
    log.output(`  ${name.padEnd(20)} ${[...alias.targets, ...patches].join(" ")}`);
  }
}
