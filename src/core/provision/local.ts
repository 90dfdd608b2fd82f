import fs from "node:fs";
import type { Config, LocalSlot } from "../../schemas/config.schema.js";
import type { HostTools } from "../host-tools.js";
import { renderUenv, UENV_TXT } from "../runtime-config.js";
import { LocalSink, putImageSet } from "../sink.js";
import { CONVERSION_VERSIONS, type LocalPlan } from "../targets.js";
import { buildUpgradeBundle } from "../upgrade-bundle.js";
import { ConfigurationError } from "../../utils/errors.js";
import * as log from "../../utils/logger.js";

/** Directory configured for a local slot, created when missing */
export function localTargetDir(config: Config, slot: LocalSlot): string {
  const dir = config.local[slot];
  if (!dir) {
    throw new ConfigurationError(`Missing path for local target '${slot}'`, `local.${slot}`);
  }
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

/** Local slots a plan writes to, in run order */
export function localSlots(plan: LocalPlan): LocalSlot[] {
  const slots: LocalSlot[] = [];
  if (plan.sd) slots.push("sd");
  if (plan.sdConfig) slots.push("sd_config");
  if (plan.sdRecovery) slots.push("sd_recovery");
  if (plan.sdRecoveryConfig) slots.push("sd_recovery_config");
  if (plan.nandRecovery) slots.push("nand_recovery");
  for (const version of CONVERSION_VERSIONS) {
    if (plan.conversion[version]) slots.push(`nand_dm_v${version}`);
  }
  return slots;
}

/** Fail before any I/O when a slot has no configured directory */
export function assertLocalTargets(config: Config, slots: readonly LocalSlot[]): void {
  for (const slot of slots) {
    if (!config.local[slot]) {
      throw new ConfigurationError(`Missing path for local target '${slot}'`, `local.${slot}`);
    }
  }
}

function localSink(config: Config, slot: LocalSlot): LocalSink {
  return new LocalSink(localTargetDir(config, slot));
}

async function writeUenv(config: Config, slot: LocalSlot): Promise<void> {
  const sink = localSink(config, slot);
  log.info(`Creating '${UENV_TXT}' in '${sink.location}'...`);
  await sink.put(Buffer.from(renderUenv(config)), UENV_TXT);
}

/** Mirror the local part of a plan into the configured host directories */
export async function runLocalPlan(plan: LocalPlan, config: Config, tools: HostTools): Promise<void> {
  if (plan.sd) {
    await putImageSet(localSink(config, "sd"), plan.sd);
  }
  if (plan.sdConfig) {
    await writeUenv(config, "sd_config");
  }
  if (plan.sdRecovery) {
    await putImageSet(localSink(config, "sd_recovery"), plan.sdRecovery);
  }
  if (plan.sdRecoveryConfig) {
    await writeUenv(config, "sd_recovery_config");
  }
  if (plan.nandRecovery) {
    await putImageSet(localSink(config, "nand_recovery"), plan.nandRecovery);
  }
  for (const version of CONVERSION_VERSIONS) {
    const image = plan.conversion[version];
    if (!image) continue;
    await buildUpgradeBundle(localSink(config, `nand_dm_v${version}`), image, version, { config, tools });
  }
}
