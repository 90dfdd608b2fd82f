import fs from "node:fs";
import path from "node:path";
import type { FeedImage } from "../images.js";
import type { HostTools } from "../host-tools.js";
import { ATTR_FILENAME, findPackage, formatPackage, readPackages } from "../packages.js";
import type { LocalSink } from "../sink.js";
import { ConfigurationError } from "../../utils/errors.js";
import * as log from "../../utils/logger.js";

export const FEEDS_INDEX = "Packages";
export const FIRMWARE_PACKAGE = "firmware";
/** Attributes left out of the exported index record */
export const EXCLUDED_ATTRIBUTES: ReadonlySet<string> = new Set(["Source", "Maintainer"]);

export interface FeedExportOptions {
  /** existing index the firmware record is appended to */
  feedsBase?: string;
  tools: HostTools;
}

/**
 * Export the firmware package as a signed single-package feed:
 * Packages (+ signature), Packages.gz, the .ipk and the sysupgrade
 * archive named after the package file.
 */
export async function exportFeeds(image: FeedImage, sink: LocalSink, options: FeedExportOptions): Promise<void> {
  const srcIndex = path.join(image.packagesDir, FEEDS_INDEX);
  const firmware = findPackage(readPackages(srcIndex), FIRMWARE_PACKAGE);
  if (!firmware) {
    throw new ConfigurationError(`Missing ${FIRMWARE_PACKAGE} package in '${srcIndex}'`, srcIndex);
  }
  const ipk = firmware.get(ATTR_FILENAME);
  if (!ipk) {
    throw new ConfigurationError(`Package '${FIRMWARE_PACKAGE}' in '${srcIndex}' has no ${ATTR_FILENAME}`, srcIndex);
  }

  let index = "";
  if (options.feedsBase) {
    if (!fs.existsSync(options.feedsBase)) {
      throw new ConfigurationError(`Missing feeds base index '${options.feedsBase}'`, "deploy.feeds_base");
    }
    const base = fs.readFileSync(options.feedsBase, "utf-8");
    // records are separated by a blank line
    if (base.length > 0) index = `${base}\n`;
  }
  index += formatPackage(firmware, EXCLUDED_ATTRIBUTES);

  await sink.put(Buffer.from(index), FEEDS_INDEX);
  const dstIndex = path.join(sink.location, FEEDS_INDEX);

  log.info(`Signing '${dstIndex}'...`);
  await options.tools.sign(dstIndex, image.signingKey);
  await sink.put(dstIndex, `${FEEDS_INDEX}.gz`, true);

  const ipkName = path.basename(ipk);
  await sink.put(path.join(image.packagesDir, ipk), ipkName);
  await sink.put(image.sysupgradeArchive, `${path.parse(ipkName).name}.tar`);
}
