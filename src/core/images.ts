import fs from "node:fs";
import { ConfigurationError } from "../utils/errors.js";

/** Files of an SD card deployment */
export interface SdImage {
  readonly kind: "sd";
  readonly boot: string;
  readonly bootloader: string;
  readonly bitstream: string;
  readonly kernel: string;
}

/** SD or NAND recovery set: the SD set plus the factory image */
export interface RecoveryImage {
  readonly kind: "recovery";
  readonly boot: string;
  readonly bootloader: string;
  readonly bitstream: string;
  readonly kernel: string;
  readonly factoryImage: string;
}

/** NAND firmware slots */
export interface NandImage {
  readonly kind: "nand";
  readonly boot: string;
  readonly bootloader: string;
  readonly bitstream: string;
  readonly factoryImage: string;
  readonly sysupgradeArchive: string;
}

/** Conversion of a device running its vendor firmware */
export interface ConversionImage {
  readonly kind: "conversion";
  readonly boot: string;
  readonly bootloader: string;
  readonly bitstream: string;
  /** upgrade kernel booted by stage 1 */
  readonly kernel: string;
  /** recovery kernel shipped inside stage 2 */
  readonly recoveryKernel: string;
  readonly factoryImage: string;
}

/** Package feed export */
export interface FeedImage {
  readonly kind: "feeds";
  readonly signingKey: string;
  readonly packagesDir: string;
  readonly sysupgradeArchive: string;
}

export type ImageDescriptor = SdImage | RecoveryImage | NandImage | ConversionImage | FeedImage;

/** Every path a descriptor references, in a stable order */
export function imageFiles(image: ImageDescriptor): string[] {
  switch (image.kind) {
    case "sd":
      return [image.boot, image.bootloader, image.bitstream, image.kernel];
    case "recovery":
      return [image.boot, image.bootloader, image.bitstream, image.kernel, image.factoryImage];
    case "nand":
      return [image.boot, image.bootloader, image.bitstream, image.factoryImage, image.sysupgradeArchive];
    case "conversion":
      return [
        image.boot,
        image.bootloader,
        image.bitstream,
        image.kernel,
        image.recoveryKernel,
        image.factoryImage,
      ];
    case "feeds":
      return [image.signingKey, image.packagesDir, image.sysupgradeArchive];
  }
}

/** Fail before any write when a referenced artifact is missing */
export function assertImageFiles(image: ImageDescriptor): void {
  for (const file of imageFiles(image)) {
    if (!fs.existsSync(file)) {
      throw new ConfigurationError(`Missing ${image.kind} image file '${file}'`, file);
    }
  }
}
