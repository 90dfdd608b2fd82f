import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { createGzip, gzipSync } from "node:zlib";
import type { FileTransfer } from "../transport/sftp.js";
import type { SdImage, RecoveryImage, ConversionImage } from "./images.js";
import { transferProgress } from "../utils/ui.js";
import * as log from "../utils/logger.js";

/** A local file path or generated content */
export type SinkSource = string | Buffer;

/** Destination directory for artifacts: a directory on the device or on the host */
export interface Sink {
  /** human readable destination, used in log messages */
  readonly location: string;
  /** Store `source` as `name`; with `compress` the stored bytes are gzip-compressed */
  put(source: SinkSource, name: string, compress?: boolean): Promise<void>;
  /** Sink for a subdirectory, created when missing */
  at(subdir: string): Promise<Sink>;
}

async function readCompressed(source: SinkSource): Promise<Buffer> {
  return gzipSync(Buffer.isBuffer(source) ? source : await fs.promises.readFile(source));
}

/** Directory on the device, written over SFTP */
export class RemoteSink implements Sink {
  constructor(
    private readonly transfer: FileTransfer,
    readonly location: string,
  ) {}

  async put(source: SinkSource, name: string, compress = false): Promise<void> {
    const target = path.posix.join(this.location, name);
    log.info(`Uploading '${name}'...`);
    // SFTP cannot compress on the fly, so compressed data is produced in memory
    const data = compress ? await readCompressed(source) : source;
    const progress = transferProgress(name);
    try {
      await this.transfer.put(data, target, progress.onProgress);
      progress.done(true);
    } catch (err) {
      progress.done(false);
      throw err;
    }
  }

  async at(subdir: string): Promise<Sink> {
    const location = path.posix.join(this.location, subdir);
    const existing = await this.transfer.listdir(this.location);
    if (!existing.includes(subdir)) await this.transfer.mkdir(location);
    return new RemoteSink(this.transfer, location);
  }
}

/** Directory on the host */
export class LocalSink implements Sink {
  constructor(readonly location: string) {}

  async put(source: SinkSource, name: string, compress = false): Promise<void> {
    const target = path.join(this.location, name);
    log.info(`Copying '${name}' to '${this.location}'...`);
    if (Buffer.isBuffer(source)) {
      await fs.promises.writeFile(target, compress ? gzipSync(source) : source);
      return;
    }
    if (compress) {
      await pipeline(fs.createReadStream(source), createGzip(), fs.createWriteStream(target));
    } else {
      await fs.promises.copyFile(source, target);
    }
  }

  async at(subdir: string): Promise<Sink> {
    const location = path.join(this.location, subdir);
    await fs.promises.mkdir(location, { recursive: true });
    return new LocalSink(location);
  }
}

export interface ImageSetOptions {
  /** destination names stored gzip-compressed, gaining a .gz suffix */
  compressed?: ReadonlySet<string>;
}

/**
 * Store an image set under the fixed names the boot loader and the
 * bootstrap scripts expect: boot.bin, u-boot.img, system.bit, fit.itb,
 * plus factory.bin for recovery sets.
 */
export async function putImageSet(
  sink: Sink,
  image: SdImage | RecoveryImage | ConversionImage,
  options: ImageSetOptions = {},
): Promise<void> {
  const files: [string, string][] = [
    [image.boot, "boot.bin"],
    [image.bootloader, "u-boot.img"],
    [image.bitstream, "system.bit"],
    [image.kernel, "fit.itb"],
  ];
  if (image.kind === "recovery") files.push([image.factoryImage, "factory.bin"]);

  for (const [source, name] of files) {
    const compress = options.compressed?.has(name) ?? false;
    await sink.put(source, compress ? `${name}.gz` : name, compress);
  }
}
