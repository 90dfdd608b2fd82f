import path from "node:path";
import { FwdeployError } from "../utils/errors.js";
import * as log from "../utils/logger.js";

export type ProgressCallback = (transferred: number, total: number) => void;

type Done = (err?: Error | null) => void;

/** Subset of the ssh2 SFTP client the transfer handle relies on */
export interface SftpChannel {
  fastPut(
    localPath: string,
    remotePath: string,
    options: { step?: (transferred: number, chunk: number, total: number) => void },
    callback: Done,
  ): void;
  fastGet(
    remotePath: string,
    localPath: string,
    options: { step?: (transferred: number, chunk: number, total: number) => void },
    callback: Done,
  ): void;
  writeFile(remotePath: string, data: Buffer | string, callback: Done): void;
  mkdir(remotePath: string, callback: Done): void;
  readdir(remotePath: string, callback: (err: Error | undefined, list: { filename: string }[]) => void): void;
  unlink(remotePath: string, callback: Done): void;
  end(): void;
}

/** File-copy handle of a remote session */
export interface FileTransfer {
  /** Upload a local file (path) or in-memory content */
  put(source: string | Buffer, remotePath: string, onProgress?: ProgressCallback): Promise<void>;
  get(remotePath: string, localPath: string, onProgress?: ProgressCallback): Promise<void>;
  writeFile(remotePath: string, data: Buffer | string): Promise<void>;
  mkdir(remotePath: string): Promise<void>;
  /** Change the directory relative paths resolve against */
  chdir(remotePath: string): void;
  listdir(remotePath?: string): Promise<string[]>;
  remove(remotePath: string): Promise<void>;
  close(): void;
}

function transferError(op: string, remotePath: string, err: Error): FwdeployError {
  return new FwdeployError(`SFTP ${op} '${remotePath}' failed: ${err.message}`, "TRANSFER_FAILED", {
    cause: err,
  });
}

export class SftpTransfer implements FileTransfer {
  private cwd: string | undefined;

  constructor(private readonly channel: SftpChannel) {}

  /** Remote path after applying the tracked working directory */
  resolve(remotePath: string): string {
    return this.cwd ? path.posix.resolve(this.cwd, remotePath) : remotePath;
  }

  chdir(remotePath: string): void {
    this.cwd = this.resolve(remotePath);
    log.debug(`SFTP working directory '${this.cwd}'`);
  }

  put(source: string | Buffer, remotePath: string, onProgress?: ProgressCallback): Promise<void> {
    const target = this.resolve(remotePath);
    if (Buffer.isBuffer(source)) {
      return this.writeFile(target, source).then(() => onProgress?.(source.length, source.length));
    }
    log.debug(`SFTP put '${source}' -> '${target}'`);
    return new Promise((resolve, reject) => {
      this.channel.fastPut(
        source,
        target,
        { step: onProgress ? (transferred, _chunk, total) => onProgress(transferred, total) : undefined },
        (err) => (err ? reject(transferError("put", target, err)) : resolve()),
      );
    });
  }

  get(remotePath: string, localPath: string, onProgress?: ProgressCallback): Promise<void> {
    const source = this.resolve(remotePath);
    log.debug(`SFTP get '${source}' -> '${localPath}'`);
    return new Promise((resolve, reject) => {
      this.channel.fastGet(
        source,
        localPath,
        { step: onProgress ? (transferred, _chunk, total) => onProgress(transferred, total) : undefined },
        (err) => (err ? reject(transferError("get", source, err)) : resolve()),
      );
    });
  }

  writeFile(remotePath: string, data: Buffer | string): Promise<void> {
    const target = this.resolve(remotePath);
    log.debug(`SFTP write '${target}' (${Buffer.byteLength(data)} bytes)`);
    return new Promise((resolve, reject) => {
      this.channel.writeFile(target, data, (err) =>
        err ? reject(transferError("write", target, err)) : resolve(),
      );
    });
  }

  mkdir(remotePath: string): Promise<void> {
    const target = this.resolve(remotePath);
    return new Promise((resolve, reject) => {
      this.channel.mkdir(target, (err) => (err ? reject(transferError("mkdir", target, err)) : resolve()));
    });
  }

  listdir(remotePath = "."): Promise<string[]> {
    const target = this.resolve(remotePath);
    return new Promise((resolve, reject) => {
      this.channel.readdir(target, (err, list) =>
        err ? reject(transferError("listdir", target, err)) : resolve(list.map((entry) => entry.filename)),
      );
    });
  }

  remove(remotePath: string): Promise<void> {
    const target = this.resolve(remotePath);
    return new Promise((resolve, reject) => {
      this.channel.unlink(target, (err) => (err ? reject(transferError("remove", target, err)) : resolve()));
    });
  }

  close(): void {
    this.channel.end();
  }
}
