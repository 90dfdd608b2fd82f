import { once, type EventEmitter } from "node:events";
import type { Readable, Writable } from "node:stream";
import { RemoteCommandError } from "../utils/errors.js";

/** Remote command as an argument vector */
export type Argv = readonly string[];

export interface CommandOutput {
  stdout: Buffer;
  stderr: Buffer;
}

export interface ExitStatus {
  /** null when the command was killed by a signal or the channel failed */
  code: number | null;
  signal: string | undefined;
  /** channel failure, set instead of an exit status */
  error?: Error;
}

// glob characters are left unquoted so the remote shell expands them (rm -fr /mnt/*)
const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./*?-]+$/;

/** Quote a single argument for a POSIX shell */
export function quoteArg(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Join an argument vector into the command line sent to the remote shell */
export function formatCommand(argv: Argv): string {
  return argv.map(quoteArg).join(" ");
}

/**
 * Accumulate what a stream emits; the returned getter joins the chunks.
 * With `limit` only the last `limit` bytes are kept.
 */
export function collect(stream: Readable, limit = Infinity): () => Buffer {
  const chunks: Buffer[] = [];
  let size = 0;
  stream.on("data", (chunk: Buffer | string) => {
    const data = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    chunks.push(data);
    size += data.length;
    while (chunks.length > 1 && size - chunks[0].length >= limit) {
      size -= chunks[0].length;
      chunks.shift();
    }
  });
  return () => {
    const all = Buffer.concat(chunks);
    return all.length > limit ? all.subarray(all.length - limit) : all;
  };
}

/**
 * Resolve with the exit status of an exec channel.
 *
 * The status arrives on "exit"; a channel that closes without one
 * (connection dropped) resolves with a null code and no signal. The
 * promise never rejects, so it may be awaited long after it was created.
 */
export function waitForExit(channel: EventEmitter): Promise<ExitStatus> {
  return new Promise((resolve) => {
    let status: ExitStatus | undefined;
    channel.once("exit", (code: unknown, signal: unknown) => {
      status = {
        code: typeof code === "number" ? code : null,
        signal: typeof signal === "string" ? signal : undefined,
      };
    });
    channel.once("close", () => {
      resolve(status ?? { code: null, signal: undefined });
    });
    channel.on("error", (err: Error) => {
      resolve({ code: null, signal: undefined, error: err });
    });
  });
}

/** Throw RemoteCommandError unless the command exited with status 0 */
export function checkExit(command: string, status: ExitStatus, output: CommandOutput): void {
  if (status.error) throw status.error;
  if (status.code === 0) return;
  throw new RemoteCommandError(command, status.code, output.stdout, output.stderr, status.signal);
}

/** Write a buffer or the whole of a readable stream into a writable, honouring back-pressure */
export async function writeAll(sink: Writable, source: Buffer | Readable): Promise<void> {
  if (Buffer.isBuffer(source)) {
    if (!sink.write(source)) await once(sink, "drain");
    return;
  }
  for await (const chunk of source) {
    if (!sink.write(chunk)) await once(sink, "drain");
  }
}
