import crypto from "node:crypto";
import type { EventEmitter } from "node:events";
import fs from "node:fs";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import { PassThrough, type Duplex, type Readable, type Writable } from "node:stream";
import { setTimeout } from "node:timers/promises";
import ssh2, { type ConnectConfig } from "ssh2";
import {
  collect,
  checkExit,
  formatCommand,
  waitForExit,
  type Argv,
  type CommandOutput,
  type ExitStatus,
} from "./command.js";
import { SftpTransfer, type FileTransfer, type SftpChannel } from "./sftp.js";
import { AuthenticationError, NetworkError, errorMessage } from "../utils/errors.js";
import * as log from "../utils/logger.js";

// ssh2 is CommonJS; utils is only reachable through module.exports
const { Client, utils } = ssh2;

/** Exec channel: stdin/stdout duplex plus the stderr stream */
export type ExecChannel = Duplex & { stderr: Readable };

/** The part of an ssh2 Client a session drives */
export interface SshClient extends EventEmitter {
  connect(config: ConnectConfig): unknown;
  exec(command: string, callback: (err: Error | undefined, channel: ExecChannel) => void): unknown;
  sftp(callback: (err: Error | undefined, sftp: SftpChannel) => void): unknown;
  end(): unknown;
}

export interface ConnectOptions {
  hostname: string;
  username: string;
  password?: string;
  port?: number;
  /** Asked for a password once every non-interactive method was rejected */
  prompt?: (message: string) => Promise<string>;
  /** Private keys tried first; defaults to ~/.ssh/id_ed25519, id_ecdsa, id_rsa */
  identityFiles?: string[];
  /** SSH agent socket; defaults to $SSH_AUTH_SOCK */
  agent?: string;
  /** defaults to an ssh2 Client */
  createClient?: () => SshClient;
}

/** Standard streams of a running remote command */
export interface RemoteProcess {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
}

/** Command execution on a device; implemented by SshSession and by test doubles */
export interface RemoteShell {
  /** Run a command to completion; non-zero exit raises RemoteCommandError */
  run(argv: Argv): Promise<CommandOutput>;
  /**
   * Run a command while `body` streams into or out of it. When `body`
   * settles the write side is shut down and the exit status is checked.
   * An error thrown by `body` takes precedence over the exit status.
   */
  pipe<T>(argv: Argv, body: (process: RemoteProcess) => Promise<T>): Promise<T>;
  /** Open a file-transfer handle; the caller closes it */
  sftp(): Promise<FileTransfer>;
}

const DEFAULT_IDENTITIES = ["id_ed25519", "id_ecdsa", "id_rsa"];

/** Bytes of streamed stdout kept for the error of a failed piped command */
const STDOUT_TAIL = 64 * 1024;

function isAuthFailure(err: unknown): boolean {
  return err instanceof Error && "level" in err && err.level === "client-authentication";
}

/** Key-based identity: agent socket and the first usable unencrypted private key */
function identityConfig(options: ConnectOptions): Partial<ConnectConfig> | undefined {
  const config: Partial<ConnectConfig> = {};
  const agent = options.agent ?? process.env.SSH_AUTH_SOCK;
  if (agent) config.agent = agent;

  const files = options.identityFiles ?? DEFAULT_IDENTITIES.map((name) => path.join(os.homedir(), ".ssh", name));
  for (const file of files) {
    if (!fs.existsSync(file)) continue;
    const key = fs.readFileSync(file);
    if (utils.parseKey(key) instanceof Error) {
      log.debug(`Skipping identity '${file}' (encrypted or unsupported)`);
      continue;
    }
    config.privateKey = key;
    log.debug(`Using identity '${file}'`);
    break;
  }
  return config.agent || config.privateKey ? config : undefined;
}

function connectClient(client: SshClient, config: ConnectConfig): Promise<SshClient> {
  return new Promise((resolve, reject) => {
    let settled = false;
    client.once("ready", () => {
      settled = true;
      resolve(client);
    });
    client.once("error", (err: Error) => {
      if (settled) return;
      settled = true;
      client.end();
      reject(err);
    });
    client.once("close", () => {
      if (settled) return;
      settled = true;
      reject(new Error("connection closed before authentication completed"));
    });
    client.connect(config);
  });
}

/**
 * Authenticated SSH connection to a device.
 *
 * Authentication order: key-based identity (agent, private key), the
 * "none" method, the configured password, then an interactive prompt
 * repeated until the device accepts a password.
 */
export class SshSession implements RemoteShell {
  private constructor(
    private readonly client: SshClient,
    readonly hostname: string,
  ) {
    client.on("error", (err: Error) => log.warn(`SSH connection to '${hostname}': ${err.message}`));
  }

  static async connect(options: ConnectOptions): Promise<SshSession> {
    const { hostname, username, createClient = () => new Client() } = options;
    const port = options.port ?? 22;
    const base: ConnectConfig = {
      host: hostname,
      port,
      username,
      hostVerifier: (key: Buffer): boolean => {
        log.debug(`Host key of '${hostname}' SHA256:${crypto.createHash("sha256").update(key).digest("base64")}`);
        return true;
      },
    };

    const attempts: { method: string; config: ConnectConfig }[] = [];
    const identity = identityConfig(options);
    if (identity) attempts.push({ method: "public key", config: { ...base, ...identity } });
    attempts.push({ method: "none", config: base });
    if (options.password !== undefined) {
      attempts.push({ method: "password", config: { ...base, password: options.password } });
    }

    log.debug(`Connecting to '${username}@${hostname}:${port}'...`);
    let lastError: unknown;
    for (const attempt of attempts) {
      try {
        const client = await connectClient(createClient(), attempt.config);
        log.debug(`Authenticated to '${hostname}' with ${attempt.method}`);
        return new SshSession(client, hostname);
      } catch (err) {
        if (!isAuthFailure(err)) {
          throw new NetworkError(`Cannot connect to '${hostname}:${port}': ${errorMessage(err)}`, hostname, {
            cause: err,
          });
        }
        log.debug(`Authentication with ${attempt.method} rejected by '${hostname}'`);
        lastError = err;
      }
    }

    const exhausted = new AuthenticationError(
      `Authentication of '${username}@${hostname}' failed for every configured method`,
      hostname,
      username,
      { cause: lastError },
    );
    if (!options.prompt) throw exhausted;
    log.warn(exhausted.message);

    for (;;) {
      const password = await options.prompt(`${username}@${hostname}'s password: `);
      try {
        const client = await connectClient(createClient(), { ...base, password });
        log.debug(`Authenticated to '${hostname}' with prompted password`);
        return new SshSession(client, hostname);
      } catch (err) {
        if (!isAuthFailure(err)) {
          throw new NetworkError(`Cannot connect to '${hostname}:${port}': ${errorMessage(err)}`, hostname, {
            cause: err,
          });
        }
        log.warn("Permission denied, please try again");
      }
    }
  }

  private exec(command: string): Promise<ExecChannel> {
    log.debug(`Remotely running command '${command}'...`);
    return new Promise((resolve, reject) => {
      this.client.exec(command, (err, channel) => {
        if (err) {
          reject(
            new NetworkError(`Cannot start '${command}' on '${this.hostname}': ${err.message}`, this.hostname, {
              cause: err,
            }),
          );
          return;
        }
        resolve(channel);
      });
    });
  }

  async run(argv: Argv): Promise<CommandOutput> {
    const command = formatCommand(argv);
    const channel = await this.exec(command);
    const stdout = collect(channel);
    const stderr = collect(channel.stderr);
    const exited = waitForExit(channel);
    channel.end();
    const status = await exited;
    const output = { stdout: stdout(), stderr: stderr() };
    checkExit(command, status, output);
    return output;
  }

  async pipe<T>(argv: Argv, body: (process: RemoteProcess) => Promise<T>): Promise<T> {
    const command = formatCommand(argv);
    const channel = await this.exec(command);
    // held for the body until it reads
    const stdout = new PassThrough();
    channel.pipe(stdout);
    const stdoutTail = collect(channel, STDOUT_TAIL);
    const stderr = collect(channel.stderr);
    const exited = waitForExit(channel);

    const settle = (): Promise<ExitStatus> => {
      channel.end();
      // drain output nobody consumed so the remote side can exit
      stdout.resume();
      channel.resume();
      return exited;
    };

    let result: T;
    try {
      result = await body({ stdin: channel, stdout, stderr: channel.stderr });
    } catch (err) {
      const status = await settle();
      if (status.code !== 0) {
        log.debug(`'${command}' ended with status ${status.code ?? status.signal ?? "unknown"} after error`);
      }
      throw err;
    }
    checkExit(command, await settle(), { stdout: stdoutTail(), stderr: stderr() });
    return result;
  }

  sftp(): Promise<FileTransfer> {
    return new Promise((resolve, reject) => {
      this.client.sftp((err, sftp) => {
        if (err) {
          reject(new NetworkError(`Cannot open SFTP on '${this.hostname}': ${err.message}`, this.hostname, { cause: err }));
          return;
        }
        resolve(new SftpTransfer(sftp));
      });
    });
  }

  close(): void {
    log.debug(`Closing connection to '${this.hostname}'`);
    this.client.end();
  }
}

/** Open a session, run `fn` and close the session on every exit path */
export async function withSession<T>(options: ConnectOptions, fn: (session: SshSession) => Promise<T>): Promise<T> {
  const session = await SshSession.connect(options);
  try {
    return await fn(session);
  } finally {
    session.close();
  }
}

function probe(hostname: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ host: hostname, port });
    const finish = (up: boolean): void => {
      socket.destroy();
      resolve(up);
    };
    socket.setTimeout(timeoutMs, () => finish(false));
    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
  });
}

/**
 * Wait for a rebooting device: a fixed delay for the shutdown, polling of
 * the SSH port until it accepts connections, then a delay for the services.
 */
export async function waitForReboot(
  hostname: string,
  options: { port?: number; delayBefore?: number; delayAfter?: number; pollInterval?: number } = {},
): Promise<void> {
  const { port = 22, delayBefore = 3000, delayAfter = 8000, pollInterval = 1000 } = options;
  await setTimeout(delayBefore);
  while (!(await probe(hostname, port, pollInterval))) {
    log.debug(`Waiting for '${hostname}:${port}'...`);
    await setTimeout(pollInterval);
  }
  await setTimeout(delayAfter);
}
