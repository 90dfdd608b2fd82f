/**
 * Typed error classes for fwdeploy.
 *
 * Hierarchy:
 *   FwdeployError (base)
 *   ├── ConfigurationError      missing path or attribute, raised before any I/O
 *   ├── UnsupportedTargetError  unknown or mutually exclusive deploy targets
 *   ├── RemoteCommandError      non-zero exit of a remote command
 *   ├── AuthenticationError     every non-interactive SSH method was rejected
 *   ├── NetworkError            SSH connection could not be established
 *   ├── MissingUtilityError     host utility missing from the build tree
 *   └── UtilityExecutionError   host utility exited with non-zero status
 */

/** Base error for all fwdeploy-specific errors */
export class FwdeployError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FwdeployError";
    this.code = code;
  }
}

export class ConfigurationError extends FwdeployError {
  readonly path: string | undefined;

  constructor(message: string, path?: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
    this.path = path;
  }
}

export class UnsupportedTargetError extends FwdeployError {
  readonly targets: string[];

  constructor(message: string, targets: string[]) {
    super(message, "UNSUPPORTED_TARGET");
    this.name = "UnsupportedTargetError";
    this.targets = targets;
  }
}

export class RemoteCommandError extends FwdeployError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly signal: string | undefined;
  readonly stdout: Buffer;
  readonly stderr: Buffer;

  constructor(
    command: string,
    exitCode: number | null,
    stdout: Buffer,
    stderr: Buffer,
    signal?: string,
  ) {
    const status = exitCode !== null ? `exit status ${exitCode}` : `signal ${signal ?? "unknown"}`;
    const detail = stderr.toString("utf-8").trim().split("\n").pop();
    super(
      `Remote command '${command}' failed with ${status}${detail ? `: ${detail}` : ""}`,
      "REMOTE_COMMAND_FAILED",
    );
    this.name = "RemoteCommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.signal = signal;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export class AuthenticationError extends FwdeployError {
  readonly hostname: string;
  readonly username: string;

  constructor(message: string, hostname: string, username: string, options?: { cause?: unknown }) {
    super(message, "AUTHENTICATION_FAILED", options);
    this.name = "AuthenticationError";
    this.hostname = hostname;
    this.username = username;
  }
}

export class NetworkError extends FwdeployError {
  readonly hostname: string;

  constructor(message: string, hostname: string, options?: { cause?: unknown }) {
    super(message, "NETWORK_ERROR", options);
    this.name = "NetworkError";
    this.hostname = hostname;
  }
}

export class MissingUtilityError extends FwdeployError {
  readonly utilityPath: string;

  constructor(utilityPath: string) {
    super(`Missing utility '${utilityPath}'`, "MISSING_UTILITY");
    this.name = "MissingUtilityError";
    this.utilityPath = utilityPath;
  }
}

export class UtilityExecutionError extends FwdeployError {
  readonly utility: string;
  readonly exitCode: number | null;

  constructor(message: string, utility: string, exitCode: number | null) {
    super(message, "UTILITY_EXECUTION_ERROR");
    this.name = "UtilityExecutionError";
    this.utility = utility;
    this.exitCode = exitCode;
  }
}

/** Message for any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
