import ora, { type Ora } from "ora";

let activeSpinner: Ora | null = null;

/** Start a spinner with the given message. Stops any active spinner first. */
export function startSpinner(text: string): void {
  if (activeSpinner) {
    activeSpinner.stop();
  }
  activeSpinner = ora({
    text,
    stream: process.stderr,
    // Auto-disable on non-TTY (CI environments)
    isEnabled: process.stderr.isTTY === true,
  }).start();
}

/** Update the text of the active spinner */
export function updateSpinner(text: string): void {
  if (activeSpinner) {
    activeSpinner.text = text;
  }
}

/** Mark the spinner as succeeded */
export function succeedSpinner(text?: string): void {
  if (activeSpinner) {
    activeSpinner.succeed(text);
    activeSpinner = null;
  }
}

/** Mark the spinner as failed */
export function failSpinner(text?: string): void {
  if (activeSpinner) {
    activeSpinner.fail(text);
    activeSpinner = null;
  }
}

/** Temporarily pause the spinner (e.g., while logging). Returns resume function. */
export function pauseSpinner(): (() => void) | null {
  if (!activeSpinner) return null;
  const spinner = activeSpinner;
  spinner.stop();
  return () => {
    spinner.start();
  };
}

/** Human readable byte count: 1536 -> "1.5 KiB" */
export function formatBytes(bytes: number): string {
  const units = ["B", "KiB", "MiB", "GiB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

/**
 * Progress callback for a single transfer, rendered through the spinner.
 * Returns the callback and a `done` function that settles the spinner.
 */
export function transferProgress(label: string): {
  onProgress: (transferred: number, total: number) => void;
  done: (ok: boolean) => void;
} {
  startSpinner(`${label}: 0%`);
  return {
    onProgress: (transferred, total) => {
      const pct = total > 0 ? Math.floor((transferred / total) * 100) : 100;
      updateSpinner(`${label}: ${pct}% (${formatBytes(transferred)} / ${formatBytes(total)})`);
    },
    done: (ok) => {
      if (ok) succeedSpinner(label);
      else failSpinner(label);
    },
  };
}

/**
 * Read a password from the terminal without echoing it.
 * Rejects when stdin is not a TTY or the user presses Ctrl+C.
 */
export function promptPassword(message = "Password: "): Promise<string> {
  const stdin = process.stdin;
  if (!stdin.isTTY) {
    return Promise.reject(new Error("Cannot prompt for password: standard input is not a terminal"));
  }
  const resume = pauseSpinner();
  process.stderr.write(message);
  stdin.setRawMode(true);
  stdin.setEncoding("utf-8");
  stdin.resume();

  return new Promise((resolve, reject) => {
    let value = "";
    const finish = (err?: Error): void => {
      stdin.removeListener("data", onData);
      stdin.setRawMode(false);
      stdin.pause();
      process.stderr.write("\n");
      resume?.();
      if (err) reject(err);
      else resolve(value);
    };
    const onData = (chunk: string): void => {
      for (const ch of chunk) {
        if (ch === "\r" || ch === "\n") {
          finish();
          return;
        }
        if (ch === "\u0003") {
          finish(new Error("Password prompt interrupted"));
          return;
        }
        if (ch === "\u007f" || ch === "\b") {
          value = value.slice(0, -1);
        } else {
          value += ch;
        }
      }
    };
    stdin.on("data", onData);
  });
}
