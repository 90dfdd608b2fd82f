import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** Default configuration file, relative to the current directory */
export const DEFAULT_CONFIG_PATH = path.join("configs", "default.yml");

/** Get the templates directory (relative to package install) */
export function getTemplatesDir(): string {
  // __dirname = src/utils/ or dist/utils/, templates is at project root
  return path.join(__dirname, "..", "..", "templates");
}

/** Directory holding the static files of the firmware conversion bundle */
export function getUpgradeTemplatesDir(): string {
  return path.join(getTemplatesDir(), "upgrade");
}

/** Sibling override of a config file: configs/default.yml -> configs/default.local.yml */
export function localOverridePath(configPath: string): string {
  const ext = path.extname(configPath);
  const base = ext ? configPath.slice(0, -ext.length) : configPath;
  return `${base}.local${ext || ".yml"}`;
}
