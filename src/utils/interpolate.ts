import { ConfigurationError } from "./errors.js";

/**
 * Variables available to path templates in the configuration file.
 * Resolved once when the configuration is loaded.
 */
export interface TemplateVariables {
  /** whole platform name, e.g. zynq-dm1-g9 */
  platform: string;
  /** target part of the platform, e.g. zynq */
  target: string;
  /** sub-target part of the platform, e.g. dm1-g9 */
  subtarget: string;
  /** first segment of the sub-target, e.g. dm1 */
  subtarget_family: string;
  /** absolute build directory (<build.dir>/<build.name>) */
  build_dir: string;
  /** working directory of the build system inside build_dir */
  lede_dir: string;
}

const TEMPLATE_KEYS: ReadonlySet<string> = new Set<keyof TemplateVariables>([
  "platform",
  "target",
  "subtarget",
  "subtarget_family",
  "build_dir",
  "lede_dir",
]);

function isTemplateKey(key: string): key is keyof TemplateVariables {
  return TEMPLATE_KEYS.has(key);
}

/**
 * Interpolate ${variable} patterns in a string.
 *
 * Only the closed set of template variables is accepted; an unknown name
 * raises ConfigurationError so that typos never reach the filesystem.
 */
export function interpolate(template: string, variables: TemplateVariables, field?: string): string {
  return template.replace(/\$\{([^}]+)\}/g, (_match, key: string) => {
    const name = key.trim();
    if (!isTemplateKey(name)) {
      throw new ConfigurationError(
        `Unknown template variable '\${${name}}'${field ? ` in '${field}'` : ""}`,
        field,
      );
    }
    return variables[name];
  });
}
