import crypto from "node:crypto";

/** Random bytes behind one identifier; 12 bytes encode to 16 characters without padding */
export const HWID_RANDOM_BYTES = 12;

/**
 * Generate a unique hardware identifier.
 *
 * Base64 with "a" and "b" in place of "+" and "/" so the value is safe in
 * U-Boot environment files and shell arguments.
 */
export function generateHwid(random: (size: number) => Buffer = crypto.randomBytes): string {
  return random(HWID_RANDOM_BYTES).toString("base64").replace(/\+/g, "a").replace(/\//g, "b");
}
