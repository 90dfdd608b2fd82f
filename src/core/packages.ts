import fs from "node:fs";

/** One record of a feeds index: attributes in file order */
export type PackageRecord = Map<string, string>;

export const ATTR_PACKAGE = "Package";
export const ATTR_FILENAME = "Filename";

/**
 * Parse a feeds index (`Packages`).
 *
 * Records are separated by blank lines. An attribute line has the form
 * `Name: value`; a line starting with whitespace continues the previous
 * value and is joined to it with a newline, leading whitespace kept.
 */
export function parsePackages(text: string): PackageRecord[] {
  const records: PackageRecord[] = [];
  let record: PackageRecord = new Map();
  let attribute: string | undefined;

  const flush = (): void => {
    if (record.size > 0) records.push(record);
    record = new Map();
    attribute = undefined;
  };

  for (const raw of text.split("\n")) {
    if (raw === "") {
      flush();
      continue;
    }
    const line = raw.replace(/\s+$/, "");
    if (/^\s/.test(raw)) {
      if (attribute !== undefined) record.set(attribute, `${record.get(attribute) ?? ""}\n${line}`);
      continue;
    }
    const sep = line.indexOf(": ");
    if (sep === -1) {
      // "Name:" with an empty value
      attribute = line.endsWith(":") ? line.slice(0, -1) : line;
      record.set(attribute, "");
      continue;
    }
    attribute = line.slice(0, sep);
    record.set(attribute, line.slice(sep + 2));
  }
  flush();
  return records;
}

export function readPackages(indexPath: string): PackageRecord[] {
  return parsePackages(fs.readFileSync(indexPath, "utf-8"));
}

export function findPackage(records: readonly PackageRecord[], name: string): PackageRecord | undefined {
  return records.find((record) => record.get(ATTR_PACKAGE) === name);
}

/** Serialize one record, dropping the excluded attributes */
export function formatPackage(record: PackageRecord, excluded: ReadonlySet<string> = new Set()): string {
  let out = "";
  for (const [attribute, value] of record) {
    if (!excluded.has(attribute)) out += `${attribute}: ${value}\n`;
  }
  return out;
}
