import fs from "node:fs";
import { Readable } from "node:stream";
import { gzipSync } from "node:zlib";
import { ConfigurationError } from "../utils/errors.js";

const BLOCK = 512;

export interface TarInput {
  name: string;
  data: Buffer;
  /** permission bits, 0644 when omitted */
  mode?: number;
  /** modification time in seconds since the epoch */
  mtime?: number;
}

export interface TarHeader {
  name: string;
  mode: number;
  size: number;
  /** type flag character: "0" regular file, "5" directory, ... */
  type: string;
}

export interface TarEntry extends TarHeader {
  data: Buffer;
}

/** Location of a member inside an archive file */
export interface TarMember extends TarHeader {
  /** byte offset of the member data */
  offset: number;
}

function writeOctal(header: Buffer, value: number, offset: number, length: number): void {
  header.write(value.toString(8).padStart(length - 1, "0") + "\0", offset, length, "ascii");
}

function readString(block: Buffer, offset: number, length: number): string {
  const slice = block.subarray(offset, offset + length);
  const nul = slice.indexOf(0);
  return slice.subarray(0, nul === -1 ? length : nul).toString("utf8");
}

function readOctal(block: Buffer, offset: number, length: number): number {
  return parseInt(readString(block, offset, length).trim(), 8) || 0;
}

function checksum(block: Buffer): number {
  let sum = 0;
  for (let i = 0; i < BLOCK; i++) {
    // the checksum field itself counts as spaces
    sum += i >= 148 && i < 156 ? 0x20 : block[i];
  }
  return sum;
}

/** ustar header of a regular file; `size` is the exact length of the data that follows */
export function tarHeader(name: string, size: number, mode = 0o644, mtime = 0): Buffer {
  if (Buffer.byteLength(name) > 100) {
    throw new Error(`Tar entry name '${name}' is longer than 100 bytes`);
  }
  const header = Buffer.alloc(BLOCK);
  header.write(name, 0, 100, "utf8");
  writeOctal(header, mode, 100, 8);
  writeOctal(header, 0, 108, 8);
  writeOctal(header, 0, 116, 8);
  writeOctal(header, size, 124, 12);
  writeOctal(header, mtime, 136, 12);
  header.write("0", 156, 1, "ascii");
  header.write("ustar\0", 257, 6, "ascii");
  header.write("00", 263, 2, "ascii");
  header.write("root", 265, 32, "ascii");
  header.write("root", 297, 32, "ascii");
  header.write(checksum(header).toString(8).padStart(6, "0") + "\0 ", 148, 8, "ascii");
  return header;
}

/** Uncompressed tar archive of the entries, in order */
export function createTar(entries: readonly TarInput[]): Buffer {
  const parts: Buffer[] = [];
  for (const entry of entries) {
    parts.push(tarHeader(entry.name, entry.data.length, entry.mode, entry.mtime));
    parts.push(entry.data);
    const padding = (BLOCK - (entry.data.length % BLOCK)) % BLOCK;
    if (padding) parts.push(Buffer.alloc(padding));
  }
  // end-of-archive marker
  parts.push(Buffer.alloc(BLOCK * 2));
  return Buffer.concat(parts);
}

/** gzip-compressed tar archive (.tgz) */
export function createTarGz(entries: readonly TarInput[]): Buffer {
  return gzipSync(createTar(entries));
}

/** Parse one header block; undefined marks the end of the archive */
export function parseHeader(block: Buffer): TarHeader | undefined {
  if (block.length < BLOCK || block.every((b) => b === 0)) return undefined;
  const stored = readOctal(block, 148, 8);
  if (stored !== checksum(block)) {
    throw new Error("Invalid tar header checksum");
  }
  let name = readString(block, 0, 100);
  const magic = readString(block, 257, 6);
  if (magic.startsWith("ustar")) {
    const prefix = readString(block, 345, 155);
    if (prefix) name = `${prefix}/${name}`;
  }
  const typeFlag = block[156];
  return {
    name: name.replace(/^\.\//, ""),
    mode: readOctal(block, 100, 8),
    size: readOctal(block, 124, 12),
    type: typeFlag === 0 ? "0" : String.fromCharCode(typeFlag),
  };
}

function paddedSize(size: number): number {
  return Math.ceil(size / BLOCK) * BLOCK;
}

/** Parse an uncompressed tar archive held in memory */
export function parseTar(buf: Buffer): TarEntry[] {
  const entries: TarEntry[] = [];
  let offset = 0;
  let longName: string | undefined;

  while (offset + BLOCK <= buf.length) {
    const header = parseHeader(buf.subarray(offset, offset + BLOCK));
    if (!header) break;
    offset += BLOCK;
    const data = Buffer.from(buf.subarray(offset, offset + header.size));
    offset += paddedSize(header.size);

    // GNU long name: the data is the name of the next entry
    if (header.type === "L") {
      longName = readString(data, 0, data.length);
      continue;
    }
    // pax headers carry nothing this reader needs
    if (header.type === "x" || header.type === "g") continue;

    entries.push({ ...header, name: longName ?? header.name, data });
    longName = undefined;
  }
  return entries;
}

/**
 * Locate a member of a tar file without reading the member data,
 * so multi-megabyte volume images can be streamed from disk.
 */
export async function findTarMember(filePath: string, name: string): Promise<TarMember> {
  const handle = await fs.promises.open(filePath, "r");
  try {
    const block = Buffer.alloc(BLOCK);
    let offset = 0;
    let longName: string | undefined;
    for (;;) {
      const { bytesRead } = await handle.read(block, 0, BLOCK, offset);
      const header = bytesRead === BLOCK ? parseHeader(block) : undefined;
      if (!header) break;
      const dataOffset = offset + BLOCK;
      offset = dataOffset + paddedSize(header.size);

      if (header.type === "L") {
        const data = Buffer.alloc(header.size);
        await handle.read(data, 0, header.size, dataOffset);
        longName = readString(data, 0, data.length);
        continue;
      }
      if (header.type === "x" || header.type === "g") continue;

      const entryName = longName ?? header.name;
      longName = undefined;
      if (entryName === name) {
        return { ...header, name: entryName, offset: dataOffset };
      }
    }
  } finally {
    await handle.close();
  }
  throw new ConfigurationError(`Archive '${filePath}' has no member '${name}'`, filePath);
}

/** Read stream over the data of one member */
export function openTarMember(filePath: string, member: TarMember): Readable {
  if (member.size === 0) return Readable.from([]);
  // end is inclusive
  return fs.createReadStream(filePath, { start: member.offset, end: member.offset + member.size - 1 });
}
