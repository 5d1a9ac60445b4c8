import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import mime from "mime-types";
import { IMAGE_HEADER_BYTES } from "../constants.ts";

export type ImageType = "jpeg" | "png" | "gif" | "webp" | "bmp" | "avif" | "jxl";

export type HeaderReader = () => Promise<Buffer>;

const MAGIC_BYTES: [ImageType, number, number[]][] = [
  ["jpeg", 0, [0xff, 0xd8, 0xff]],
  ["png", 0, [0x89, 0x50, 0x4e, 0x47]],
  ["gif", 0, [0x47, 0x49, 0x46, 0x38]],
  ["bmp", 0, [0x42, 0x4d]],
  ["jxl", 0, [0xff, 0x0a]],
  ["jxl", 0, [0x00, 0x00, 0x00, 0x0c, 0x4a, 0x58, 0x4c, 0x20]],
];

function matchesAt(header: Buffer, offset: number, bytes: number[]): boolean {
  return bytes.every((byte, i) => header[offset + i] === byte);
}

export function detectImageType(header: Buffer): ImageType | null {
  for (const [type, offset, magic] of MAGIC_BYTES) {
    if (matchesAt(header, offset, magic)) return type;
  }

  if (header.subarray(0, 4).toString("latin1") === "RIFF" && header.subarray(8, 12).toString("latin1") === "WEBP") {
    return "webp";
  }

  const brand = header.subarray(4, 12).toString("latin1");
  if (brand === "ftypavif" || brand === "ftypavis") return "avif";

  return null;
}

/**
 * Decides by the name's mime type when it has a known one, otherwise by the
 * first bytes, if a reader for them is given.
 */
export async function isImage(name: string, readHeader?: HeaderReader): Promise<boolean> {
  const contentType = mime.lookup(name);
  if (contentType) return contentType.startsWith("image/");
  if (!readHeader) return false;

  try {
    return detectImageType(await readHeader()) !== null;
  } catch {
    return false;
  }
}

export async function readStreamHeader(stream: Readable, size = IMAGE_HEADER_BYTES): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let length = 0;

  try {
    for await (const chunk of stream) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      chunks.push(buffer);
      length += buffer.length;
      if (length >= size) break;
    }
  } finally {
    stream.destroy();
  }

  return Buffer.concat(chunks).subarray(0, size);
}

export async function saveStreamAsFile(input: Readable, destPath: string): Promise<void> {
  await mkdir(dirname(destPath), { recursive: true });
  await pipeline(input, createWriteStream(destPath));
}
