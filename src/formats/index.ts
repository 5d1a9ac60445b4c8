import { stat } from "node:fs/promises";
import { extname } from "node:path";
import type { Container, ContainerKind, ContainerReader, EpubReader } from "./types.ts";
import { createDirectoryReader } from "./directory.ts";
import { createZipReader } from "./zip.ts";
import { createRarReader } from "./rar.ts";
import { createEpubReader } from "./epub.ts";
import { SUPPORTED_ARCHIVE_EXTENSIONS } from "../constants.ts";
import { UnsupportedFormatError } from "../utils/errors.ts";

const kindByExtension = new Map<string, Exclude<ContainerKind, "Directory">>([
  ["zip", "Zip"],
  ["cbz", "Zip"],
  ["rar", "Rar"],
  ["cbr", "Rar"],
  ["epub", "Epub"],
]);

export function fileExtension(name: string): string {
  return extname(name).slice(1).toLowerCase();
}

export function isSupportedChapterFile(name: string): boolean {
  return SUPPORTED_ARCHIVE_EXTENSIONS.includes(fileExtension(name));
}

/** Picks the variant from directory-ness and extension alone. */
export function containerFor(path: string, isDirectory: boolean): Container {
  if (isDirectory) return { _tag: "Directory", path };

  const kind = kindByExtension.get(fileExtension(path));
  if (!kind) throw new UnsupportedFormatError(path);
  return { _tag: kind, path };
}

export async function resolveContainer(path: string): Promise<Container> {
  const info = await stat(path);
  return containerFor(path, info.isDirectory());
}

export function openReader(container: Container): ContainerReader {
  switch (container._tag) {
    case "Directory":
      return createDirectoryReader(container);
    case "Zip":
      return createZipReader(container);
    case "Rar":
      return createRarReader(container);
    case "Epub":
      return createEpubReader(container);
  }
}

async function scoped<R extends ContainerReader, A>(reader: R, use: (reader: R) => Promise<A>): Promise<A> {
  try {
    return await use(reader);
  } finally {
    await reader.close();
  }
}

/** Runs `use` with a fresh reader and releases it however `use` ends. */
export function withContainer<A>(container: Container, use: (reader: ContainerReader) => Promise<A>): Promise<A> {
  return scoped(openReader(container), use);
}

export function withEpub<A>(
  container: Extract<Container, { _tag: "Epub" }>,
  use: (reader: EpubReader) => Promise<A>,
): Promise<A> {
  return scoped(createEpubReader(container), use);
}

export type { Container, ContainerKind, ContainerEntry, ContainerReader, EpubReader } from "./types.ts";
