import { createReadStream } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join, parse } from "node:path";
import type { Readable } from "node:stream";
import type { Container, ContainerEntry, ContainerReader, EpubReader } from "./formats/index.ts";
import { withContainer, withEpub } from "./formats/index.ts";
import { COVER_FILE, COVER_NAME } from "./constants.ts";
import { readStreamHeader, saveStreamAsFile, type HeaderReader } from "./utils/image.ts";

export type ImagePredicate = (name: string, readHeader?: HeaderReader) => Promise<boolean>;

export interface CoverStrategies {
  compareNames: (a: string, b: string) => number;
  isImage: ImagePredicate;
}

/**
 * First image among the container's files in natural name order. The
 * predicate may read bytes, so it runs one entry at a time and stops at the
 * first match.
 */
export async function findCover(reader: ContainerReader, strategies: CoverStrategies): Promise<ContainerEntry | null> {
  const files = (await reader.entries())
    .filter((entry) => !entry.isDirectory)
    .sort((a, b) => strategies.compareNames(a.name, b.name));

  for (const entry of files) {
    const readHeader = async () => readStreamHeader(await entry.open());
    if (await strategies.isImage(entry.name, readHeader)) return entry;
  }
  return null;
}

/** The first image referenced by the epub's reading order, if the archive holds it */
export async function findEpubCover(reader: EpubReader): Promise<string | null> {
  for await (const image of reader.pageImages()) {
    return (await reader.has(image)) ? image : null;
  }
  return null;
}

/**
 * Locates the cover of a chapter container and hands its stream to `use`
 * while the container is still open.
 */
export async function withContainerCover<A>(
  container: Container,
  strategies: CoverStrategies,
  use: (stream: Readable, entryName: string) => Promise<A>,
): Promise<A | null> {
  if (container._tag === "Epub") {
    return withEpub(container, async (reader) => {
      const image = await findEpubCover(reader);
      return image ? use(await reader.open(image), image) : null;
    });
  }

  return withContainer(container, async (reader) => {
    const entry = await findCover(reader, strategies);
    return entry ? use(await entry.open(), entry.name) : null;
  });
}

/** A `cover.*` image directly inside `seriesDir` */
export async function findCoverFile(seriesDir: string, isImage: ImagePredicate): Promise<string | null> {
  let names: string[];
  try {
    names = await readdir(seriesDir);
  } catch {
    return null;
  }

  const name = names.sort().find((n) => parse(n).name === COVER_NAME);
  if (!name) return null;

  const path = join(seriesDir, name);
  const info = await stat(path);
  if (!info.isFile()) return null;

  const readHeader = () => readStreamHeader(createReadStream(path));
  return (await isImage(name, readHeader)) ? path : null;
}

/**
 * Writes `input` as the series cover under the first storage root, unless a
 * cover file is already there. Returns the cover path.
 */
export async function updateCover(
  roots: readonly string[],
  seriesUrl: string,
  input: Readable,
  isImage: ImagePredicate,
): Promise<string | null> {
  const root = roots[0];
  if (root === undefined) {
    input.destroy();
    return null;
  }

  const seriesDir = join(root, seriesUrl);
  const existing = await findCoverFile(seriesDir, isImage);
  if (existing) {
    input.destroy();
    return existing;
  }

  const cover = join(seriesDir, COVER_FILE);
  const present = await stat(cover).then(
    () => true,
    () => false,
  );
  if (present) {
    input.destroy();
    return cover;
  }

  await saveStreamAsFile(input, cover);
  return cover;
}
