import { Readable } from "node:stream";
import type { Container, ContainerEntry, ContainerReader } from "./types.ts";
import { config } from "../config.ts";
import { spawnWithTimeout } from "../utils/process.ts";
import { ContainerReadError } from "../utils/errors.ts";

type RarContainer = Extract<Container, { _tag: "Rar" }>;

interface RarListing {
  name: string;
  isDirectory: boolean;
}

/**
 * Parses `7zz l -ba -slt` output: one `Key = Value` block per item, separated
 * by blank lines. The block describing the archive itself carries a `Type`.
 */
export function parseTechnicalListing(output: string, archivePath: string): RarListing[] {
  const listings: RarListing[] = [];

  for (const block of output.split(/\r?\n\s*\r?\n/)) {
    const fields = new Map<string, string>();
    for (const line of block.split(/\r?\n/)) {
      const separator = line.indexOf(" = ");
      if (separator > 0) fields.set(line.slice(0, separator).trim(), line.slice(separator + 3));
    }

    const path = fields.get("Path");
    if (!path || fields.has("Type") || path === archivePath) continue;

    const isDirectory = fields.get("Folder") === "+" || (fields.get("Attributes") ?? "").startsWith("D");
    listings.push({ name: path.replace(/\\/g, "/"), isDirectory });
  }

  return listings;
}

async function listRar(filePath: string): Promise<RarListing[]> {
  const result = await spawnWithTimeout({
    command: [config.sevenZipPath, "l", "-ba", "-slt", filePath],
    timeout: config.archiveToolTimeout,
  }).catch((error: unknown) => {
    throw new ContainerReadError(filePath, "listing", error);
  });

  if (result.timedOut) throw new ContainerReadError(filePath, "listing (timed out)");
  if (result.exitCode !== 0) {
    throw new ContainerReadError(filePath, "listing", result.stderr.toString("utf-8").trim());
  }
  return parseTechnicalListing(result.stdout.toString("utf-8"), filePath);
}

async function readRarEntry(filePath: string, name: string): Promise<Readable> {
  const result = await spawnWithTimeout({
    command: [config.sevenZipPath, "e", "-so", filePath, name],
    timeout: config.archiveToolTimeout,
  }).catch((error: unknown) => {
    throw new ContainerReadError(filePath, `read of ${name}`, error);
  });

  if (result.timedOut) throw new ContainerReadError(filePath, `read of ${name} (timed out)`);
  if (result.exitCode !== 0) {
    throw new ContainerReadError(filePath, `read of ${name}`, result.stderr.toString("utf-8").trim());
  }
  return Readable.from([result.stdout]);
}

/** Rar archives go through the 7-Zip command-line tool; each call is its own process. */
export function createRarReader(container: RarContainer): ContainerReader {
  return {
    container,

    async entries() {
      return (await listRar(container.path)).map(
        (item): ContainerEntry => ({
          name: item.name,
          isDirectory: item.isDirectory,
          open: () => readRarEntry(container.path, item.name),
        }),
      );
    },

    async has(name) {
      return (await listRar(container.path)).some((item) => item.name === name);
    },

    open(name) {
      return readRarEntry(container.path, name);
    },

    async close() {
      // no handle outlives a call
    },
  };
}
