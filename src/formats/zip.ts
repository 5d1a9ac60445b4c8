import type { Readable } from "node:stream";
import yauzl from "yauzl";
import type { Container, ContainerEntry, ContainerReader } from "./types.ts";
import { ContainerReadError } from "../utils/errors.ts";

type ZipBackedContainer = Extract<Container, { _tag: "Zip" | "Epub" }>;

function openZipFile(filePath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(filePath, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(new ContainerReadError(filePath, "open", err));
        return;
      }
      resolve(zipfile);
    });
  });
}

function readAllEntries(zipfile: yauzl.ZipFile, filePath: string): Promise<yauzl.Entry[]> {
  return new Promise((resolve, reject) => {
    const entries: yauzl.Entry[] = [];

    zipfile.on("entry", (entry: yauzl.Entry) => {
      entries.push(entry);
      zipfile.readEntry();
    });
    zipfile.once("end", () => resolve(entries));
    zipfile.once("error", (error: unknown) => reject(new ContainerReadError(filePath, "listing", error)));

    zipfile.readEntry();
  });
}

function openEntryStream(zipfile: yauzl.ZipFile, entry: yauzl.Entry, filePath: string): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(new ContainerReadError(filePath, `read of ${entry.fileName}`, err));
        return;
      }
      resolve(stream);
    });
  });
}

/**
 * Zip-backed reader. Holds a single file handle from the first call until
 * `close()`. The central directory can only be walked once per handle, so the
 * listing is kept for the lifetime of the reader.
 */
export function createZipReader<C extends ZipBackedContainer>(container: C): ContainerReader & { container: C } {
  let zipfile: yauzl.ZipFile | null = null;
  let listing: Promise<yauzl.Entry[]> | null = null;
  let closed = false;

  async function handle(): Promise<yauzl.ZipFile> {
    if (closed) throw new ContainerReadError(container.path, "read after close");
    zipfile ??= await openZipFile(container.path);
    return zipfile;
  }

  async function rawEntries(): Promise<yauzl.Entry[]> {
    const zip = await handle();
    listing ??= readAllEntries(zip, container.path);
    return listing;
  }

  async function open(name: string): Promise<Readable> {
    const entry = (await rawEntries()).find((e) => e.fileName === name);
    if (!entry) throw new ContainerReadError(container.path, `read of missing entry ${name}`);
    return openEntryStream(await handle(), entry, container.path);
  }

  return {
    container,

    async entries() {
      const zip = await handle();
      return (await rawEntries()).map(
        (entry): ContainerEntry => ({
          name: entry.fileName,
          isDirectory: entry.fileName.endsWith("/"),
          open: () => openEntryStream(zip, entry, container.path),
        }),
      );
    },

    async has(name) {
      return (await rawEntries()).some((e) => e.fileName === name);
    },

    open,

    async close() {
      closed = true;
      zipfile?.close();
      zipfile = null;
    },
  };
}
