import { createReadStream } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import type { Readable } from "node:stream";
import type { Container, ContainerEntry, ContainerReader } from "./types.ts";
import { ContainerReadError } from "../utils/errors.ts";

type DirectoryContainer = Extract<Container, { _tag: "Directory" }>;

function openFile(filePath: string): Promise<Readable> {
  return new Promise((resolve, reject) => {
    const stream = createReadStream(filePath);
    stream.once("open", () => resolve(stream));
    stream.once("error", (error) => reject(new ContainerReadError(filePath, "read", error)));
  });
}

export function createDirectoryReader(container: DirectoryContainer): ContainerReader {
  return {
    container,

    async entries() {
      try {
        const dirents = await readdir(container.path, { withFileTypes: true });
        return dirents.map(
          (dirent): ContainerEntry => ({
            name: dirent.name,
            isDirectory: dirent.isDirectory(),
            open: () => openFile(join(container.path, dirent.name)),
          }),
        );
      } catch (error) {
        throw new ContainerReadError(container.path, "listing", error);
      }
    },

    async has(name) {
      try {
        await stat(join(container.path, name));
        return true;
      } catch {
        return false;
      }
    },

    open(name) {
      return openFile(join(container.path, name));
    },

    async close() {
      // nothing held open
    },
  };
}
