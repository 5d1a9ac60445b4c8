import { Context, Effect, Layer } from "effect";
import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { config } from "../config.ts";
import { log } from "../logging/index.ts";
import type { LogContext } from "../logging/types.ts";
import type { Chapter, Series } from "../types.ts";
import { compareNatural } from "../utils/natural.ts";
import { isImage, type HeaderReader } from "../utils/image.ts";
import { toError } from "../utils/errors.ts";
import { parseChapterNumber } from "../chapter-recognition.ts";

export interface DirEntry {
  name: string;
  isDirectory: boolean;
  mtimeMs: number;
}

export interface FileInfo {
  isDirectory: boolean;
  mtimeMs: number;
}

// Config Service
export class ConfigService extends Context.Tag("ConfigService")<
  ConfigService,
  {
    /** Storage roots in priority order */
    readonly roots: readonly string[];
  }
>() {}

// Logger Service
export class LoggerService extends Context.Tag("LoggerService")<
  LoggerService,
  {
    readonly info: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
    readonly warn: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
    readonly error: (tag: string, msg: string, err?: unknown, ctx?: LogContext) => Effect.Effect<void>;
    readonly debug: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
  }
>() {}

// FileSystem Service
export class FileSystemService extends Context.Tag("FileSystemService")<
  FileSystemService,
  {
    /** Children of a directory, one level, with their modification times */
    readonly listDir: (path: string) => Effect.Effect<DirEntry[], Error>;
    readonly stat: (path: string) => Effect.Effect<FileInfo, Error>;
    readonly exists: (path: string) => Effect.Effect<boolean>;
    readonly readText: (path: string) => Effect.Effect<string, Error>;
  }
>() {}

// Strategy Service: ordering, numbering and image detection
export class StrategyService extends Context.Tag("StrategyService")<
  StrategyService,
  {
    readonly compareNames: (a: string, b: string) => number;
    readonly parseChapterNumber: (chapter: Chapter, series: Series) => number;
    readonly isImage: (name: string, readHeader?: HeaderReader) => Promise<boolean>;
  }
>() {}

export type LibraryServices = ConfigService | LoggerService | FileSystemService | StrategyService;

// Live implementations

export const LiveConfigService = Layer.succeed(ConfigService, {
  roots: config.roots,
});

export const LiveLoggerService = Layer.succeed(LoggerService, {
  info: (tag, msg, ctx) => Effect.sync(() => log.info(tag, msg, ctx)),
  warn: (tag, msg, ctx) => Effect.sync(() => log.warn(tag, msg, ctx)),
  error: (tag, msg, err, ctx) => Effect.sync(() => log.error(tag, msg, err, ctx)),
  debug: (tag, msg, ctx) => Effect.sync(() => log.debug(tag, msg, ctx)),
});

export const LiveFileSystemService = Layer.succeed(FileSystemService, {
  listDir: (path) =>
    Effect.tryPromise({
      try: async () => {
        const dirents = await readdir(path, { withFileTypes: true });
        const entries: DirEntry[] = [];
        for (const dirent of dirents) {
          const entryPath = join(path, dirent.name);
          try {
            const info = await stat(entryPath);
            entries.push({ name: dirent.name, isDirectory: info.isDirectory(), mtimeMs: info.mtimeMs });
          } catch (error) {
            // dangling link or removed while listing
            log.debug("FileSystem", "Skipping unreadable entry", { path: entryPath, error: toError(error).message });
          }
        }
        return entries;
      },
      catch: toError,
    }),

  stat: (path) =>
    Effect.tryPromise({
      try: () => stat(path),
      catch: toError,
    }).pipe(
      Effect.map((s) => ({
        isDirectory: s.isDirectory(),
        mtimeMs: s.mtimeMs,
      })),
    ),

  exists: (path) =>
    Effect.tryPromise({
      try: () => stat(path),
      catch: toError,
    }).pipe(
      Effect.as(true),
      Effect.catchAll(() => Effect.succeed(false)),
    ),

  readText: (path) =>
    Effect.tryPromise({
      try: () => readFile(path, "utf-8"),
      catch: toError,
    }),
});

export const LiveStrategyService = Layer.succeed(StrategyService, {
  compareNames: compareNatural,
  parseChapterNumber,
  isImage,
});

// Combined live layer
export const LiveLayer = Layer.mergeAll(
  LiveConfigService,
  LiveLoggerService,
  LiveFileSystemService,
  LiveStrategyService,
);
