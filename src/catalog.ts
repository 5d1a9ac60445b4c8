import { Effect, Option } from "effect";
import { join } from "node:path";
import { createSeries, LATEST_ORDER, POPULAR_ORDER, type Chapter, type Series, type SortOrder } from "./types.ts";
import { LATEST_THRESHOLD_MS } from "./constants.ts";
import { withEpub, fileExtension, type Container } from "./formats/index.ts";
import { findCoverFile, updateCover, withContainerCover } from "./cover.ts";
import { discoverChapters, resolveChapterFormat } from "./chapters.ts";
import { fillSeriesFromEpub, mergeSeriesMetadata, parseSeriesMetadata } from "./metadata.ts";
import {
  ConfigService,
  FileSystemService,
  LoggerService,
  StrategyService,
  type DirEntry,
  type LibraryServices,
} from "./effect/services.ts";
import { toError, type FormatError } from "./utils/errors.ts";

type SeriesFilter = { kind: "search"; query: string } | { kind: "latest"; since: number };

function matches(filter: SeriesFilter, dir: DirEntry): boolean {
  switch (filter.kind) {
    case "search":
      return dir.name.toLowerCase().includes(filter.query.toLowerCase());
    case "latest":
      return dir.mtimeMs >= filter.since;
  }
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortSeriesDirs(dirs: DirEntry[], order: SortOrder): DirEntry[] {
  const compare =
    order.index === 0
      ? (a: DirEntry, b: DirEntry) => compareText(a.name.toLowerCase(), b.name.toLowerCase())
      : (a: DirEntry, b: DirEntry) => a.mtimeMs - b.mtimeMs;

  return [...dirs].sort((a, b) => (order.ascending ? compare(a, b) : compare(b, a)));
}

/** Visible series directories of every root; on name clashes the first root wins */
const collectSeriesDirs = (filter: SeriesFilter) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const fs = yield* FileSystemService;
    const logger = yield* LoggerService;

    const seen = new Set<string>();
    const dirs: DirEntry[] = [];

    for (const root of config.roots) {
      const entries = yield* fs.listDir(root).pipe(
        Effect.tapError((error) => logger.debug("Catalog", "Storage root not readable", { root, error: error.message })),
        Effect.orElseSucceed((): DirEntry[] => []),
      );

      for (const entry of entries) {
        if (!entry.isDirectory || entry.name.startsWith(".")) continue;
        if (!matches(filter, entry) || seen.has(entry.name)) continue;
        seen.add(entry.name);
        dirs.push(entry);
      }
    }

    return dirs;
  });

const findSeriesCoverFile = (seriesUrl: string) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const strategies = yield* StrategyService;

    for (const root of config.roots) {
      const cover = yield* Effect.tryPromise({
        try: () => findCoverFile(join(root, seriesUrl), strategies.isImage),
        catch: toError,
      }).pipe(Effect.orElseSucceed(() => null));
      if (cover) return cover;
    }
    return null;
  });

/**
 * Copies the cover of `chapter` to the series directory of the first storage
 * root and returns its path.
 */
export const updateCoverFromChapter = (
  chapter: Chapter,
  series: Series,
): Effect.Effect<string | null, FormatError | Error, ConfigService | FileSystemService | StrategyService> =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const strategies = yield* StrategyService;
    const container = yield* resolveChapterFormat(chapter.url);

    return yield* Effect.tryPromise({
      try: () =>
        withContainerCover(container, strategies, (stream) =>
          updateCover(config.roots, series.url, stream, strategies.isImage),
        ),
      catch: toError,
    });
  });

const readEpubSeriesMetadata = (container: Extract<Container, { _tag: "Epub" }>, series: Series) =>
  Effect.tryPromise({
    try: async () => fillSeriesFromEpub(series, await withEpub(container, (reader) => reader.metadata())),
    catch: toError,
  });

const buildSeries = (dir: DirEntry) =>
  Effect.gen(function* () {
    const logger = yield* LoggerService;
    let series = createSeries(dir.name);

    const coverFile = yield* findSeriesCoverFile(series.url);
    if (coverFile) series.thumbnailUrl = coverFile;

    const chapters = yield* discoverChapters(series);
    const chapter = chapters.at(-1);
    if (!chapter) return series;

    const format = yield* resolveChapterFormat(chapter.url).pipe(Effect.option);
    if (Option.isSome(format) && format.value._tag === "Epub") {
      series = yield* readEpubSeriesMetadata(format.value, series).pipe(
        Effect.tapError((error) =>
          logger.error("Catalog", "Failed to read epub metadata", error, { series: series.url, chapter: chapter.url }),
        ),
        Effect.orElseSucceed(() => series),
      );
    }

    if (!series.thumbnailUrl) {
      const cover = yield* updateCoverFromChapter(chapter, series).pipe(
        Effect.tapError((error) =>
          logger.error("Catalog", "Failed to copy cover", error, { series: series.url, chapter: chapter.url }),
        ),
        Effect.orElseSucceed(() => null),
      );
      if (cover) series.thumbnailUrl = cover;
    }

    return series;
  });

const searchSeries = (filter: SeriesFilter, order: SortOrder): Effect.Effect<Series[], never, LibraryServices> =>
  Effect.gen(function* () {
    const logger = yield* LoggerService;
    const startTime = Date.now();

    const dirs = sortSeriesDirs(yield* collectSeriesDirs(filter), order);

    const result: Series[] = [];
    for (const dir of dirs) {
      result.push(yield* buildSeries(dir));
    }

    yield* logger.info("Catalog", `Listed ${result.length} series`, {
      query: filter.kind === "search" ? filter.query : undefined,
      sort: `${order.index === 0 ? "name" : "date"}:${order.ascending ? "asc" : "desc"}`,
      series_count: result.length,
      duration_ms: Date.now() - startTime,
    });

    return result;
  });

export const listSeries = (query: string, order: SortOrder = POPULAR_ORDER) =>
  searchSeries({ kind: "search", query }, order);

export const listLatest = (now: number = Date.now()) =>
  searchSeries({ kind: "latest", since: now - LATEST_THRESHOLD_MS }, LATEST_ORDER);

/** Merges the first `*.json` file found in the series directories, root by root */
export const seriesDetails = (series: Series): Effect.Effect<Series, never, LibraryServices> =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const fs = yield* FileSystemService;
    const logger = yield* LoggerService;
    const strategies = yield* StrategyService;

    for (const root of config.roots) {
      const seriesDir = join(root, series.url);
      const entries = yield* fs.listDir(seriesDir).pipe(Effect.orElseSucceed((): DirEntry[] => []));
      const metaFile = entries
        .filter((e) => !e.isDirectory && fileExtension(e.name) === "json")
        .sort((a, b) => strategies.compareNames(a.name, b.name))[0];
      if (!metaFile) continue;

      const path = join(seriesDir, metaFile.name);
      return yield* fs.readText(path).pipe(
        Effect.flatMap((text) =>
          Effect.try({
            try: () => mergeSeriesMetadata(series, parseSeriesMetadata(text, path)),
            catch: toError,
          }),
        ),
        Effect.tapError((error) => logger.error("Details", "Failed to read series metadata", error, { path })),
        Effect.orElseSucceed(() => series),
      );
    }

    return series;
  });

export const chapters = (series: Series) => discoverChapters(series);

export const resolveFormat = (chapter: Chapter) => resolveChapterFormat(chapter.url);
