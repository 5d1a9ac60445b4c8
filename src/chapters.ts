import { Effect, Option } from "effect";
import { join, parse } from "node:path";
import type { Chapter, Series } from "./types.ts";
import { containerFor, isSupportedChapterFile, withEpub, type Container } from "./formats/index.ts";
import { ConfigService, FileSystemService, LoggerService, StrategyService, type DirEntry } from "./effect/services.ts";
import { stripSeriesTitle } from "./title.ts";
import { fillChapterFromEpub } from "./metadata.ts";
import { UNKNOWN_CHAPTER_NUMBER } from "./chapter-recognition.ts";
import { ChapterNotFoundError, UnsupportedFormatError, toError, type FormatError } from "./utils/errors.ts";

/**
 * Maps a chapter url to its container, using the first storage root where
 * the url exists.
 */
export const resolveChapterFormat = (
  chapterUrl: string,
): Effect.Effect<Container, FormatError, ConfigService | FileSystemService> =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const fs = yield* FileSystemService;

    for (const root of config.roots) {
      const path = join(root, chapterUrl);
      if (!(yield* fs.exists(path))) continue;

      const info = yield* fs.stat(path).pipe(Effect.mapError(() => new ChapterNotFoundError(chapterUrl)));
      return yield* Effect.try({
        try: () => containerFor(path, info.isDirectory),
        catch: (e) => (e instanceof UnsupportedFormatError ? e : new UnsupportedFormatError(path)),
      });
    }

    return yield* Effect.fail(new ChapterNotFoundError(chapterUrl));
  });

/** Highest chapter number first; equal numbers by name, also descending */
export function sortChapters(chapters: Chapter[], compareNames: (a: string, b: string) => number): Chapter[] {
  return [...chapters].sort((c1, c2) => {
    if (c1.chapterNumber !== c2.chapterNumber) return c2.chapterNumber > c1.chapterNumber ? 1 : -1;
    return compareNames(c2.name, c1.name);
  });
}

const buildChapter = (series: Series, entry: DirEntry) =>
  Effect.gen(function* () {
    const logger = yield* LoggerService;
    const strategies = yield* StrategyService;

    let chapter: Chapter = {
      url: `${series.url}/${entry.name}`,
      name: entry.isDirectory ? entry.name : parse(entry.name).name,
      chapterNumber: UNKNOWN_CHAPTER_NUMBER,
      dateUpload: entry.mtimeMs,
    };

    const format = yield* resolveChapterFormat(chapter.url).pipe(Effect.option);
    if (Option.isSome(format) && format.value._tag === "Epub") {
      const epub = format.value;
      const meta = yield* Effect.tryPromise({
        try: () => withEpub(epub, (reader) => reader.metadata()),
        catch: toError,
      }).pipe(
        Effect.tapError((error) =>
          logger.warn("Chapters", "Failed to read epub metadata", { chapter: chapter.url, error: error.message }),
        ),
        Effect.option,
      );
      if (Option.isSome(meta)) chapter = fillChapterFromEpub(chapter, meta.value);
    }

    const stripped = stripSeriesTitle(chapter.name, series.title);
    if (stripped.length > 0) chapter.name = stripped;

    chapter.chapterNumber = strategies.parseChapterNumber(chapter, series);
    return chapter;
  });

/**
 * Chapters of a series across all storage roots: sub-directories and
 * supported archive files of `<root>/<series.url>`.
 */
export const discoverChapters = (
  series: Series,
): Effect.Effect<Chapter[], never, ConfigService | LoggerService | FileSystemService | StrategyService> =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const fs = yield* FileSystemService;
    const logger = yield* LoggerService;
    const strategies = yield* StrategyService;

    const chapters: Chapter[] = [];

    for (const root of config.roots) {
      const seriesDir = join(root, series.url);
      const entries = yield* fs.listDir(seriesDir).pipe(Effect.orElseSucceed((): DirEntry[] => []));

      for (const entry of entries) {
        if (!entry.isDirectory && !isSupportedChapterFile(entry.name)) continue;
        chapters.push(yield* buildChapter(series, entry));
      }
    }

    yield* logger.debug("Chapters", `Found ${chapters.length} chapters`, {
      series: series.url,
      chapters_count: chapters.length,
    });

    return sortChapters(chapters, strategies.compareNames);
  });
