import { describe, test, expect, beforeAll, afterAll } from "vitest";
import { Effect, Either } from "effect";
import { join } from "node:path";
import { symlink } from "node:fs/promises";
import { discoverChapters, resolveChapterFormat } from "../../src/chapters.ts";
import { createSeries } from "../../src/types.ts";
import {
  createTempDir,
  cleanupTempDir,
  createFileStructure,
  setModifiedTime,
  PNG_BYTES,
} from "../helpers/fs-helpers.ts";
import { createEpub, createZip } from "../helpers/archives.ts";
import { createTestLayer } from "../helpers/layers.ts";

const CHAPTER_ONE_TIME = Date.UTC(2022, 5, 1, 12, 0, 0);

describe("chapter discovery", () => {
  let base: string;
  let root1: string;
  let root2: string;

  beforeAll(async () => {
    base = await createTempDir("chapters");
    root1 = join(base, "root1");
    root2 = join(base, "root2");

    await createFileStructure(base, {
      root1: {
        "My Series": {
          "My Series - Chapter 4": { "1.png": PNG_BYTES },
          "details.json": "{}",
          "cover.jpg": PNG_BYTES,
          "notes.txt": "skip me",
        },
        Solo: {
          Solo: {},
          "Solo 2": {},
        },
        Ties: {
          "Chapter 5a": {},
          "Chapter 5": {},
          "Chapter 5b": {},
        },
        Novel: {
          "broken.epub": "not an archive",
        },
        Mixed: {
          "notes.txt": "text",
        },
      },
      root2: {
        "My Series": {
          "Chapter 1": { "1.png": PNG_BYTES },
        },
        Mixed: {
          "notes.txt": "text",
          "Only Here": {},
        },
      },
    });

    await createZip(join(root1, "My Series", "Chapter 2.cbz"), { "1.png": PNG_BYTES });
    await createZip(join(root2, "My Series", "Chapter 3.zip"), { "1.png": PNG_BYTES });
    await createZip(join(root1, "Mixed", "Shared.cbz"), { "1.png": PNG_BYTES });
    await createZip(join(root2, "Mixed", "Shared.cbz"), { "1.png": PNG_BYTES });
    await createEpub(join(root1, "Novel", "vol1.epub"), {
      title: "Novel: Chapter 7",
      creator: "Jane Writer",
      publisher: "Night Shift",
      date: "2023-04-05",
      pages: [],
    });

    await symlink(join(base, "nowhere.cbz"), join(root1, "My Series", "stale.cbz"));
    await setModifiedTime(join(root2, "My Series", "Chapter 1"), CHAPTER_ONE_TIME);
  });

  afterAll(async () => {
    await cleanupTempDir(base);
  });

  test("merges chapters of every root, highest number first, skipping unreadable entries", async () => {
    const { layer } = createTestLayer([root1, root2]);
    const chapters = await Effect.runPromise(discoverChapters(createSeries("My Series")).pipe(Effect.provide(layer)));

    expect(chapters.map((c) => [c.url, c.name, c.chapterNumber])).toEqual([
      ["My Series/My Series - Chapter 4", "Chapter 4", 4],
      ["My Series/Chapter 3.zip", "Chapter 3", 3],
      ["My Series/Chapter 2.cbz", "Chapter 2", 2],
      ["My Series/Chapter 1", "Chapter 1", 1],
    ]);
    expect(chapters[3]?.dateUpload).toBe(CHAPTER_ONE_TIME);
  });

  test("keeps the full name when nothing is left after the series title", async () => {
    const { layer } = createTestLayer([root1]);
    const chapters = await Effect.runPromise(discoverChapters(createSeries("Solo")).pipe(Effect.provide(layer)));

    expect(chapters.map((c) => [c.url, c.name, c.chapterNumber])).toEqual([
      ["Solo/Solo 2", "2", 2],
      ["Solo/Solo", "Solo", -1],
    ]);
  });

  test("breaks ties by name, descending", async () => {
    const { layer } = createTestLayer([root1], { parseChapterNumber: () => 5 });
    const chapters = await Effect.runPromise(discoverChapters(createSeries("Ties")).pipe(Effect.provide(layer)));

    expect(chapters.map((c) => c.name)).toEqual(["Chapter 5b", "Chapter 5a", "Chapter 5"]);
  });

  test("reads chapter details from epub packages", async () => {
    const { layer, logs } = createTestLayer([root1]);
    const chapters = await Effect.runPromise(discoverChapters(createSeries("Novel")).pipe(Effect.provide(layer)));

    expect(chapters[0]).toEqual({
      url: "Novel/vol1.epub",
      name: "Chapter 7",
      chapterNumber: 7,
      dateUpload: Date.UTC(2023, 3, 5),
      scanlator: "Night Shift",
    });
    expect(chapters[1]).toMatchObject({ url: "Novel/broken.epub", name: "broken", chapterNumber: -1 });
    expect(logs.filter((l) => l.level === "warn")).toMatchObject([
      { tag: "Chapters", msg: "Failed to read epub metadata", ctx: { chapter: "Novel/broken.epub" } },
    ]);
  });

  test("returns nothing for an unknown series", async () => {
    const { layer } = createTestLayer([root1, root2]);
    const chapters = await Effect.runPromise(discoverChapters(createSeries("Nobody")).pipe(Effect.provide(layer)));

    expect(chapters).toEqual([]);
  });

  describe("resolveChapterFormat", () => {
    const resolve = (url: string, roots: string[]) =>
      Effect.runPromise(resolveChapterFormat(url).pipe(Effect.either, Effect.provide(createTestLayer(roots).layer)));

    test("uses the first root holding the chapter", async () => {
      expect(await resolve("Mixed/Shared.cbz", [root1, root2])).toEqual(
        Either.right({ _tag: "Zip", path: join(root1, "Mixed", "Shared.cbz") }),
      );
      expect(await resolve("Mixed/Shared.cbz", [root2, root1])).toEqual(
        Either.right({ _tag: "Zip", path: join(root2, "Mixed", "Shared.cbz") }),
      );
    });

    test("falls through to later roots", async () => {
      expect(await resolve("Mixed/Only Here", [root1, root2])).toEqual(
        Either.right({ _tag: "Directory", path: join(root2, "Mixed", "Only Here") }),
      );
    });

    test("fails with ChapterNotFound when no root has it", async () => {
      const result = await resolve("Mixed/Gone.cbz", [root1, root2]);

      expect(Either.isLeft(result) && result.left._tag).toBe("ChapterNotFound");
    });

    test("fails with UnsupportedFormat for other files", async () => {
      const result = await resolve("Mixed/notes.txt", [root1, root2]);

      expect(Either.isLeft(result) && result.left._tag).toBe("UnsupportedFormat");
    });
  });
});
