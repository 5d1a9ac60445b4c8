import { describe, test, expect, beforeAll, afterAll } from "vitest";
import { join } from "node:path";
import { withContainer } from "../../../src/formats/index.ts";
import { createDirectoryReader } from "../../../src/formats/directory.ts";
import { findCover } from "../../../src/cover.ts";
import { compareNatural } from "../../../src/utils/natural.ts";
import { isImage, readStreamHeader } from "../../../src/utils/image.ts";
import { ContainerReadError } from "../../../src/utils/errors.ts";
import { createTempDir, cleanupTempDir, createFileStructure, PNG_BYTES, JPEG_BYTES } from "../../helpers/fs-helpers.ts";

const strategies = { compareNames: compareNatural, isImage };

describe("Directory container", () => {
  let root: string;

  beforeAll(async () => {
    root = await createTempDir("directory-container");
    await createFileStructure(root, {
      "Chapter 1": {
        "10.png": PNG_BYTES,
        "2.jpg": JPEG_BYTES,
        "credits.txt": "thanks",
        extras: { "1.png": PNG_BYTES },
      },
      Sniffed: {
        "a.txt": "text",
        page: PNG_BYTES,
      },
      Empty: {},
    });
  });

  afterAll(async () => {
    await cleanupTempDir(root);
  });

  test("lists one level of entries", async () => {
    const reader = createDirectoryReader({ _tag: "Directory", path: join(root, "Chapter 1") });
    const entries = await reader.entries();

    expect(entries.map((e) => [e.name, e.isDirectory]).sort()).toEqual([
      ["10.png", false],
      ["2.jpg", false],
      ["credits.txt", false],
      ["extras", true],
    ]);
  });

  test("checks existence of names", async () => {
    const reader = createDirectoryReader({ _tag: "Directory", path: join(root, "Chapter 1") });

    expect(await reader.has("extras")).toBe(true);
    expect(await reader.has("2.jpg")).toBe(true);
    expect(await reader.has("missing.png")).toBe(false);
  });

  test("finds the first image in natural order", async () => {
    const cover = await withContainer({ _tag: "Directory", path: join(root, "Chapter 1") }, async (reader) => {
      const entry = await findCover(reader, strategies);
      return entry && { name: entry.name, header: await readStreamHeader(await entry.open()) };
    });

    expect(cover).toEqual({ name: "2.jpg", header: JPEG_BYTES });
  });

  test("sniffs files without an extension", async () => {
    const cover = await withContainer({ _tag: "Directory", path: join(root, "Sniffed") }, (reader) =>
      findCover(reader, strategies),
    );

    expect(cover?.name).toBe("page");
  });

  test("has no cover when there are no images", async () => {
    const cover = await withContainer({ _tag: "Directory", path: join(root, "Empty") }, (reader) =>
      findCover(reader, strategies),
    );

    expect(cover).toBeNull();
  });

  test("fails to open missing entries", async () => {
    const reader = createDirectoryReader({ _tag: "Directory", path: join(root, "Chapter 1") });
    await expect(reader.open("missing.png")).rejects.toBeInstanceOf(ContainerReadError);
  });

  test("fails to list a missing directory", async () => {
    const reader = createDirectoryReader({ _tag: "Directory", path: join(root, "Nope") });
    await expect(reader.entries()).rejects.toThrow("Archive listing failed");
  });
});
