import { describe, test, expect } from "vitest";
import { detectImageType, isImage } from "../../../src/utils/image.ts";
import { PNG_BYTES, JPEG_BYTES } from "../../helpers/fs-helpers.ts";

describe("utils/image", () => {
  describe("isImage", () => {
    test("accepts image extensions without reading", async () => {
      expect(await isImage("page.jpg")).toBe(true);
      expect(await isImage("dir/PAGE.PNG")).toBe(true);
      expect(await isImage("page.webp")).toBe(true);
    });

    test("rejects known non-image types without reading", async () => {
      let read = false;
      const readHeader = async () => {
        read = true;
        return PNG_BYTES;
      };

      expect(await isImage("notes.txt", readHeader)).toBe(false);
      expect(await isImage("ComicInfo.xml", readHeader)).toBe(false);
      expect(read).toBe(false);
    });

    test("sniffs names without a known type", async () => {
      expect(await isImage("blob", async () => PNG_BYTES)).toBe(true);
      expect(await isImage("blob", async () => Buffer.from("plain text"))).toBe(false);
    });

    test("rejects unknown names when nothing can be read", async () => {
      expect(await isImage("blob")).toBe(false);
      expect(
        await isImage("blob", async () => {
          throw new Error("unreadable");
        }),
      ).toBe(false);
    });
  });

  describe("detectImageType", () => {
    test("recognizes common headers", () => {
      expect(detectImageType(PNG_BYTES)).toBe("png");
      expect(detectImageType(JPEG_BYTES)).toBe("jpeg");
      expect(detectImageType(Buffer.from("GIF89a"))).toBe("gif");
      expect(detectImageType(Buffer.from("RIFF\x00\x00\x00\x00WEBPVP8 ", "latin1"))).toBe("webp");
      expect(detectImageType(Buffer.from("\x00\x00\x00\x1cftypavif", "latin1"))).toBe("avif");
    });

    test("returns null for other bytes", () => {
      expect(detectImageType(Buffer.from("%PDF-1.7"))).toBeNull();
      expect(detectImageType(Buffer.alloc(0))).toBeNull();
    });
  });
});
