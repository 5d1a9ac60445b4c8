import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { finished } from "node:stream/promises";
import yazl from "yazl";

/** Entries ending in "/" become directory entries */
export async function createZip(path: string, entries: Record<string, string | Buffer>): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  const zip = new yazl.ZipFile();

  for (const [name, content] of Object.entries(entries)) {
    if (name.endsWith("/")) {
      zip.addEmptyDirectory(name);
    } else {
      zip.addBuffer(typeof content === "string" ? Buffer.from(content) : content, name);
    }
  }
  zip.end();

  const output = createWriteStream(path);
  zip.outputStream.pipe(output);
  await finished(output);
  return path;
}

export interface EpubFixture {
  title?: string;
  creator?: string;
  publisher?: string;
  description?: string;
  date?: string;
  modified?: string;
  /** Pages in reading order: entry name under OEBPS/ and its body markup */
  pages: { name: string; body: string }[];
  /** Extra entries under OEBPS/ (images) */
  files?: Record<string, Buffer>;
}

function element(tag: string, value: string | undefined): string {
  return value === undefined ? "" : `<${tag}>${value}</${tag}>`;
}

export async function createEpub(path: string, fixture: EpubFixture): Promise<string> {
  const metadata = [
    element("dc:title", fixture.title),
    element("dc:creator", fixture.creator),
    element("dc:publisher", fixture.publisher),
    element("dc:description", fixture.description),
    element("dc:date", fixture.date),
    fixture.modified === undefined ? "" : `<meta property="dcterms:modified">${fixture.modified}</meta>`,
  ].join("");

  const manifest = fixture.pages
    .map((page, i) => `<item id="page${i}" href="${page.name}" media-type="application/xhtml+xml"/>`)
    .join("");
  const spine = fixture.pages.map((_, i) => `<itemref idref="page${i}"/>`).join("");

  const entries: Record<string, string | Buffer> = {
    mimetype: "application/epub+zip",
    "META-INF/container.xml":
      '<?xml version="1.0"?><container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">' +
      '<rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles></container>',
    "OEBPS/content.opf":
      '<?xml version="1.0"?><package xmlns="http://www.idpf.org/2007/opf" version="3.0">' +
      `<metadata xmlns:dc="http://purl.org/dc/elements/1.1/">${metadata}</metadata>` +
      `<manifest>${manifest}</manifest><spine>${spine}</spine></package>`,
  };

  for (const page of fixture.pages) {
    entries[`OEBPS/${page.name}`] =
      '<?xml version="1.0"?><html xmlns="http://www.w3.org/1999/xhtml" xmlns:xlink="http://www.w3.org/1999/xlink">' +
      `<head><title>page</title></head><body>${page.body}</body></html>`;
  }
  for (const [name, content] of Object.entries(fixture.files ?? {})) {
    entries[`OEBPS/${name}`] = content;
  }

  return createZip(path, entries);
}
