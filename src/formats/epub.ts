import type { Readable } from "node:stream";
import { XMLParser } from "fast-xml-parser";
import { load } from "cheerio";
import type { Container, EpubPackageMetadata, EpubReader } from "./types.ts";
import { createZipReader } from "./zip.ts";
import { getString, getFirstString, cleanDescription, resolveHref } from "./utils.ts";
import { ContainerReadError } from "../utils/errors.ts";

type EpubContainer = Extract<Container, { _tag: "Epub" }>;

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  isArray: (name) => ["rootfile", "creator", "item", "itemref", "meta", "title"].includes(name),
});

interface OPFMeta {
  "@_name"?: string;
  "@_content"?: string;
  "@_property"?: string;
  "#text"?: string;
}

interface OPFItem {
  "@_id"?: string;
  "@_href"?: string;
  "@_media-type"?: string;
}

interface OPFItemRef {
  "@_idref"?: string;
}

interface OPFPackage {
  package?: {
    metadata?: {
      title?: unknown;
      creator?: unknown;
      description?: unknown;
      publisher?: unknown;
      date?: unknown;
      meta?: OPFMeta[];
    };
    manifest?: { item?: OPFItem[] };
    spine?: { itemref?: OPFItemRef[] };
  };
}

interface RootFile {
  "@_full-path"?: string;
  "@_media-type"?: string;
}

interface ContainerXML {
  container?: {
    rootfiles?: {
      rootfile?: RootFile[];
    };
  };
}

interface PackageDocument {
  path: string;
  data: OPFPackage;
}

async function readText(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

function findOpfPath(containerData: ContainerXML): string | undefined {
  const files = containerData.container?.rootfiles?.rootfile ?? [];

  const opf = files.find((f) => f["@_media-type"] === "application/oebps-package+xml");
  if (opf?.["@_full-path"]) return opf["@_full-path"];

  return files[0]?.["@_full-path"];
}

function extractMetadata(opf: OPFPackage): EpubPackageMetadata {
  const meta = opf.package?.metadata;
  if (!meta) return {};

  const modified = (meta.meta ?? []).find((m) => m["@_property"] === "dcterms:modified");

  return {
    title: getFirstString(meta.title),
    creator: getFirstString(meta.creator),
    publisher: getFirstString(meta.publisher),
    description: cleanDescription(getFirstString(meta.description)),
    date: getFirstString(meta.date),
    modified: getString(modified),
  };
}

/** Page entry names in reading (spine) order */
function pagesFromPackage(pkg: PackageDocument): string[] {
  const manifest = pkg.data.package?.manifest?.item ?? [];
  const spine = pkg.data.package?.spine?.itemref ?? [];
  const pages: string[] = [];

  for (const ref of spine) {
    const item = manifest.find((i) => i["@_id"] === ref["@_idref"]);
    const href = item?.["@_href"];
    if (!href) continue;
    const page = resolveHref(pkg.path, href);
    if (page) pages.push(page);
  }
  return pages;
}

function imagesFromPage(pagePath: string, content: string): string[] {
  const $ = load(content, { xml: true });
  const images: string[] = [];

  $("img, image").each((_, el) => {
    const node = $(el);
    const href = node.attr("src") ?? node.attr("href") ?? node.attr("xlink:href");
    if (!href) return;
    const image = resolveHref(pagePath, href);
    if (image) images.push(image);
  });
  return images;
}

export function createEpubReader(container: EpubContainer): EpubReader {
  const zip = createZipReader(container);
  let packageDocument: Promise<PackageDocument> | null = null;

  async function readEntryText(name: string): Promise<string> {
    return readText(await zip.open(name));
  }

  async function loadPackage(): Promise<PackageDocument> {
    const containerXml = xmlParser.parse(await readEntryText("META-INF/container.xml")) as ContainerXML;
    const path = findOpfPath(containerXml);
    if (!path) throw new ContainerReadError(container.path, "package lookup");

    return { path, data: xmlParser.parse(await readEntryText(path)) as OPFPackage };
  }

  function getPackage(): Promise<PackageDocument> {
    packageDocument ??= loadPackage();
    return packageDocument;
  }

  return {
    ...zip,
    container,

    async metadata() {
      return extractMetadata((await getPackage()).data);
    },

    async *pageImages() {
      const pkg = await getPackage();
      for (const page of pagesFromPackage(pkg)) {
        if (!(await zip.has(page))) continue;
        yield* imagesFromPage(page, await readEntryText(page));
      }
    },
  };
}
