import { posix } from "node:path";

export function decodeEntities(str: string): string {
  return str
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&amp;/g, "&")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#(\d+);/g, (_, n: string) => String.fromCharCode(Number(n)))
    .replace(/&#x([0-9a-f]+);/gi, (_, n: string) => String.fromCharCode(parseInt(n, 16)));
}

export function getString(val: unknown): string | undefined {
  if (typeof val === "string") return decodeEntities(val.trim()) || undefined;
  if (typeof val === "number") return String(val);
  if (typeof val === "object" && val && "#text" in val) {
    return decodeEntities(String(val["#text"]).trim()) || undefined;
  }
  return undefined;
}

export function getFirstString(val: unknown): string | undefined {
  if (Array.isArray(val)) return getString(val[0]);
  return getString(val);
}

export function cleanDescription(desc: string | undefined): string | undefined {
  if (!desc) return undefined;
  return desc.replace(/<[^>]+>/g, "").replace(/\s+/g, " ").trim() || undefined;
}

/** Resolves an href found in `fromEntry` to an entry name of the same archive */
export function resolveHref(fromEntry: string, href: string): string | undefined {
  const path = href.split("#")[0]?.split("?")[0];
  if (!path || /^[a-z][a-z0-9+.-]*:/i.test(path)) return undefined;

  let decoded: string;
  try {
    decoded = decodeURIComponent(path);
  } catch {
    decoded = path;
  }

  const joined = posix.normalize(posix.join(posix.dirname(fromEntry), decoded));
  if (joined.startsWith("../")) return undefined;
  return joined.replace(/^\.\//, "").replace(/^\//, "");
}
