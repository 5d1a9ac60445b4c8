import type { Chapter, Series } from "./types.ts";

/** Number right after "ch." */
const BASIC = /(?<=ch\.) *([0-9]+)(\.[0-9]+)?(\.?[a-z]+)?/;
/** Any number with an optional decimal part and letter suffix */
const NUMBER = /([0-9]+)(\.[0-9]+)?(\.?[a-z]+)?/;
const NUMBER_ALL = new RegExp(NUMBER.source, "g");
const LEADING_NUMBER = new RegExp(`^${NUMBER.source}`);
/** Volume, version and season markers that would otherwise be read as chapter numbers */
const UNWANTED = /\b(?:v|ver|vol|version|volume|season|s)[^a-z]?[0-9]+/g;
const UNWANTED_WHITESPACE = /\s(?=extra|special|omake)/g;

export const UNKNOWN_CHAPTER_NUMBER = -1;

function suffixValue(decimal: string | undefined, alpha: string | undefined): number {
  if (decimal) return parseFloat(decimal);
  if (!alpha) return 0;

  if (alpha.includes("extra")) return 0.99;
  if (alpha.includes("omake")) return 0.98;
  if (alpha.includes("special")) return 0.97;

  const letter = alpha.replace(/^\.+/, "");
  if (letter.length !== 1) return 0;

  // a..i map to .1 .. .9
  const position = letter.charCodeAt(0) - ("a".charCodeAt(0) - 1);
  return position >= 1 && position < 10 ? position / 10 : 0;
}

function valueOf(match: RegExpMatchArray | null): number | undefined {
  const integer = match?.[1];
  if (!match || integer === undefined) return undefined;
  return parseInt(integer, 10) + suffixValue(match[2], match[3]);
}

function normalize(name: string): string {
  return name
    .toLowerCase()
    .replace(/,/g, ".")
    .replace(/-/g, ".")
    .replace(UNWANTED_WHITESPACE, "")
    .replace(UNWANTED, "");
}

/**
 * Reads a chapter number out of a chapter name. Tries, in order: the number
 * after "ch.", the only number in the name, the number the name starts with
 * once the series title is removed, and the first number after that removal.
 * Numbers already recognized are returned as they are.
 */
export function parseChapterNumber(chapter: Chapter, series: Series): number {
  if (chapter.chapterNumber === -2 || chapter.chapterNumber > UNKNOWN_CHAPTER_NUMBER) {
    return chapter.chapterNumber;
  }

  const name = normalize(chapter.name);

  const basic = valueOf(name.match(BASIC));
  if (basic !== undefined) return basic;

  const occurrences = [...name.matchAll(NUMBER_ALL)];
  const only = occurrences.length === 1 ? valueOf(occurrences[0] ?? null) : undefined;
  if (only !== undefined) return only;

  const withoutTitle = name.split(series.title.toLowerCase()).join("").trim();

  return valueOf(withoutTitle.match(LEADING_NUMBER)) ?? valueOf(withoutTitle.match(NUMBER)) ?? UNKNOWN_CHAPTER_NUMBER;
}
