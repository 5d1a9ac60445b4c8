import { Either, Option, ParseResult, Schema } from "effect";
import type { Chapter, Series } from "./types.ts";
import type { EpubPackageMetadata } from "./formats/types.ts";
import { MetadataParseError } from "./utils/errors.ts";

/** Text content of a JSON primitive; numbers and booleans are taken as written */
const TextField = Schema.Union(
  Schema.String,
  Schema.transform(Schema.Union(Schema.Number, Schema.Boolean), Schema.String, {
    strict: true,
    decode: (value) => String(value),
    encode: (text) => Number(text),
  }),
);

/** An integer, or a string holding one */
const IntField = Schema.Union(Schema.Int, Schema.compose(Schema.NumberFromString, Schema.Int));

const GenreField = Schema.Array(TextField);

const JsonObject = Schema.Record({ key: Schema.String, value: Schema.Unknown });

/** Fields read from `<series>/*.json`; each one is absent when missing, null or of the wrong type */
export interface SeriesMetadataFile {
  title?: string;
  author?: string;
  artist?: string;
  description?: string;
  genre?: readonly string[];
  status?: number;
}

const decodeObject = Schema.decodeUnknownEither(JsonObject);
const decodeText = Schema.decodeUnknownOption(TextField);
const decodeInt = Schema.decodeUnknownOption(IntField);
const decodeGenre = Schema.decodeUnknownOption(GenreField);

export function parseSeriesMetadata(text: string, filePath: string): SeriesMetadataFile {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new MetadataParseError(filePath, error);
  }

  const result = decodeObject(json);
  if (Either.isLeft(result)) {
    throw new MetadataParseError(filePath, ParseResult.TreeFormatter.formatErrorSync(result.left));
  }
  const fields = result.right;

  return {
    title: Option.getOrUndefined(decodeText(fields.title)),
    author: Option.getOrUndefined(decodeText(fields.author)),
    artist: Option.getOrUndefined(decodeText(fields.artist)),
    description: Option.getOrUndefined(decodeText(fields.description)),
    genre: Option.getOrUndefined(decodeGenre(fields.genre)),
    status: Option.getOrUndefined(decodeInt(fields.status)),
  };
}

/** Copies the fields the file sets; the others leave the series as it is. */
export function mergeSeriesMetadata(series: Series, meta: SeriesMetadataFile): Series {
  const merged: Series = { ...series };

  if (meta.title !== undefined) merged.title = meta.title;
  if (meta.author !== undefined) merged.author = meta.author;
  if (meta.artist !== undefined) merged.artist = meta.artist;
  if (meta.description !== undefined) merged.description = meta.description;
  if (meta.genre !== undefined) merged.genre = meta.genre.join(", ");
  if (meta.status !== undefined) merged.status = meta.status;

  return merged;
}

export function fillSeriesFromEpub(series: Series, meta: EpubPackageMetadata): Series {
  const filled: Series = { ...series };
  if (meta.creator) filled.author = meta.creator;
  if (meta.description) filled.description = meta.description;
  return filled;
}

export function fillChapterFromEpub(chapter: Chapter, meta: EpubPackageMetadata): Chapter {
  const filled: Chapter = { ...chapter };

  if (meta.title) filled.name = meta.title;

  const scanlator = meta.publisher ?? meta.creator;
  if (scanlator) filled.scanlator = scanlator;

  const date = meta.date ?? meta.modified;
  const timestamp = date ? Date.parse(date) : NaN;
  if (!isNaN(timestamp)) filled.dateUpload = timestamp;

  return filled;
}
