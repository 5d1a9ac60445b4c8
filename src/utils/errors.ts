export class LibraryError extends Error {
  public readonly path: string;
  public readonly originalError?: unknown;

  constructor(message: string, path: string, originalError?: unknown) {
    super(message);
    this.name = "LibraryError";
    this.path = path;
    this.originalError = originalError;
  }
}

export class UnsupportedFormatError extends LibraryError {
  readonly _tag = "UnsupportedFormat";

  constructor(path: string) {
    super("Invalid chapter format", path);
    this.name = "UnsupportedFormatError";
  }
}

export class ChapterNotFoundError extends LibraryError {
  readonly _tag = "ChapterNotFound";

  constructor(chapterUrl: string) {
    super("Chapter not found", chapterUrl);
    this.name = "ChapterNotFoundError";
  }
}

/** Raised when a chapter cannot be mapped to a container. */
export type FormatError = UnsupportedFormatError | ChapterNotFoundError;

export class ContainerReadError extends LibraryError {
  constructor(path: string, operation: string, cause?: unknown) {
    super(`Archive ${operation} failed`, path, cause);
    this.name = "ContainerReadError";
  }
}

export class MetadataParseError extends LibraryError {
  constructor(path: string, cause?: unknown) {
    super("Failed to parse series metadata", path, cause);
    this.name = "MetadataParseError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
