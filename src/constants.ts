export const LATEST_THRESHOLD_MS = 7 * 24 * 60 * 60 * 1000; // 7 days

export const COVER_NAME = "cover";
export const COVER_FILE = "cover.jpg";

export const SUPPORTED_ARCHIVE_EXTENSIONS = ["zip", "rar", "cbr", "cbz", "epub"];

export const IMAGE_HEADER_BYTES = 32;
