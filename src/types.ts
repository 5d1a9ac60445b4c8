/** Publication status codes, as stored in series metadata files */
export const SeriesStatus = {
  Unknown: 0,
  Ongoing: 1,
  Completed: 2,
  Licensed: 3,
  PublishingFinished: 4,
  Cancelled: 5,
  OnHiatus: 6,
} as const;

export type SeriesStatus = (typeof SeriesStatus)[keyof typeof SeriesStatus];

/** One publication, backed by a directory named `url` under a storage root */
export interface Series {
  /** Directory name; unique key within a listing */
  url: string;
  title: string;
  author?: string;
  artist?: string;
  description?: string;
  /** Comma-separated genre list */
  genre?: string;
  /** Usually a SeriesStatus code; metadata files may carry any integer */
  status: number;
  /** Absolute path of the cover image */
  thumbnailUrl?: string;
}

/** One installment, backed by a directory or an archive file */
export interface Chapter {
  /** `<series>/<entry name>` */
  url: string;
  name: string;
  /** -1 when no number could be recognized */
  chapterNumber: number;
  /** Epoch milliseconds */
  dateUpload: number;
  scanlator?: string;
}

export interface SortOrder {
  /** 0 sorts by name, 1 by last-modified time */
  index: 0 | 1;
  ascending: boolean;
}

export const POPULAR_ORDER: SortOrder = { index: 0, ascending: true };
export const LATEST_ORDER: SortOrder = { index: 1, ascending: false };

export function createSeries(url: string): Series {
  return { url, title: url, status: SeriesStatus.Unknown };
}
