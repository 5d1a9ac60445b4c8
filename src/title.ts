const LETTER_OR_DIGIT = /[\p{L}\p{Nd}]/u;
const WHITESPACE = /\s/u;
const LEADING_SEPARATORS = /^[ \-_,:]+/;

function isStructural(char: string): boolean {
  return !LETTER_OR_DIGIT.test(char) && !WHITESPACE.test(char);
}

function sameIgnoringCase(a: string, b: string): boolean {
  return a === b || a.toUpperCase() === b.toUpperCase() || a.toLowerCase() === b.toLowerCase();
}

/**
 * Removes the series title from the start of a chapter name, matching only on
 * letters, digits and whitespace: punctuation on either side is skipped.
 *
 * @example
 * stripSeriesTitle("My Series - Chapter 12", "My Series") // "Chapter 12"
 * stripSeriesTitle("Chapter 5", "Unrelated Title")        // "Chapter 5"
 *
 * The result may be empty when the name is nothing but the title.
 */
export function stripSeriesTitle(chapterName: string, seriesTitle: string): string {
  let chapterIndex = 0;
  let titleIndex = 0;

  while (chapterIndex < chapterName.length && titleIndex < seriesTitle.length) {
    const chapterChar = chapterName.charAt(chapterIndex);
    const titleChar = seriesTitle.charAt(titleIndex);

    if (sameIgnoringCase(chapterChar, titleChar)) {
      chapterIndex++;
      titleIndex++;
      continue;
    }

    const structuralChapterChar = isStructural(chapterChar);
    const structuralTitleChar = isStructural(titleChar);
    if (!structuralChapterChar && !structuralTitleChar) return chapterName;

    if (structuralChapterChar) chapterIndex++;
    if (structuralTitleChar) titleIndex++;
  }

  return chapterName.slice(chapterIndex).replace(LEADING_SEPARATORS, "");
}
