const CHUNK_PATTERN = /(\d+)/;

function compareDigits(a: string, b: string): number {
  const x = a.replace(/^0+(?=\d)/, "");
  const y = b.replace(/^0+(?=\d)/, "");
  if (x.length !== y.length) return x.length - y.length;
  if (x < y) return -1;
  if (x > y) return 1;
  return 0;
}

function comparePlain(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Case-insensitive comparison where runs of digits compare by value:
 * "page2" < "Page10". Falls back to exact comparison, so distinct strings
 * never compare equal.
 */
export function compareNatural(a: string, b: string): number {
  const left = a.toLowerCase().split(CHUNK_PATTERN);
  const right = b.toLowerCase().split(CHUNK_PATTERN);
  const length = Math.min(left.length, right.length);

  // split() with a capture group alternates text and digit chunks, digits at odd indexes
  for (let i = 0; i < length; i++) {
    const x = left[i] ?? "";
    const y = right[i] ?? "";
    const result = i % 2 === 1 ? compareDigits(x, y) : comparePlain(x, y);
    if (result !== 0) return result;
  }

  if (left.length !== right.length) return left.length - right.length;
  return comparePlain(a, b);
}
