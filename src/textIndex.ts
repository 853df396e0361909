/**
 * Code-point indexing helpers
 *
 * Offsets throughout the service count Unicode code points (what the
 * recognizer reports), while JavaScript strings index UTF-16 code units.
 * Every slice of user text goes through these helpers so an emoji or an
 * astral-plane character counts as one position.
 */

export function toCodePoints(text: string): string[] {
  return Array.from(text);
}

export function codePointLength(text: string): number {
  let length = 0;
  for (const _char of text) {
    length++;
  }
  return length;
}

export function sliceCodePoints(codePoints: readonly string[], start: number, end?: number): string {
  return codePoints.slice(start, end).join("");
}

/** First `limit` code points, with "..." appended when the text was cut */
export function previewText(text: string, limit: number): string {
  const codePoints = toCodePoints(text);
  if (codePoints.length <= limit) return text;
  return `${sliceCodePoints(codePoints, 0, limit)}...`;
}
