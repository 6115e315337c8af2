export const DEFAULT_TRUNCATION_MARKER = "…";

/**
 * Length in code points, so an emoji or other astral character counts once.
 */
export function textLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Shorten text to at most maxChars characters (code points). The marker is
 * appended only when at least one character of the original text fits beside
 * it. Surrogate pairs are never split.
 */
export function truncateText(
  text: string,
  maxChars: number,
  marker: string = DEFAULT_TRUNCATION_MARKER,
): string {
  if (!(maxChars > 0)) {
    return "";
  }
  const limit = Math.floor(maxChars);
  // UTF-16 length is an upper bound on the code point count
  if (text.length <= limit) {
    return text;
  }
  const chars = Array.from(text);
  if (chars.length <= limit) {
    return text;
  }
  const markerLength = textLength(marker);
  if (limit >= markerLength + 1) {
    return chars.slice(0, limit - markerLength).join("") + marker;
  }
  return chars.slice(0, limit).join("");
}
