/**
 * CRLF and lone CR become LF, runs of three or more newlines collapse to
 * two, and the result is trimmed.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/** Window advance; never below 1 so overlap >= window still terminates. */
export function windowStep(windowSize: number, overlap: number): number {
  return Math.max(1, windowSize - overlap);
}
