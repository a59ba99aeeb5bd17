const SENTENCE_MARKS = /[.!?]/g;
const ORDINARY_CHAR = /[\p{L}\p{N}\s.,;:!?'"()\-]/u;

/**
 * Heuristic 0..1 score: a base for any content, a capped bonus for length
 * and for sentence punctuation per word, minus a penalty for the share of
 * unusual characters (extraction debris, binary residue).
 */
export function scoreQuality(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) return 0;

  const length = trimmed.length;
  const words = trimmed.split(/\s+/).length;
  const marks = trimmed.match(SENTENCE_MARKS)?.length ?? 0;

  let unusual = 0;
  for (const char of trimmed) {
    if (!ORDINARY_CHAR.test(char)) unusual++;
  }

  const lengthBonus = Math.min(0.4, (length / 5000) * 0.4);
  const punctuationBonus = Math.min(0.3, (marks / words) * 3);
  const penalty = Math.min(0.4, (unusual / length) * 2);

  const score = Math.max(0, Math.min(1, 0.2 + lengthBonus + punctuationBonus - penalty));
  return Math.round(score * 100) / 100;
}
