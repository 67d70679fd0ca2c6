const MAX_SENTENCES = 3;

/**
 * Sentences of `content` mentioning any keyword (case-insensitive), at most
 * three, in their original order. Returns `content` untouched when nothing
 * matches.
 */
export function extractRelevantSentences(
  content: string,
  keywords: readonly string[],
): string {
  const needles = keywords.map((k) => k.toLowerCase());
  const relevant = content
    .split('.')
    .map((sentence) => sentence.trim())
    .filter((sentence) => {
      const lower = sentence.toLowerCase();
      return needles.some((needle) => lower.includes(needle));
    });

  if (relevant.length === 0) return content;
  return `${relevant.slice(0, MAX_SENTENCES).join('. ')}.`;
}
