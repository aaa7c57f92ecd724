/**
 * Normalized form of generated text used for repeat detection.
 * Case, punctuation, emoji and spacing differences all collapse to the same value.
 */
export function fingerprint(text: string): string {
  return String(text ?? '')
    .normalize('NFKC')
    .toLowerCase()
    // Variation selectors and zero-width joiners ride along with emoji.
    .replace(/[\uFE0E\uFE0F\u200D]/g, '')
    // Punctuation becomes a word break, so spacing around it doesn't matter.
    .replace(/[^\p{L}\p{M}\p{N}\s]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}
