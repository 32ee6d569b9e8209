export function countPattern(text: string, pattern: RegExp): number {
  return (text.match(pattern) ?? []).length;
}

/** Division that yields 0 for an empty denominator. */
export function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function extractWords(text: string): string[] {
  return text.match(/[\p{L}\p{N}_]+/gu) ?? [];
}
