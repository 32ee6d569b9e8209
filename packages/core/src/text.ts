export const MAX_POST_LENGTH = 280;

const ELLIPSIS = "...";

/**
 * Cut text longer than the platform limit to 277 characters plus "...".
 * Length is counted in code points so emoji are never split.
 */
export function truncatePost(text: string, limit = MAX_POST_LENGTH): string {
  const chars = [...text];
  if (chars.length <= limit) return text;
  return chars.slice(0, limit - ELLIPSIS.length).join("") + ELLIPSIS;
}
