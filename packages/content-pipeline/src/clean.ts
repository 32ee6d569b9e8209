import { truncatePost } from "@echopost/core";

// Longest first so "here is the tweet:" wins over "tweet:".
const LABEL_PREFIXES = [
  "here is the tweet:",
  "here's the tweet:",
  "response:",
  "reply:",
  "tweet:",
];

function stripQuotes(text: string): string {
  return text.replace(/^["']+|["']+$/g, "").trim();
}

/**
 * Turn raw model output into postable text: drop wrapping quotes and a
 * leading label, then fit the platform limit.
 */
export function cleanTweet(text: string): string {
  let cleaned = stripQuotes(text.trim());

  const lower = cleaned.toLowerCase();
  const prefix = LABEL_PREFIXES.find((p) => lower.startsWith(p));
  if (prefix) {
    cleaned = stripQuotes(cleaned.slice(prefix.length).trim());
  }

  return truncatePost(cleaned);
}
