import {
  ValidationError,
  createChildLogger,
  fail,
  ok,
  truncatePost,
  type Result,
} from "@echopost/core";

const logger = createChildLogger({ module: "publishing:text" });

/**
 * Make text sendable: reject empty text, truncate anything over the limit.
 */
export function prepareText(text: string): Result<string, ValidationError> {
  const trimmed = text.trim();
  if (!trimmed) {
    return fail(new ValidationError("Post text is empty"));
  }

  const prepared = truncatePost(trimmed);
  if (prepared !== trimmed) {
    logger.warn({ length: [...trimmed].length }, "Post text too long, truncated");
  }
  return ok(prepared);
}
