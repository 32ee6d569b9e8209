/**
 * Missing credentials or an unreadable settings file. Fatal at startup.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly missing: string[] = []
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A call to the language model or the social platform failed.
 */
export class ProviderError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ProviderError";
  }
}

/**
 * A model response could not be read as the JSON we asked for.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    readonly raw: string
  ) {
    super(message);
    this.name = "ParseError";
  }
}

/**
 * Text that cannot be sent as-is (e.g. an empty post).
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
