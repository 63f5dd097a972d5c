/**
 * Error classes raised while formatting. Every failure is terminal for the
 * current render; callers tell them apart with `instanceof`.
 */

/** A code formatter rejected or failed to process fenced code. */
export class FormatError extends Error {
  override readonly name = "FormatError";

  constructor(
    message: string,
    readonly details: {
      readonly language?: string;
      readonly command?: readonly string[];
      readonly exitCode?: number;
      readonly stderr?: string;
    } = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A broken internal precondition (programmer error, never recoverable). */
export class InvariantViolation extends Error {
  override readonly name = "InvariantViolation";
}

/** Invalid configuration file or option value. */
export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(message: string, readonly source?: string) {
    super(message);
  }
}
