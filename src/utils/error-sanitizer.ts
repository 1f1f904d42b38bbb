// Scrub error messages before they leave the process

export interface SanitizedError {
  code: string;
  message: string;
}

/**
 * Error messages end up in agent-error payloads that reach operator
 * dashboards, and in JSON-RPC replies. Strip anything that identifies the
 * host or the customer.
 *
 * @example
 * ErrorSanitizer.sanitize(new Error("Failed at /srv/app/src/classifier.ts for jo@example.com"));
 * // { code: 'UNKNOWN', message: 'Failed at [path]classifier.ts for [email]' }
 */
export class ErrorSanitizer {
  private static readonly PATTERNS: ReadonlyArray<[RegExp, string]> = [
    [/\s+at .*\(.*:\d+:\d+\)/g, ""], // stack frames
    [/\/[a-zA-Z0-9_\-/.]+\//g, "[path]"], // Unix directories
    [/[a-zA-Z]:\\[a-zA-Z0-9_\-\\.]+\\/g, "[path]"], // Windows directories
    [/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, "[email]"],
  ];

  static sanitize(error: unknown): SanitizedError {
    const code = hasCode(error) ? error.code : "UNKNOWN";
    const message = error instanceof Error ? error.message : String(error);

    let sanitized = message;
    for (const [pattern, replacement] of this.PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }

    return { code, message: sanitized };
  }

  /** Sanitized message only. */
  static message(error: unknown): string {
    return this.sanitize(error).message;
  }
}

function hasCode(error: unknown): error is { code: string } {
  return typeof error === "object" && error !== null && "code" in error && typeof error.code === "string";
}
