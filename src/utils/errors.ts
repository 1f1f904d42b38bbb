// Typed errors raised by the workflow core

/**
 * Base class carrying a machine-readable code alongside the message.
 */
export class DeskflowError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** createSession was called for a key the registry already holds. */
export class SessionExistsError extends DeskflowError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super("SESSION_EXISTS", `Session ${sessionId} already exists`);
    this.sessionId = sessionId;
  }
}

/** A chain of publish-from-handler calls nested deeper than allowed. */
export class PublishDepthExceededError extends DeskflowError {
  readonly eventType: string;
  readonly maxDepth: number;

  constructor(eventType: string, maxDepth: number) {
    super("PUBLISH_DEPTH_EXCEEDED", `Publish of '${eventType}' exceeds max nesting depth ${maxDepth}`);
    this.eventType = eventType;
    this.maxDepth = maxDepth;
  }
}

export class ConfigError extends DeskflowError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super("CONFIG_INVALID", `Invalid configuration in ${source}: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** JSON-RPC params that failed validation; mapped to -32602. */
export class InvalidParamsError extends DeskflowError {
  readonly issues: string[];

  constructor(method: string, issues: string[]) {
    super("INVALID_PARAMS", `Invalid params for ${method}: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
