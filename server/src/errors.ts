/**
 * Conversation Error Taxonomy
 *
 * Every failure the conversation loop can meet has a class and a `kind`.
 * The kind picks the user-facing template; the message is for logs only.
 *
 * - connection / auth / model: the model server could not give us a reply
 * - parse: malformed directive (recovered by the parser, never terminal)
 * - unknown_tool / unknown_parameter / missing_parameter / type_mismatch /
 *   invalid_arguments / tool_execution: bad tool calls, fed back to the model
 * - iteration_limit / cancelled / unknown: terminal turn failures
 * - template: broken prompt configuration, aborts start-up
 */

export const ERROR_KINDS = [
  "connection",
  "auth",
  "model",
  "parse",
  "unknown_tool",
  "unknown_parameter",
  "missing_parameter",
  "type_mismatch",
  "invalid_arguments",
  "tool_execution",
  "iteration_limit",
  "cancelled",
  "template",
  "unknown",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KINDS.some(kind => kind === value);
}

export class ConversationError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

// ============================================
// MODEL SERVER
// ============================================

export class ConnectionError extends ConversationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("connection", message, options);
  }
}

export class AuthError extends ConversationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("auth", message, options);
  }
}

export class ModelError extends ConversationError {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super("model", message, options);
  }
}

// ============================================
// DIRECTIVE + ARGUMENTS
// ============================================

export class ParseError extends ConversationError {
  constructor(message: string, readonly position: number) {
    super("parse", message);
  }
}

export class UnknownToolError extends ConversationError {
  constructor(readonly toolName: string) {
    super("unknown_tool", `Unknown tool "${toolName}"`);
  }
}

export class UnknownParameterError extends ConversationError {
  constructor(readonly toolName: string, readonly parameter: string) {
    super("unknown_parameter", `Tool "${toolName}" has no parameter "${parameter}"`);
  }
}

export class MissingParameterError extends ConversationError {
  constructor(readonly toolName: string, readonly parameter: string) {
    super("missing_parameter", `Tool "${toolName}" requires parameter "${parameter}"`);
  }
}

export class TypeMismatchError extends ConversationError {
  constructor(
    readonly toolName: string,
    readonly parameter: string,
    readonly expected: string,
    readonly received: string
  ) {
    super(
      "type_mismatch",
      `Parameter "${parameter}" of tool "${toolName}" expects ${expected}, got "${received}"`
    );
  }
}

export class InvalidArgumentsError extends ConversationError {
  constructor(readonly toolName: string, detail: string) {
    super("invalid_arguments", `Invalid arguments for tool "${toolName}": ${detail}`);
  }
}

export class ToolExecutionError extends ConversationError {
  constructor(readonly toolName: string, message: string, options?: { cause?: unknown }) {
    super("tool_execution", message, options);
  }
}

// ============================================
// TURN-LEVEL
// ============================================

export class IterationLimitExceededError extends ConversationError {
  constructor(readonly limit: number) {
    super("iteration_limit", `Tool call limit of ${limit} reached for this turn`);
  }
}

export class CancelledError extends ConversationError {
  constructor(message = "Turn cancelled") {
    super("cancelled", message);
  }
}

export class TemplateError extends ConversationError {
  constructor(message: string, readonly key?: string, options?: { cause?: unknown }) {
    super("template", message, options);
  }
}

// ============================================
// CLASSIFICATION
// ============================================

const TOOL_CALL_KINDS = new Set<ErrorKind>([
  "unknown_tool",
  "unknown_parameter",
  "missing_parameter",
  "type_mismatch",
  "invalid_arguments",
  "tool_execution",
]);

/** Bad tool calls: recovered by feeding a failed tool result back to the model. */
export function isToolCallError(error: unknown): error is ConversationError {
  return error instanceof ConversationError && TOOL_CALL_KINDS.has(error.kind);
}

/** Classify any throwable; anything not already typed becomes kind "unknown". */
export function toConversationError(error: unknown): ConversationError {
  if (error instanceof ConversationError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ConversationError("unknown", message, { cause: error });
}
