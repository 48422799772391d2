/**
 * Tool Loop — Public API
 */

export { runConversationTurn } from "./loop.js";
export { parseToolCall, DIRECTIVE_KEYWORD } from "./parser.js";
export { bindArguments, resolveInvocation, splitTopLevel, unquote } from "./binder.js";
export { executeTool } from "./executor.js";
export { abortableCall, abortReason, createTurnSignal } from "./abort.js";
export { isTerminal } from "./types.js";
export type { ParseOutcome } from "./parser.js";
export type { TurnSignal } from "./abort.js";
export type {
  TurnState,
  TurnStatus,
  TerminalTurnState,
  TurnOptions,
  TurnResult,
  ToolCallRecord,
} from "./types.js";
