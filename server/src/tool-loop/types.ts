/**
 * Tool Loop — Shared Types
 *
 * The turn state machine and what a finished turn reports back.
 */

import type { ConversationError, ErrorKind } from "../errors.js";
import type { ILLMClient, LLMMessage } from "../llm/types.js";
import type { ResponseFormatter } from "../conversation/formatter.js";
import type { ToolSnapshot } from "../tools/registry.js";
import type {
  BoundArguments,
  ToolDefinition,
  ToolInvocationRequest,
  ToolResult,
} from "../tools/types.js";

// ============================================
// TURN STATE
// ============================================

export type TurnState =
  | { status: "awaiting_model_reply" }
  | { status: "tool_call_detected"; reply: string; request: ToolInvocationRequest }
  | { status: "tool_executing"; reply: string; tool: ToolDefinition; args: BoundArguments }
  | { status: "final_answer_ready"; answer: string; toolOnly: boolean }
  | { status: "failed"; error: ConversationError };

export type TurnStatus = TurnState["status"];

export type TerminalTurnState = Extract<TurnState, { status: "final_answer_ready" | "failed" }>;

export function isTerminal(state: TurnState): state is TerminalTurnState {
  return state.status === "final_answer_ready" || state.status === "failed";
}

// ============================================
// OPTIONS + RESULT
// ============================================

export interface TurnOptions {
  client: ILLMClient;
  /** Per-call model override */
  model?: string;
  temperature?: number;

  /** Rendered for the snapshot below */
  systemPrompt: string;
  /** Committed messages from earlier turns, oldest first */
  history: LLMMessage[];
  userText: string;

  /** The registry snapshot held for the whole turn */
  tools: ToolSnapshot;
  formatter: ResponseFormatter;

  /** Tool calls allowed in this turn */
  maxIterations: number;
  conversationId: string;

  // ── Cancellation ──
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ToolCallRecord {
  toolName: string;
  args?: BoundArguments;
  success: boolean;
  errorKind?: ErrorKind;
  error?: string;
  durationMs: number;
}

export interface TurnResult {
  status: TerminalTurnState["status"];
  /** What the user sees */
  text: string;
  /** The model's answer before prefix/suffix, when the turn succeeded */
  answer?: string;
  errorKind?: ErrorKind;
  toolCalls: ToolCallRecord[];
  /** Tool calls attempted, successful or not */
  iterations: number;
  /** Every state the turn passed through, in order */
  states: TurnStatus[];
  /** Directive and tool-result messages produced during the turn */
  messages: LLMMessage[];
  usage: { inputTokens: number; outputTokens: number };
}

export function toCallRecord(result: ToolResult, args?: BoundArguments): ToolCallRecord {
  if (result.success) {
    return { toolName: result.toolName, args, success: true, durationMs: result.durationMs };
  }
  return {
    toolName: result.toolName,
    args,
    success: false,
    errorKind: result.errorKind,
    error: result.error,
    durationMs: result.durationMs,
  };
}
