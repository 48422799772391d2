/**
 * Tool Loop — Conversation Turn Engine
 *
 * One turn, from user text to final answer:
 * 1. Send system prompt + history + user text (+ this turn's tool messages)
 * 2. Scan the reply for a `Using tool:` directive
 * 3. No directive → final answer
 * 4. Directive → bind arguments, run the tool, append the result, repeat
 * 5. Stop at the iteration limit, on a model failure, or on cancellation
 *
 * Every path ends in `final_answer_ready` or `failed`. Bad tool calls are
 * not failures: they go back to the model as failed tool results.
 */

import { createComponentLogger } from "../logging.js";
import {
  IterationLimitExceededError,
  isToolCallError,
  toConversationError,
  type ConversationError,
} from "../errors.js";
import { abortableCall, createTurnSignal } from "./abort.js";
import { parseToolCall } from "./parser.js";
import { resolveInvocation } from "./binder.js";
import { executeTool } from "./executor.js";
import type { LLMMessage } from "../llm/types.js";
import type { ToolResult } from "../tools/types.js";
import {
  isTerminal,
  toCallRecord,
  type TerminalTurnState,
  type ToolCallRecord,
  type TurnOptions,
  type TurnResult,
  type TurnState,
  type TurnStatus,
} from "./types.js";

const log = createComponentLogger("tool-loop");

export async function runConversationTurn(options: TurnOptions): Promise<TurnResult> {
  const { client, tools, formatter, maxIterations, conversationId } = options;
  const turnLog = log.child({ conversationId });
  const turnSignal = createTurnSignal(options.signal, options.timeoutMs);
  const signal = turnSignal.signal;

  const turnMessages: LLMMessage[] = [];
  const toolCalls: ToolCallRecord[] = [];
  const states: TurnStatus[] = [];
  const usage = { inputTokens: 0, outputTokens: 0 };
  /** Model text around directives, shown with the acknowledgment of a tool-only turn */
  const notes: string[] = [];
  let iterations = 0;
  let succeededCalls = 0;

  /** Append the directive and its result, then go back to the model. */
  const recordToolResult = (reply: string, result: ToolResult, record: ToolCallRecord): TurnState => {
    turnMessages.push({ role: "assistant", content: reply });
    turnMessages.push({ role: "tool", content: formatter.formatToolResult(result) });
    toolCalls.push(record);
    if (result.success) succeededCalls++;
    iterations++;
    return { status: "awaiting_model_reply" };
  };

  const finalize = (reply: string): TurnState => {
    if (!reply.trim() && succeededCalls > 0) {
      return { status: "final_answer_ready", answer: "", toolOnly: true };
    }
    return { status: "final_answer_ready", answer: reply, toolOnly: false };
  };

  const step = async (state: Exclude<TurnState, TerminalTurnState>): Promise<TurnState> => {
    switch (state.status) {
      case "awaiting_model_reply": {
        const messages: LLMMessage[] = [
          { role: "system", content: options.systemPrompt },
          ...options.history,
          { role: "user", content: options.userText },
          ...turnMessages,
        ];
        const response = await abortableCall(
          () => client.chat(messages, { model: options.model, temperature: options.temperature, signal }),
          signal,
        );
        usage.inputTokens += response.usage?.inputTokens ?? 0;
        usage.outputTokens += response.usage?.outputTokens ?? 0;

        const reply = response.content;
        turnLog.info(`Model reply (iteration ${iterations + 1})`, { contentLength: reply.length });

        if (tools.isEmpty) return finalize(reply);

        const parsed = parseToolCall(reply);
        if (parsed.kind === "directive") {
          turnLog.debug("Tool directive found", { directive: parsed.directiveText });
          const note = parsed.passthrough.trim();
          if (note) notes.push(note);
          return { status: "tool_call_detected", reply, request: parsed.request };
        }
        if (parsed.kind === "malformed") {
          turnLog.debug("Malformed directive, treating reply as plain text", {
            error: parsed.error.message,
            position: parsed.error.position,
          });
        }
        return finalize(reply);
      }

      case "tool_call_detected": {
        if (iterations >= maxIterations) {
          return { status: "failed", error: new IterationLimitExceededError(maxIterations) };
        }
        try {
          const { tool, args } = resolveInvocation(tools, state.request);
          return { status: "tool_executing", reply: state.reply, tool, args };
        } catch (err) {
          if (!isToolCallError(err)) throw err;
          turnLog.warn("Bad tool call, returning the error to the model", {
            tool: state.request.toolName,
            kind: err.kind,
            error: err.message,
          });
          const result: ToolResult = {
            toolName: state.request.toolName,
            success: false,
            error: err.message,
            errorKind: err.kind,
            durationMs: 0,
          };
          return recordToolResult(state.reply, result, toCallRecord(result));
        }
      }

      case "tool_executing": {
        const result = await executeTool(state.tool, state.args, { conversationId, signal });
        return recordToolResult(state.reply, result, toCallRecord(result, state.args));
      }
    }
  };

  const logFailure = (error: ConversationError): void => {
    if (error.kind === "unknown") {
      turnLog.error("Turn failed unexpectedly", error.cause ?? error, { iterations });
    } else {
      turnLog.warn("Turn failed", { kind: error.kind, error: error.message, iterations });
    }
  };

  const finish = (terminal: TerminalTurnState): TurnResult => {
    const base = { toolCalls, iterations, states, messages: turnMessages, usage };

    if (terminal.status === "final_answer_ready") {
      turnLog.info("Turn completed", { iterations, toolOnly: terminal.toolOnly });
      const text = terminal.toolOnly ? formatter.formatAcknowledgment(notes) : formatter.formatAnswer(terminal.answer);
      return {
        ...base,
        status: terminal.status,
        text,
        answer: terminal.toolOnly ? text : terminal.answer,
      };
    }

    logFailure(terminal.error);
    return {
      ...base,
      status: terminal.status,
      text: formatter.formatError(terminal.error.kind),
      errorKind: terminal.error.kind,
    };
  };

  let state: TurnState = { status: "awaiting_model_reply" };
  while (!isTerminal(state)) {
    states.push(state.status);
    try {
      state = await step(state);
    } catch (err) {
      state = { status: "failed", error: toConversationError(err) };
    }
  }
  turnSignal.dispose();
  states.push(state.status);

  return finish(state);
}
