/**
 * Tool Executor
 *
 * Runs a bound tool and turns whatever happens into a ToolResult. A tool
 * that throws produces a failed result; only cancellation of the turn
 * escapes as an exception.
 */

import { createComponentLogger } from "../logging.js";
import { CancelledError, ToolExecutionError } from "../errors.js";
import { abortableCall, abortReason } from "./abort.js";
import type { BoundArguments, ToolContext, ToolDefinition, ToolResult } from "../tools/types.js";

const log = createComponentLogger("tool-loop.executor");

export async function executeTool(
  tool: ToolDefinition,
  args: BoundArguments,
  ctx: ToolContext,
): Promise<ToolResult> {
  const startTime = Date.now();
  const turnLog = log.child({ conversationId: ctx.conversationId });
  turnLog.info(`Executing tool: ${tool.name}`, { argKeys: Object.keys(args) });

  try {
    const value = await abortableCall(
      async () => tool.execute(args, ctx),
      ctx.signal,
    );
    const durationMs = Date.now() - startTime;
    turnLog.debug("Tool succeeded", { tool: tool.name, durationMs });
    return { toolName: tool.name, success: true, value, durationMs };
  } catch (err) {
    if (err instanceof CancelledError) throw err;
    if (ctx.signal?.aborted) throw abortReason(ctx.signal);

    const failure = new ToolExecutionError(
      tool.name,
      err instanceof Error ? err.message : String(err),
      { cause: err },
    );
    const durationMs = Date.now() - startTime;
    turnLog.warn("Tool handler failed", { tool: tool.name, durationMs, error: failure.message });
    return {
      toolName: tool.name,
      success: false,
      error: failure.message,
      errorKind: failure.kind,
      durationMs,
    };
  }
}
