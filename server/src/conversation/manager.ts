/**
 * Conversation Manager
 *
 * Owns the per-conversation state around the turn engine:
 * - one turn at a time per conversation (RunLock), later inputs wait
 * - at most `maxConcurrentRequests` turns in flight across conversations
 * - history committed only for turns that reached a final answer
 * - pruning, reset, and statistics for diagnostics
 */

import { nanoid } from "nanoid";
import { createComponentLogger } from "../logging.js";
import { runConversationTurn, type ToolCallRecord, type TurnStatus } from "../tool-loop/index.js";
import { RunLock } from "./run-lock.js";
import { ConcurrencyLimiter } from "./limiter.js";
import { ConversationHistory } from "./history.js";
import type { ErrorKind } from "../errors.js";
import type { ILLMClient, LLMMessage } from "../llm/types.js";
import type { PromptBuilder } from "../prompts/builder.js";
import type { ResponseFormatter } from "./formatter.js";
import type { StoredHistories } from "./store.js";
import type { ToolRegistry } from "../tools/registry.js";

const log = createComponentLogger("conversation");

export interface ConversationManagerOptions {
  client: ILLMClient;
  registry: ToolRegistry;
  builder: PromptBuilder;
  formatter: ResponseFormatter;
  model?: string;
  temperature?: number;
  /** Default system prompt override for every conversation */
  systemPrompt?: string;
  maxToolIterations: number;
  maxConcurrentRequests: number;
  history: {
    maxMessages: number;
    pruneTarget: number;
  };
}

export interface ConversationInput {
  text: string;
  /** Omit to start a new conversation */
  conversationId?: string;
  /** Per-call system prompt override, wins over the configured one */
  systemPrompt?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ConversationReply {
  conversationId: string;
  text: string;
  error: boolean;
  errorKind?: ErrorKind;
  toolCalls: ToolCallRecord[];
  iterations: number;
  states: TurnStatus[];
  durationMs: number;
}

export interface ConversationStats {
  turns: number;
  succeeded: number;
  failed: number;
  toolCalls: number;
  failedToolCalls: number;
  failuresByKind: Partial<Record<ErrorKind, number>>;
  averageDurationMs: number;
}

export interface ConversationDiagnostics {
  model?: string;
  conversations: number;
  historyMessages: number;
  runningConversations: string[];
  activeTurns: number;
  queuedTurns: number;
  tools: number;
  registryVersion: number;
  stats: ConversationStats;
}

export class ConversationManager {
  private conversations = new Map<string, ConversationHistory>();
  private runLock = new RunLock();
  private limiter: ConcurrencyLimiter;
  private totalDurationMs = 0;
  private stats: Omit<ConversationStats, "averageDurationMs"> = {
    turns: 0,
    succeeded: 0,
    failed: 0,
    toolCalls: 0,
    failedToolCalls: 0,
    failuresByKind: {},
  };

  constructor(private readonly options: ConversationManagerOptions) {
    this.limiter = new ConcurrencyLimiter(options.maxConcurrentRequests);
  }

  /** Run one turn. Never rejects for turn-level failures; they come back in the reply. */
  async process(input: ConversationInput): Promise<ConversationReply> {
    const conversationId = input.conversationId || nanoid();

    const releaseConversation = await this.runLock.acquire(conversationId);
    try {
      const releaseSlot = await this.limiter.acquire();
      try {
        return await this.runTurn(conversationId, input);
      } finally {
        releaseSlot();
      }
    } finally {
      releaseConversation();
    }
  }

  private async runTurn(conversationId: string, input: ConversationInput): Promise<ConversationReply> {
    const startTime = Date.now();
    const existing = this.conversations.get(conversationId);
    const tools = this.options.registry.snapshot();
    const systemPrompt = this.options.builder.build(tools, input.systemPrompt ?? this.options.systemPrompt);

    const result = await runConversationTurn({
      client: this.options.client,
      model: this.options.model,
      temperature: this.options.temperature,
      systemPrompt,
      history: existing?.snapshot() ?? [],
      userText: input.text,
      tools,
      formatter: this.options.formatter,
      maxIterations: this.options.maxToolIterations,
      conversationId,
      signal: input.signal,
      timeoutMs: input.timeoutMs,
    });

    if (result.status === "final_answer_ready") {
      const history = existing ?? this.create(conversationId);
      history.commitTurn([
        { role: "user", content: input.text },
        ...result.messages,
        { role: "assistant", content: result.answer ?? result.text },
      ]);
      const dropped = history.prune(this.options.history.maxMessages, this.options.history.pruneTarget);
      if (dropped > 0) {
        log.debug("Pruned conversation history", { conversationId, dropped, remaining: history.length });
      }
    }

    const durationMs = Date.now() - startTime;
    this.record(result.errorKind, result.toolCalls, durationMs);

    return {
      conversationId,
      text: result.text,
      error: result.status === "failed",
      errorKind: result.errorKind,
      toolCalls: result.toolCalls,
      iterations: result.iterations,
      states: result.states,
      durationMs,
    };
  }

  /** Called on the first committed turn, so failed turns leave nothing behind. */
  private create(conversationId: string): ConversationHistory {
    const history = new ConversationHistory();
    this.conversations.set(conversationId, history);
    log.info("Conversation started", { conversationId });
    return history;
  }

  private record(errorKind: ErrorKind | undefined, toolCalls: ToolCallRecord[], durationMs: number): void {
    this.stats.turns++;
    this.totalDurationMs += durationMs;
    this.stats.toolCalls += toolCalls.length;
    this.stats.failedToolCalls += toolCalls.filter(c => !c.success).length;
    if (errorKind) {
      this.stats.failed++;
      this.stats.failuresByKind[errorKind] = (this.stats.failuresByKind[errorKind] ?? 0) + 1;
    } else {
      this.stats.succeeded++;
    }
  }

  /** The committed history of a conversation, or undefined if unknown. */
  getHistory(conversationId: string): LLMMessage[] | undefined {
    return this.conversations.get(conversationId)?.snapshot();
  }

  /** Forget a conversation. Returns false when it did not exist. */
  reset(conversationId: string): boolean {
    const existed = this.conversations.delete(conversationId);
    if (existed) log.info("Conversation reset", { conversationId });
    return existed;
  }

  /** Every conversation's committed history, for the history store. */
  exportHistories(): StoredHistories {
    const histories: StoredHistories = {};
    for (const [conversationId, history] of this.conversations) {
      histories[conversationId] = history.snapshot();
    }
    return histories;
  }

  /** Load stored histories; stored conversations replace live ones with the same id. */
  restoreHistories(histories: StoredHistories): number {
    let restored = 0;
    for (const [conversationId, messages] of Object.entries(histories)) {
      if (messages.length === 0) continue;
      const history = ConversationHistory.from(messages);
      history.prune(this.options.history.maxMessages, this.options.history.pruneTarget);
      this.conversations.set(conversationId, history);
      restored++;
    }
    return restored;
  }

  getStats(): ConversationStats {
    return {
      ...this.stats,
      failuresByKind: { ...this.stats.failuresByKind },
      averageDurationMs: this.stats.turns === 0 ? 0 : Math.round(this.totalDurationMs / this.stats.turns),
    };
  }

  getDiagnostics(): ConversationDiagnostics {
    const tools = this.options.registry.snapshot();
    let historyMessages = 0;
    for (const history of this.conversations.values()) historyMessages += history.length;

    return {
      model: this.options.model,
      conversations: this.conversations.size,
      historyMessages,
      runningConversations: this.runLock.activeConversationIds,
      activeTurns: this.limiter.activeCount,
      queuedTurns: this.limiter.queuedCount,
      tools: tools.size,
      registryVersion: tools.version,
      stats: this.getStats(),
    };
  }
}
