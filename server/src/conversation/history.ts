/**
 * Conversation History
 *
 * The committed messages of one conversation. Grows by whole turns and is
 * pruned from the front, always restarting at a user message so the model
 * never sees a tool result without the call that produced it.
 */

import type { LLMMessage } from "../llm/types.js";

export class ConversationHistory {
  private messages: LLMMessage[] = [];
  /** Index where the newest committed turn begins */
  private lastTurnStart = 0;

  /** Rebuild a history from stored messages. */
  static from(messages: LLMMessage[]): ConversationHistory {
    const history = new ConversationHistory();
    history.messages = messages.map(m => ({ ...m }));
    const lastUser = history.messages.map(m => m.role).lastIndexOf("user");
    history.lastTurnStart = Math.max(lastUser, 0);
    return history;
  }

  get length(): number {
    return this.messages.length;
  }

  /** Copy of the messages, oldest first. */
  snapshot(): LLMMessage[] {
    return this.messages.map(m => ({ ...m }));
  }

  /** Commit one finished turn. */
  commitTurn(messages: LLMMessage[]): void {
    this.lastTurnStart = this.messages.length;
    this.messages.push(...messages.map(m => ({ ...m })));
  }

  /**
   * When longer than `maxMessages`, drop the oldest messages down to at most
   * `target`. The newest turn is always kept whole, even when it alone is
   * longer than `target`. Returns how many were dropped.
   */
  prune(maxMessages: number, target: number): number {
    if (this.messages.length <= maxMessages) return 0;

    let start = Math.min(this.messages.length - target, this.lastTurnStart);
    while (start < this.lastTurnStart && this.messages[start].role !== "user") start++;

    this.messages = this.messages.slice(start);
    this.lastTurnStart -= start;
    return start;
  }
}
