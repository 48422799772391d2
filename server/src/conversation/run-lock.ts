// RunLock: per-conversation lock so turns on one conversation run one at a time

export class RunLock {
  private tails = new Map<string, Promise<void>>();
  private holders = new Map<string, number>();

  /**
   * Acquire the lock for a conversation. Resolves, in arrival order, once
   * every earlier holder has released. Returns the release function.
   */
  async acquire(conversationId: string): Promise<() => void> {
    const previous = this.tails.get(conversationId) ?? Promise.resolve();

    let resolveCurrent: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      resolveCurrent = resolve;
    });

    this.tails.set(conversationId, previous.then(() => current));
    this.holders.set(conversationId, (this.holders.get(conversationId) ?? 0) + 1);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      resolveCurrent();

      const remaining = (this.holders.get(conversationId) ?? 1) - 1;
      if (remaining === 0) {
        this.holders.delete(conversationId);
        this.tails.delete(conversationId);
      } else {
        this.holders.set(conversationId, remaining);
      }
    };
  }

  /** Return all conversation IDs that currently have a running or waiting turn. */
  get activeConversationIds(): string[] {
    return [...this.holders.keys()];
  }
}
