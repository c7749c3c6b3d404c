/**
 * Per-chat ordering boundary.
 *
 * Every mutation of a chat (event append, undo, rule change) runs through
 * `runExclusive(chatId, fn)`. Calls for the same chat run one after another in
 * arrival order; different chats never wait on each other.
 */
export class ChatLock {
  private readonly chains = new Map<string, Promise<void>>();

  async runExclusive<T>(chatId: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.chains.get(chatId) ?? Promise.resolve();

    let release: () => void = () => {};
    const next = new Promise<void>((r) => {
      release = r;
    });
    const chain = prev.then(() => next);
    this.chains.set(chatId, chain);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      queueMicrotask(() => {
        if (this.chains.get(chatId) === chain) this.chains.delete(chatId);
      });
    }
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.chains.values()]);
  }
}
