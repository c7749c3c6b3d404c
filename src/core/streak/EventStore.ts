import type { ChatHeader, ChatState, StreakEvent } from './types.js';

/** Everything persisted for one chat */
export interface StoredChat {
  header: ChatHeader;
  /** Ordered by id */
  events: StreakEvent[];
  /** Projection written with the last commit (null when nothing was committed yet) */
  projection: ChatState | null;
}

/**
 * Durable per-chat append-only log.
 *
 * `commit` stores an event together with the projection that results from it;
 * both are visible afterwards or neither is.
 */
export interface EventStore {
  load(chatId: string): Promise<StoredChat | null>;
  open(header: ChatHeader): Promise<void>;
  commit(chatId: string, event: StreakEvent, projection: ChatState): Promise<void>;
}

/**
 * In-process store. Keeps deep copies so callers can never mutate what was
 * committed.
 */
export class InMemoryEventStore implements EventStore {
  private chats = new Map<string, StoredChat>();

  async load(chatId: string): Promise<StoredChat | null> {
    const stored = this.chats.get(chatId);
    return stored ? structuredClone(stored) : null;
  }

  async open(header: ChatHeader): Promise<void> {
    if (this.chats.has(header.chatId)) return;
    this.chats.set(header.chatId, { header: { ...header }, events: [], projection: null });
  }

  async commit(chatId: string, event: StreakEvent, projection: ChatState): Promise<void> {
    const stored = this.chats.get(chatId);
    if (!stored) throw new Error(`Chat ${chatId} was never opened`);
    const last = stored.events[stored.events.length - 1];
    if (last && event.id <= last.id) {
      throw new Error(`Event id ${event.id} is not after ${last.id} in chat ${chatId}`);
    }
    stored.events.push(structuredClone(event));
    stored.projection = structuredClone(projection);
  }
}
