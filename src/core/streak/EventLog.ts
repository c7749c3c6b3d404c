import type { ChatLock } from '../concurrency/ChatLock.js';
import { ConsistencyFault, NotUndoableError, UnknownEventError, ValidationError } from '../errors.js';
import type { Logger } from '../../infra/logger/logger.js';
import type { EventStore } from './EventStore.js';
import { applyEvent, collectNullified, diffStates, emptyState, foldEvents } from './fold.js';
import {
  isResetEvent,
  type Actor,
  type ChatHeader,
  type ChatState,
  type ManualResetDetails,
  type ManualResetEvent,
  type ResetEvent,
  type StreakEvent,
  type TriggerDetails,
  type TriggerEvent,
  type UndoEvent,
} from './types.js';

export const MIN_UNDO = 1;
export const MAX_UNDO = 10;

/** In-memory arena for one chat. Replaced wholesale after every commit. */
interface ChatLogState {
  readonly header: ChatHeader;
  readonly events: readonly StreakEvent[];
  readonly nullified: ReadonlySet<number>;
  readonly projection: ChatState;
}

export type TriggerInput = { kind: 'TRIGGER'; details: TriggerDetails };
export type ManualResetInput = { kind: 'MANUAL_RESET'; details: ManualResetDetails };
export type AppendInput = TriggerInput | ManualResetInput;

export interface HistoryEntry {
  event: StreakEvent;
  nullified: boolean;
}

export interface UndoOutcome {
  /** Events nullified by this call, newest first */
  undone: ResetEvent[];
  count: number;
  requested: number;
  /** The UNDO event recorded, absent when nothing was eligible */
  undoEvent?: UndoEvent;
  state: ChatState;
}

export interface EventLogOptions {
  now?: () => number;
  /** Re-fold on every getState and compare with the cache */
  verifyOnRead?: boolean;
  onFault?: (fault: ConsistencyFault) => void;
}

/**
 * Append-only per-chat event history with a cached projection.
 *
 * Writes go through the shared ChatLock; reads are served from the cached
 * projection. Undo never edits events: it appends an UNDO event naming the
 * events it nullifies, then re-folds the whole history.
 */
export class EventLog {
  private chats = new Map<string, ChatLogState>();
  private loading = new Map<string, Promise<ChatLogState | null>>();
  private readonly now: () => number;
  private readonly verifyOnRead: boolean;
  private readonly onFault?: (fault: ConsistencyFault) => void;

  constructor(
    private store: EventStore,
    private lock: ChatLock,
    private logger: Logger,
    options: EventLogOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.verifyOnRead = options.verifyOnRead ?? false;
    this.onFault = options.onFault;
  }

  /**
   * Record that a chat has been seen; its first streak starts now.
   * No-op for chats that already have a log.
   */
  async open(chatId: string): Promise<ChatState> {
    return this.lock.runExclusive(chatId, async () => (await this.ensureOpen(chatId)).projection);
  }

  appendEvent(chatId: string, actor: Actor, input: TriggerInput, messageRef?: string): Promise<TriggerEvent>;
  appendEvent(
    chatId: string,
    actor: Actor,
    input: ManualResetInput,
    messageRef?: string,
  ): Promise<ManualResetEvent>;
  async appendEvent(
    chatId: string,
    actor: Actor,
    input: AppendInput,
    messageRef?: string,
  ): Promise<ResetEvent> {
    return this.lock.runExclusive(chatId, async () => {
      const current = await this.ensureOpen(chatId);
      const base = {
        id: this.nextId(current),
        chatId,
        actor,
        timestamp: this.nextTimestamp(current),
        snapshotBefore: current.projection,
        ...(messageRef !== undefined ? { messageRef } : {}),
      };
      const event: ResetEvent =
        input.kind === 'TRIGGER'
          ? { ...base, kind: 'TRIGGER', details: input.details }
          : { ...base, kind: 'MANUAL_RESET', details: input.details };
      const projection = applyEvent(current.projection, event);

      await this.store.commit(chatId, event, projection);
      this.chats.set(chatId, {
        header: current.header,
        events: [...current.events, event],
        nullified: current.nullified,
        projection,
      });

      this.logger.debug('event-log', `Appended #${event.id} ${event.kind} in ${chatId}`);
      return event;
    });
  }

  /**
   * Nullify up to `count` of the most recent TRIGGER / MANUAL_RESET events.
   */
  async undo(chatId: string, count: number, actor: Actor): Promise<UndoOutcome> {
    if (!Number.isInteger(count) || count < MIN_UNDO || count > MAX_UNDO) {
      throw new ValidationError(`Undo count must be an integer between ${MIN_UNDO} and ${MAX_UNDO}`);
    }

    return this.lock.runExclusive(chatId, async () => {
      const current = await this.loadChat(chatId);
      if (!current) {
        return { undone: [], count: 0, requested: count, state: emptyState(chatId) };
      }

      const targets: ResetEvent[] = [];
      for (let i = current.events.length - 1; i >= 0 && targets.length < count; i--) {
        const event = current.events[i];
        if (event && isResetEvent(event) && !current.nullified.has(event.id)) {
          targets.push(event);
        }
      }

      if (targets.length === 0) {
        return { undone: [], count: 0, requested: count, state: current.projection };
      }

      const { undoEvent, state } = await this.commitUndo(current, targets, count, actor);
      this.logger.info(
        'event-log',
        `Undid ${targets.length}/${count} event(s) in ${chatId}: ${targets.map((e) => `#${e.id}`).join(', ')}`,
      );
      return { undone: targets, count: targets.length, requested: count, undoEvent, state };
    });
  }

  /**
   * Nullify one specific event. UNDO events and already-nullified events
   * cannot be undone.
   */
  async undoById(chatId: string, eventId: number, actor: Actor): Promise<UndoOutcome> {
    return this.lock.runExclusive(chatId, async () => {
      const current = await this.loadChat(chatId);
      const target = current?.events.find((e) => e.id === eventId);
      if (!current || !target) {
        throw new UnknownEventError(chatId, eventId);
      }
      if (!isResetEvent(target)) {
        throw new NotUndoableError(eventId, 'IS_UNDO');
      }
      if (current.nullified.has(eventId)) {
        throw new NotUndoableError(eventId, 'ALREADY_UNDONE');
      }

      const { undoEvent, state } = await this.commitUndo(current, [target], 1, actor);
      return { undone: [target], count: 1, requested: 1, undoEvent, state };
    });
  }

  private async commitUndo(
    current: ChatLogState,
    targets: ResetEvent[],
    requested: number,
    actor: Actor,
  ): Promise<{ undoEvent: UndoEvent; state: ChatState }> {
    const chatId = current.header.chatId;
    const undoEvent: UndoEvent = {
      id: this.nextId(current),
      chatId,
      kind: 'UNDO',
      actor,
      timestamp: this.nextTimestamp(current),
      snapshotBefore: current.projection,
      details: { targetIds: targets.map((e) => e.id), requested },
    };

    const events = [...current.events, undoEvent];
    const nullified = new Set(current.nullified);
    for (const target of targets) nullified.add(target.id);
    // Always a fold from scratch, never a patch of the previous projection
    const state = foldEvents(current.header, events, nullified);

    await this.store.commit(chatId, undoEvent, state);
    this.chats.set(chatId, { header: current.header, events, nullified, projection: state });
    return { undoEvent, state };
  }

  /**
   * Cached projection. Unknown chats read as the empty state.
   */
  async getState(chatId: string): Promise<ChatState> {
    if (this.verifyOnRead) return this.verify(chatId);
    const current = await this.loadChat(chatId);
    return current ? current.projection : emptyState(chatId);
  }

  /**
   * Fold the log afresh and compare with the cache. On divergence the fresh
   * fold replaces the cache and the fault is reported.
   */
  async verify(chatId: string): Promise<ChatState> {
    const current = await this.loadChat(chatId);
    if (!current) return emptyState(chatId);
    const fresh = foldEvents(current.header, current.events, current.nullified);
    const diff = diffStates(current.projection, fresh);
    if (diff === null) return current.projection;

    // Only swap if nothing was committed meanwhile
    if (this.chats.get(chatId) === current) {
      this.chats.set(chatId, { ...current, projection: fresh });
    }
    this.reportFault(new ConsistencyFault(chatId, `field "${diff}" differs from a fresh fold`));
    return fresh;
  }

  /**
   * Reverse-chronological page of events.
   */
  async history(chatId: string, limit: number = 10): Promise<HistoryEntry[]> {
    const current = await this.loadChat(chatId);
    if (!current || limit <= 0) return [];
    return current.events
      .slice(-limit)
      .reverse()
      .map((event) => ({ event, nullified: current.nullified.has(event.id) }));
  }

  /** All events in id order, with the set of nullified ids. */
  async snapshot(chatId: string): Promise<{ events: readonly StreakEvent[]; nullified: ReadonlySet<number> }> {
    const current = await this.loadChat(chatId);
    return current
      ? { events: current.events, nullified: current.nullified }
      : { events: [], nullified: new Set<number>() };
  }

  private reportFault(fault: ConsistencyFault): void {
    this.logger.error('event-log', fault.message);
    this.onFault?.(fault);
  }

  private nextId(current: ChatLogState): number {
    const last = current.events[current.events.length - 1];
    return (last?.id ?? 0) + 1;
  }

  // Timestamps never run backwards within a chat, even if the clock does
  private nextTimestamp(current: ChatLogState): number {
    const last = current.events[current.events.length - 1];
    const floor = last?.timestamp ?? current.header.openedAt;
    return Math.max(this.now(), floor);
  }

  /** Must be called inside the chat's lock. */
  private async ensureOpen(chatId: string): Promise<ChatLogState> {
    const existing = await this.loadChat(chatId);
    if (existing) return existing;

    const header: ChatHeader = { chatId, openedAt: this.now() };
    await this.store.open(header);
    const state: ChatLogState = {
      header,
      events: [],
      nullified: new Set<number>(),
      projection: foldEvents(header, []),
    };
    this.chats.set(chatId, state);
    this.logger.info('event-log', `Started tracking chat ${chatId}`);
    return state;
  }

  private async loadChat(chatId: string): Promise<ChatLogState | null> {
    const cached = this.chats.get(chatId);
    if (cached) return cached;

    // Concurrent first reads share one load
    let pending = this.loading.get(chatId);
    if (!pending) {
      pending = this.readFromStore(chatId).finally(() => this.loading.delete(chatId));
      this.loading.set(chatId, pending);
    }
    const loaded = await pending;
    const raced = this.chats.get(chatId);
    if (raced) return raced;
    if (loaded) this.chats.set(chatId, loaded);
    return loaded;
  }

  private async readFromStore(chatId: string): Promise<ChatLogState | null> {
    const stored = await this.store.load(chatId);
    if (!stored) return null;

    const nullified = collectNullified(stored.events);
    const fresh = foldEvents(stored.header, stored.events, nullified);
    if (stored.projection) {
      const diff = diffStates(stored.projection, fresh);
      if (diff !== null) {
        this.reportFault(new ConsistencyFault(chatId, `stored projection field "${diff}" is stale`));
      }
    }
    return { header: stored.header, events: stored.events, nullified, projection: fresh };
  }
}
