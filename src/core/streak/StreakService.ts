import type { DetectionEngine, DetectionMeta, DetectionResult } from '../detection/DetectionEngine.js';
import type { AddedWord, TriggerRegistry } from '../triggers/TriggerRegistry.js';
import type { TriggerRule } from '../triggers/types.js';
import type { Logger } from '../../infra/logger/logger.js';
import type { EventLog, HistoryEntry, UndoOutcome } from './EventLog.js';
import type { Actor, ChatState, ManualResetEvent, TriggerEvent } from './types.js';

export interface MessageMeta extends DetectionMeta {
  messageRef?: string;
}

export interface MessageOutcome {
  detection: DetectionResult;
  /** Present when the message reset the streak */
  event?: TriggerEvent;
  /** Length of the streak the trigger ended */
  endedStreakMs?: number;
}

export interface Counter {
  state: ChatState;
  /** 0 until a streak has started */
  currentStreakMs: number;
}

export interface LeaderboardEntry {
  userId: string;
  displayName?: string;
  triggers: number;
  manualResets: number;
  total: number;
}

export interface StreakServiceOptions {
  now?: () => number;
}

/**
 * Entry point for chat traffic: runs detection on messages, records resets
 * and answers the read-side queries commands need.
 */
export class StreakService {
  private readonly now: () => number;

  constructor(
    private events: EventLog,
    private triggers: TriggerRegistry,
    private engine: DetectionEngine,
    private logger: Logger,
    options: StreakServiceOptions = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  async onMessage(chatId: string, text: string, actor: Actor, meta: MessageMeta = {}): Promise<MessageOutcome> {
    // First message seen in a chat starts its streak
    await this.events.open(chatId);

    const snapshot = await this.triggers.activeRules(chatId);
    const detection = this.engine.detect(snapshot, text, meta);
    if (!detection.matched) {
      if (detection.excluded) {
        this.logger.debug('streak', `Trigger in ${chatId} ignored: inside an excluded span`);
      }
      return { detection };
    }

    const event = await this.events.appendEvent(
      chatId,
      actor,
      { kind: 'TRIGGER', details: detection.match },
      meta.messageRef,
    );

    const endedStreakMs = streakEndedBy(event);
    this.logger.info(
      'streak',
      `Streak in ${chatId} broken by ${actor.userId} with "${detection.match.fragment}" (${detection.match.layer}${
        detection.match.ruleName ? `: ${detection.match.ruleName}` : ''
      })`,
    );
    return { detection, event, endedStreakMs };
  }

  /** Dry run of detection against the chat's current rules. */
  async detect(chatId: string, text: string, meta: DetectionMeta = {}): Promise<DetectionResult> {
    return this.engine.detect(await this.triggers.activeRules(chatId), text, meta);
  }

  async reset(chatId: string, actor: Actor, reason: string = ''): Promise<ManualResetEvent> {
    const event = await this.events.appendEvent(chatId, actor, {
      kind: 'MANUAL_RESET',
      details: { reason },
    });
    this.logger.info('streak', `Manual reset in ${chatId} by ${actor.userId}${reason ? `: ${reason}` : ''}`);
    return event;
  }

  async undo(chatId: string, count: number, actor: Actor): Promise<UndoOutcome> {
    return this.events.undo(chatId, count, actor);
  }

  async undoById(chatId: string, eventId: number, actor: Actor): Promise<UndoOutcome> {
    return this.events.undoById(chatId, eventId, actor);
  }

  async getCounter(chatId: string): Promise<Counter> {
    const state = await this.events.getState(chatId);
    const currentStreakMs = state.streakStart === null ? 0 : Math.max(0, this.now() - state.streakStart);
    return { state, currentStreakMs };
  }

  /**
   * Who reset the streak most, counting only events still in effect.
   */
  async getLeaderboard(chatId: string, limit: number = 10): Promise<LeaderboardEntry[]> {
    const { events, nullified } = await this.events.snapshot(chatId);
    const board = new Map<string, LeaderboardEntry>();

    for (const event of events) {
      if (event.kind === 'UNDO' || nullified.has(event.id)) continue;
      const entry: LeaderboardEntry = board.get(event.actor.userId) ?? {
        userId: event.actor.userId,
        triggers: 0,
        manualResets: 0,
        total: 0,
      };
      if (event.actor.displayName) entry.displayName = event.actor.displayName;
      if (event.kind === 'TRIGGER') entry.triggers++;
      else entry.manualResets++;
      entry.total++;
      board.set(entry.userId, entry);
    }

    return [...board.values()]
      .sort((a, b) => b.total - a.total || b.triggers - a.triggers || a.userId.localeCompare(b.userId))
      .slice(0, Math.max(0, limit));
  }

  async history(chatId: string, limit: number = 10): Promise<HistoryEntry[]> {
    return this.events.history(chatId, limit);
  }

  async addWord(chatId: string, word: string, actor: Actor): Promise<AddedWord> {
    return this.triggers.addWord(chatId, word, actor);
  }

  async removeWord(chatId: string, word: string, actor: Actor): Promise<TriggerRule[]> {
    return this.triggers.removeWord(chatId, word, actor);
  }

  async enableRule(chatId: string, ruleName: string, actor: Actor): Promise<TriggerRule> {
    return this.triggers.enable(chatId, ruleName, actor);
  }

  async disableRule(chatId: string, ruleName: string, actor: Actor): Promise<TriggerRule> {
    return this.triggers.disable(chatId, ruleName, actor);
  }

  async listTriggers(chatId: string): Promise<readonly TriggerRule[]> {
    return this.triggers.listRules(chatId);
  }
}

function streakEndedBy(event: TriggerEvent): number {
  const start = event.snapshotBefore.streakStart;
  return start === null ? 0 : Math.max(0, event.timestamp - start);
}
