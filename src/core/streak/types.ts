/**
 * Event-sourced streak model.
 *
 * Events are immutable and totally ordered per chat by `id` (1, 2, 3 ...).
 * `ChatState` is a projection: the fold of the chat's non-nullified events.
 */

import type { VariantKind } from '../triggers/types.js';

export type EventKind = 'TRIGGER' | 'MANUAL_RESET' | 'UNDO';

export type DetectionLayer = 'LEMMA' | 'PATTERN';

export interface Actor {
  userId: string;
  displayName?: string;
}

export interface TextSpan {
  start: number;
  end: number;
}

export interface TriggerDetails {
  layer: DetectionLayer;
  /** Canonical word the match is attributed to */
  matchedWord: string;
  /** Text as it appeared in the message */
  fragment: string;
  ruleName?: string;
  variant?: VariantKind;
  span: TextSpan;
}

export interface ManualResetDetails {
  reason: string;
}

export interface UndoDetails {
  /** Ids of the events this undo nullifies, newest first */
  targetIds: number[];
  requested: number;
}

interface EventBase {
  id: number;
  chatId: string;
  actor: Actor;
  messageRef?: string;
  timestamp: number;
  /** State right before this event was applied */
  snapshotBefore: ChatState;
}

export interface TriggerEvent extends EventBase {
  kind: 'TRIGGER';
  details: TriggerDetails;
}

export interface ManualResetEvent extends EventBase {
  kind: 'MANUAL_RESET';
  details: ManualResetDetails;
}

export interface UndoEvent extends EventBase {
  kind: 'UNDO';
  details: UndoDetails;
}

export type StreakEvent = TriggerEvent | ManualResetEvent | UndoEvent;

/** Events that end a streak (and can be undone) */
export type ResetEvent = TriggerEvent | ManualResetEvent;

export interface LastReset {
  eventId: number;
  kind: ResetEvent['kind'];
  actor: Actor;
  timestamp: number;
  details: TriggerDetails | ManualResetDetails;
}

export interface ChatState {
  chatId: string;
  /** When the running streak began; null until the chat is first seen */
  streakStart: number | null;
  bestStreakMs: number;
  bestStreakStart: number | null;
  bestStreakEnd: number | null;
  lastReset: LastReset | null;
  totalResetCount: number;
  /** Id of the last event folded in (0 for none) */
  lastEventId: number;
}

/** Written once, when a chat is first seen; the fold starts from it. */
export interface ChatHeader {
  chatId: string;
  openedAt: number;
}

export function isResetEvent(event: StreakEvent): event is ResetEvent {
  return event.kind === 'TRIGGER' || event.kind === 'MANUAL_RESET';
}
