import type { ChatHeader, ChatState, ResetEvent, StreakEvent } from './types.js';

export function emptyState(chatId: string): ChatState {
  return {
    chatId,
    streakStart: null,
    bestStreakMs: 0,
    bestStreakStart: null,
    bestStreakEnd: null,
    lastReset: null,
    totalResetCount: 0,
    lastEventId: 0,
  };
}

export function initialState(header: ChatHeader): ChatState {
  return { ...emptyState(header.chatId), streakStart: header.openedAt };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled event kind: ${JSON.stringify(value)}`);
}

function endStreak(state: ChatState, event: ResetEvent): ChatState {
  const ended = state.streakStart === null ? 0 : Math.max(0, event.timestamp - state.streakStart);
  const best =
    ended > state.bestStreakMs
      ? { bestStreakMs: ended, bestStreakStart: state.streakStart, bestStreakEnd: event.timestamp }
      : {
          bestStreakMs: state.bestStreakMs,
          bestStreakStart: state.bestStreakStart,
          bestStreakEnd: state.bestStreakEnd,
        };
  return {
    ...state,
    ...best,
    streakStart: event.timestamp,
    lastReset: {
      eventId: event.id,
      kind: event.kind,
      actor: event.actor,
      timestamp: event.timestamp,
      details: event.details,
    },
    lastEventId: event.id,
  };
}

/**
 * Fold one event onto a state. Pure.
 *
 * UNDO leaves the state alone here; what it nullifies is handled by
 * `foldEvents`, which skips the targeted events.
 */
export function applyEvent(state: ChatState, event: StreakEvent): ChatState {
  switch (event.kind) {
    case 'TRIGGER':
      return endStreak(state, event);
    case 'MANUAL_RESET':
      return { ...endStreak(state, event), totalResetCount: state.totalResetCount + 1 };
    case 'UNDO':
      return { ...state, lastEventId: event.id };
    default:
      return assertNever(event);
  }
}

/** Ids nullified by the UNDO events among `events` (optionally only those with id <= upTo). */
export function collectNullified(events: readonly StreakEvent[], upTo?: number): Set<number> {
  const nullified = new Set<number>();
  for (const event of events) {
    if (upTo !== undefined && event.id > upTo) break;
    if (event.kind === 'UNDO') {
      for (const id of event.details.targetIds) nullified.add(id);
    }
  }
  return nullified;
}

/**
 * Full fold from scratch over an ordered event arena, skipping nullified ids.
 * `upTo` bounds the fold to events with id <= upTo.
 */
export function foldEvents(
  header: ChatHeader,
  events: readonly StreakEvent[],
  nullified: ReadonlySet<number> = collectNullified(events),
  upTo?: number,
): ChatState {
  let state = initialState(header);
  for (const event of events) {
    if (upTo !== undefined && event.id > upTo) break;
    if (nullified.has(event.id)) {
      state = { ...state, lastEventId: event.id };
      continue;
    }
    state = applyEvent(state, event);
  }
  return state;
}

/** Field-by-field comparison; returns the first differing field name or null. */
export function diffStates(a: ChatState, b: ChatState): string | null {
  const keys: Array<keyof ChatState> = [
    'chatId',
    'streakStart',
    'bestStreakMs',
    'bestStreakStart',
    'bestStreakEnd',
    'totalResetCount',
    'lastEventId',
  ];
  for (const key of keys) {
    if (a[key] !== b[key]) return key;
  }
  if ((a.lastReset?.eventId ?? null) !== (b.lastReset?.eventId ?? null)) return 'lastReset';
  return null;
}
