import { z } from 'zod';
import { VARIANT_KINDS } from '../triggers/types.js';

/**
 * Runtime shapes of persisted streak records, used when reading them back
 * from disk.
 */

const ActorSchema = z.object({
  userId: z.string(),
  displayName: z.string().optional(),
});

const SpanSchema = z.object({ start: z.number().int(), end: z.number().int() });

const TriggerDetailsSchema = z.object({
  layer: z.enum(['LEMMA', 'PATTERN']),
  matchedWord: z.string(),
  fragment: z.string(),
  ruleName: z.string().optional(),
  variant: z.enum(VARIANT_KINDS).optional(),
  span: SpanSchema,
});

const ManualResetDetailsSchema = z.object({ reason: z.string() });

const UndoDetailsSchema = z.object({
  targetIds: z.array(z.number().int().positive()),
  requested: z.number().int(),
});

const LastResetSchema = z.object({
  eventId: z.number().int(),
  kind: z.enum(['TRIGGER', 'MANUAL_RESET']),
  actor: ActorSchema,
  timestamp: z.number(),
  details: z.union([TriggerDetailsSchema, ManualResetDetailsSchema]),
});

export const ChatStateSchema = z.object({
  chatId: z.string(),
  streakStart: z.number().nullable(),
  bestStreakMs: z.number(),
  bestStreakStart: z.number().nullable(),
  bestStreakEnd: z.number().nullable(),
  lastReset: LastResetSchema.nullable(),
  totalResetCount: z.number().int(),
  lastEventId: z.number().int(),
});

export const ChatHeaderSchema = z.object({
  chatId: z.string(),
  openedAt: z.number(),
});

const EventBaseSchema = z.object({
  id: z.number().int().positive(),
  chatId: z.string(),
  actor: ActorSchema,
  messageRef: z.string().optional(),
  timestamp: z.number(),
  snapshotBefore: ChatStateSchema,
});

export const StreakEventSchema = z.discriminatedUnion('kind', [
  EventBaseSchema.extend({ kind: z.literal('TRIGGER'), details: TriggerDetailsSchema }),
  EventBaseSchema.extend({ kind: z.literal('MANUAL_RESET'), details: ManualResetDetailsSchema }),
  EventBaseSchema.extend({ kind: z.literal('UNDO'), details: UndoDetailsSchema }),
]);

/** One line of a chat's JSONL log */
export const LogRecordSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('open'), header: ChatHeaderSchema }),
  z.object({ type: z.literal('commit'), event: StreakEventSchema, projection: ChatStateSchema }),
]);

export type LogRecord = z.infer<typeof LogRecordSchema>;
