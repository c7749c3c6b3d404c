import { z } from 'zod';
import { toChatId, type ChatEvent, type SenderRole } from '../../core/events/ChatEvent.js';

/**
 * OneBot11 message events: https://onebot.dev/spec/
 * Only group and private messages are mapped; text segments are joined.
 */
const OB11MessageSchema = z.object({
  post_type: z.literal('message'),
  message_type: z.enum(['group', 'private']),
  message: z.array(
    z.union([
      z.object({
        type: z.literal('text'),
        data: z.object({ text: z.string().max(2000) }),
      }),
      z.object({
        type: z.string(),
        data: z.record(z.unknown()),
      }),
    ]),
  ),
  user_id: z.number(),
  group_id: z.number().optional(),
  message_id: z.number().optional(),
  time: z.number(),
  self_id: z.number().optional(),
  sender: z
    .object({
      user_id: z.number(),
      nickname: z.string().optional(),
      card: z.string().optional(),
      role: z.string().optional(),
    })
    .optional(),
});

function toSenderRole(role: string | undefined): SenderRole {
  return role === 'owner' || role === 'admin' ? role : 'member';
}

/**
 * Map OneBot11 message to simplified ChatEvent.
 * Returns null for anything that is not a user's text-bearing message.
 */
export function mapToChatEvent(
  raw: unknown,
  logger?: { debug: (tag: string, msg: string) => void },
): ChatEvent | null {
  const parsed = OB11MessageSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const msg = parsed.data;

  // Drop messages sent by the bot itself to avoid self-trigger loops
  if (msg.self_id && msg.user_id === msg.self_id) {
    logger?.debug('qq-mapper', `Filtered self message from bot ${msg.self_id}`);
    return null;
  }

  if (msg.message_type === 'group' && msg.group_id === undefined) {
    logger?.debug('qq-mapper', 'Dropped group message without group_id');
    return null;
  }

  // Extract plain text
  const rawText = msg.message
    .map((seg) => {
      if (seg.type === 'text' && typeof seg.data.text === 'string') {
        return seg.data.text;
      }
      return '';
    })
    .join('');

  const isGroup = msg.message_type === 'group';
  const card = msg.sender?.card?.trim();

  const chatEvent: ChatEvent = {
    platform: 'qq',
    chatId: isGroup ? toChatId('group', msg.group_id ?? 0) : toChatId('private', msg.user_id),
    userId: String(msg.user_id),
    messageId: String(msg.message_id ?? 0),
    rawText,
    timestamp: msg.time * 1000,
    // Group card first, it is what members see
    userName: card || msg.sender?.nickname || `User${msg.user_id}`,
    senderRole: isGroup ? toSenderRole(msg.sender?.role) : 'member',
  };

  return chatEvent;
}
