/**
 * Platform-agnostic chat event structure.
 * All platform adapters should normalize their events to this format.
 */
export interface ChatEvent {
  /** Platform identifier */
  platform: 'qq';

  /** `group:<groupId>` or `private:<userId>` */
  chatId: string;

  /** User ID */
  userId: string;

  /** Message ID (for reply reference) */
  messageId: string;

  /** Plain text content */
  rawText: string;

  /** Timestamp (milliseconds) */
  timestamp: number;

  /** Optional: User display name */
  userName?: string;

  /** Sender's role in the group; private chats report `member` */
  senderRole: SenderRole;

  /** Whether this message is from the bot itself */
  fromBot?: boolean;
}

export type ChatKind = 'group' | 'private';

export type SenderRole = 'owner' | 'admin' | 'member';

export function toChatId(kind: ChatKind, id: string | number): string {
  return `${kind}:${id}`;
}

export function parseChatId(chatId: string): { kind: ChatKind; targetId: string } | null {
  const match = /^(group|private):(\d+)$/.exec(chatId);
  if (!match) return null;
  const [, kind, targetId] = match;
  if (kind !== 'group' && kind !== 'private') return null;
  return targetId ? { kind, targetId } : null;
}

export function isPrivateChat(chatId: string): boolean {
  return parseChatId(chatId)?.kind === 'private';
}
