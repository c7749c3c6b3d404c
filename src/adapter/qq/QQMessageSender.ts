import type { WebSocket } from 'ws';
import { parseChatId } from '../../core/events/ChatEvent.js';
import type { MessageSender } from '../../core/messaging/MessageSender.js';
import { describeError, type Logger } from '../../infra/logger/logger.js';

interface OutgoingSegment {
  type: 'reply' | 'text';
  data: Record<string, unknown>;
}

/**
 * QQ/NapCat message sender implementation.
 * Converts MessageSender interface to OneBot11 API calls.
 */
export class QQMessageSender implements MessageSender {
  constructor(
    private ws: Pick<WebSocket, 'send'>,
    private logger: Logger,
  ) {}

  async sendText(chatId: string, text: string, replyTo?: string): Promise<void> {
    const target = parseChatId(chatId);
    if (!target) {
      throw new Error(`Cannot send to ${chatId}: not a QQ chat id`);
    }

    const segments: OutgoingSegment[] = [];
    if (replyTo && replyTo !== '0') {
      const parsed = Number.parseInt(replyTo, 10);
      segments.push({
        type: 'reply',
        data: {
          id: Number.isFinite(parsed) ? parsed : replyTo,
        },
      });
    }
    segments.push({
      type: 'text',
      data: { text },
    });

    const id = Number.parseInt(target.targetId, 10);
    const message =
      target.kind === 'group'
        ? { action: 'send_group_msg', params: { group_id: id, message: segments } }
        : { action: 'send_private_msg', params: { user_id: id, message: segments } };

    try {
      this.logger.info(
        'qq-sender',
        `Sending to ${chatId}: "${text.substring(0, 40)}" (${text.length} chars)`,
      );
      this.ws.send(JSON.stringify(message));
    } catch (error) {
      this.logger.error('qq-sender', `Failed to send message: ${describeError(error)}`);
      throw error;
    }
  }
}
