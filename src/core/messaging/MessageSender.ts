import type { Logger } from '../../infra/logger/logger.js';

/**
 * Unified message sending interface.
 * All platform adapters should implement this to send messages.
 */
export interface MessageSender {
  /**
   * Send plain text message to a chat.
   * @param chatId - Target chat (`group:<id>` / `private:<id>`)
   * @param replyTo - Optional: message ID to reply to
   */
  sendText(chatId: string, text: string, replyTo?: string): Promise<void>;
}

/**
 * Stand-in used until an adapter connection provides a real sender.
 */
export class UnconnectedSender implements MessageSender {
  constructor(private logger: Logger) {}

  async sendText(chatId: string, text: string): Promise<void> {
    this.logger.warn('sender', `No adapter connected, dropping reply to ${chatId}: "${text.substring(0, 40)}"`);
  }
}
