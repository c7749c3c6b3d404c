import type { ChatEvent } from '../events/ChatEvent.js';
import type { MessageSender } from '../messaging/MessageSender.js';
import type { CommandRouter } from '../command/CommandRouter.js';
import { ChatLock } from '../concurrency/ChatLock.js';
import type { StreakService } from '../streak/StreakService.js';
import { formatDuration } from '../command/builtin/format.js';
import { describeError, type Logger } from '../../infra/logger/logger.js';

/**
 * Main event router - handles all incoming chat events.
 * Flow: Event → Command handler | StreakService → Response
 *
 * Events of one chat are handled strictly in arrival order.
 */
export class MainRouter {
  private inbound = new ChatLock();

  constructor(
    private logger: Logger,
    private sender: MessageSender,
    private service: StreakService,
    private commandRouter: CommandRouter,
  ) {}

  /** Swap the outgoing channel, e.g. when an adapter connection opens. */
  setSender(sender: MessageSender): void {
    this.sender = sender;
    this.commandRouter.setSender(sender);
  }

  /**
   * Handle incoming chat event.
   */
  async handleEvent(event: ChatEvent): Promise<void> {
    if (event.fromBot) {
      this.logger.debug('router', `Skipping bot message in ${event.chatId}`);
      return;
    }

    this.logger.debug(
      'router',
      `Received message from ${event.userId} in ${event.chatId}: "${event.rawText.substring(0, 30)}"`,
    );

    try {
      await this.inbound.runExclusive(event.chatId, () => this.route(event));
    } catch (error) {
      this.logger.error('router', `Failed to handle message in ${event.chatId}: ${describeError(error)}`);
    }
  }

  private async route(event: ChatEvent): Promise<void> {
    if (this.commandRouter.tryParse(event.rawText)) {
      await this.commandRouter.handle(event);
      return;
    }

    const outcome = await this.service.onMessage(
      event.chatId,
      event.rawText,
      { userId: event.userId, displayName: event.userName },
      { messageRef: event.messageId },
    );
    if (!outcome.event) return;

    const { fragment } = outcome.event.details;
    await this.sender.sendText(
      event.chatId,
      `💥 连续被打断！「${fragment}」\n本次坚持了 ${formatDuration(outcome.endedStreakMs ?? 0)}`,
      event.messageId,
    );
  }
}
