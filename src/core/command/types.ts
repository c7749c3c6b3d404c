import type { ChatEvent } from '../events/ChatEvent.js';
import type { MessageSender } from '../messaging/MessageSender.js';
import type { StreakService } from '../streak/StreakService.js';
import type { Logger } from '../../infra/logger/logger.js';

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  /** The original chat event */
  event: ChatEvent;

  /** Command arguments (split by whitespace) */
  args: string[];

  /** Message sender for replying */
  sender: MessageSender;

  service: StreakService;

  logger: Logger;

  /** Every registered command, for /help */
  commands: readonly CommandHandler[];
}

/**
 * Interface for command handlers
 */
export interface CommandHandler {
  /** Primary command name (e.g., "counter") */
  name: string;

  /** Alternative names (e.g., ["streak"]) */
  aliases?: string[];

  /** Description for help text */
  description?: string;

  /** Argument synopsis shown by /help, e.g. "<word>" */
  usage?: string;

  /** Group owners and admins only (always allowed in private chats) */
  adminOnly?: boolean;

  /** Execute the command */
  run(ctx: CommandContext): Promise<void>;
}
