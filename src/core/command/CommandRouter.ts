import { isPrivateChat, type ChatEvent } from '../events/ChatEvent.js';
import { ValidationError } from '../errors.js';
import type { MessageSender } from '../messaging/MessageSender.js';
import type { StreakService } from '../streak/StreakService.js';
import { validationText } from './errorText.js';
import type { CommandHandler } from './types.js';
import { describeError, type Logger } from '../../infra/logger/logger.js';

export interface ParsedCommand {
  name: string;
  args: string[];
  prefix: '/' | '!';
}

export function isAdmin(event: ChatEvent): boolean {
  return isPrivateChat(event.chatId) || event.senderRole === 'owner' || event.senderRole === 'admin';
}

/**
 * Routes command messages to appropriate handlers
 */
export class CommandRouter {
  private commandMap: Map<string, CommandHandler> = new Map();
  private commands: CommandHandler[];

  constructor(
    private sender: MessageSender,
    private logger: Logger,
    private service: StreakService,
    commands: CommandHandler[],
  ) {
    this.commands = [...commands];
    // Register all commands and their aliases
    for (const cmd of commands) {
      this.commandMap.set(cmd.name.toLowerCase(), cmd);
      for (const alias of cmd.aliases ?? []) {
        this.commandMap.set(alias.toLowerCase(), cmd);
      }
    }

    this.logger.info('command-router', `Registered ${commands.length} commands`);
  }

  /** Replies go through this sender from now on. */
  setSender(sender: MessageSender): void {
    this.sender = sender;
  }

  isRegistered(name: string): boolean {
    return this.commandMap.has(name.toLowerCase());
  }

  /**
   * "/undo 3" → { name: "undo", args: ["3"] }. Null for plain text and for
   * unknown command names.
   */
  tryParse(rawText: string): ParsedCommand | null {
    const text = rawText.trim();
    const first = text[0];
    if (first !== '/' && first !== '!' && first !== '！') return null;

    const body = text.slice(1).trim();
    if (!body) return null;

    const [head = '', ...args] = body.split(/\s+/);
    const name = head.toLowerCase();
    if (!this.isRegistered(name)) return null;
    return { name, args, prefix: first === '/' ? '/' : '!' };
  }

  /**
   * Handle a command event
   */
  async handle(event: ChatEvent): Promise<void> {
    const parsed = this.tryParse(event.rawText);
    const handler = parsed ? this.commandMap.get(parsed.name) : undefined;
    if (!parsed || !handler) {
      this.logger.warn('command-router', `Unknown command: ${event.rawText.substring(0, 30)}`);
      await this.sender.sendText(event.chatId, '未知指令\n使用 /help 查看可用命令');
      return;
    }

    if (handler.adminOnly && !isAdmin(event)) {
      this.logger.info('command-router', `Refused /${handler.name} for non-admin ${event.userId}`);
      await this.sender.sendText(event.chatId, `⛔ /${handler.name} 仅限群主或管理员使用`, event.messageId);
      return;
    }

    try {
      this.logger.info(
        'command-router',
        `Executing command: /${handler.name} (args: ${parsed.args.length}, from ${event.userId})`,
      );
      await handler.run({
        event,
        args: parsed.args,
        sender: this.sender,
        service: this.service,
        logger: this.logger,
        commands: this.commands,
      });
      this.logger.debug('command-router', `Command /${handler.name} completed`);
    } catch (error) {
      if (error instanceof ValidationError) {
        await this.sender.sendText(event.chatId, `⚠️ ${validationText(error)}`, event.messageId);
        return;
      }
      this.logger.error('command-router', `Command ${handler.name} failed: ${describeError(error)}`);
      await this.sender.sendText(event.chatId, `指令执行失败：${handler.name}`);
    }
  }
}
