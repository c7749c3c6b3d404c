import type { CommandHandler } from '../types.js';
import { formatDuration } from './format.js';

export const ResetCommand: CommandHandler = {
  name: 'reset',
  aliases: ['重置'],
  description: '手动重置连续计数',
  usage: '[原因]',

  async run({ event, args, sender, service }) {
    const reason = args.join(' ');
    const reset = await service.reset(event.chatId, { userId: event.userId, displayName: event.userName }, reason);
    const start = reset.snapshotBefore.streakStart;
    const ended = start === null ? 0 : reset.timestamp - start;
    await sender.sendText(event.chatId, `🔄 已重置连续计数（本次坚持了 ${formatDuration(ended)}）`);
  },
};
