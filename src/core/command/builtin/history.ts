import type { CommandHandler } from '../types.js';
import { actorName, describeEvent } from './format.js';

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 20;

/**
 * Most recent events, newest first; undone ones are marked
 */
export const HistoryCommand: CommandHandler = {
  name: 'history',
  aliases: ['log', '历史'],
  description: '查看最近的事件',
  usage: '[条数]',

  async run({ event, args, sender, service }) {
    const requested = Number.parseInt(args[0] ?? '', 10);
    const limit = Number.isNaN(requested) ? DEFAULT_LIMIT : Math.min(MAX_LIMIT, Math.max(1, requested));

    const entries = await service.history(event.chatId, limit);
    if (entries.length === 0) {
      await sender.sendText(event.chatId, '暂无记录');
      return;
    }
    const lines = entries.map(({ event: e, nullified }) => {
      const undone = nullified ? '（已撤销）' : '';
      return `#${e.id} ${actorName(e.actor)} ${describeEvent(e)}${undone}`;
    });
    await sender.sendText(event.chatId, lines.join('\n'));
  },
};
