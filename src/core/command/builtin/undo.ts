import { ValidationError } from '../../errors.js';
import { MAX_UNDO, MIN_UNDO } from '../../streak/EventLog.js';
import type { CommandHandler } from '../types.js';

/**
 * /undo [n]  undo the n most recent resets (clamped to 1..10)
 * /undo #id  undo one specific event
 */
export const UndoCommand: CommandHandler = {
  name: 'undo',
  aliases: ['撤销'],
  description: '撤销最近的触发或重置',
  usage: '[数量|#编号]',

  async run({ event, args, sender, service }) {
    const actor = { userId: event.userId, displayName: event.userName };
    const arg = args[0];

    if (arg?.startsWith('#')) {
      const id = Number.parseInt(arg.slice(1), 10);
      if (Number.isNaN(id)) throw new ValidationError(`无效的事件编号：${arg}`);
      await service.undoById(event.chatId, id, actor);
      await sender.sendText(event.chatId, `↩️ 已撤销事件 #${id}`);
      return;
    }

    const parsed = arg === undefined ? 1 : Number.parseInt(arg, 10);
    if (Number.isNaN(parsed)) throw new ValidationError(`用法：/undo [数量]，数量为 ${MIN_UNDO}-${MAX_UNDO}`);
    const count = Math.min(MAX_UNDO, Math.max(MIN_UNDO, parsed));

    const outcome = await service.undo(event.chatId, count, actor);
    if (outcome.count === 0) {
      await sender.sendText(event.chatId, '没有可撤销的事件');
      return;
    }
    const ids = outcome.undone.map((e) => `#${e.id}`).join(', ');
    const partial = outcome.count < outcome.requested ? `（请求 ${outcome.requested} 个）` : '';
    await sender.sendText(event.chatId, `↩️ 已撤销 ${outcome.count} 个事件${partial}：${ids}`);
  },
};
