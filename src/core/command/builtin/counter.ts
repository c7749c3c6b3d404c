import type { CommandHandler } from '../types.js';
import { actorName, formatDuration } from './format.js';

/**
 * Current streak, best streak and the last reset
 */
export const CounterCommand: CommandHandler = {
  name: 'counter',
  aliases: ['streak', '计数'],
  description: '查看当前连续时长和最长纪录',

  async run({ event, sender, service }) {
    const { state, currentStreakMs } = await service.getCounter(event.chatId);
    const lines = [
      `⏱ 当前连续：${formatDuration(currentStreakMs)}`,
      `🏆 最长纪录：${formatDuration(state.bestStreakMs)}`,
      `🔁 手动重置：${state.totalResetCount} 次`,
    ];
    if (state.lastReset) {
      const how =
        state.lastReset.kind === 'TRIGGER' && 'fragment' in state.lastReset.details
          ? `说了「${state.lastReset.details.fragment}」`
          : '手动重置';
      lines.push(`上次中断：${actorName(state.lastReset.actor)} ${how}`);
    }
    await sender.sendText(event.chatId, lines.join('\n'));
  },
};
