import type { CommandHandler } from '../types.js';

export const LeaderboardCommand: CommandHandler = {
  name: 'leaderboard',
  aliases: ['top', '排行'],
  description: '谁打断连续最多',

  async run({ event, sender, service }) {
    const board = await service.getLeaderboard(event.chatId, 10);
    if (board.length === 0) {
      await sender.sendText(event.chatId, '暂无记录');
      return;
    }
    const lines = board.map(
      (entry, i) =>
        `${i + 1}. ${entry.displayName ?? entry.userId}：触发 ${entry.triggers} 次，重置 ${entry.manualResets} 次`,
    );
    await sender.sendText(event.chatId, `🏅 排行榜\n${lines.join('\n')}`);
  },
};
