import type { CommandHandler } from '../types.js';

/**
 * Help command - show available commands
 */
export const HelpCommand: CommandHandler = {
  name: 'help',
  aliases: ['h', '帮助'],
  description: '显示所有可用命令',

  async run({ event, sender, commands }) {
    const lines = commands.map((cmd) => {
      const usage = cmd.usage ? ` ${cmd.usage}` : '';
      const admin = cmd.adminOnly ? '（管理员）' : '';
      return `  /${cmd.name}${usage} - ${cmd.description ?? ''}${admin}`;
    });

    const helpText = `可用命令：
${lines.join('\n')}

  提示：
  - 命令可以用 / 或 ！ 开头
  - 引号内、链接中的触发词不计入`;

    await sender.sendText(event.chatId, helpText);
  },
};
