import { ValidationError } from '../../errors.js';
import type { CommandContext, CommandHandler } from '../types.js';

function requireArg(args: string[], usage: string): string {
  const value = args[0];
  if (!value) throw new ValidationError(`用法：${usage}`);
  return value;
}

function actorOf({ event }: CommandContext) {
  return { userId: event.userId, displayName: event.userName };
}

export const AddWordCommand: CommandHandler = {
  name: 'addword',
  description: '添加触发词（含全部变体规则）',
  usage: '<词>',
  adminOnly: true,

  async run(ctx) {
    const word = requireArg(ctx.args, '/addword <词>');
    const added = await ctx.service.addWord(ctx.event.chatId, word, actorOf(ctx));
    await ctx.sender.sendText(
      ctx.event.chatId,
      `✅ 已添加触发词「${added.lemma.name}」（${added.patterns.length} 条变体规则）`,
    );
  },
};

export const RemoveWordCommand: CommandHandler = {
  name: 'removeword',
  description: '移除触发词及其变体规则',
  usage: '<词>',
  adminOnly: true,

  async run(ctx) {
    const word = requireArg(ctx.args, '/removeword <词>');
    const removed = await ctx.service.removeWord(ctx.event.chatId, word, actorOf(ctx));
    const name = removed[0]?.sourceWord ?? word;
    await ctx.sender.sendText(ctx.event.chatId, `🗑 已移除「${name}」（${removed.length} 条规则）`);
  },
};

export const EnableRuleCommand: CommandHandler = {
  name: 'enablerule',
  description: '启用规则',
  usage: '<规则名>',
  adminOnly: true,

  async run(ctx) {
    const name = requireArg(ctx.args, '/enablerule <规则名>');
    const rule = await ctx.service.enableRule(ctx.event.chatId, name, actorOf(ctx));
    await ctx.sender.sendText(ctx.event.chatId, `已启用规则 ${rule.name}`);
  },
};

export const DisableRuleCommand: CommandHandler = {
  name: 'disablerule',
  description: '停用规则',
  usage: '<规则名>',
  adminOnly: true,

  async run(ctx) {
    const name = requireArg(ctx.args, '/disablerule <规则名>');
    const rule = await ctx.service.disableRule(ctx.event.chatId, name, actorOf(ctx));
    await ctx.sender.sendText(ctx.event.chatId, `已停用规则 ${rule.name}`);
  },
};
