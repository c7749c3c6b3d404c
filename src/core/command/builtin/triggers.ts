import type { PatternRule } from '../../triggers/types.js';
import type { CommandHandler } from '../types.js';

/**
 * Trigger words of this chat with their rule names.
 * `/triggers full` prints each pattern rule's source as well.
 */
export const TriggersCommand: CommandHandler = {
  name: 'triggers',
  aliases: ['words', '触发词'],
  description: '查看本群的触发词和规则',
  usage: '[full]',

  async run({ event, args, sender, service }) {
    const full = args[0]?.toLowerCase() === 'full';
    const rules = await service.listTriggers(event.chatId);
    const lemmas = rules.filter((r) => r.kind === 'LEMMA');
    if (lemmas.length === 0) {
      await sender.sendText(event.chatId, '本群还没有触发词');
      return;
    }

    const lines = lemmas.map((lemma) => {
      const patterns = rules.filter(
        (r): r is PatternRule => r.kind === 'PATTERN' && r.sourceWord === lemma.sourceWord,
      );
      const state = lemma.enabled ? '' : '（停用）';
      const head = `• ${lemma.name}${state}`;
      if (patterns.length === 0) return head;

      if (full) {
        const details = patterns.map((p) => `    ${p.name}${p.enabled ? '' : '(停用)'}: ${p.pattern}`);
        return [head, ...details].join('\n');
      }
      const names = patterns.map((p) => (p.enabled ? p.name : `${p.name}(停用)`));
      return `${head}\n    ${names.join(', ')}`;
    });
    await sender.sendText(event.chatId, `触发词：\n${lines.join('\n')}`);
  },
};
