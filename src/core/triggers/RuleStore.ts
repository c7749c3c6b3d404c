import type { TriggerRule } from './types.js';

/**
 * Durable per-chat rule sets. `save` replaces the whole set at once.
 * `load` returns null for a chat that never had rules saved.
 */
export interface RuleStore {
  load(chatId: string): Promise<TriggerRule[] | null>;
  save(chatId: string, rules: readonly TriggerRule[]): Promise<void>;
}

export class InMemoryRuleStore implements RuleStore {
  private chats = new Map<string, TriggerRule[]>();

  async load(chatId: string): Promise<TriggerRule[] | null> {
    const rules = this.chats.get(chatId);
    return rules ? structuredClone(rules) : null;
  }

  async save(chatId: string, rules: readonly TriggerRule[]): Promise<void> {
    this.chats.set(chatId, structuredClone([...rules]));
  }
}
