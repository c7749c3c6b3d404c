import type { ChatLock } from '../concurrency/ChatLock.js';
import type { LemmaNormalizer } from '../detection/LemmaNormalizer.js';
import { DuplicateTriggerError, InvalidTriggerError, UnknownRuleError } from '../errors.js';
import type { Actor } from '../streak/types.js';
import type { Logger } from '../../infra/logger/logger.js';
import type { PatternCompiler } from './PatternCompiler.js';
import type { RuleStore } from './RuleStore.js';
import type { LemmaRule, PatternRule, RuleSnapshot, TriggerRule } from './types.js';

const WORD = /^[\p{L}\p{M}]+$/u;
const SYSTEM_ACTOR: Actor = { userId: 'system' };

export interface TriggerRegistryOptions {
  /** Lifetime of a cached snapshot, default 5 minutes */
  ttlMs?: number;
  /** Words every chat starts with, added the first time its rules are read */
  defaultWords?: readonly string[];
  now?: () => number;
}

export interface AddedWord {
  lemma: LemmaRule;
  patterns: PatternRule[];
}

interface CacheEntry {
  readonly snapshot: RuleSnapshot;
  readonly rules: readonly TriggerRule[];
  readonly expiresAt: number;
}

/**
 * Per-chat trigger rules.
 *
 * Reads are served from a per-chat `{ snapshot, expiresAt }` entry. Every
 * mutation runs under the chat lock, writes the whole new rule set to the
 * store and then replaces the entry; a snapshot handed out is never changed.
 */
export class TriggerRegistry {
  private cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly defaultWords: string[];
  private readonly now: () => number;

  constructor(
    private store: RuleStore,
    private compiler: PatternCompiler,
    private normalizer: LemmaNormalizer,
    private lock: ChatLock,
    private logger: Logger,
    options: TriggerRegistryOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? 5 * 60 * 1000;
    this.now = options.now ?? Date.now;
    this.defaultWords = [...new Set((options.defaultWords ?? []).map((w) => this.canonical(w)))];
  }

  /** Enabled rules, lemmas and patterns each in insertion order. */
  async activeRules(chatId: string): Promise<RuleSnapshot> {
    return (await this.entry(chatId)).snapshot;
  }

  /** Every rule of the chat, disabled ones included. */
  async listRules(chatId: string): Promise<readonly TriggerRule[]> {
    return (await this.entry(chatId)).rules;
  }

  async addLemma(chatId: string, word: string, actor: Actor): Promise<LemmaRule> {
    const lemma = this.canonical(word);
    return this.mutate(chatId, (rules) => {
      this.assertNewLemma(chatId, rules, lemma);
      const rule = this.lemmaRule(chatId, lemma, actor);
      this.logger.info('triggers', `Added lemma "${lemma}" in ${chatId} (by ${actor.userId})`);
      return { rules: [...rules, rule], result: rule };
    });
  }

  /**
   * Add a lemma together with its generated pattern rules. Either all of
   * them are stored or none.
   */
  async addWord(chatId: string, word: string, actor: Actor): Promise<AddedWord> {
    const lemma = this.canonical(word);
    return this.mutate(chatId, (rules) => {
      const added = this.buildWord(chatId, rules, lemma, actor);
      this.logger.info(
        'triggers',
        `Added word "${lemma}" with ${added.patterns.length} pattern(s) in ${chatId} (by ${actor.userId})`,
      );
      return { rules: [...rules, added.lemma, ...added.patterns], result: added };
    });
  }

  /** Remove a word's lemma rule and every rule generated from it. */
  async removeWord(chatId: string, word: string, actor: Actor): Promise<TriggerRule[]> {
    const lemma = this.canonical(word);
    return this.mutate(chatId, (rules) => {
      const removed = rules.filter((r) => r.sourceWord === lemma);
      if (removed.length === 0) throw new UnknownRuleError(chatId, lemma);
      this.logger.info(
        'triggers',
        `Removed word "${lemma}" (${removed.length} rule(s)) in ${chatId} (by ${actor.userId})`,
      );
      return { rules: rules.filter((r) => r.sourceWord !== lemma), result: removed };
    });
  }

  async enable(chatId: string, ruleName: string, actor: Actor): Promise<TriggerRule> {
    return this.setEnabled(chatId, ruleName, true, actor);
  }

  async disable(chatId: string, ruleName: string, actor: Actor): Promise<TriggerRule> {
    return this.setEnabled(chatId, ruleName, false, actor);
  }

  /** Drop cached snapshots, for one chat or all of them. */
  invalidate(chatId?: string): void {
    if (chatId === undefined) this.cache.clear();
    else this.cache.delete(chatId);
  }

  private async setEnabled(
    chatId: string,
    ruleName: string,
    enabled: boolean,
    actor: Actor,
  ): Promise<TriggerRule> {
    const name = ruleName.trim().toLowerCase();
    return this.mutate(chatId, (rules) => {
      const target = rules.find((r) => r.name === name);
      if (!target) throw new UnknownRuleError(chatId, name);
      const updated: TriggerRule = { ...target, enabled };
      this.logger.info(
        'triggers',
        `${enabled ? 'Enabled' : 'Disabled'} rule "${name}" in ${chatId} (by ${actor.userId})`,
      );
      return { rules: rules.map((r) => (r === target ? updated : r)), result: updated };
    });
  }

  private async entry(chatId: string): Promise<CacheEntry> {
    const cached = this.cache.get(chatId);
    if (cached && cached.expiresAt > this.now()) return cached;

    const rules = await this.lock.runExclusive(chatId, () => this.loadOrSeed(chatId));
    return this.install(chatId, rules);
  }

  private async mutate<T>(
    chatId: string,
    change: (rules: readonly TriggerRule[]) => { rules: TriggerRule[]; result: T },
  ): Promise<T> {
    return this.lock.runExclusive(chatId, async () => {
      const current = await this.loadOrSeed(chatId);
      const { rules, result } = change(current);
      await this.store.save(chatId, rules);
      this.install(chatId, rules);
      return result;
    });
  }

  /** Caller holds the chat lock. */
  private async loadOrSeed(chatId: string): Promise<TriggerRule[]> {
    const stored = await this.store.load(chatId);
    if (stored !== null || this.defaultWords.length === 0) return stored ?? [];

    let rules: TriggerRule[] = [];
    for (const word of this.defaultWords) {
      const added = this.buildWord(chatId, rules, word, SYSTEM_ACTOR);
      rules = [...rules, added.lemma, ...added.patterns];
    }
    await this.store.save(chatId, rules);
    this.logger.info('triggers', `Seeded ${chatId} with default words: ${this.defaultWords.join(', ')}`);
    return rules;
  }

  private install(chatId: string, rules: readonly TriggerRule[]): CacheEntry {
    const frozen = Object.freeze([...rules]);
    const lemmas: LemmaRule[] = [];
    const patterns: PatternRule[] = [];
    for (const rule of frozen) {
      if (!rule.enabled) continue;
      if (rule.kind === 'LEMMA') lemmas.push(rule);
      else patterns.push(rule);
    }

    const entry: CacheEntry = {
      snapshot: Object.freeze({
        chatId,
        lemmas: Object.freeze(lemmas),
        patterns: Object.freeze(patterns),
      }),
      rules: frozen,
      expiresAt: this.now() + this.ttlMs,
    };
    this.cache.set(chatId, entry);
    return entry;
  }

  private buildWord(
    chatId: string,
    rules: readonly TriggerRule[],
    lemma: string,
    actor: Actor,
  ): AddedWord {
    this.assertNewLemma(chatId, rules, lemma);
    const taken = new Set(rules.filter((r) => r.kind === 'PATTERN').map((r) => r.name));
    const createdAt = this.now();

    const patterns = this.compiler.generateVariants(lemma).map((variant): PatternRule => {
      if (taken.has(variant.name)) throw new DuplicateTriggerError(chatId, variant.name);
      // Fails here, before anything is stored, if a source does not compile
      this.compiler.compile(variant.pattern);
      return {
        chatId,
        kind: 'PATTERN',
        name: variant.name,
        sourceWord: lemma,
        variant: variant.variant,
        pattern: variant.pattern,
        enabled: true,
        createdBy: actor.userId,
        createdAt,
      };
    });

    return { lemma: this.lemmaRule(chatId, lemma, actor), patterns };
  }

  private lemmaRule(chatId: string, lemma: string, actor: Actor): LemmaRule {
    return {
      chatId,
      kind: 'LEMMA',
      name: lemma,
      sourceWord: lemma,
      enabled: true,
      createdBy: actor.userId,
      createdAt: this.now(),
    };
  }

  private assertNewLemma(chatId: string, rules: readonly TriggerRule[], lemma: string): void {
    if (rules.some((r) => r.kind === 'LEMMA' && r.name === lemma)) {
      throw new DuplicateTriggerError(chatId, lemma);
    }
  }

  private canonical(word: string): string {
    const trimmed = word.normalize('NFC').trim();
    if (!WORD.test(trimmed)) {
      throw new InvalidTriggerError(word);
    }
    return this.normalizer.normalize(trimmed).toLowerCase();
  }
}
