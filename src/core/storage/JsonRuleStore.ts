/**
 * JsonRuleStore: one JSON file per chat holding its whole rule set.
 * Saves write a temp file and rename it over the old one.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { RuleStore } from '../triggers/RuleStore.js';
import { RuleFileSchema } from '../triggers/schema.js';
import type { TriggerRule } from '../triggers/types.js';
import { describeError, type Logger } from '../../infra/logger/logger.js';

export class JsonRuleStore implements RuleStore {
  private writes = 0;

  constructor(
    private logger: Logger,
    private rulesDir: string = './data/rules',
  ) {}

  async initialize(): Promise<void> {
    this.logger.info('rule-store', `Initializing rule store at ${this.rulesDir}`);
    await fs.mkdir(this.rulesDir, { recursive: true });
  }

  private fileFor(chatId: string): string {
    return path.join(this.rulesDir, `${encodeURIComponent(chatId)}.json`);
  }

  async load(chatId: string): Promise<TriggerRule[] | null> {
    let content: string;
    try {
      content = await fs.readFile(this.fileFor(chatId), 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    }

    const parsed = RuleFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(
        `Invalid rule file for ${chatId}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
      );
    }
    return parsed.data.rules;
  }

  async save(chatId: string, rules: readonly TriggerRule[]): Promise<void> {
    const target = this.fileFor(chatId);
    const temp = `${target}.${process.pid}.${++this.writes}.tmp`;
    const body = JSON.stringify({ chatId, rules }, null, 2);
    try {
      await fs.writeFile(temp, body, 'utf-8');
      await fs.rename(temp, target);
    } catch (error) {
      this.logger.error('rule-store', `Failed to save rules of ${chatId}: ${describeError(error)}`);
      await fs.rm(temp, { force: true });
      throw error;
    }
    this.logger.debug('rule-store', `Saved ${rules.length} rule(s) for ${chatId}`);
  }
}
