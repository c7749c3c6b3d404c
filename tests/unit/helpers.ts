import { fileURLToPath } from 'node:url';
import { buildConfig } from '../../src/infra/config/config.js';
import { loadStaticTables, type StaticTables } from '../../src/infra/config/tables.js';
import type { Logger } from '../../src/infra/logger/logger.js';
import { ChatLock } from '../../src/core/concurrency/ChatLock.js';
import { builtinCommandNames } from '../../src/core/command/builtin/index.js';
import { DetectionEngine } from '../../src/core/detection/DetectionEngine.js';
import { ExclusionFilter } from '../../src/core/detection/ExclusionFilter.js';
import { DictionaryLemmaNormalizer } from '../../src/core/detection/LemmaNormalizer.js';
import { EventLog } from '../../src/core/streak/EventLog.js';
import { InMemoryEventStore, type EventStore } from '../../src/core/streak/EventStore.js';
import { StreakService } from '../../src/core/streak/StreakService.js';
import { PatternCompiler } from '../../src/core/triggers/PatternCompiler.js';
import { InMemoryRuleStore, type RuleStore } from '../../src/core/triggers/RuleStore.js';
import { TriggerRegistry } from '../../src/core/triggers/TriggerRegistry.js';
import type { MessageSender } from '../../src/core/messaging/MessageSender.js';

export const repoRoot = fileURLToPath(new URL('../../', import.meta.url));

// Mock logger
export const mockLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
};

export function testConfig() {
  return buildConfig({ app: { env: 'test' } }, {});
}

let tables: StaticTables | null = null;

/** The shipped confusable / transliteration / lemma tables */
export function shippedTables(): StaticTables {
  tables ??= loadStaticTables(testConfig(), repoRoot);
  return tables;
}

/** Settable clock */
export function createClock(start: number = 1_000) {
  const clock = {
    t: start,
    now: () => clock.t,
  };
  return clock;
}

export function createCompiler(): PatternCompiler {
  const { confusables, transliteration } = shippedTables();
  return new PatternCompiler({ confusables, transliteration });
}

export function createNormalizer(): DictionaryLemmaNormalizer {
  return new DictionaryLemmaNormalizer(shippedTables().lemmas);
}

export interface Harness {
  clock: ReturnType<typeof createClock>;
  lock: ChatLock;
  eventStore: EventStore;
  ruleStore: RuleStore;
  compiler: PatternCompiler;
  registry: TriggerRegistry;
  engine: DetectionEngine;
  log: EventLog;
  service: StreakService;
}

export function createHarness(
  options: { defaultWords?: string[]; eventStore?: EventStore; ruleStore?: RuleStore } = {},
): Harness {
  const clock = createClock();
  const lock = new ChatLock();
  const eventStore = options.eventStore ?? new InMemoryEventStore();
  const ruleStore = options.ruleStore ?? new InMemoryRuleStore();
  const compiler = createCompiler();
  const normalizer = createNormalizer();
  const registry = new TriggerRegistry(ruleStore, compiler, normalizer, lock, mockLogger, {
    defaultWords: options.defaultWords ?? [],
    now: clock.now,
  });
  const engine = new DetectionEngine(compiler, normalizer, new ExclusionFilter({ commandNames: builtinCommandNames }));
  const log = new EventLog(eventStore, lock, mockLogger, { now: clock.now });
  const service = new StreakService(log, registry, engine, mockLogger, { now: clock.now });
  return { clock, lock, eventStore, ruleStore, compiler, registry, engine, log, service };
}

export interface SentMessage {
  chatId: string;
  text: string;
  replyTo?: string;
}

/** Records everything sent through it */
export class RecordingSender implements MessageSender {
  sent: SentMessage[] = [];

  async sendText(chatId: string, text: string, replyTo?: string): Promise<void> {
    this.sent.push(replyTo === undefined ? { chatId, text } : { chatId, text, replyTo });
  }

  last(): SentMessage | undefined {
    return this.sent[this.sent.length - 1];
  }
}
