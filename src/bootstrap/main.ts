import path from 'node:path';
import { loadConfig, type AppConfig } from '../infra/config/config.js';
import { loadStaticTables } from '../infra/config/tables.js';
import { createLogger, type Logger } from '../infra/logger/logger.js';
import { MainRouter } from '../core/router/MainRouter.js';
import { CommandRouter } from '../core/command/CommandRouter.js';
import { builtinCommandNames, builtinCommands } from '../core/command/builtin/index.js';
import { UnconnectedSender } from '../core/messaging/MessageSender.js';
import { ChatLock } from '../core/concurrency/ChatLock.js';
import { InMemoryEventStore, type EventStore } from '../core/streak/EventStore.js';
import { EventLog } from '../core/streak/EventLog.js';
import { StreakService } from '../core/streak/StreakService.js';
import { JsonlEventStore } from '../core/storage/JsonlEventStore.js';
import { JsonRuleStore } from '../core/storage/JsonRuleStore.js';
import { InMemoryRuleStore, type RuleStore } from '../core/triggers/RuleStore.js';
import { PatternCompiler } from '../core/triggers/PatternCompiler.js';
import { TriggerRegistry } from '../core/triggers/TriggerRegistry.js';
import { DictionaryLemmaNormalizer } from '../core/detection/LemmaNormalizer.js';
import { DetectionEngine } from '../core/detection/DetectionEngine.js';
import { ExclusionFilter } from '../core/detection/ExclusionFilter.js';
import { QQAdapter } from '../adapter/qq/QQAdapter.js';

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  service: StreakService;
  router: MainRouter;
  adapter: QQAdapter | null;
  stop(): Promise<void>;
}

async function createStores(cfg: AppConfig, logger: Logger): Promise<{ events: EventStore; rules: RuleStore }> {
  if (cfg.storage.driver === 'memory') {
    logger.warn('bootstrap', 'Using in-memory storage - history is lost on restart');
    return { events: new InMemoryEventStore(), rules: new InMemoryRuleStore() };
  }

  const events = new JsonlEventStore(logger, path.join(cfg.storage.dataDir, 'events'));
  const rules = new JsonRuleStore(logger, path.join(cfg.storage.dataDir, 'rules'));
  await events.initialize();
  await rules.initialize();
  return { events, rules };
}

export async function start(configPath?: string): Promise<Runtime> {
  // Load config and create logger
  const cfg = loadConfig(configPath);
  const logger = createLogger(cfg.logging);
  logger.info('bootstrap', `Starting ${cfg.app.name} in ${cfg.app.env}`);

  const tables = loadStaticTables(cfg);
  const stores = await createStores(cfg, logger);

  // One lock per chat, shared by the event log and the trigger registry
  const lock = new ChatLock();
  const compiler = new PatternCompiler({
    confusables: tables.confusables,
    transliteration: tables.transliteration,
    minVariantLength: cfg.triggers.minVariantLength,
    maxSeparatorWidth: cfg.triggers.maxSeparatorWidth,
    cacheSize: cfg.triggers.patternCacheSize,
  });
  const normalizer = new DictionaryLemmaNormalizer(tables.lemmas);
  const registry = new TriggerRegistry(stores.rules, compiler, normalizer, lock, logger, {
    ttlMs: cfg.triggers.cacheTtlMs,
    defaultWords: cfg.triggers.defaultWords,
  });
  const eventLog = new EventLog(stores.events, lock, logger, {
    verifyOnRead: cfg.projection.verifyOnRead,
  });
  const engine = new DetectionEngine(
    compiler,
    normalizer,
    new ExclusionFilter({ commandNames: builtinCommandNames }),
  );
  const service = new StreakService(eventLog, registry, engine, logger);

  // Replaced per connection by the adapter
  const sender = new UnconnectedSender(logger);
  const commandRouter = new CommandRouter(sender, logger, service, builtinCommands);
  const router = new MainRouter(logger, sender, service, commandRouter);

  let adapter: QQAdapter | null = null;
  if (cfg.adapters.qq.enabled) {
    logger.info('bootstrap', 'Starting QQ adapter...');
    adapter = new QQAdapter(router, logger, cfg.adapters.qq.wsPort, cfg.adapters.qq.token);
    adapter.start();
  } else {
    logger.warn('bootstrap', 'QQ adapter disabled (missing token or config)');
  }

  return {
    config: cfg,
    logger,
    service,
    router,
    adapter,
    async stop() {
      await adapter?.stop();
      await lock.drain();
      logger.info('bootstrap', 'Stopped');
    },
  };
}
