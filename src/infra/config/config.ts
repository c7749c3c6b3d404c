import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const AppConfigSchema = z.object({
  app: z
    .object({
      name: z.string().default('streakwatch'),
      env: z.enum(['dev', 'prod', 'test']).default('prod'),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default('info'),
      color: z.boolean().default(true),
    })
    .default({}),
  storage: z
    .object({
      driver: z.enum(['file', 'memory']).default('file'),
      dataDir: z.string().default('./data'),
    })
    .default({}),
  adapters: z
    .object({
      qq: z
        .object({
          enabled: z.boolean().default(true),
          wsPort: z.number().int().positive().default(6090),
          token: z.coerce.string().optional(),
        })
        .default({}),
    })
    .default({}),
  triggers: z
    .object({
      defaultWords: z.array(z.string().min(1)).default([]),
      cacheTtlMs: z.number().int().positive().default(5 * 60 * 1000),
      minVariantLength: z.number().int().min(1).default(3),
      maxSeparatorWidth: z.number().int().min(0).max(5).default(2),
      patternCacheSize: z.number().int().positive().default(512),
      tables: z
        .object({
          confusables: z.string().default('config/confusables.json'),
          transliteration: z.string().default('config/transliteration.json'),
          lemmas: z.string().default('config/lemmas.json'),
        })
        .default({}),
    })
    .default({}),
  projection: z
    .object({
      verifyOnRead: z.boolean().default(false),
    })
    .default({}),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

let cachedConfig: AppConfig | null = null;

/**
 * Parse a config object (already read from YAML) and apply environment overrides.
 */
export function buildConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = AppConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const cfg = parsed.data;

  const envName = LogLevelSchema.safeParse(env.LOG_LEVEL);
  if (envName.success) cfg.logging.level = envName.data;

  const appEnv = z.enum(['dev', 'prod', 'test']).safeParse(env.NODE_ENV);
  if (appEnv.success) cfg.app.env = appEnv.data;

  if (!cfg.adapters.qq.token && env.QQ_ADAPTER_TOKEN) {
    cfg.adapters.qq.token = env.QQ_ADAPTER_TOKEN;
  }
  if (env.STREAKWATCH_DATA_DIR) cfg.storage.dataDir = env.STREAKWATCH_DATA_DIR;

  // Auto-disable QQ adapter if token is missing in prod (warn instead of fail)
  if (cfg.adapters.qq.enabled && cfg.app.env === 'prod' && !cfg.adapters.qq.token) {
    console.warn(
      '[CONFIG] QQ adapter enabled in prod but no token configured. Disabling adapter. Set adapters.qq.token or QQ_ADAPTER_TOKEN to enable.',
    );
    cfg.adapters.qq.enabled = false;
  }
  return cfg;
}

export function loadConfig(filePath?: string): AppConfig {
  if (cachedConfig && !filePath) return cachedConfig;
  const target = filePath ?? resolve(process.cwd(), 'config', 'default.yaml');
  const raw: unknown = parse(readFileSync(target, 'utf-8'));
  const cfg = buildConfig(raw);
  if (!filePath) cachedConfig = cfg;
  return cfg;
}
