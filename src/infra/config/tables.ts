import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { AppConfig } from './config.js';

/** char -> alternative spellings / look-alike characters */
const CharTableSchema = z.record(z.string().min(1), z.array(z.string()));
/** word form -> lemma */
const LemmaTableSchema = z.record(z.string().min(1), z.string().min(1));

export type CharTable = z.infer<typeof CharTableSchema>;
export type LemmaTable = z.infer<typeof LemmaTableSchema>;

export interface StaticTables {
  confusables: CharTable;
  transliteration: CharTable;
  lemmas: LemmaTable;
}

function readTable<T>(schema: z.ZodType<T>, filePath: string, baseDir: string): T {
  const target = resolve(baseDir, filePath);
  const raw: unknown = JSON.parse(readFileSync(target, 'utf-8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid table ${target}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}

/**
 * Load the confusable, transliteration and lemma tables named in the config.
 * Relative paths resolve against `baseDir` (the working directory by default).
 */
export function loadStaticTables(cfg: AppConfig, baseDir: string = process.cwd()): StaticTables {
  const { tables } = cfg.triggers;
  return {
    confusables: readTable(CharTableSchema, tables.confusables, baseDir),
    transliteration: readTable(CharTableSchema, tables.transliteration, baseDir),
    lemmas: readTable(LemmaTableSchema, tables.lemmas, baseDir),
  };
}
