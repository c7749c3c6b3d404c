/**
 * JsonlEventStore: file-backed EventStore, one JSONL file per chat.
 *
 * - Append only, never rewritten
 * - First line is the chat header (`open`), each further line a `commit`
 *   carrying one event plus the projection after it
 * - A commit is a single appended line, so event and projection land together
 * - A torn last line (a crash mid-append) is cut off on load, so the next
 *   commit starts on a fresh line
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { ChatLock } from '../concurrency/ChatLock.js';
import type { EventStore, StoredChat } from '../streak/EventStore.js';
import type { ChatHeader, ChatState, StreakEvent } from '../streak/types.js';
import { LogRecordSchema, type LogRecord } from '../streak/schema.js';
import { describeError, type Logger } from '../../infra/logger/logger.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonlEventStore implements EventStore {
  private logDir: string;
  private logger: Logger;
  // Reads (which may repair the file) and appends of one chat never interleave
  private io = new ChatLock();

  constructor(logger: Logger, logDir: string = './data/events') {
    this.logger = logger;
    this.logDir = logDir;
  }

  /**
   * Create the log directory
   */
  async initialize(): Promise<void> {
    this.logger.info('event-store', `Initializing event log at ${this.logDir}`);
    await fs.mkdir(this.logDir, { recursive: true });
  }

  private fileFor(chatId: string): string {
    return path.join(this.logDir, `${encodeURIComponent(chatId)}.jsonl`);
  }

  private async appendRecord(chatId: string, record: LogRecord): Promise<void> {
    const line = JSON.stringify(record) + '\n';
    try {
      await fs.appendFile(this.fileFor(chatId), line, 'utf-8');
    } catch (error) {
      this.logger.error('event-store', `Failed to append to log of ${chatId}: ${describeError(error)}`);
      throw error;
    }
  }

  async open(header: ChatHeader): Promise<void> {
    await this.io.runExclusive(header.chatId, async () => {
      const existing = await this.readLog(header.chatId);
      if (existing) return;
      await this.appendRecord(header.chatId, { type: 'open', header });
      this.logger.debug('event-store', `Opened log for ${header.chatId}`);
    });
  }

  async commit(chatId: string, event: StreakEvent, projection: ChatState): Promise<void> {
    await this.io.runExclusive(chatId, () => this.appendRecord(chatId, { type: 'commit', event, projection }));
    this.logger.debug('event-store', `Committed event #${event.id} (${event.kind}) for ${chatId}`);
  }

  async load(chatId: string): Promise<StoredChat | null> {
    return this.io.runExclusive(chatId, () => this.readLog(chatId));
  }

  private async readLog(chatId: string): Promise<StoredChat | null> {
    const file = this.fileFor(chatId);
    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    const lines = content.split('\n').filter((line) => line.trim().length > 0);
    let stored: StoredChat | null = null;
    let torn = false;

    for (const [index, line] of lines.entries()) {
      const record = this.parseLine(line);
      if (!record) {
        // A torn final line is a commit that never completed
        if (index === lines.length - 1) {
          await this.cutTornTail(file, content, line);
          torn = true;
          this.logger.warn('event-store', `Dropped incomplete last record in log of ${chatId}`);
          break;
        }
        throw new Error(`Corrupted record at line ${index + 1} in log of ${chatId}`);
      }

      if (record.type === 'open') {
        if (stored) throw new Error(`Duplicate header in log of ${chatId}`);
        stored = { header: record.header, events: [], projection: null };
        continue;
      }

      if (!stored) throw new Error(`Log of ${chatId} does not start with a header`);
      stored.events.push(record.event);
      stored.projection = record.projection;
    }

    // Complete record but the newline never made it
    if (!torn && content.length > 0 && !content.endsWith('\n')) {
      await fs.appendFile(file, '\n', 'utf-8');
    }
    return stored;
  }

  private parseLine(line: string): LogRecord | null {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return null;
    }
    const parsed = LogRecordSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  /** Truncate the file to the end of its last complete line. */
  private async cutTornTail(file: string, content: string, torn: string): Promise<void> {
    const keep = content.slice(0, content.lastIndexOf(torn));
    await fs.truncate(file, Buffer.byteLength(keep, 'utf-8'));
  }
}
