/**
 * Outbox implementations
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Outbox, OutboxRecord } from './types';

/**
 * Outbox kept in memory, for tests and dry runs
 */
export class MemoryOutbox implements Outbox {
  private records: OutboxRecord[] = [];

  async append(record: OutboxRecord): Promise<void> {
    this.records.push(record);
  }

  async list(): Promise<OutboxRecord[]> {
    return [...this.records];
  }
}

function isOutboxRecord(value: unknown): value is OutboxRecord {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  const payload = record.payload;
  return typeof record.messageId === 'string' &&
    typeof record.channel === 'string' &&
    typeof record.recipient === 'string' &&
    typeof record.deliveredAt === 'string' &&
    typeof payload === 'object' && payload !== null &&
    Object.values(payload).every((v) => typeof v === 'string');
}

/**
 * Outbox stored as JSON lines, one record per line
 */
export class FileOutbox implements Outbox {
  constructor(readonly filePath: string) {}

  async append(record: OutboxRecord): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.appendFile(this.filePath, JSON.stringify(record) + '\n', 'utf-8');
  }

  async list(): Promise<OutboxRecord[]> {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }

    const content = await fs.promises.readFile(this.filePath, 'utf-8');
    const records: OutboxRecord[] = [];

    content.split('\n').forEach((line, index) => {
      if (!line.trim()) {
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        parsed = undefined;
      }
      if (isOutboxRecord(parsed)) {
        records.push(parsed);
      } else {
        console.warn(`Warning: skipping malformed outbox line ${index + 1} in ${this.filePath}`);
      }
    });

    return records;
  }
}
