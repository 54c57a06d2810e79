// src/security/audit-logger.ts

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../config/logger.js';
import { AuditEntry } from '../types/index.js';

// Queries longer than this are cut before they are written
export const MAX_AUDITED_QUERY_LENGTH = 200;

export type AuditRecord = Omit<AuditEntry, 'timestamp' | 'queryLength'>;

/**
 * Buffers one JSON line per validation call and appends them to a daily file
 * under `logPath`, either when the buffer fills up or on a timer.
 */
export class AuditLogger {
  private buffer: AuditEntry[] = [];
  private flushInterval: NodeJS.Timeout;

  constructor(
    private logPath: string,
    private bufferSize: number = 100,
    flushIntervalMs: number = 30000
  ) {
    // Flush buffer periodically
    this.flushInterval = setInterval(() => {
      this.flush().catch(error => logger.error('Scheduled audit flush failed', error));
    }, flushIntervalMs);
    this.flushInterval.unref();
  }

  async log(record: AuditRecord): Promise<void> {
    this.buffer.push({
      ...record,
      timestamp: new Date(),
      queryLength: record.query.length,
      query: record.query.slice(0, MAX_AUDITED_QUERY_LENGTH)
    });

    if (this.buffer.length >= this.bufferSize) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;

    const entries = [...this.buffer];
    this.buffer = [];

    try {
      await fs.mkdir(this.logPath, { recursive: true });
      const logFile = path.join(this.logPath, `audit-${this.getDateString()}.log`);
      const logLines = entries.map(e => JSON.stringify(e)).join('\n') + '\n';

      await fs.appendFile(logFile, logLines, 'utf8');
    } catch (error) {
      logger.error('Failed to write audit log', error);
      // Put entries back in buffer
      this.buffer.unshift(...entries);
    }
  }

  private getDateString(): string {
    const now = new Date();
    return `${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, '0')}-${String(now.getDate()).padStart(2, '0')}`;
  }

  async close(): Promise<void> {
    clearInterval(this.flushInterval);
    await this.flush();
  }
}
