/**
 * Generic JSONL (JSON Lines) audit logger
 */

import { appendFile, readFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';

/**
 * Base interface for audit entries
 * All audit entries must have a timestamp
 */
export interface BaseAuditEntry {
  timestamp: string;
  [key: string]: unknown;
}

export interface AuditReadOptions<T> {
  /** Maximum number of entries to return (default: 100) */
  limit?: number;
  filter?: (entry: T) => boolean;
  /** Sort by timestamp descending (most recent first) - default: true */
  sortDescending?: boolean;
}

/**
 * A fixed path, or a resolver called on every write (used for date-based rotation).
 */
export type LogPathSource = string | (() => string);

/**
 * Generic JSONL logger for audit trails
 *
 * @example
 * ```typescript
 * interface RunAuditEntry extends BaseAuditEntry {
 *   language: string;
 *   exitCode: number;
 * }
 *
 * const auditLog = new JsonlLogger<RunAuditEntry>(dailyLogPath('/var/log/sandbox', 'executions'));
 * await auditLog.write({ timestamp: createTimestamp(), language: 'python', exitCode: 0 });
 * ```
 */
export class JsonlLogger<T extends BaseAuditEntry> {
  private pathSource: LogPathSource;
  private readyDirs = new Set<string>();

  constructor(pathSource: LogPathSource) {
    this.pathSource = pathSource;
  }

  private async ensureDir(logPath: string): Promise<void> {
    const dir = dirname(logPath);
    if (this.readyDirs.has(dir)) return;
    await mkdir(dir, { recursive: true });
    this.readyDirs.add(dir);
  }

  async write(entry: T): Promise<void> {
    const logPath = this.getPath();
    await this.ensureDir(logPath);
    await appendFile(logPath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  /**
   * Read entries from the current log file with optional filtering.
   * Lines that are not valid JSON are skipped.
   */
  async read(options: AuditReadOptions<T> = {}): Promise<T[]> {
    const logPath = this.getPath();
    if (!existsSync(logPath)) {
      return [];
    }

    const content = await readFile(logPath, 'utf-8');
    const lines = content.trim().split('\n').filter(Boolean);

    let entries: T[] = lines
      .map((line) => {
        try {
          return JSON.parse(line) as T;
        } catch {
          return null;
        }
      })
      .filter((e): e is T => e !== null);

    if (options.filter) {
      entries = entries.filter(options.filter);
    }

    const sortDescending = options.sortDescending ?? true;
    entries.sort((a, b) => {
      const timeA = new Date(a.timestamp).getTime();
      const timeB = new Date(b.timestamp).getTime();
      return sortDescending ? timeB - timeA : timeA - timeB;
    });

    return entries.slice(0, options.limit ?? 100);
  }

  /**
   * Path the next write goes to
   */
  getPath(): string {
    return typeof this.pathSource === 'string' ? this.pathSource : this.pathSource();
  }
}

/**
 * Path resolver for one file per UTC day: `<dir>/<prefix>-YYYY-MM-DD.jsonl`.
 */
export function dailyLogPath(dir: string, prefix: string, now: () => Date = () => new Date()): () => string {
  return () => join(dir, `${prefix}-${now().toISOString().slice(0, 10)}.jsonl`);
}

export function createTimestamp(): string {
  return new Date().toISOString();
}
