import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { FailureKind } from '../backend/adapter.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import { generateId } from '../utils/id.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('attempts');

export type AttemptOutcome = 'success' | 'failure';

export interface AttemptRecord {
  prompt: string;
  width: number;
  height: number;
  credentialId: string;
  outcome: AttemptOutcome;
  errorKind?: FailureKind;
  errorMessage?: string;
  /** Image URL, or "base64" when the image only came back inline */
  imageRef?: string;
}

export interface AttemptLogEntry extends AttemptRecord {
  id: string;
  timestamp: string;
}

/** Fire-and-forget sink: `record` never throws and never blocks a request */
export interface AttemptLogger {
  record(attempt: AttemptRecord): void;
}

function isEntry(value: unknown): value is AttemptLogEntry {
  if (value === null || typeof value !== 'object') return false;
  return 'id' in value && typeof value.id === 'string' &&
    'timestamp' in value && typeof value.timestamp === 'string' &&
    'credentialId' in value && typeof value.credentialId === 'string' &&
    'outcome' in value && (value.outcome === 'success' || value.outcome === 'failure');
}

/** Append-only JSON Lines log of credential attempts */
export class FileAttemptLog implements AttemptLogger {
  private filePath: string;
  private pending = new Set<Promise<void>>();

  constructor(dataDir: string, private clock: Clock = systemClock) {
    this.filePath = join(dataDir, 'attempts.jsonl');
  }

  getFilePath(): string {
    return this.filePath;
  }

  record(attempt: AttemptRecord): void {
    const entry: AttemptLogEntry = {
      id: generateId(),
      timestamp: this.clock.now().toISOString(),
      ...attempt,
    };
    const write = this.append(entry)
      .catch((err: unknown) => {
        log.warn(`Failed to write attempt log: ${err instanceof Error ? err.message : String(err)}`);
      })
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);
  }

  private async append(entry: AttemptLogEntry): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  /** Wait for writes still in flight (used on shutdown and in tests) */
  async flush(): Promise<void> {
    await Promise.all(this.pending);
  }

  /** Newest entries first */
  async recent(limit = 20): Promise<AttemptLogEntry[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    const entries: AttemptLogEntry[] = [];
    const lines = content.split('\n');
    for (let i = lines.length - 1; i >= 0 && entries.length < limit; i--) {
      const line = lines[i].trim();
      if (!line) continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isEntry(parsed)) entries.push(parsed);
      } catch {
        log.debug(`Skipping unreadable attempt log line ${i + 1}`);
      }
    }
    return entries;
  }
}
