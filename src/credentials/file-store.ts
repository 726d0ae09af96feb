import { readFile, writeFile, mkdir, rename, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { dirname, join } from 'node:path';
import { Mutex } from 'async-mutex';
import type {
  Credential,
  CredentialPatch,
  DailyUsage,
  NewCredentialInput,
} from './credential.js';
import { createCredential, checkProxyUrl } from './credential.js';
import type { CredentialStore } from './store.js';
import { CredentialNotFoundError, InvalidCredentialError } from './store.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import { generateCredentialId, generateId } from '../utils/id.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('store');

export interface CredentialStoreData {
  version: 1;
  credentials: Credential[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value ? value : undefined;
}

function count(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

/** Rebuild a credential from disk, or null when the entry is unusable */
function parseCredential(raw: unknown): Credential | null {
  if (!isRecord(raw)) return null;
  if (typeof raw.id !== 'string' || !raw.id) return null;
  if (typeof raw.secret !== 'string' || !raw.secret) return null;
  const createdAt = optionalString(raw.createdAt) ?? new Date(0).toISOString();
  return {
    id: raw.id,
    label: typeof raw.label === 'string' ? raw.label : raw.id,
    secret: raw.secret,
    proxy: optionalString(raw.proxy),
    active: raw.active !== false,
    lifetimeSuccessCount: count(raw.lifetimeSuccessCount),
    lifetimeErrorCount: count(raw.lifetimeErrorCount),
    dailyUsedCount: count(raw.dailyUsedCount),
    dailyDate: optionalString(raw.dailyDate) ?? '',
    lastUsedAt: optionalString(raw.lastUsedAt),
    createdAt,
    updatedAt: optionalString(raw.updatedAt) ?? createdAt,
  };
}

/** Identifies one version of the file on disk */
interface FileStamp {
  ino: number;
  mtimeMs: number;
  size: number;
}

function stampOf(info: Stats): FileStamp {
  return { ino: info.ino, mtimeMs: info.mtimeMs, size: info.size };
}

function sameStamp(a: FileStamp, b: FileStamp): boolean {
  return a.ino === b.ino && a.mtimeMs === b.mtimeMs && a.size === b.size;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Credential store backed by a single JSON file.
 *
 * The server and CLI commands may share one file. Reads reload it when its
 * stamp has changed since this instance last saw it; every mutation re-reads
 * it, applies the change and writes it back while holding `lock`, so edits
 * from another process are merged rather than overwritten.
 */
export class FileCredentialStore implements CredentialStore {
  private credentials = new Map<string, Credential>();
  private filePath: string;
  private lock = new Mutex();
  private stamp: FileStamp | null = null;

  constructor(dataDir: string, private clock: Clock = systemClock) {
    this.filePath = join(dataDir, 'credentials.json');
  }

  getFilePath(): string {
    return this.filePath;
  }

  async load(): Promise<void> {
    await this.lock.runExclusive(() => this.readFromDisk());
  }

  /** Caller must hold `lock` */
  private async readFromDisk(): Promise<void> {
    let content: string;
    let stamp: FileStamp;
    try {
      const info = await stat(this.filePath);
      content = await readFile(this.filePath, 'utf-8');
      stamp = stampOf(info);
    } catch (err) {
      if (isMissing(err)) {
        this.credentials.clear();
        this.stamp = null;
        return;
      }
      throw err;
    }

    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed) || parsed.version !== 1 || !Array.isArray(parsed.credentials)) {
      throw new Error(`Unrecognized credential file format: ${this.filePath}`);
    }

    this.credentials.clear();
    for (const entry of parsed.credentials) {
      const credential = parseCredential(entry);
      if (!credential) {
        log.warn('Skipping malformed credential entry in ' + this.filePath);
        continue;
      }
      this.credentials.set(credential.id, credential);
    }
    this.stamp = stamp;
    log.debug(`Loaded ${this.credentials.size} credentials`);
  }

  /** Reload only when another writer has touched the file. Caller must hold `lock`. */
  private async syncFromDisk(): Promise<void> {
    let current: FileStamp | null;
    try {
      const info = await stat(this.filePath);
      current = stampOf(info);
    } catch (err) {
      if (!isMissing(err)) throw err;
      current = null;
    }
    if (current === null && this.stamp === null) return;
    if (current && this.stamp && sameStamp(current, this.stamp)) return;
    await this.readFromDisk();
  }

  /** Caller must hold `lock` */
  private async writeToDisk(): Promise<void> {
    const data: CredentialStoreData = {
      version: 1,
      credentials: Array.from(this.credentials.values()),
    };
    await mkdir(dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${generateId(8)}.tmp`;
    await writeFile(tmp, JSON.stringify(data, null, 2), { encoding: 'utf-8', mode: 0o600 });
    await rename(tmp, this.filePath);
    const info = await stat(this.filePath);
    this.stamp = stampOf(info);
  }

  /** Read-modify-write against the latest file contents */
  private mutate<T>(change: () => T): Promise<T> {
    return this.lock.runExclusive(async () => {
      await this.readFromDisk();
      const result = change();
      await this.writeToDisk();
      return result;
    });
  }

  private read<T>(view: () => T): Promise<T> {
    return this.lock.runExclusive(async () => {
      await this.syncFromDisk();
      return view();
    });
  }

  /** Reset the daily window when its date is not today. Returns true if it rolled. */
  private rollover(credential: Credential): boolean {
    const today = this.clock.today();
    if (credential.dailyDate === today) return false;
    credential.dailyUsedCount = 0;
    credential.dailyDate = today;
    return true;
  }

  private require(id: string): Credential {
    const credential = this.credentials.get(id);
    if (!credential) throw new CredentialNotFoundError(id);
    return credential;
  }

  async listActiveCredentials(): Promise<Credential[]> {
    return this.read(() => Array.from(this.credentials.values())
      .filter(c => c.active)
      .sort((a, b) =>
        a.lifetimeSuccessCount - b.lifetimeSuccessCount || a.createdAt.localeCompare(b.createdAt))
      .map(c => ({ ...c })));
  }

  async dailyUsage(id: string): Promise<DailyUsage> {
    return this.read(() => {
      const credential = this.credentials.get(id);
      if (!credential) return { count: 0, date: this.clock.today() };
      this.rollover(credential);
      return { count: credential.dailyUsedCount, date: credential.dailyDate };
    });
  }

  async incrementSuccess(id: string): Promise<void> {
    await this.mutate(() => {
      const credential = this.require(id);
      this.rollover(credential);
      const now = this.clock.now().toISOString();
      credential.lifetimeSuccessCount++;
      credential.dailyUsedCount++;
      credential.lastUsedAt = now;
      credential.updatedAt = now;
    });
  }

  async incrementFailure(id: string): Promise<void> {
    await this.mutate(() => {
      const credential = this.require(id);
      this.rollover(credential);
      const now = this.clock.now().toISOString();
      credential.lifetimeErrorCount++;
      credential.lastUsedAt = now;
      credential.updatedAt = now;
    });
  }

  async get(id: string): Promise<Credential | null> {
    return this.read(() => {
      const credential = this.credentials.get(id);
      return credential ? { ...credential } : null;
    });
  }

  /** All credentials, newest first */
  async list(): Promise<Credential[]> {
    return this.read(() => Array.from(this.credentials.values())
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map(c => ({ ...c })));
  }

  async add(input: NewCredentialInput): Promise<Credential> {
    if (!input.label.trim()) throw new InvalidCredentialError('Credential label must not be empty');
    if (!input.secret.trim()) throw new InvalidCredentialError('Credential secret must not be empty');
    if (input.proxy) {
      const problem = checkProxyUrl(input.proxy);
      if (problem) throw new InvalidCredentialError(problem);
    }

    const credential = await this.mutate(() => {
      let id = generateCredentialId();
      while (this.credentials.has(id)) id = generateCredentialId();
      const created = createCredential(
        { ...input, label: input.label.trim(), secret: input.secret.trim() },
        id,
        this.clock.now(),
        this.clock.today(),
      );
      this.credentials.set(id, created);
      return { ...created };
    });
    log.info(`Added credential ${credential.label} (${credential.id})`);
    return credential;
  }

  async update(id: string, patch: CredentialPatch): Promise<Credential> {
    if (patch.label !== undefined && !patch.label.trim()) {
      throw new InvalidCredentialError('Credential label must not be empty');
    }
    if (patch.secret !== undefined && !patch.secret.trim()) {
      throw new InvalidCredentialError('Credential secret must not be empty');
    }
    if (patch.proxy) {
      const problem = checkProxyUrl(patch.proxy);
      if (problem) throw new InvalidCredentialError(problem);
    }

    const credential = await this.mutate(() => {
      const target = this.require(id);
      if (patch.label !== undefined) target.label = patch.label.trim();
      if (patch.secret !== undefined) target.secret = patch.secret.trim();
      if (patch.proxy !== undefined) target.proxy = patch.proxy || undefined;
      if (patch.active !== undefined) target.active = patch.active;
      target.updatedAt = this.clock.now().toISOString();
      return { ...target };
    });
    log.info(`Updated credential ${credential.label} (${id})`);
    return credential;
  }

  async remove(id: string): Promise<boolean> {
    const existed = await this.mutate(() => this.credentials.delete(id));
    if (existed) log.info(`Removed credential ${id}`);
    return existed;
  }
}
