import { Mutex } from 'async-mutex';
import type { Credential } from '../credentials/credential.js';
import type { CredentialStore } from '../credentials/store.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('pool');

export interface SchedulerOptions {
  /** Successful uses per credential per day */
  dailyQuota: number;
  /** Reload the active list when the cache is older than this (default 30s) */
  cacheTtlMs?: number;
  /** Warn once a credential's lifetime error count reaches this (default 10) */
  errorWarnThreshold?: number;
  clock?: Clock;
}

export interface SelectOptions {
  /** Credential ids this caller must not be given */
  exclude?: ReadonlySet<string>;
}

export interface PoolStats {
  total: number;
  active: number;
  inactive: number;
  /** Active credentials whose day usage has reached the quota */
  exhausted: number;
  totalUses: number;
  totalErrors: number;
  errorRate: number;
}

/**
 * Round-robin scheduler over the active credentials in a store.
 *
 * The cached list, cursor and cache timestamp are shared by every in-flight
 * request and only touched while holding `lock`. The lock covers store reads
 * during selection, never the backend call itself.
 */
export class CredentialScheduler {
  private lock = new Mutex();
  private cache: Credential[] = [];
  private cursor = 0;
  private cachedAt: number | null = null;

  private readonly dailyQuota: number;
  private readonly cacheTtlMs: number;
  private readonly errorWarnThreshold: number;
  private readonly clock: Clock;

  constructor(private store: CredentialStore, options: SchedulerOptions) {
    this.dailyQuota = options.dailyQuota;
    this.cacheTtlMs = options.cacheTtlMs ?? 30_000;
    this.errorWarnThreshold = options.errorWarnThreshold ?? 10;
    this.clock = options.clock ?? systemClock;
  }

  getQuota(): number {
    return this.dailyQuota;
  }

  /** Current pool size as of the last refresh */
  get size(): number {
    return this.cache.length;
  }

  async refresh(force = false): Promise<void> {
    await this.lock.runExclusive(() => this.refreshLocked(force));
  }

  /** Caller must hold `lock` */
  private async refreshLocked(force: boolean): Promise<void> {
    const now = this.clock.now().getTime();
    const stale = this.cachedAt === null || now - this.cachedAt > this.cacheTtlMs;
    if (!force && !stale && this.cache.length > 0) return;

    this.cache = await this.store.listActiveCredentials();
    this.cachedAt = now;
    if (this.cursor >= this.cache.length) {
      this.cursor = 0;
    }
    log.debug(`Refreshed pool: ${this.cache.length} active credentials`);
  }

  /**
   * Pick the next credential with quota left, starting at the cursor.
   * Probes each pooled credential at most once; null means the pool is
   * exhausted for this caller.
   */
  async selectCredential(options: SelectOptions = {}): Promise<Credential | null> {
    return this.lock.runExclusive(async () => {
      await this.refreshLocked(false);

      if (this.cache.length === 0) {
        log.warn('No active credentials in pool');
        return null;
      }

      const probes = this.cache.length;
      for (let i = 0; i < probes; i++) {
        const credential = this.cache[this.cursor];
        this.cursor = (this.cursor + 1) % this.cache.length;

        if (options.exclude?.has(credential.id)) continue;

        const usage = await this.store.dailyUsage(credential.id);
        if (usage.count < this.dailyQuota) {
          log.info(`Selected credential ${credential.label} (${credential.id}, today ${usage.count}/${this.dailyQuota})`);
          return credential;
        }
        log.debug(`Credential ${credential.label} is at its daily quota (${usage.count}/${this.dailyQuota})`);
      }

      log.error('Every credential in the pool is out of quota');
      return null;
    });
  }

  async recordOutcome(id: string, success: boolean): Promise<void> {
    if (success) {
      await this.store.incrementSuccess(id);
    } else {
      await this.store.incrementFailure(id);
      const credential = await this.store.get(id);
      if (credential && credential.lifetimeErrorCount >= this.errorWarnThreshold) {
        log.warn(`Credential ${credential.label} has failed ${credential.lifetimeErrorCount} times, check it`);
      }
    }
    await this.refresh(true);
  }

  /** Reporting only; selection always re-reads usage from the store */
  async remainingQuota(id: string): Promise<number> {
    const usage = await this.store.dailyUsage(id);
    return Math.max(0, this.dailyQuota - usage.count);
  }

  async getStats(): Promise<PoolStats> {
    await this.refresh();

    const all = await this.store.list();
    const active = all.filter(c => c.active);
    let exhausted = 0;
    for (const c of active) {
      const usage = await this.store.dailyUsage(c.id);
      if (usage.count >= this.dailyQuota) exhausted++;
    }

    const totalUses = all.reduce((sum, c) => sum + c.lifetimeSuccessCount, 0);
    const totalErrors = all.reduce((sum, c) => sum + c.lifetimeErrorCount, 0);

    return {
      total: all.length,
      active: active.length,
      inactive: all.length - active.length,
      exhausted,
      totalUses,
      totalErrors,
      errorRate: totalUses > 0 ? totalErrors / totalUses : 0,
    };
  }
}
