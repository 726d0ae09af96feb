import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, appendFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileAttemptLog } from '../../src/generation/attempt-log.js';
import type { AttemptRecord } from '../../src/generation/attempt-log.js';
import { ManualClock } from '../../src/utils/clock.js';

function attempt(credentialId: string, overrides: Partial<AttemptRecord> = {}): AttemptRecord {
  return {
    prompt: 'a fox',
    width: 1024,
    height: 1024,
    credentialId,
    outcome: 'success',
    imageRef: 'https://images.example.test/fox.png',
    ...overrides,
  };
}

describe('FileAttemptLog', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'imagerelay-attempts-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should return nothing before the first write', async () => {
    const log = new FileAttemptLog(tempDir);
    expect(await log.recent()).toEqual([]);
  });

  it('should append entries and read them newest first', async () => {
    const log = new FileAttemptLog(join(tempDir, 'nested'));
    log.record(attempt('c1'));
    await log.flush();
    log.record(attempt('c2', { outcome: 'failure', errorKind: 'rate_limited', errorMessage: 'slow down', imageRef: undefined }));
    await log.flush();

    const entries = await log.recent();

    expect(entries.map(e => e.credentialId)).toEqual(['c2', 'c1']);
    expect(entries[0]).toMatchObject({ outcome: 'failure', errorKind: 'rate_limited', errorMessage: 'slow down' });
    expect(entries[1].imageRef).toBe('https://images.example.test/fox.png');
    expect(typeof entries[0].id).toBe('string');
    expect(Number.isNaN(Date.parse(entries[0].timestamp))).toBe(false);
  });

  it('should honor the limit', async () => {
    const log = new FileAttemptLog(tempDir);
    for (let i = 0; i < 5; i++) {
      log.record(attempt(`c${i}`));
      await log.flush();
    }

    expect((await log.recent(2)).map(e => e.credentialId)).toEqual(['c4', 'c3']);
  });

  it('should skip unreadable lines', async () => {
    const log = new FileAttemptLog(tempDir);
    log.record(attempt('c1'));
    await log.flush();
    await appendFile(log.getFilePath(), 'not json\n{"id":1}\n');

    expect((await log.recent()).map(e => e.credentialId)).toEqual(['c1']);
  });

  it('should not throw when the write fails', async () => {
    const blocker = join(tempDir, 'blocker');
    await writeFile(blocker, 'a file, not a directory');
    const log = new FileAttemptLog(blocker);

    expect(() => log.record(attempt('c1'))).not.toThrow();
    await expect(log.flush()).resolves.toBeUndefined();
  });

  it('should stamp entries with the injected clock', async () => {
    const clock = new ManualClock(new Date('2026-03-14T23:59:30.000Z'));
    const log = new FileAttemptLog(tempDir, clock);
    log.record(attempt('c1'));
    await log.flush();

    expect((await log.recent())[0].timestamp).toBe('2026-03-14T23:59:30.000Z');
  });
});
