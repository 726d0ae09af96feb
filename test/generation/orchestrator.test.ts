import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { GenerationOrchestrator } from '../../src/generation/orchestrator.js';
import type { OrchestratorOptions } from '../../src/generation/orchestrator.js';
import type { AttemptRecord } from '../../src/generation/attempt-log.js';
import { CredentialScheduler } from '../../src/pool/scheduler.js';
import { FileCredentialStore } from '../../src/credentials/file-store.js';
import { failure } from '../../src/backend/adapter.js';
import type { BackendAdapter, BackendResult } from '../../src/backend/adapter.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { ManualClock } from '../../src/utils/clock.js';

const IMAGE_URL = 'https://images.example.test/fox.png';

function okResult(): BackendResult {
  return { ok: true, image: { imageUrl: IMAGE_URL, mimeType: 'image/png' } };
}

describe('GenerationOrchestrator', () => {
  let tempDir: string;
  let clock: ManualClock;
  let store: FileCredentialStore;
  let call: Mock<BackendAdapter['call']>;
  let record: Mock<(attempt: AttemptRecord) => void>;
  let sleep: Mock<(ms: number) => Promise<void>>;

  const options = (): OrchestratorOptions => ({
    retry: { maxCredentialAttempts: 3, maxAttemptsPerCredential: 3, retryDelayMs: 1000 },
    limits: DEFAULT_CONFIG.limits,
    defaults: { width: 1024, height: 1024, model: 'z-image-turbo', steps: 9 },
    sleep,
  });

  function build(dailyQuota = 100): { orchestrator: GenerationOrchestrator; scheduler: CredentialScheduler } {
    const scheduler = new CredentialScheduler(store, { dailyQuota, clock });
    const adapter: BackendAdapter = { name: 'fake', call };
    const orchestrator = new GenerationOrchestrator(scheduler, adapter, { record }, options());
    return { orchestrator, scheduler };
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'imagerelay-gen-'));
    clock = new ManualClock(new Date(2026, 2, 14, 10, 0, 0));
    store = new FileCredentialStore(tempDir, clock);
    await store.load();
    call = vi.fn<BackendAdapter['call']>();
    record = vi.fn<(attempt: AttemptRecord) => void>();
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => {});
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should return the image from the first credential', async () => {
    const alpha = await store.add({ label: 'alpha', secret: 'test-secret-a' });
    call.mockResolvedValue(okResult());
    const { orchestrator } = build();

    const result = await orchestrator.generate({ prompt: '  a red fox  ' });

    expect(result).toEqual({ ok: true, imageUrl: IMAGE_URL });
    expect(call).toHaveBeenCalledTimes(1);
    expect(call.mock.calls[0][0].id).toBe(alpha.id);
    expect(call.mock.calls[0][1]).toEqual({
      prompt: 'a red fox',
      width: 1024,
      height: 1024,
      model: 'z-image-turbo',
      steps: 9,
    });
    expect(record).toHaveBeenCalledWith({
      prompt: 'a red fox',
      width: 1024,
      height: 1024,
      credentialId: alpha.id,
      outcome: 'success',
      errorKind: undefined,
      errorMessage: undefined,
      imageRef: IMAGE_URL,
    });
    const stored = await store.get(alpha.id);
    expect(stored?.lifetimeSuccessCount).toBe(1);
    expect(stored?.dailyUsedCount).toBe(1);
  });

  it('should log inline images as base64', async () => {
    await store.add({ label: 'alpha', secret: 'test-secret-a' });
    call.mockResolvedValue({ ok: true, image: { imageBase64: 'aGVsbG8=' } });
    const { orchestrator } = build();

    const result = await orchestrator.generate({ prompt: 'fox' });

    expect(result).toEqual({ ok: true, imageBase64: 'aGVsbG8=' });
    expect(record.mock.calls[0][0].imageRef).toBe('base64');
  });

  it('should retry a rate limit on the same credential with growing delays', async () => {
    const alpha = await store.add({ label: 'alpha', secret: 'test-secret-a' });
    call
      .mockResolvedValueOnce(failure('rate_limited', 'Backend rate limit reached', 429))
      .mockResolvedValueOnce(failure('rate_limited', 'Backend rate limit reached', 429))
      .mockResolvedValueOnce(okResult());
    const { orchestrator } = build();

    const result = await orchestrator.generate({ prompt: 'fox' });

    expect(result.ok).toBe(true);
    expect(call).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(c => c[0])).toEqual([1000, 2000]);
    expect(record).toHaveBeenCalledTimes(1);
    expect(record.mock.calls[0][0].outcome).toBe('success');
    const stored = await store.get(alpha.id);
    expect(stored?.lifetimeSuccessCount).toBe(1);
    expect(stored?.lifetimeErrorCount).toBe(0);
  });

  it('should exclude rejected credentials and report the last failure', async () => {
    await store.add({ label: 'alpha', secret: 'test-secret-a' });
    await store.add({ label: 'beta', secret: 'test-secret-b' });
    call.mockImplementation(async credential =>
      failure('auth_invalid', `token rejected for ${credential.label}`, 401));
    const { orchestrator } = build();

    const result = await orchestrator.generate({ prompt: 'fox' });

    expect(result).toEqual({
      ok: false,
      error: 'All credential attempts failed: token rejected for beta',
      code: 'exhausted',
    });
    expect(call.mock.calls.map(c => c[0].label)).toEqual(['alpha', 'beta']);
    expect(sleep).not.toHaveBeenCalled();
    expect(record).toHaveBeenCalledTimes(2);
  });

  it('should fail over to the next credential on a server error', async () => {
    const alpha = await store.add({ label: 'alpha', secret: 'test-secret-a' });
    const beta = await store.add({ label: 'beta', secret: 'test-secret-b' });
    call
      .mockResolvedValueOnce(failure('server_error', 'Backend error: HTTP 500', 500))
      .mockResolvedValueOnce(okResult());
    const { orchestrator } = build();

    const result = await orchestrator.generate({ prompt: 'fox' });

    expect(result).toEqual({ ok: true, imageUrl: IMAGE_URL });
    expect(call.mock.calls.map(c => c[0].id)).toEqual([alpha.id, beta.id]);
    expect(record.mock.calls.map(c => [c[0].credentialId, c[0].outcome, c[0].errorKind])).toEqual([
      [alpha.id, 'failure', 'server_error'],
      [beta.id, 'success', undefined],
    ]);
    expect((await store.get(alpha.id))?.lifetimeErrorCount).toBe(1);
  });

  it('should abort on a bad request without failing over', async () => {
    await store.add({ label: 'alpha', secret: 'test-secret-a' });
    await store.add({ label: 'beta', secret: 'test-secret-b' });
    call.mockResolvedValue(failure('bad_request', 'Invalid request: prompt rejected', 400));
    const { orchestrator } = build();

    const result = await orchestrator.generate({ prompt: 'fox' });

    expect(result).toEqual({ ok: false, error: 'Invalid request: prompt rejected', code: 'bad_request' });
    expect(call).toHaveBeenCalledTimes(1);
    expect(record).toHaveBeenCalledTimes(1);
  });

  it('should bound total calls when transport keeps failing', async () => {
    const alpha = await store.add({ label: 'alpha', secret: 'test-secret-a' });
    call.mockResolvedValue(failure('transport', 'Request to backend timed out'));
    const { orchestrator } = build();

    const result = await orchestrator.generate({ prompt: 'fox' });

    expect(result).toEqual({
      ok: false,
      error: 'All credential attempts failed: Request to backend timed out',
      code: 'exhausted',
    });
    expect(call).toHaveBeenCalledTimes(9);
    expect(sleep).toHaveBeenCalledTimes(6);
    expect(record).toHaveBeenCalledTimes(3);
    expect((await store.get(alpha.id))?.lifetimeErrorCount).toBe(3);
  });

  it('should report an exhausted pool without calling the backend', async () => {
    const { orchestrator } = build();

    const result = await orchestrator.generate({ prompt: 'fox' });

    expect(result).toEqual({
      ok: false,
      error: 'No credential with remaining quota is available; add credentials or wait for the daily reset',
      code: 'pool_exhausted',
    });
    expect(call).not.toHaveBeenCalled();
    expect(record).not.toHaveBeenCalled();
  });

  it('should treat a pool at quota as exhausted', async () => {
    const alpha = await store.add({ label: 'alpha', secret: 'test-secret-a' });
    await store.incrementSuccess(alpha.id);
    const { orchestrator } = build(1);

    const result = await orchestrator.generate({ prompt: 'fox' });

    expect(result.ok).toBe(false);
    expect(result.ok === false && result.code).toBe('pool_exhausted');
    expect(call).not.toHaveBeenCalled();
  });

  it('should reject invalid input before selecting a credential', async () => {
    await store.add({ label: 'alpha', secret: 'test-secret-a' });
    const { orchestrator, scheduler } = build();
    const select = vi.spyOn(scheduler, 'selectCredential');

    const result = await orchestrator.generate({ prompt: 'fox', width: 100 });

    expect(result).toEqual({ ok: false, error: 'width must be between 256 and 2048, got 100', code: 'validation' });
    expect(select).not.toHaveBeenCalled();
    expect(call).not.toHaveBeenCalled();
  });

  it('should still succeed when the attempt log throws', async () => {
    await store.add({ label: 'alpha', secret: 'test-secret-a' });
    call.mockResolvedValue(okResult());
    record.mockImplementation(() => {
      throw new Error('disk full');
    });
    const { orchestrator } = build();

    const result = await orchestrator.generate({ prompt: 'fox' });

    expect(result).toEqual({ ok: true, imageUrl: IMAGE_URL });
  });

  it('should serve other requests while a backend call is in flight', async () => {
    await store.add({ label: 'alpha', secret: 'test-secret-a' });
    await store.add({ label: 'beta', secret: 'test-secret-b' });
    let release = (): void => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    call.mockImplementation(async credential => {
      if (credential.label === 'alpha') await gate;
      return okResult();
    });
    const { orchestrator } = build();

    const slow = orchestrator.generate({ prompt: 'slow fox' });
    await vi.waitFor(() => expect(call).toHaveBeenCalledTimes(1));

    const fast = await orchestrator.generate({ prompt: 'fast fox' });
    expect(fast).toEqual({ ok: true, imageUrl: IMAGE_URL });
    expect(call.mock.calls[1][0].label).toBe('beta');

    release();
    expect(await slow).toEqual({ ok: true, imageUrl: IMAGE_URL });
  });
});
