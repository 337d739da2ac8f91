import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { refreshCommand } from '../../../cli/commands/refresh.js';
import { createRuntime } from '../../../cli/runtime.js';
import { BuildCache } from '../../../core/build-cache.js';
import { MemoryCacheStore } from '../../../cache/memory-cache-store.js';
import { ConfigurationError } from '../../../utils/errors.js';
import { FakeBuildSource } from '../../mocks/build-source.js';
import { MINUTE, RETENTION, makeBuild } from '../../fixtures/builds.js';
import { createTempDir, cleanupTempDir } from '../../setup.js';

vi.mock('../../../cli/runtime.js', () => ({ createRuntime: vi.fn() }));

describe('refreshCommand', () => {
  let tempDir: string;
  let store: MemoryCacheStore;
  let source: FakeBuildSource;
  let close: Mock<() => Promise<void>>;

  beforeEach(async () => {
    tempDir = await createTempDir('refresh-command-test-');

    store = new MemoryCacheStore();
    source = new FakeBuildSource([makeBuild({ createdAt: new Date(Date.now() - 20 * MINUTE) })]);
    close = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
    vi.mocked(createRuntime).mockReturnValue({
      source,
      store,
      cache: new BuildCache(store, { org: 'acme', keyPrefix: '', bucketSizeMs: 60 * MINUTE, retention: RETENTION }),
      close,
    });
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  const REDIS_URL = 'redis://127.0.0.1:6379';

  it('should fetch the refresh window and report what was cached', async () => {
    const code = await refreshCommand(tempDir, { refreshHistory: '1h', redisUrl: REDIS_URL });

    expect(code).toBe(0);
    expect(source.calls).toHaveLength(1);
    expect(store.size).toBeGreaterThanOrEqual(1);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('✅ Cached 1 builds in '));
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should exit non-zero when a bucket cannot be written', async () => {
    store.put = async () => {
      throw new Error('READONLY You can\'t write against a read only replica.');
    };

    const code = await refreshCommand(tempDir, { refreshHistory: '1h', redisUrl: REDIS_URL });

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('❌ Refresh incomplete: '));
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should refuse to refresh an in-process cache', async () => {
    await expect(refreshCommand(tempDir, { refreshHistory: '1h' })).rejects.toThrow(ConfigurationError);

    expect(createRuntime).not.toHaveBeenCalled();
    expect(source.calls).toHaveLength(0);
  });

  it('should keep the outcome when closing the connection fails', async () => {
    close.mockRejectedValueOnce(new Error('Connection is closed.'));

    const code = await refreshCommand(tempDir, { refreshHistory: '1h', redisUrl: REDIS_URL });

    expect(code).toBe(0);
    expect(console.warn).toHaveBeenCalledWith('⚠️  Failed to close the cache connection: Connection is closed.');
  });
});
