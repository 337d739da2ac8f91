import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { RedisCacheStore, RedisClientLike } from '../../cache/redis-cache-store.js';

describe('RedisCacheStore', () => {
  let client: {
    set: Mock<RedisClientLike['set']>;
    getBuffer: Mock<RedisClientLike['getBuffer']>;
    quit: Mock<RedisClientLike['quit']>;
    disconnect: Mock<RedisClientLike['disconnect']>;
  };
  let store: RedisCacheStore;

  beforeEach(() => {
    client = {
      set: vi.fn<RedisClientLike['set']>().mockResolvedValue('OK'),
      getBuffer: vi.fn<RedisClientLike['getBuffer']>().mockResolvedValue(null),
      quit: vi.fn<RedisClientLike['quit']>().mockResolvedValue('OK'),
      disconnect: vi.fn<RedisClientLike['disconnect']>(),
    };
    store = new RedisCacheStore(client);
  });

  it('should store values with a millisecond expiry', async () => {
    const value = Buffer.from('payload');

    await store.put('build-stats:builds:acme:3600000:2024-03-04T10:00:00.000Z', value, 600000);

    expect(client.set).toHaveBeenCalledWith(
      'build-stats:builds:acme:3600000:2024-03-04T10:00:00.000Z',
      value,
      'PX',
      600000
    );
  });

  it('should round fractional TTLs and never send less than one millisecond', async () => {
    await store.put('a', Buffer.from('1'), 1500.4);
    await store.put('b', Buffer.from('2'), 0.2);

    expect(client.set).toHaveBeenNthCalledWith(1, 'a', Buffer.from('1'), 'PX', 1500);
    expect(client.set).toHaveBeenNthCalledWith(2, 'b', Buffer.from('2'), 'PX', 1);
  });

  it('should return stored bytes', async () => {
    client.getBuffer.mockResolvedValueOnce(Buffer.from('payload'));

    expect((await store.get('k'))?.toString()).toBe('payload');
    expect(client.getBuffer).toHaveBeenCalledWith('k');
  });

  it('should map a nil reply to a miss', async () => {
    expect(await store.get('k')).toBeUndefined();
  });

  it('should propagate client errors', async () => {
    client.getBuffer.mockRejectedValueOnce(new Error('Command timed out'));

    await expect(store.get('k')).rejects.toThrow('Command timed out');
  });

  it('should quit the client on close', async () => {
    await store.close();

    expect(client.quit).toHaveBeenCalledTimes(1);
    expect(client.disconnect).not.toHaveBeenCalled();
  });

  it('should disconnect instead of rejecting when quit fails', async () => {
    client.quit.mockRejectedValueOnce(new Error('Connection is closed.'));

    await expect(store.close()).resolves.toBeUndefined();

    expect(client.disconnect).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith('⚠️  Redis quit failed, disconnecting: Connection is closed.');
  });
});
