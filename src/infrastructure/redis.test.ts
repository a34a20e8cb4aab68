import { beforeEach, describe, expect, it, vi } from 'vitest';

import { QueueBackendError } from '@/core/errors.js';
import { createMockLogger } from '@/testing/helpers/index.js';

import { createRedisConnection } from './redis.js';

const { control, instances, FakeIoRedis } = vi.hoisted(() => {
  const control = { failConnect: false, failQuit: false };

  class FakeIoRedis {
    readonly handlers = new Map<string, (error: Error) => void>();
    readonly connect = vi.fn(() =>
      control.failConnect ? Promise.reject(new Error('ECONNREFUSED')) : Promise.resolve(),
    );
    readonly ping = vi.fn(() => Promise.resolve('PONG'));
    readonly quit = vi.fn(() =>
      control.failQuit ? Promise.reject(new Error('already closed')) : Promise.resolve('OK'),
    );
    readonly disconnect = vi.fn();
    readonly rpush = vi.fn((_key: string, ...values: string[]) => Promise.resolve(values.length));
    readonly lpop = vi.fn(() => Promise.resolve(null));
    readonly lrange = vi.fn(() => Promise.resolve([]));
    readonly del = vi.fn(() => Promise.resolve(1));

    constructor(
      readonly url: string,
      readonly options: Record<string, unknown>,
    ) {
      instances.push(this);
    }

    on(event: string, handler: (error: Error) => void): this {
      this.handlers.set(event, handler);
      return this;
    }
  }

  const instances: FakeIoRedis[] = [];
  return { control, instances, FakeIoRedis };
});

vi.mock('ioredis', () => ({ Redis: FakeIoRedis }));

function lastInstance(): InstanceType<typeof FakeIoRedis> {
  const instance = instances.at(-1);
  if (!instance) throw new Error('no Redis instance created');
  return instance;
}

describe('createRedisConnection', () => {
  beforeEach(() => {
    instances.length = 0;
    control.failConnect = false;
    control.failQuit = false;
  });

  it('creates a lazily connected client that fails commands fast', () => {
    createRedisConnection({ url: 'redis://localhost:6379/0', logger: createMockLogger() });

    const redis = lastInstance();
    expect(redis.url).toBe('redis://localhost:6379/0');
    expect(redis.options).toMatchObject({ lazyConnect: true, maxRetriesPerRequest: 1 });
    expect(redis.connect).not.toHaveBeenCalled();
  });

  it('connects and pings on connect()', async () => {
    const logger = createMockLogger();
    const connection = createRedisConnection({ url: 'redis://localhost:6379/0', logger });

    await connection.connect();

    const redis = lastInstance();
    expect(redis.connect).toHaveBeenCalledTimes(1);
    expect(redis.ping).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith('Redis connected', {
      component: 'redis',
      url: 'redis://localhost:6379/0',
    });
  });

  it('throws QueueBackendError with a redacted URL when the server is unreachable', async () => {
    control.failConnect = true;
    const connection = createRedisConnection({
      url: 'redis://:test-secret@localhost:6379/0',
      logger: createMockLogger(),
    });

    const failure = await connection.connect().then(
      () => undefined,
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(QueueBackendError);
    expect(failure).toHaveProperty(
      'message',
      'Queue backend "redis" error: cannot reach redis://:***@localhost:6379/0: ECONNREFUSED',
    );
    expect(lastInstance().disconnect).toHaveBeenCalledTimes(1);
  });

  it('delegates list commands to the client', async () => {
    const connection = createRedisConnection({ url: 'redis://localhost:6379/0', logger: createMockLogger() });

    await connection.client.rpush('qzark:tasks', 'a', 'b');
    await connection.client.lrange('qzark:tasks', 0, -1);

    const redis = lastInstance();
    expect(redis.rpush).toHaveBeenCalledWith('qzark:tasks', 'a', 'b');
    expect(redis.lrange).toHaveBeenCalledWith('qzark:tasks', 0, -1);
  });

  it('logs connection errors as warnings', () => {
    const logger = createMockLogger();
    createRedisConnection({ url: 'redis://localhost:6379/0', logger });

    lastInstance().handlers.get('error')?.(new Error('socket hang up'));

    expect(logger.warn).toHaveBeenCalledWith('Redis connection error', {
      component: 'redis',
      error: 'socket hang up',
    });
  });

  it('quits gracefully and forces a disconnect when quit fails', async () => {
    control.failQuit = true;
    const connection = createRedisConnection({ url: 'redis://localhost:6379/0', logger: createMockLogger() });

    await connection.disconnect();

    const redis = lastInstance();
    expect(redis.quit).toHaveBeenCalledTimes(1);
    expect(redis.disconnect).toHaveBeenCalledTimes(1);
  });
});
