export { createMockLogger } from './logger.js';
export type { MockLogger } from './logger.js';
export { createFakeRedisConnection } from './fake-redis.js';
export type { FakeRedisConnection } from './fake-redis.js';
export { makeTask } from '../fixtures/tasks.js';
