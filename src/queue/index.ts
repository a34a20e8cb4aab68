// Task queue contract, backends and startup seeding
export type { QueueBackend, QueueResult, TaskStore } from './types.js';

export { createMemoryTaskStore } from './memory-queue.js';
export { createRedisTaskStore, decodeTask, encodeTask, DEFAULT_REDIS_KEY } from './redis-queue.js';
export type { RedisTaskStoreOptions } from './redis-queue.js';

export { openTaskStore, DEFAULT_REDIS_URL } from './factory.js';
export type { TaskStoreOptions } from './factory.js';

export { reconcileQueue, seedTaskStore } from './seed.js';
export type { SeedSummary } from './seed.js';
