import 'dotenv/config';

import { parseCliArgs, USAGE } from '@/cli/args.js';
import { loadSettings, loadTaskDefinitions } from '@/config/index.js';
import { errorMessage } from '@/core/index.js';
import { createChannels, createNotificationFanout } from '@/notifications/index.js';
import { createLogger } from '@/observability/index.js';
import type { Logger } from '@/observability/index.js';
import { openTaskStore, seedTaskStore } from '@/queue/index.js';
import type { TaskStore } from '@/queue/index.js';
import { createScheduler, createTaskExecutor } from '@/scheduling/index.js';
import type { Scheduler } from '@/scheduling/index.js';

/** Wait for the scheduler to stop, giving up after the grace period. */
async function stopWithin(scheduler: Scheduler, graceMs: number, logger: Logger): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), graceMs);
  });

  const stopped = await Promise.race([scheduler.stop().then(() => true as const), expired]);
  clearTimeout(timer);

  if (!stopped) {
    logger.warn('Running tasks did not finish within the shutdown grace period', {
      component: 'main',
      graceMs,
      inFlight: scheduler.inFlight(),
    });
  }
  return stopped;
}

async function start(): Promise<number> {
  const startedAt = Date.now();

  const args = parseCliArgs(process.argv.slice(2));
  if (!args.ok) {
    process.stderr.write(`${args.error.message}\n\n${USAGE}\n`);
    return 2;
  }
  if (args.value.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }
  const cli = args.value;

  const logger = createLogger({ level: cli.logLevel });
  logger.debug(`Logger configured to level: ${cli.logLevel ?? 'default'}`, { component: 'main' });

  // 1) Settings, with the CLI timeout taking precedence
  const settingsResult = await loadSettings({ filePath: cli.configFile });
  if (!settingsResult.ok) {
    logger.fatal(settingsResult.error.message, {
      component: 'main',
      ...settingsResult.error.context,
    });
    return 1;
  }
  const settings = settingsResult.value;
  const timeoutSeconds = cli.timeoutSeconds ?? settings.timeoutSeconds;
  logger.info(`Using timeout: ${timeoutSeconds} seconds`, { component: 'main' });

  // 2) Task definitions
  const tasksResult = await loadTaskDefinitions(cli.tasksFile, logger);
  if (!tasksResult.ok) {
    logger.fatal(tasksResult.error.message, {
      component: 'main',
      ...tasksResult.error.context,
    });
    return 1;
  }
  const tasks = tasksResult.value;

  // 3) Queue backend; unreachable at startup is fatal
  const storeResult = await openTaskStore(
    cli.queueBackend === 'redis'
      ? { backend: 'redis', url: cli.redisUrl, key: cli.redisKey, logger }
      : { backend: 'memory' },
  );
  if (!storeResult.ok) {
    logger.fatal(storeResult.error.message, { component: 'main' });
    return 1;
  }
  const store: TaskStore = storeResult.value;

  const seeded = await seedTaskStore(store, tasks, logger);
  if (!seeded.ok) {
    logger.fatal(seeded.error.message, { component: 'main' });
    await store.close();
    return 1;
  }

  // 4) Notifications
  const channels = createChannels(settings.channels);
  const notifier = createNotificationFanout({ channels, logger });
  logger.info('Notification channels configured', {
    component: 'main',
    channels: notifier.channels,
  });

  // 5) Scheduler
  const executor = createTaskExecutor({ logger });
  const scheduler = createScheduler({
    store,
    executor,
    notifier,
    logger,
    concurrency: cli.concurrency,
    pollIntervalMs: cli.pollIntervalMs,
  });

  logger.info('Starting Qzark', {
    component: 'main',
    tasks: tasks.length,
    backend: store.backend,
  });
  scheduler.start();

  const signal = await new Promise<NodeJS.Signals>((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
  });
  logger.info(`${signal} received, stopping scheduler`, { component: 'main' });

  const stopped = await stopWithin(scheduler, timeoutSeconds * 1000, logger);
  if (!stopped) executor.terminateAll();
  await store.close();

  logger.debug(`End. Session time: ${((Date.now() - startedAt) / 1000).toFixed(4)} seconds`, {
    component: 'main',
    ...scheduler.stats(),
  });
  logger.info('Qzark finished', { component: 'main' });
  return stopped ? 0 : 1;
}

start()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    process.stderr.write(`Fatal: ${errorMessage(error)}\n`);
    process.exit(1);
  });
