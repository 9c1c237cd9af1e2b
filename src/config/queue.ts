import { Queue, Worker } from 'bullmq';
import type { Job, WorkerOptions } from 'bullmq';
import { Redis as IORedis } from 'ioredis';
import { createChildLogger } from './logger.js';

const log = createChildLogger('queue-config');

// ─── Queue Names ──────────────────────────────────────────────────────

export const QUEUE_NAMES = {
  POLICY_SWEEPS: 'policy-sweeps',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ─── Redis Connection ─────────────────────────────────────────────────

let _connection: IORedis | null = null;

export function getRedisConnection(redisUrl?: string): IORedis {
  if (!_connection) {
    const url = redisUrl || process.env.REDIS_URL || 'redis://localhost:6379';
    _connection = new IORedis(url, {
      maxRetriesPerRequest: null, // Required by BullMQ
      enableReadyCheck: false,
      retryStrategy(times: number) {
        const delay = Math.min(times * 200, 5000);
        log.warn({ attempt: times, delayMs: delay }, 'Redis reconnecting');
        return delay;
      },
    });

    _connection.on('connect', () => {
      log.info('Redis connected');
    });

    _connection.on('error', (err) => {
      log.error({ err }, 'Redis connection error');
    });

    _connection.on('close', () => {
      log.warn('Redis connection closed');
    });
  }
  return _connection;
}

export async function closeRedisConnection(): Promise<void> {
  if (!_connection) return;
  try {
    await _connection.quit();
  } catch (err) {
    log.error({ err }, 'Error closing Redis connection');
  }
  _connection = null;
}

// ─── Factories ───────────────────────────────────────────────────────
// Callers own the instances they create and are responsible for closing them.

export function createQueue(name: QueueName, connection: IORedis): Queue {
  const queue = new Queue(name, {
    connection,
    defaultJobOptions: {
      removeOnComplete: {
        age: 24 * 3600,
        count: 1000,
      },
      removeOnFail: {
        age: 7 * 24 * 3600,
        count: 1000,
      },
    },
  });
  log.info({ queue: name }, 'Queue instance created');
  return queue;
}

export function createWorker<T, R>(
  name: QueueName,
  connection: IORedis,
  processor: (job: Job<T, R>) => Promise<R>,
  opts?: Partial<WorkerOptions>,
): Worker<T, R> {
  const worker = new Worker<T, R>(name, processor, {
    connection,
    concurrency: 1,
    ...opts,
  });

  worker.on('completed', (job) => {
    log.debug({ jobId: job.id, queue: name }, 'Job completed');
  });

  worker.on('failed', (job, err) => {
    log.error({ jobId: job?.id, queue: name, err: err.message }, 'Job failed');
  });

  worker.on('error', (err) => {
    log.error({ queue: name, err }, 'Worker error');
  });

  log.info({ queue: name, concurrency: opts?.concurrency ?? 1 }, 'Worker created');
  return worker;
}
