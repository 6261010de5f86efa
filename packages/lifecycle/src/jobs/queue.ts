import { Queue } from 'bullmq';
import type { ConnectionOptions } from 'bullmq';
import { getEngineConfig } from '../lib/config/engine.js';
import type { RosterTransitionJobInput } from '../schemas/roster-job.schema.js';

// Queue names
export const QUEUE_NAMES = {
  ROSTER_TRANSITIONS: 'roster-transitions',
} as const;

/**
 * Redis connection options for BullMQ, read from the validated engine config.
 */
export function getRedisConnection(): ConnectionOptions {
  const { redis } = getEngineConfig();
  return {
    host: redis.host,
    port: redis.port,
    password: redis.password,
    db: redis.db,
  };
}

// Queue instance (lazy initialization)
let rosterTransitionQueue: Queue<RosterTransitionJobInput> | null = null;

/**
 * Get or create the roster transition queue
 */
export function getRosterTransitionQueue(): Queue<RosterTransitionJobInput> {
  if (!rosterTransitionQueue) {
    rosterTransitionQueue = new Queue<RosterTransitionJobInput>(QUEUE_NAMES.ROSTER_TRANSITIONS, {
      connection: getRedisConnection(),
      defaultJobOptions: {
        // Validation failures are final; retries only cover transient storage errors
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 1000,
        },
        removeOnComplete: {
          age: 24 * 3600, // Keep completed jobs for 24 hours
          count: 1000,
        },
        removeOnFail: {
          age: 7 * 24 * 3600, // Keep failed jobs for 7 days
        },
      },
    });
  }
  return rosterTransitionQueue;
}

/**
 * Schedule a batch transition. A future `delay` turns this into a dated
 * roster change; a stable `jobId` deduplicates repeated submissions.
 */
export async function enqueueRosterTransition(
  data: RosterTransitionJobInput,
  options: { delay?: number; jobId?: string } = {}
): Promise<string | null> {
  const queue = getRosterTransitionQueue();

  const job = await queue.add(data.transition, data, {
    jobId: options.jobId,
    delay: options.delay,
  });

  return job.id ?? null;
}

/**
 * Close all queues (for graceful shutdown)
 */
export async function closeQueues(): Promise<void> {
  if (rosterTransitionQueue) {
    const queue = rosterTransitionQueue;
    rosterTransitionQueue = null;
    await queue.close();
  }
}
