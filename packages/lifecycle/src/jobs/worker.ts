import { Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { createLogger } from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import type { RosterLifecycle } from '../lifecycle.js';
import type { RosterTransitionJobInput } from '../schemas/roster-job.schema.js';
import { createRosterTransitionProcessor } from './processors/roster-transition.processor.js';
import type { EntityLookup, RosterTransitionResult } from './processors/roster-transition.processor.js';
import { QUEUE_NAMES, getRedisConnection } from './queue.js';

let rosterTransitionWorker: Worker<RosterTransitionJobInput, RosterTransitionResult> | null = null;

/**
 * Start the roster transition worker. Jobs run one at a time so dated
 * transitions on the same roster apply in queue order.
 */
export function startRosterTransitionWorker(
  lifecycle: RosterLifecycle,
  lookup: EntityLookup,
  logger: Logger = createLogger('roster-transition-worker')
): Worker<RosterTransitionJobInput, RosterTransitionResult> {
  if (rosterTransitionWorker) {
    return rosterTransitionWorker;
  }

  const worker = new Worker<RosterTransitionJobInput, RosterTransitionResult>(
    QUEUE_NAMES.ROSTER_TRANSITIONS,
    createRosterTransitionProcessor(lifecycle, lookup),
    {
      connection: getRedisConnection(),
      concurrency: 1,
    }
  );

  worker.on('completed', (job: Job<RosterTransitionJobInput>, result: RosterTransitionResult) => {
    logger.info(
      { jobId: job.id, succeeded: result.succeeded.length, failed: result.failed.length },
      'Roster transition job completed'
    );
  });

  worker.on('failed', (job: Job<RosterTransitionJobInput> | undefined, err: Error) => {
    logger.error({ jobId: job?.id, err }, 'Roster transition job failed');
  });

  worker.on('error', (err: Error) => {
    logger.error({ err }, 'Roster transition worker error');
  });

  rosterTransitionWorker = worker;
  logger.info('Roster transition worker started');
  return worker;
}

export async function stopRosterTransitionWorker(): Promise<void> {
  if (rosterTransitionWorker) {
    const worker = rosterTransitionWorker;
    rosterTransitionWorker = null;
    await worker.close();
  }
}

/**
 * Get worker status for health checks
 */
export function getWorkerStatus(): { rosterTransitions: boolean } {
  return {
    rosterTransitions: rosterTransitionWorker !== null && !rosterTransitionWorker.closing,
  };
}
