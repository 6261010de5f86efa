import { UnrecoverableError } from 'bullmq';
import type { Job } from 'bullmq';
import { entityKey, toEntityRef } from '../../domain/capabilities.js';
import type { EntityRef, RosterEntity, TransitionName } from '../../domain/types.js';
import type { BatchOptions, BatchOutcome } from '../../engine/collections/batch.js';
import { ConfigurationError, NotFoundError, ValidationError, fromZodError } from '../../lib/errors.js';
import type { RosterLifecycle } from '../../lifecycle.js';
import { RosterTransitionJobDataSchema } from '../../schemas/roster-job.schema.js';
import type { RosterTransitionJobInput } from '../../schemas/roster-job.schema.js';

/** Resolves queued entity references back to live roster entities. */
export interface EntityLookup {
  find(ref: EntityRef): Promise<RosterEntity | null>;
}

export interface RosterTransitionResult {
  transition: TransitionName;
  succeeded: EntityRef[];
  failed: Array<{ entity: EntityRef; error: string }>;
  processedAt: string;
}

export type RosterTransitionJob = Pick<Job<RosterTransitionJobInput>, 'id' | 'data' | 'log'>;

function runTransition(
  lifecycle: RosterLifecycle,
  transition: TransitionName,
  entities: RosterEntity[],
  date: Date | null,
  options: BatchOptions
): Promise<BatchOutcome> {
  const { actions } = lifecycle;
  switch (transition) {
    case 'employ':
      return actions.employMany(entities, date, options);
    case 'suspend':
      return actions.suspendMany(entities, date, options);
    case 'release':
      return actions.releaseMany(entities, date, options);
    case 'retire':
      return actions.retireMany(entities, date, options);
    case 'injure':
      return actions.injureMany(entities, date, options);
    case 'reinstate':
      return actions.reinstateMany(entities, date, options);
  }
}

/**
 * Build the processor for scheduled roster transitions.
 *
 * Bad job data, unknown entities and rejected transitions fail the job
 * without retry; anything else is rethrown for BullMQ's backoff.
 */
export function createRosterTransitionProcessor(
  lifecycle: RosterLifecycle,
  lookup: EntityLookup
): (job: RosterTransitionJob) => Promise<RosterTransitionResult> {
  return async (job) => {
    const parsed = RosterTransitionJobDataSchema.safeParse(job.data);
    if (!parsed.success) {
      const error = fromZodError(parsed.error, 'Invalid roster transition job data');
      await job.log(`Rejected job ${job.id ?? '?'}: ${error.message}`);
      throw new UnrecoverableError(error.message);
    }

    const { transition, effectiveDate, notes, continueOnError, triggeredBy } = parsed.data;
    await job.log(`Starting ${transition} for ${parsed.data.entities.length} entities`);
    await job.log(`Triggered by: ${triggeredBy}`);

    try {
      const entities: RosterEntity[] = [];
      for (const ref of parsed.data.entities) {
        const entity = await lookup.find(ref);
        if (!entity) {
          throw new NotFoundError(ref.type, ref.id);
        }
        entities.push(entity);
      }

      const date = effectiveDate ? new Date(effectiveDate) : null;
      const outcome = await runTransition(lifecycle, transition, entities, date, {
        notes,
        continueOnError,
      });

      for (const failure of outcome.failed) {
        await job.log(`Failed ${transition} for ${entityKey(failure.entity)}: ${failure.error.message}`);
      }
      await job.log(
        `Completed ${transition}: ${outcome.succeeded.length} succeeded, ${outcome.failed.length} failed`
      );

      return {
        transition,
        succeeded: outcome.succeeded.map(toEntityRef),
        failed: outcome.failed.map((failure) => ({
          entity: toEntityRef(failure.entity),
          error: failure.error.message,
        })),
        processedAt: lifecycle.context.clock.now().toISOString(),
      };
    } catch (err) {
      if (
        err instanceof ValidationError ||
        err instanceof NotFoundError ||
        err instanceof ConfigurationError
      ) {
        await job.log(`Aborted ${transition}: ${err.message}`);
        throw new UnrecoverableError(err.message);
      }
      throw err;
    }
  };
}
