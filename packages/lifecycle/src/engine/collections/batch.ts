import { entityKey } from '../../domain/capabilities.js';
import type { RosterEntity } from '../../domain/types.js';
import type { Logger } from '../../lib/logger.js';

export interface BatchOptions {
  notes?: string;
  /** Record per-entity failures and keep going instead of stopping at the first. */
  continueOnError?: boolean;
}

export interface BatchFailure {
  entity: RosterEntity;
  error: Error;
}

export interface BatchOutcome {
  succeeded: RosterEntity[];
  failed: BatchFailure[];
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Applies `action` to each entity strictly in order. Without
 * `continueOnError` the first failure propagates unchanged.
 */
export async function runBatch(
  entities: readonly RosterEntity[],
  action: (entity: RosterEntity) => Promise<void>,
  options: { continueOnError?: boolean; logger: Logger; operation: string },
): Promise<BatchOutcome> {
  const outcome: BatchOutcome = { succeeded: [], failed: [] };

  for (const entity of entities) {
    try {
      await action(entity);
      outcome.succeeded.push(entity);
    } catch (err) {
      if (!options.continueOnError) {
        throw err;
      }
      const error = toError(err);
      options.logger.warn(
        { entity: entityKey(entity), operation: options.operation, err: error },
        'Batch item failed; continuing',
      );
      outcome.failed.push({ entity, error });
    }
  }

  return outcome;
}
