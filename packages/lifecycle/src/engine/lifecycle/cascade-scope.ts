import type { RosterEntity, TransitionName } from '../../domain/types.js';
import { CascadeDepthExceededError } from '../../lib/errors.js';
import type { StatusTransitionPipeline } from './transition-pipeline.js';

export type PipelineSpawner = (
  entity: RosterEntity,
  transition: TransitionName,
  date: Date,
  scope: CascadeScope,
) => StatusTransitionPipeline;

/**
 * Bookkeeping for one top-level transition and every cascade it triggers.
 * The visited buckets are shared by all child scopes and dropped with the
 * root once the top-level call returns.
 */
export class CascadeScope {
  private constructor(
    private readonly spawner: PipelineSpawner,
    readonly maxDepth: number,
    readonly depth: number,
    private readonly visited: Map<string, Set<string>>,
  ) {}

  static root(spawner: PipelineSpawner, maxDepth: number): CascadeScope {
    return new CascadeScope(spawner, maxDepth, 0, new Map());
  }

  child(): CascadeScope {
    return new CascadeScope(this.spawner, this.maxDepth, this.depth + 1, this.visited);
  }

  /**
   * Pipeline for a cascaded transition, one level deeper than this scope.
   * It joins the ambient transaction and this scope's visited set.
   */
  pipeline(entity: RosterEntity, transition: TransitionName, date: Date): StatusTransitionPipeline {
    return this.spawner(entity, transition, date, this.child());
  }

  hasVisited(bucket: string, key: string): boolean {
    return this.visited.get(bucket)?.has(key) ?? false;
  }

  /** Returns false when `key` was already marked in `bucket`. */
  markVisited(bucket: string, key: string): boolean {
    let keys = this.visited.get(bucket);
    if (!keys) {
      keys = new Set();
      this.visited.set(bucket, keys);
    }
    if (keys.has(key)) {
      return false;
    }
    keys.add(key);
    return true;
  }

  ensureDepth(key: string): void {
    if (this.depth > this.maxDepth) {
      throw new CascadeDepthExceededError(this.depth, this.maxDepth, key);
    }
  }
}
