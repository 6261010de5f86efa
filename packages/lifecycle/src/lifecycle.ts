import type { RosterEntity, StableEntity, TransitionName } from './domain/types.js';
import { MemberCollectionManager } from './engine/collections/member-collection.js';
import { GuardRegistry } from './engine/lifecycle/guards.js';
import { loadRosterLifecycle } from './engine/lifecycle/index.js';
import type { LifecycleGraph } from './engine/lifecycle/lifecycle-graph.js';
import { StatusTransitionPipeline } from './engine/lifecycle/transition-pipeline.js';
import type { LifecycleContext } from './engine/lifecycle/transition-pipeline.js';
import { ActionPipeline } from './engine/pipeline/action-pipeline.js';
import type { PipelineRuntime } from './engine/pipeline/action-pipeline.js';
import { StableMembershipOrchestrator } from './engine/stables/stable-orchestrator.js';
import { getEngineConfig } from './lib/config/engine.js';
import { systemClock } from './lib/dates.js';
import type { Clock } from './lib/dates.js';
import { ConfigurationError } from './lib/errors.js';
import { createLogger } from './lib/logger.js';
import type { Logger } from './lib/logger.js';
import { RepositoryRegistry } from './lib/repositories.js';
import type { RepositoryMap } from './lib/repositories.js';
import type { TransactionRunner } from './lib/transaction.js';
import { RosterActionsService } from './services/roster-actions.service.js';

export interface RosterLifecycleOptions {
  repositories: RepositoryRegistry | Partial<RepositoryMap>;
  transactions: TransactionRunner;
  clock?: Clock;
  logger?: Logger;
  /** Defaults to LIFECYCLE_MAX_CASCADE_DEPTH. */
  maxCascadeDepth?: number;
  graph?: LifecycleGraph;
  /** Defaults to the guards declared on the graph. */
  guards?: GuardRegistry;
}

/**
 * Entry point for callers: one instance per repository set, shared by every
 * request.
 */
export class RosterLifecycle implements PipelineRuntime {
  readonly context: LifecycleContext;
  readonly actions: RosterActionsService;

  constructor(context: LifecycleContext) {
    this.context = context;
    this.actions = new RosterActionsService(context);
  }

  /** Bare transition with no default cascades. */
  transition(entity: RosterEntity, transition: TransitionName, date?: Date | null): StatusTransitionPipeline {
    return StatusTransitionPipeline.create(this.context, entity, transition, date);
  }

  collection(entities: Iterable<RosterEntity>): MemberCollectionManager {
    return new MemberCollectionManager(
      this.actions,
      this.context.logger.child({ module: 'member-collection' }),
      entities,
    );
  }

  mergeStables(
    primary: StableEntity,
    secondary: StableEntity,
    newName?: string | null,
  ): StableMembershipOrchestrator {
    return StableMembershipOrchestrator.mergeStables(this, primary, secondary, newName);
  }

  splitStable(original: StableEntity, newName: string): StableMembershipOrchestrator {
    return StableMembershipOrchestrator.splitStable(this, original, newName);
  }

  transferMembers(from: StableEntity, to: StableEntity): StableMembershipOrchestrator {
    return StableMembershipOrchestrator.transferMembers(this, from, to);
  }

  pipeline(): ActionPipeline {
    return new ActionPipeline(this);
  }
}

/**
 * Wire the engine. The lifecycle graph is validated here; a structurally
 * broken definition never reaches a caller.
 */
export function createRosterLifecycle(options: RosterLifecycleOptions): RosterLifecycle {
  const graph = options.graph ?? loadRosterLifecycle();
  const validation = graph.validate();
  if (!validation.valid) {
    throw new ConfigurationError(
      `Lifecycle '${graph.id}' is invalid: ${validation.errors.join('; ')}`,
    );
  }

  const repositories =
    options.repositories instanceof RepositoryRegistry
      ? options.repositories
      : new RepositoryRegistry(options.repositories);

  return new RosterLifecycle({
    graph,
    guards: options.guards ?? GuardRegistry.fromGraph(graph),
    repositories,
    transactions: options.transactions,
    clock: options.clock ?? systemClock,
    logger: options.logger ?? createLogger('lifecycle'),
    maxCascadeDepth: options.maxCascadeDepth ?? getEngineConfig().maxCascadeDepth,
  });
}
