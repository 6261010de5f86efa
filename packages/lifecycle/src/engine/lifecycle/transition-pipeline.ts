import { describeEntity, entityKey, hasAnyCapability } from '../../domain/capabilities.js';
import { resolveStatus } from '../../domain/status.js';
import type { LifecycleStatus, RosterEntity, TransitionName } from '../../domain/types.js';
import { getEffectiveDate } from '../../lib/dates.js';
import type { Clock } from '../../lib/dates.js';
import { TransitionRejectedError } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import type { RepositoryRegistry } from '../../lib/repositories.js';
import type { TransactionRunner } from '../../lib/transaction.js';
import { CascadeScope } from './cascade-scope.js';
import type { PipelineSpawner } from './cascade-scope.js';
import type { GuardRegistry } from './guards.js';
import type { LifecycleGraph } from './lifecycle-graph.js';
import type { CascadeStrategy, TransitionDefinition, ValidationStrategy } from './types.js';

/**
 * Collaborators every pipeline, batch and orchestrator shares. Built once by
 * createRosterLifecycle.
 */
export interface LifecycleContext {
  graph: LifecycleGraph;
  guards: GuardRegistry;
  repositories: RepositoryRegistry;
  transactions: TransactionRunner;
  clock: Clock;
  logger: Logger;
  maxCascadeDepth: number;
}

/**
 * StatusTransitionPipeline: applies one transition to one entity.
 *
 * Inside one (ambient) transaction: default validation, custom validations,
 * closing of an incompatible prior state, the repository mutation, then the
 * cascades in registration order. Any failure rolls the whole call back.
 */
export class StatusTransitionPipeline {
  private readonly validations: ValidationStrategy[] = [];
  private readonly cascades: CascadeStrategy[] = [];
  private notes: string | undefined;
  private readonly definition: TransitionDefinition;

  private constructor(
    private readonly context: LifecycleContext,
    readonly entity: RosterEntity,
    readonly transition: TransitionName,
    readonly date: Date,
    private readonly scope: CascadeScope | undefined,
  ) {
    this.definition = context.graph.getTransition(transition);
  }

  /**
   * Throws ConfigurationError when the lifecycle does not define `transition`.
   * A missing date resolves to "now" on the context clock.
   */
  static create(
    context: LifecycleContext,
    entity: RosterEntity,
    transition: TransitionName,
    date?: Date | null,
    scope?: CascadeScope,
  ): StatusTransitionPipeline {
    return new StatusTransitionPipeline(
      context,
      entity,
      transition,
      getEffectiveDate(date, context.clock),
      scope,
    );
  }

  withValidation(strategy: ValidationStrategy): this {
    this.validations.push(strategy);
    return this;
  }

  withCascade(strategy: CascadeStrategy): this {
    this.cascades.push(strategy);
    return this;
  }

  withNotes(notes: string): this {
    this.notes = notes;
    return this;
  }

  async execute(): Promise<void> {
    const { context, entity, transition } = this;
    const key = entityKey(entity);
    const scope = this.scope ?? CascadeScope.root(this.spawner(), context.maxCascadeDepth);

    if (!scope.markVisited(`transition:${transition}`, key)) {
      context.logger.debug(
        { entity: key, transition, depth: scope.depth },
        'Skipping cascade re-entry',
      );
      return;
    }
    scope.ensureDepth(key);

    await context.transactions.runInTransaction(async () => {
      const mutate = context.repositories.mutation(entity.type, this.definition.mutation);

      const status = await this.validate();
      await this.endPriorState(status);
      await mutate(entity, this.date, this.notes);

      context.logger.debug(
        { entity: key, transition, from: status, to: this.definition.to, depth: scope.depth },
        'Transition applied',
      );

      for (const cascade of this.cascades) {
        await cascade(entity, this.date, transition, scope);
      }
    });
  }

  /**
   * Default validation (capability, graph edge, registered guards) followed
   * by the custom strategies. Returns the status the entity was in.
   */
  private async validate(): Promise<LifecycleStatus> {
    const { context, entity, transition, definition } = this;
    const subject = describeEntity(entity);
    const status = resolveStatus(entity);
    const rejection = {
      entityType: entity.type,
      entityId: entity.id,
      currentStatus: status,
      transition,
    };

    if (!hasAnyCapability(entity, definition.requires)) {
      throw new TransitionRejectedError(
        `This ${subject} cannot be ${definition.label}.`,
        rejection,
      );
    }

    const structural = context.graph.canApply(transition, status, subject);
    if (!structural.allowed) {
      throw new TransitionRejectedError(structural.reason, rejection);
    }

    const guarded = await context.guards.evaluate(entity, transition);
    if (!guarded.allowed) {
      throw new TransitionRejectedError(guarded.reason, rejection);
    }

    for (const validation of this.validations) {
      await validation(entity, transition);
    }
    return status;
  }

  private async endPriorState(status: LifecycleStatus): Promise<void> {
    const rule = this.definition.endsPriorState;
    if (!rule || rule.status !== status) {
      return;
    }
    const endRetirement = this.context.repositories.endRetirement(this.entity.type);
    await endRetirement(this.entity, this.date);
  }

  private spawner(): PipelineSpawner {
    const { context } = this;
    return (entity: RosterEntity, transition: TransitionName, date: Date, scope: CascadeScope) =>
      StatusTransitionPipeline.create(context, entity, transition, date, scope);
  }
}
