import { describeEntity, hasCapability } from '../domain/capabilities.js';
import type { RosterEntity, TransitionName } from '../domain/types.js';
import { TransitionRejectedError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { StatusTransitionPipeline } from '../engine/lifecycle/transition-pipeline.js';
import type { LifecycleContext } from '../engine/lifecycle/transition-pipeline.js';
import type { CascadeStrategy } from '../engine/lifecycle/types.js';
import * as employment from '../engine/cascades/employment.js';
import { suspendMembers } from '../engine/cascades/suspension.js';
import { reinstateManagers, reinstateWrestlers } from '../engine/cascades/reinstatement.js';
import {
  detachManagedMembers,
  detachManagers,
  leaveStable,
  leaveTagTeam,
  removeStableMembers,
} from '../engine/cascades/retirement.js';
import { currentMembers, isEmployedAndNotSuspended, isSuspended } from '../engine/cascades/relationships.js';
import type { MemberRelationship } from '../engine/cascades/relationships.js';
import { runBatch } from '../engine/collections/batch.js';
import type { BatchOptions, BatchOutcome } from '../engine/collections/batch.js';
import { resolveStatus } from '../domain/status.js';

const GROUP_RELATIONSHIPS: readonly MemberRelationship[] = ['wrestlers', 'managers', 'tag-teams'];

/**
 * Single-entity roster actions with the cascades each entity type gets by
 * default, plus their batch forms.
 */
export class RosterActionsService {
  private readonly logger: Logger;

  constructor(private readonly context: LifecycleContext) {
    this.logger = context.logger.child({ module: 'roster-actions' });
  }

  /** Bare pipeline with no cascades attached. */
  pipeline(entity: RosterEntity, transition: TransitionName, date?: Date | null): StatusTransitionPipeline {
    return StatusTransitionPipeline.create(this.context, entity, transition, date);
  }

  async employ(entity: RosterEntity, date?: Date | null, notes?: string): Promise<void> {
    await this.run(entity, 'employ', date, notes, this.employmentCascades(entity));
  }

  async suspend(entity: RosterEntity, date?: Date | null, notes?: string): Promise<void> {
    await this.run(entity, 'suspend', date, notes, this.suspensionCascades(entity));
  }

  async reinstate(entity: RosterEntity, date?: Date | null, notes?: string): Promise<void> {
    await this.run(entity, 'reinstate', date, notes, this.reinstatementCascades(entity));
  }

  async retire(entity: RosterEntity, date?: Date | null, notes?: string): Promise<void> {
    await this.run(entity, 'retire', date, notes, this.retirementCascades(entity));
  }

  async release(entity: RosterEntity, date?: Date | null, notes?: string): Promise<void> {
    await this.run(entity, 'release', date, notes, []);
  }

  async injure(entity: RosterEntity, date?: Date | null, notes?: string): Promise<void> {
    if (!hasCapability(entity, 'injury')) {
      throw new TransitionRejectedError(
        `This ${describeEntity(entity)} cannot be injured. Only individual people can be injured.`,
        {
          entityType: entity.type,
          entityId: entity.id,
          currentStatus: resolveStatus(entity),
          transition: 'injure',
        },
      );
    }
    await this.run(entity, 'injure', date, notes, []);
  }

  /** Clears an injury: reinstates an entity that is currently injured. */
  async heal(entity: RosterEntity, date?: Date | null, notes?: string): Promise<void> {
    if (!hasCapability(entity, 'injury') || !entity.isInjured()) {
      throw new TransitionRejectedError(
        `This ${describeEntity(entity)} is not injured and cannot be cleared from injury.`,
        {
          entityType: entity.type,
          entityId: entity.id,
          currentStatus: resolveStatus(entity),
          transition: 'reinstate',
        },
      );
    }
    await this.run(entity, 'reinstate', date, notes, []);
  }

  async withCustomCascade(
    entity: RosterEntity,
    transition: TransitionName,
    cascades: readonly CascadeStrategy[],
    date?: Date | null,
    notes?: string,
  ): Promise<void> {
    await this.run(entity, transition, date, notes, cascades);
  }

  employMany(entities: readonly RosterEntity[], date?: Date | null, options: BatchOptions = {}): Promise<BatchOutcome> {
    return this.many('employ', entities, (entity) => this.employ(entity, date, options.notes), options);
  }

  suspendMany(entities: readonly RosterEntity[], date?: Date | null, options: BatchOptions = {}): Promise<BatchOutcome> {
    return this.many('suspend', entities, (entity) => this.suspend(entity, date, options.notes), options);
  }

  reinstateMany(entities: readonly RosterEntity[], date?: Date | null, options: BatchOptions = {}): Promise<BatchOutcome> {
    return this.many('reinstate', entities, (entity) => this.reinstate(entity, date, options.notes), options);
  }

  retireMany(entities: readonly RosterEntity[], date?: Date | null, options: BatchOptions = {}): Promise<BatchOutcome> {
    return this.many('retire', entities, (entity) => this.retire(entity, date, options.notes), options);
  }

  releaseMany(entities: readonly RosterEntity[], date?: Date | null, options: BatchOptions = {}): Promise<BatchOutcome> {
    return this.many('release', entities, (entity) => this.release(entity, date, options.notes), options);
  }

  injureMany(entities: readonly RosterEntity[], date?: Date | null, options: BatchOptions = {}): Promise<BatchOutcome> {
    return this.many('injure', entities, (entity) => this.injure(entity, date, options.notes), options);
  }

  /**
   * Suspends every employed, not yet suspended member of a group across the
   * given relationships, each with its own default suspension cascades.
   */
  async suspendAvailableMembers(
    group: RosterEntity,
    date?: Date | null,
    options: BatchOptions & { relationships?: readonly MemberRelationship[] } = {},
  ): Promise<BatchOutcome> {
    const members = await this.membersOf(group, options.relationships ?? GROUP_RELATIONSHIPS);
    return this.suspendMany(members.filter(isEmployedAndNotSuspended), date, options);
  }

  async reinstateAllSuspendedMembers(
    group: RosterEntity,
    date?: Date | null,
    options: BatchOptions & { relationships?: readonly MemberRelationship[] } = {},
  ): Promise<BatchOutcome> {
    const members = await this.membersOf(group, options.relationships ?? GROUP_RELATIONSHIPS);
    return this.reinstateMany(members.filter(isSuspended), date, options);
  }

  employmentCascades(entity: RosterEntity): CascadeStrategy[] {
    const cascades: CascadeStrategy[] = [];
    if (hasCapability(entity, 'managers')) {
      cascades.push(employment.managers());
    }
    if (hasCapability(entity, 'wrestlers')) {
      cascades.push(employment.wrestlers());
    }
    if (hasCapability(entity, 'tag-teams')) {
      cascades.push(employment.tagTeams());
    }
    return cascades;
  }

  suspensionCascades(entity: RosterEntity): CascadeStrategy[] {
    switch (entity.type) {
      case 'wrestler':
        return [suspendMembers(['managers'])];
      case 'tag_team':
        return [suspendMembers(['wrestlers', 'managers'])];
      default:
        return [];
    }
  }

  reinstatementCascades(entity: RosterEntity): CascadeStrategy[] {
    switch (entity.type) {
      case 'wrestler':
        return [reinstateManagers()];
      case 'tag_team':
        return [reinstateWrestlers(), reinstateManagers()];
      default:
        return [];
    }
  }

  retirementCascades(entity: RosterEntity): CascadeStrategy[] {
    const { repositories } = this.context;
    switch (entity.type) {
      case 'wrestler':
        return [leaveTagTeam(repositories), detachManagers(repositories), leaveStable(repositories)];
      case 'tag_team':
        return [leaveStable(repositories), detachManagers(repositories)];
      case 'manager':
      case 'referee':
        return [leaveStable(repositories), detachManagedMembers(repositories)];
      case 'stable':
        return [removeStableMembers(repositories)];
    }
  }

  private async run(
    entity: RosterEntity,
    transition: TransitionName,
    date: Date | null | undefined,
    notes: string | undefined,
    cascades: readonly CascadeStrategy[],
  ): Promise<void> {
    const pipeline = this.pipeline(entity, transition, date);
    if (notes) {
      pipeline.withNotes(notes);
    }
    for (const cascade of cascades) {
      pipeline.withCascade(cascade);
    }
    await pipeline.execute();
  }

  private many(
    operation: TransitionName,
    entities: readonly RosterEntity[],
    action: (entity: RosterEntity) => Promise<void>,
    options: BatchOptions,
  ): Promise<BatchOutcome> {
    return runBatch(entities, action, {
      continueOnError: options.continueOnError,
      logger: this.logger,
      operation,
    });
  }

  private async membersOf(
    group: RosterEntity,
    relationships: readonly MemberRelationship[],
  ): Promise<RosterEntity[]> {
    const members: RosterEntity[] = [];
    for (const relationship of relationships) {
      members.push(...(await currentMembers(group, relationship)));
    }
    return members;
  }
}
