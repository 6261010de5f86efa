import { entityKey } from '../../domain/capabilities.js';
import type { RosterEntity, StableEntity } from '../../domain/types.js';
import { getEffectiveDate } from '../../lib/dates.js';
import type { Logger } from '../../lib/logger.js';
import type { StableRepository } from '../../lib/repositories.js';
import { awaitingEmployment } from '../cascades/relationships.js';
import type { MemberCollectionManager } from '../collections/member-collection.js';
import { StatusTransitionPipeline } from '../lifecycle/transition-pipeline.js';
import type { LifecycleContext } from '../lifecycle/transition-pipeline.js';

/** What the orchestrator needs from the composition root. */
export interface StableRuntime {
  context: LifecycleContext;
  collection(entities: Iterable<RosterEntity>): MemberCollectionManager;
}

export type StableMemberKind = 'wrestlers' | 'managers' | 'tag_teams';

type MemberInput = RosterEntity | RosterEntity[];

type StableOperation =
  | { kind: 'merge'; primary: StableEntity; secondary: StableEntity; newName: string | null }
  | { kind: 'split'; original: StableEntity; newName: string }
  | { kind: 'transfer-wrestlers'; entities: RosterEntity[] }
  | { kind: 'transfer-tag-teams'; entities: RosterEntity[] }
  | { kind: 'transfer-managers'; entities: RosterEntity[] }
  | { kind: 'transfer-all-available' }
  | { kind: 'transfer-by-criteria'; criteria: unknown };

type StableCascade =
  | { kind: 'employment' }
  | { kind: 'suspension'; memberTypes: readonly StableMemberKind[] }
  | { kind: 'retire-source' };

function toList(input: MemberInput): RosterEntity[] {
  return Array.isArray(input) ? [...input] : [input];
}

/**
 * Multi-step stable workflows: merge, split and member transfers followed by
 * post-transfer cascades, all inside one transaction.
 *
 * Managers attach to individual members rather than to the stable, so a
 * merge only moves wrestlers and tag teams.
 */
export class StableMembershipOrchestrator {
  private source: StableEntity | null = null;
  private target: StableEntity | null = null;
  private effectiveDate: Date | null = null;
  private readonly operations: StableOperation[] = [];
  private readonly cascades: StableCascade[] = [];
  private readonly logger: Logger;

  private constructor(private readonly runtime: StableRuntime) {
    this.logger = runtime.context.logger.child({ module: 'stable-orchestrator' });
  }

  static mergeStables(
    runtime: StableRuntime,
    primary: StableEntity,
    secondary: StableEntity,
    newName?: string | null,
  ): StableMembershipOrchestrator {
    const orchestrator = new StableMembershipOrchestrator(runtime);
    orchestrator.source = secondary;
    orchestrator.target = primary;
    orchestrator.operations.push({ kind: 'merge', primary, secondary, newName: newName ?? null });
    return orchestrator;
  }

  static splitStable(
    runtime: StableRuntime,
    original: StableEntity,
    newName: string,
  ): StableMembershipOrchestrator {
    const orchestrator = new StableMembershipOrchestrator(runtime);
    orchestrator.source = original;
    orchestrator.operations.push({ kind: 'split', original, newName });
    return orchestrator;
  }

  static transferMembers(
    runtime: StableRuntime,
    from: StableEntity,
    to: StableEntity,
  ): StableMembershipOrchestrator {
    const orchestrator = new StableMembershipOrchestrator(runtime);
    orchestrator.source = from;
    orchestrator.target = to;
    return orchestrator;
  }

  onDate(date: Date): this {
    this.effectiveDate = date;
    return this;
  }

  transferWrestlers(wrestlers: MemberInput): this {
    this.operations.push({ kind: 'transfer-wrestlers', entities: toList(wrestlers) });
    return this;
  }

  transferTagTeams(tagTeams: MemberInput): this {
    this.operations.push({ kind: 'transfer-tag-teams', entities: toList(tagTeams) });
    return this;
  }

  transferManagers(managers: MemberInput): this {
    this.operations.push({ kind: 'transfer-managers', entities: toList(managers) });
    return this;
  }

  /** Moves every available wrestler, tag team and manager of the source. */
  transferAllAvailableMembers(): this {
    this.operations.push({ kind: 'transfer-all-available' });
    return this;
  }

  /**
   * Moves the source's wrestlers that match a member criteria map (see
   * MemberCollectionManager.applyCriteria). Tag teams and managers stay.
   */
  transferMembersByCriteria(criteria: unknown): this {
    this.operations.push({ kind: 'transfer-by-criteria', criteria });
    return this;
  }

  withEmploymentCascade(): this {
    this.cascades.push({ kind: 'employment' });
    return this;
  }

  /** Managers are accepted for compatibility but never suspended from here. */
  withSuspensionCascade(
    memberTypes: readonly StableMemberKind[] = ['wrestlers', 'managers', 'tag_teams'],
  ): this {
    this.cascades.push({ kind: 'suspension', memberTypes });
    return this;
  }

  withSourceStableRetirement(): this {
    this.cascades.push({ kind: 'retire-source' });
    return this;
  }

  /**
   * Runs every queued operation, then every cascade. Resolves to the single
   * resulting stable, or to all of them when several were produced.
   */
  async execute(): Promise<StableEntity | StableEntity[]> {
    const { context } = this.runtime;

    return context.transactions.runInTransaction(async () => {
      const date = getEffectiveDate(this.effectiveDate, context.clock);
      const results = new Map<string, StableEntity>();

      for (const operation of this.operations) {
        const result = await this.executeOperation(operation, date);
        if (result) {
          results.set(entityKey(result), result);
        }
      }

      for (const cascade of this.cascades) {
        await this.executeCascade(cascade, date);
      }

      const stables = [...results.values()];
      return stables.length === 1 ? stables[0] : stables;
    });
  }

  private get stables(): StableRepository {
    return this.runtime.context.repositories.stables();
  }

  private async executeOperation(operation: StableOperation, date: Date): Promise<StableEntity | null> {
    switch (operation.kind) {
      case 'merge':
        return this.executeMerge(operation.primary, operation.secondary, operation.newName, date);
      case 'split':
        return this.executeSplit(operation.original, operation.newName);
      case 'transfer-wrestlers':
        return this.moveMembers(operation.entities, date, 'wrestler');
      case 'transfer-tag-teams':
        return this.moveMembers(operation.entities, date, 'tag-team');
      case 'transfer-managers':
        return this.moveMembers(operation.entities, date, 'manager');
      case 'transfer-all-available':
        return this.executeAvailableTransfer(date);
      case 'transfer-by-criteria':
        return this.executeCriteriaTransfer(operation.criteria, date);
    }
  }

  private async executeMerge(
    primary: StableEntity,
    secondary: StableEntity,
    newName: string | null,
    date: Date,
  ): Promise<StableEntity> {
    const { stables } = this;

    for (const wrestler of await secondary.currentWrestlers()) {
      await stables.removeWrestler(secondary, wrestler, date);
      await stables.addWrestler(primary, wrestler, date);
    }
    for (const tagTeam of await secondary.currentTagTeams()) {
      await stables.removeTagTeam(secondary, tagTeam, date);
      await stables.addTagTeam(primary, tagTeam, date);
    }

    let merged = primary;
    if (newName) {
      merged = await stables.update(primary, { name: newName });
      this.target = merged;
    }

    await StatusTransitionPipeline.create(this.runtime.context, secondary, 'retire', date).execute();

    this.logger.info(
      { primary: entityKey(primary), secondary: entityKey(secondary), name: merged.name },
      'Stables merged',
    );
    return merged;
  }

  private async executeSplit(original: StableEntity, newName: string): Promise<StableEntity> {
    const created = await this.stables.create({ name: newName, startDate: null });
    this.target = created;
    this.logger.info({ original: entityKey(original), created: entityKey(created) }, 'Stable split');
    return created;
  }

  private async moveMembers(
    members: readonly RosterEntity[],
    date: Date,
    kind: 'wrestler' | 'tag-team' | 'manager',
  ): Promise<StableEntity | null> {
    const { stables, source, target } = this;

    for (const member of members) {
      switch (kind) {
        case 'wrestler':
          if (source) await stables.removeWrestler(source, member, date);
          if (target) await stables.addWrestler(target, member, date);
          break;
        case 'tag-team':
          if (source) await stables.removeTagTeam(source, member, date);
          if (target) await stables.addTagTeam(target, member, date);
          break;
        case 'manager':
          if (source) await stables.removeManager(source, member, date);
          if (target) await stables.addManager(target, member, date);
          break;
      }
    }
    return target;
  }

  private async executeAvailableTransfer(date: Date): Promise<StableEntity | null> {
    const { source, runtime } = this;
    if (!source) {
      return this.target;
    }

    const wrestlers = runtime.collection(await source.currentWrestlers()).filterByAvailability().get();
    await this.moveMembers(wrestlers, date, 'wrestler');

    const tagTeams = runtime.collection(await source.currentTagTeams()).filterByAvailability().get();
    await this.moveMembers(tagTeams, date, 'tag-team');

    const managers = runtime.collection(await source.currentManagers()).filterByAvailability().get();
    await this.moveMembers(managers, date, 'manager');

    return this.target;
  }

  private async executeCriteriaTransfer(criteria: unknown, date: Date): Promise<StableEntity | null> {
    const { source, runtime } = this;
    if (!source) {
      return this.target;
    }

    const wrestlers = runtime.collection(await source.currentWrestlers()).applyCriteria(criteria).get();
    await this.moveMembers(wrestlers, date, 'wrestler');

    return this.target;
  }

  private async executeCascade(cascade: StableCascade, date: Date): Promise<void> {
    switch (cascade.kind) {
      case 'employment':
        await this.executeEmploymentCascade(date);
        return;
      case 'suspension':
        await this.executeSuspensionCascade(cascade.memberTypes, date);
        return;
      case 'retire-source':
        if (this.source) {
          await StatusTransitionPipeline.create(this.runtime.context, this.source, 'retire', date).execute();
        }
        return;
    }
  }

  private async executeEmploymentCascade(date: Date): Promise<void> {
    const { target, runtime } = this;
    if (!target) {
      return;
    }

    const groups = [
      await target.currentWrestlers(),
      await target.currentTagTeams(),
      await target.currentManagers(),
    ];
    for (const members of groups) {
      await runtime
        .collection(members)
        .filterByEmploymentStatus('unemployed')
        .filterBy(awaitingEmployment)
        .batchEmploy(date);
    }
  }

  private async executeSuspensionCascade(
    memberTypes: readonly StableMemberKind[],
    date: Date,
  ): Promise<void> {
    const { target, runtime } = this;
    if (!target) {
      return;
    }

    for (const memberType of memberTypes) {
      let members: RosterEntity[];
      switch (memberType) {
        case 'wrestlers':
          members = await target.currentWrestlers();
          break;
        case 'tag_teams':
          members = await target.currentTagTeams();
          break;
        case 'managers':
          continue;
      }
      await runtime
        .collection(members)
        .filterByEmploymentStatus('employed')
        .filterBySuspensionStatus('active')
        .batchSuspend(date);
    }
  }
}

/** The orchestrator entry points bound to one runtime. */
export interface StableOrchestration {
  mergeStables(
    primary: StableEntity,
    secondary: StableEntity,
    newName?: string | null,
  ): StableMembershipOrchestrator;
  splitStable(original: StableEntity, newName: string): StableMembershipOrchestrator;
  transferMembers(from: StableEntity, to: StableEntity): StableMembershipOrchestrator;
}

export function bindStableOrchestration(runtime: StableRuntime): StableOrchestration {
  return {
    mergeStables: (primary, secondary, newName) =>
      StableMembershipOrchestrator.mergeStables(runtime, primary, secondary, newName),
    splitStable: (original, newName) =>
      StableMembershipOrchestrator.splitStable(runtime, original, newName),
    transferMembers: (from, to) => StableMembershipOrchestrator.transferMembers(runtime, from, to),
  };
}
