import type { ZodType } from 'zod';
import { hasCapability, normalizeTypeName } from '../../domain/capabilities.js';
import { isAvailable } from '../../domain/status.js';
import type { RosterEntity, TransitionName } from '../../domain/types.js';
import { ValidationError, fromZodError } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import {
  EmploymentStatusFilterSchema,
  InjuryStatusFilterSchema,
  MemberCriteriaSchema,
  RetirementStatusFilterSchema,
  SuspensionStatusFilterSchema,
} from '../../schemas/member-criteria.schema.js';
import type {
  EmploymentStatusFilter,
  InjuryStatusFilter,
  RetirementStatusFilter,
  SuspensionStatusFilter,
} from '../../schemas/member-criteria.schema.js';
import type { RosterActionsService } from '../../services/roster-actions.service.js';
import { runBatch } from './batch.js';
import type { BatchOptions, BatchOutcome } from './batch.js';

export type MemberFilter = (entity: RosterEntity) => boolean;

export interface StatusGroups {
  employed: RosterEntity[];
  unemployed: RosterEntity[];
  suspended: RosterEntity[];
  injured: RosterEntity[];
  retired: RosterEntity[];
  available: RosterEntity[];
}

export interface CollectionStatistics {
  total: number;
  employed: number;
  unemployed: number;
  suspended: number;
  injured: number;
  retired: number;
  available: number;
}

function parseLiteral<T>(
  schema: ZodType<T>,
  value: unknown,
  kind: string,
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${kind} status: ${String(value)}`, { [kind]: value });
  }
  return parsed.data;
}

const isEmployed: MemberFilter = (e) => hasCapability(e, 'employment') && e.isEmployed();
const isUnemployed: MemberFilter = (e) => hasCapability(e, 'employment') && !e.isEmployed();
const isReleased: MemberFilter = (e) => hasCapability(e, 'employment') && e.isReleased();
const isSuspended: MemberFilter = (e) => hasCapability(e, 'suspension') && e.isSuspended();
const isNotSuspended: MemberFilter = (e) => hasCapability(e, 'suspension') && !e.isSuspended();
const isInjured: MemberFilter = (e) => hasCapability(e, 'injury') && e.isInjured();
const isHealthy: MemberFilter = (e) => hasCapability(e, 'injury') && !e.isInjured();
const isRetired: MemberFilter = (e) => hasCapability(e, 'retirement') && e.isRetired();
const isNotRetired: MemberFilter = (e) => hasCapability(e, 'retirement') && !e.isRetired();

/**
 * Filtered view over a roster collection plus batch transitions over the
 * filtered set. Filters are ANDed in registration order; the source
 * collection is never mutated and `get()` recomputes on every call.
 */
export class MemberCollectionManager {
  private readonly filters: MemberFilter[] = [];
  private readonly collection: readonly RosterEntity[];

  constructor(
    private readonly actions: RosterActionsService,
    private readonly logger: Logger,
    collection: Iterable<RosterEntity>,
  ) {
    this.collection = [...collection];
  }

  filterByEmploymentStatus(status: EmploymentStatusFilter): this {
    const parsed = parseLiteral(EmploymentStatusFilterSchema, status, 'employment');
    switch (parsed) {
      case 'any':
        return this;
      case 'employed':
        return this.filterBy(isEmployed);
      case 'unemployed':
        return this.filterBy(isUnemployed);
      case 'released':
        return this.filterBy(isReleased);
    }
  }

  filterBySuspensionStatus(status: SuspensionStatusFilter): this {
    const parsed = parseLiteral(SuspensionStatusFilterSchema, status, 'suspension');
    switch (parsed) {
      case 'any':
        return this;
      case 'suspended':
        return this.filterBy(isSuspended);
      case 'active':
        return this.filterBy(isNotSuspended);
    }
  }

  filterByInjuryStatus(status: InjuryStatusFilter): this {
    const parsed = parseLiteral(InjuryStatusFilterSchema, status, 'injury');
    switch (parsed) {
      case 'any':
        return this;
      case 'injured':
        return this.filterBy(isInjured);
      case 'healthy':
        return this.filterBy(isHealthy);
    }
  }

  filterByRetirementStatus(status: RetirementStatusFilter): this {
    const parsed = parseLiteral(RetirementStatusFilterSchema, status, 'retirement');
    switch (parsed) {
      case 'any':
        return this;
      case 'retired':
        return this.filterBy(isRetired);
      case 'active':
        return this.filterBy(isNotRetired);
    }
  }

  /**
   * Employed, not suspended, not injured, not retired. A check whose
   * capability the entity lacks counts as passed.
   */
  filterByAvailability(availableOnly = true): this {
    if (!availableOnly) {
      return this;
    }
    return this.filterBy(isAvailable);
  }

  /** Matches entity types loosely: 'tag_team', 'TagTeam' and 'tag team' are equal. */
  filterByType(types: string | readonly string[]): this {
    const wanted = new Set((typeof types === 'string' ? [types] : types).map(normalizeTypeName));
    return this.filterBy((entity) => wanted.has(normalizeTypeName(entity.type)));
  }

  filterBy(predicate: MemberFilter): this {
    this.filters.push(predicate);
    return this;
  }

  /**
   * Applies a criteria map. Unknown keys and bad literals raise
   * ValidationError before any filter is added.
   */
  applyCriteria(criteria: unknown): this {
    const parsed = MemberCriteriaSchema.safeParse(criteria);
    if (!parsed.success) {
      throw fromZodError(parsed.error, 'Invalid member criteria');
    }

    const { employmentStatus, suspensionStatus, injuryStatus, retirementStatus, availability, types } =
      parsed.data;
    if (employmentStatus !== undefined) this.filterByEmploymentStatus(employmentStatus);
    if (suspensionStatus !== undefined) this.filterBySuspensionStatus(suspensionStatus);
    if (injuryStatus !== undefined) this.filterByInjuryStatus(injuryStatus);
    if (retirementStatus !== undefined) this.filterByRetirementStatus(retirementStatus);
    if (availability !== undefined) this.filterByAvailability(availability);
    if (types !== undefined) this.filterByType(types);
    return this;
  }

  get(): RosterEntity[] {
    return this.collection.filter((entity) => this.filters.every((filter) => filter(entity)));
  }

  count(): number {
    return this.get().length;
  }

  exists(): boolean {
    return this.count() > 0;
  }

  first(): RosterEntity | null {
    return this.get()[0] ?? null;
  }

  /** Employs with the default employment cascades of each entity. */
  batchEmploy(date?: Date | null, options: BatchOptions = {}): Promise<BatchOutcome> {
    return this.batch('employ', this.get(), options, (entity) =>
      this.actions.employ(entity, date, options.notes),
    );
  }

  batchRelease(date?: Date | null, options: BatchOptions = {}): Promise<BatchOutcome> {
    return this.batchTransition('release', this.get(), date, options);
  }

  batchSuspend(date?: Date | null, options: BatchOptions = {}): Promise<BatchOutcome> {
    return this.batchTransition('suspend', this.get(), date, options);
  }

  batchRetire(date?: Date | null, options: BatchOptions = {}): Promise<BatchOutcome> {
    return this.batchTransition('retire', this.get(), date, options);
  }

  /** Entities that cannot be injured are skipped, not failed. */
  batchInjure(date?: Date | null, options: BatchOptions = {}): Promise<BatchOutcome> {
    const injurable = this.get().filter((entity) => hasCapability(entity, 'injury'));
    return this.batchTransition('injure', injurable, date, options);
  }

  batchReinstate(date?: Date | null, options: BatchOptions = {}): Promise<BatchOutcome> {
    return this.batchTransition('reinstate', this.get(), date, options);
  }

  groupByStatus(): StatusGroups {
    const entities = this.get();
    return {
      employed: entities.filter(isEmployed),
      unemployed: entities.filter(isUnemployed),
      suspended: entities.filter(isSuspended),
      injured: entities.filter(isInjured),
      retired: entities.filter(isRetired),
      available: entities.filter(isAvailable),
    };
  }

  getStatistics(): CollectionStatistics {
    const grouped = this.groupByStatus();
    return {
      total: this.count(),
      employed: grouped.employed.length,
      unemployed: grouped.unemployed.length,
      suspended: grouped.suspended.length,
      injured: grouped.injured.length,
      retired: grouped.retired.length,
      available: grouped.available.length,
    };
  }

  private batchTransition(
    transition: TransitionName,
    entities: RosterEntity[],
    date: Date | null | undefined,
    options: BatchOptions,
  ): Promise<BatchOutcome> {
    return this.batch(transition, entities, options, async (entity) => {
      const pipeline = this.actions.pipeline(entity, transition, date);
      if (options.notes) {
        pipeline.withNotes(options.notes);
      }
      await pipeline.execute();
    });
  }

  private batch(
    operation: TransitionName,
    entities: RosterEntity[],
    options: BatchOptions,
    action: (entity: RosterEntity) => Promise<void>,
  ): Promise<BatchOutcome> {
    return runBatch(entities, action, {
      continueOnError: options.continueOnError,
      logger: this.logger,
      operation,
    });
  }
}
