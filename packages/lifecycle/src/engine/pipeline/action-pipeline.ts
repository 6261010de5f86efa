import { toEntityRef } from '../../domain/capabilities.js';
import type { EntityRef, RosterEntity, StableEntity } from '../../domain/types.js';
import { getEffectiveDate } from '../../lib/dates.js';
import { CompensationError, ConfigurationError } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import type { RosterActionsService } from '../../services/roster-actions.service.js';
import type { CollectionStatistics } from '../collections/member-collection.js';
import { toError } from '../collections/batch.js';
import { bindStableOrchestration } from '../stables/stable-orchestrator.js';
import type { StableOrchestration, StableRuntime } from '../stables/stable-orchestrator.js';

export interface PipelineRuntime extends StableRuntime {
  actions: RosterActionsService;
}

export type FilterBatchOperation = 'employ' | 'release' | 'retire' | 'suspend' | 'reinstate' | 'injure';

export interface SplitMembers {
  wrestlers?: RosterEntity[];
  tagTeams?: RosterEntity[];
  managers?: RosterEntity[];
}

type BatchKind = 'batch-employ' | 'batch-release' | 'batch-retire' | 'batch-suspend' | 'batch-reinstate';

export type PipelineOperation =
  | { kind: 'stable-merge'; primary: StableEntity; secondary: StableEntity; newName: string | null }
  | { kind: 'stable-split'; original: StableEntity; newName: string; members: SplitMembers }
  | { kind: BatchKind; entities: RosterEntity[]; date: Date | null }
  | {
      kind: 'filter-and-batch';
      collection: RosterEntity[];
      criteria: unknown;
      operation: FilterBatchOperation;
      date: Date | null;
    }
  | { kind: 'stable-orchestration'; callback: (stables: StableOrchestration) => unknown }
  | {
      kind: 'custom';
      action: () => unknown;
      compensate?: (result: unknown) => void | Promise<void>;
    };

type InverseBatchKind = 'batch-release' | 'batch-employ' | 'batch-unretire' | 'batch-reinstate';

/**
 * Inverse operation recorded for a succeeded step when a later step fails.
 * Descriptors are informational; the enclosing transaction's rollback is
 * what actually restores state.
 */
export type CompensationRecord =
  | { kind: InverseBatchKind; operationIndex: number; entities: EntityRef[]; date: Date | null }
  | { kind: 'restore-stable-memberships'; operationIndex: number; stables: EntityRef[] }
  | { kind: 'delete-stable'; operationIndex: number; stable: EntityRef };

export interface PipelineResult {
  results: Record<number, unknown>;
  errors: Record<number, Error>;
  success: boolean;
}

const INVERSE_BATCH: Readonly<Record<BatchKind, InverseBatchKind | null>> = {
  'batch-employ': 'batch-release',
  'batch-release': 'batch-employ',
  'batch-retire': 'batch-unretire',
  'batch-suspend': 'batch-reinstate',
  'batch-reinstate': null,
};

function isStableEntity(value: unknown): value is StableEntity {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'stable' &&
    'id' in value &&
    typeof value.id === 'string'
  );
}

/**
 * ActionPipeline: queues heterogeneous roster operations and runs them in
 * order inside one transaction.
 *
 * With `continueOnError(false)` (the default) the first failure triggers the
 * compensations of every earlier operation, newest first, and is rethrown.
 * With `continueOnError(true)` each operation runs in its own nested scope
 * and failures are recorded by index.
 */
export class ActionPipeline {
  private readonly operations: PipelineOperation[] = [];
  private defaultDate: Date | null = null;
  private continueAfterError = false;
  private results: Record<number, unknown> = {};
  private errors: Record<number, Error> = {};
  private compensations: CompensationRecord[] = [];
  private readonly logger: Logger;

  constructor(private readonly runtime: PipelineRuntime) {
    this.logger = runtime.context.logger.child({ module: 'action-pipeline' });
  }

  withDefaultDate(date: Date): this {
    this.defaultDate = date;
    return this;
  }

  continueOnError(value = true): this {
    this.continueAfterError = value;
    return this;
  }

  stableMerger(primary: StableEntity, secondary: StableEntity, newName?: string | null): this {
    this.operations.push({ kind: 'stable-merge', primary, secondary, newName: newName ?? null });
    return this;
  }

  stableSplit(original: StableEntity, newName: string, members: SplitMembers = {}): this {
    this.operations.push({ kind: 'stable-split', original, newName, members });
    return this;
  }

  employMembers(entities: Iterable<RosterEntity>, date?: Date | null): this {
    return this.queueBatch('batch-employ', entities, date);
  }

  releaseMembers(entities: Iterable<RosterEntity>, date?: Date | null): this {
    return this.queueBatch('batch-release', entities, date);
  }

  retireMembers(entities: Iterable<RosterEntity>, date?: Date | null): this {
    return this.queueBatch('batch-retire', entities, date);
  }

  suspendMembers(entities: Iterable<RosterEntity>, date?: Date | null): this {
    return this.queueBatch('batch-suspend', entities, date);
  }

  reinstateMembers(entities: Iterable<RosterEntity>, date?: Date | null): this {
    return this.queueBatch('batch-reinstate', entities, date);
  }

  /**
   * Filters with a criteria map and runs one batch operation. The result is
   * the statistics of the matched entities after the batch.
   */
  filterAndBatch(
    collection: Iterable<RosterEntity>,
    criteria: unknown,
    operation: FilterBatchOperation,
    date?: Date | null,
  ): this {
    this.operations.push({
      kind: 'filter-and-batch',
      collection: [...collection],
      criteria,
      operation,
      date: date ?? null,
    });
    return this;
  }

  stableOrchestration(callback: (stables: StableOrchestration) => unknown): this {
    this.operations.push({ kind: 'stable-orchestration', callback });
    return this;
  }

  customAction(action: () => unknown, compensate?: (result: unknown) => void | Promise<void>): this {
    this.operations.push({ kind: 'custom', action, compensate });
    return this;
  }

  async execute(): Promise<PipelineResult> {
    const { transactions } = this.runtime.context;

    return transactions.runInTransaction(async () => {
      this.results = {};
      this.errors = {};
      this.compensations = [];

      for (const [index, operation] of this.operations.entries()) {
        try {
          this.results[index] = this.continueAfterError
            ? await transactions.runInTransaction(() => this.executeOperation(operation))
            : await this.executeOperation(operation);
        } catch (err) {
          const error = toError(err);
          this.errors[index] = error;
          if (!this.continueAfterError) {
            await this.compensate(index);
            throw err;
          }
          this.logger.warn(
            { operationIndex: index, kind: operation.kind, err: error },
            'Operation failed; continuing',
          );
        }
      }

      const success = this.wasSuccessful();
      this.logger.info(
        { operations: this.operations.length, failed: Object.keys(this.errors).length },
        'Action pipeline completed',
      );
      return { results: this.results, errors: this.errors, success };
    });
  }

  getResults(): Record<number, unknown> {
    return this.results;
  }

  getErrors(): Record<number, Error> {
    return this.errors;
  }

  wasSuccessful(): boolean {
    return Object.keys(this.errors).length === 0;
  }

  /** Inverse-operation descriptors recorded by the last failed run. */
  getCompensations(): CompensationRecord[] {
    return [...this.compensations];
  }

  private queueBatch(kind: BatchKind, entities: Iterable<RosterEntity>, date?: Date | null): this {
    this.operations.push({ kind, entities: [...entities], date: date ?? null });
    return this;
  }

  private resolveDate(date: Date | null): Date {
    return getEffectiveDate(date ?? this.defaultDate, this.runtime.context.clock);
  }

  private async executeOperation(operation: PipelineOperation): Promise<unknown> {
    const { runtime } = this;

    switch (operation.kind) {
      case 'stable-merge': {
        const orchestrator = bindStableOrchestration(runtime)
          .mergeStables(operation.primary, operation.secondary, operation.newName)
          .onDate(this.resolveDate(null));
        return orchestrator.execute();
      }
      case 'stable-split': {
        const { members } = operation;
        const orchestrator = bindStableOrchestration(runtime)
          .splitStable(operation.original, operation.newName)
          .onDate(this.resolveDate(null));
        if (members.wrestlers) orchestrator.transferWrestlers(members.wrestlers);
        if (members.tagTeams) orchestrator.transferTagTeams(members.tagTeams);
        if (members.managers) orchestrator.transferManagers(members.managers);
        return orchestrator.execute();
      }
      case 'batch-employ': {
        const date = this.resolveDate(operation.date);
        for (const entity of operation.entities) {
          await runtime.actions.employ(entity, date);
        }
        return undefined;
      }
      case 'batch-release':
        return this.runPlainBatch(operation.entities, 'release', operation.date);
      case 'batch-retire':
        return this.runPlainBatch(operation.entities, 'retire', operation.date);
      case 'batch-suspend':
        return this.runPlainBatch(operation.entities, 'suspend', operation.date);
      case 'batch-reinstate':
        return this.runPlainBatch(operation.entities, 'reinstate', operation.date);
      case 'filter-and-batch':
        return this.executeFilterAndBatch(operation);
      case 'stable-orchestration':
        return operation.callback(bindStableOrchestration(runtime));
      case 'custom':
        return operation.action();
      default: {
        const unknownOperation: never = operation;
        const kind: unknown = Reflect.get(unknownOperation, 'kind');
        throw new ConfigurationError(`Unknown operation type: ${String(kind)}`);
      }
    }
  }

  private async runPlainBatch(
    entities: RosterEntity[],
    transition: 'release' | 'retire' | 'suspend' | 'reinstate',
    date: Date | null,
  ): Promise<undefined> {
    const effective = this.resolveDate(date);
    for (const entity of entities) {
      await this.runtime.actions.pipeline(entity, transition, effective).execute();
    }
    return undefined;
  }

  private async executeFilterAndBatch(
    operation: Extract<PipelineOperation, { kind: 'filter-and-batch' }>,
  ): Promise<CollectionStatistics> {
    const matched = this.runtime.collection(operation.collection).applyCriteria(operation.criteria).get();
    const manager = this.runtime.collection(matched);
    const date = this.resolveDate(operation.date);

    switch (operation.operation) {
      case 'employ':
        await manager.batchEmploy(date);
        break;
      case 'release':
        await manager.batchRelease(date);
        break;
      case 'retire':
        await manager.batchRetire(date);
        break;
      case 'suspend':
        await manager.batchSuspend(date);
        break;
      case 'reinstate':
        await manager.batchReinstate(date);
        break;
      case 'injure':
        await manager.batchInjure(date);
        break;
    }
    return manager.getStatistics();
  }

  /**
   * Walks succeeded operations before `failedIndex`, newest first. Built-in
   * operations record an inverse descriptor; custom compensations run and
   * their failures are logged, never thrown.
   */
  private async compensate(failedIndex: number): Promise<void> {
    for (let index = failedIndex - 1; index >= 0; index--) {
      const operation = this.operations[index];
      const result = this.results[index];

      switch (operation.kind) {
        case 'stable-merge':
          this.compensations.push({
            kind: 'restore-stable-memberships',
            operationIndex: index,
            stables: [toEntityRef(operation.primary), toEntityRef(operation.secondary)],
          });
          break;
        case 'stable-split':
          if (isStableEntity(result)) {
            this.compensations.push({
              kind: 'delete-stable',
              operationIndex: index,
              stable: toEntityRef(result),
            });
          }
          break;
        case 'batch-employ':
        case 'batch-release':
        case 'batch-retire':
        case 'batch-suspend':
        case 'batch-reinstate': {
          const inverse = INVERSE_BATCH[operation.kind];
          if (inverse) {
            this.compensations.push({
              kind: inverse,
              operationIndex: index,
              entities: operation.entities.map(toEntityRef),
              date: operation.date,
            });
          }
          break;
        }
        case 'custom':
          if (operation.compensate) {
            try {
              await operation.compensate(result);
            } catch (err) {
              this.logger.error(
                { err: new CompensationError(index, err), operationIndex: index },
                'Compensation failed',
              );
            }
          }
          break;
        default:
          break;
      }
    }
  }
}
