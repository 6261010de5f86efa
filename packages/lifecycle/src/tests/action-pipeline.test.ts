import { describe, it, expect, vi } from 'vitest';
import { entityKey } from '../domain/capabilities.js';
import { buildRoster, singleStable } from './setup.js';

// ---------------------------------------------------------------------------
// Failure modes
// ---------------------------------------------------------------------------

describe('ActionPipeline failure handling', () => {
  it('aborts at the first failure and never runs later operations', async () => {
    const { lifecycle } = buildRoster();
    const errorB = new Error('operation B failed');
    const opC = vi.fn(() => 'C');

    const pipeline = lifecycle
      .pipeline()
      .customAction(() => 'A')
      .customAction(() => {
        throw errorB;
      })
      .customAction(opC);

    await expect(pipeline.execute()).rejects.toBe(errorB);
    expect(pipeline.getResults()).toEqual({ 0: 'A' });
    expect(pipeline.getErrors()).toEqual({ 1: errorB });
    expect(pipeline.wasSuccessful()).toBe(false);
    expect(opC).not.toHaveBeenCalled();
  });

  it('records every failure by index when continuing on error', async () => {
    const { lifecycle } = buildRoster();
    const errorB = new Error('operation B failed');

    const result = await lifecycle
      .pipeline()
      .continueOnError()
      .customAction(() => 'A')
      .customAction(() => {
        throw errorB;
      })
      .customAction(() => 'C')
      .execute();

    expect(result).toEqual({ results: { 0: 'A', 2: 'C' }, errors: { 1: errorB }, success: false });
    expect(result.errors[1]).toBe(errorB);
  });

  it('rolls back every earlier operation when aborting', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava');

    const pipeline = lifecycle
      .pipeline()
      .employMembers([ava])
      .customAction(() => {
        throw new Error('late failure');
      });

    await expect(pipeline.execute()).rejects.toThrow('late failure');
    expect(ava.isEmployed()).toBe(false);
    expect(pipeline.getCompensations()).toEqual([
      { kind: 'batch-release', operationIndex: 0, entities: [{ type: 'wrestler', id: ava.id }], date: null },
    ]);
  });

  it('rolls back only the failed operation when continuing on error', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava');
    const bea = roster.wrestler('Bea');

    const result = await lifecycle
      .pipeline()
      .continueOnError()
      .customAction(async () => {
        await lifecycle.actions.employ(ava);
        throw new Error('late failure');
      })
      .employMembers([bea])
      .execute();

    expect(result.success).toBe(false);
    expect(ava.isEmployed()).toBe(false);
    expect(bea.isEmployed()).toBe(true);
  });

  it('runs custom compensations newest first and logs their failures', async () => {
    const { lifecycle } = buildRoster();
    const order: string[] = [];
    const failure = new Error('operation C failed');

    const pipeline = lifecycle
      .pipeline()
      .customAction(
        () => 'A',
        (result) => {
          order.push(`undo ${String(result)}`);
        },
      )
      .customAction(
        () => 'B',
        () => {
          throw new Error('cannot undo B');
        },
      )
      .customAction(() => {
        throw failure;
      });

    await expect(pipeline.execute()).rejects.toBe(failure);
    expect(order).toEqual(['undo A']);
  });
});

// ---------------------------------------------------------------------------
// Built-in operations
// ---------------------------------------------------------------------------

describe('ActionPipeline operations', () => {
  it('runs batches with the pipeline default date', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava');
    const bea = roster.wrestler('Bea', { status: 'employed' });
    const date = new Date('2026-02-01T00:00:00.000Z');

    const result = await lifecycle
      .pipeline()
      .withDefaultDate(date)
      .employMembers([ava])
      .suspendMembers([bea])
      .execute();

    expect(result.success).toBe(true);
    expect(roster.calls()).toEqual([
      `createEmployment ${entityKey(ava)}`,
      `createSuspension ${entityKey(bea)}`,
    ]);
    expect(roster.mutations.map((m) => m.date)).toEqual([date, date]);
  });

  it('prefers an operation date over the default date', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava', { status: 'employed' });
    const date = new Date('2026-02-10T00:00:00.000Z');

    await lifecycle
      .pipeline()
      .withDefaultDate(new Date('2026-01-01T00:00:00.000Z'))
      .releaseMembers([ava], date)
      .execute();

    expect(roster.mutations[0].date).toEqual(date);
  });

  it('filters, runs one batch and returns statistics of the matched entities', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava');
    const bea = roster.wrestler('Bea', { status: 'employed' });

    const result = await lifecycle
      .pipeline()
      .filterAndBatch([ava, bea], { employmentStatus: 'unemployed' }, 'employ')
      .execute();

    expect(result.results[0]).toEqual({
      total: 1,
      employed: 1,
      unemployed: 0,
      suspended: 0,
      injured: 0,
      retired: 0,
      available: 1,
    });
    expect(roster.calls()).toEqual([`createEmployment ${entityKey(ava)}`]);
  });

  it('merges and splits stables', async () => {
    const { roster, lifecycle } = buildRoster();
    const primary = roster.stable('The Order', { status: 'employed' });
    const secondary = roster.stable('The Pack', { status: 'employed' });
    const ava = roster.wrestler('Ava', { status: 'employed' });
    roster.addToStable(secondary, ava);

    const result = await lifecycle
      .pipeline()
      .stableMerger(primary, secondary, 'The New Order')
      .stableSplit(primary, 'The Offshoot', { wrestlers: [ava] })
      .execute();

    expect(result.results[0]).toBe(primary);
    expect(primary.name).toBe('The New Order');
    expect(secondary.isRetired()).toBe(true);
    expect(await primary.currentWrestlers()).toEqual([]);
    expect(await ava.currentStable()).toBe(result.results[1]);
  });

  it('hands stable orchestration to a callback', async () => {
    const { roster, lifecycle } = buildRoster();
    const original = roster.stable('The Order', { status: 'employed' });

    const result = await lifecycle
      .pipeline()
      .stableOrchestration((stables) => stables.splitStable(original, 'Y').execute())
      .execute();

    const created = result.results[0];
    expect(Array.isArray(created)).toBe(false);
    expect(roster.calls()[0]).toMatch(/^create stable:stable-\d+$/);
  });

  it('reports retire and reinstate batches through the same pipeline', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava', { status: 'employed' });
    const bea = roster.wrestler('Bea', { status: 'suspended' });

    const result = await lifecycle.pipeline().retireMembers([ava]).reinstateMembers([bea]).execute();

    expect(result.success).toBe(true);
    expect(ava.isRetired()).toBe(true);
    expect(bea.isSuspended()).toBe(false);
  });

  it('returns the stable produced by a split', async () => {
    const { roster, lifecycle } = buildRoster();
    const original = roster.stable('The Order', { status: 'employed' });

    const direct = singleStable(await lifecycle.splitStable(original, 'Y').execute());

    expect(direct.name).toBe('Y');
  });
});
