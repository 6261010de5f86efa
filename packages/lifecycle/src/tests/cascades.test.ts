import { describe, it, expect } from 'vitest';
import { entityKey } from '../domain/capabilities.js';
import { allMembers, custom } from '../engine/cascades/employment.js';
import { buildRoster } from './setup.js';

// ---------------------------------------------------------------------------
// Employment
// ---------------------------------------------------------------------------

describe('employment cascades', () => {
  it('employs the unemployed managers of an employed wrestler', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava');
    const max = roster.manager('Max');
    roster.assignManager(ava, max);

    await lifecycle.actions.employ(ava);

    expect(roster.calls()).toEqual([
      `createEmployment ${entityKey(ava)}`,
      `createEmployment ${entityKey(max)}`,
    ]);
    expect(max.isEmployed()).toBe(true);
  });

  it('skips members already employed or contracted to start later', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava');
    roster.assignManager(ava, roster.manager('Max', { status: 'employed' }));
    roster.assignManager(ava, roster.manager('Mia', { status: 'future_employed' }));

    await lifecycle.actions.employ(ava);

    expect(roster.calls()).toEqual([`createEmployment ${entityKey(ava)}`]);
  });

  it('employs a tag team, then its managers, then its wrestlers', async () => {
    const { roster, lifecycle } = buildRoster();
    const team = roster.tagTeam('The Pair');
    const ava = roster.wrestler('Ava');
    const bea = roster.wrestler('Bea');
    const max = roster.manager('Max');
    roster.addToTagTeam(team, ava).addToTagTeam(team, bea).assignManager(team, max);

    await lifecycle.actions.employ(team);

    expect(roster.calls()).toEqual([
      `createEmployment ${entityKey(team)}`,
      `createEmployment ${entityKey(max)}`,
      `createEmployment ${entityKey(ava)}`,
      `createEmployment ${entityKey(bea)}`,
    ]);
  });

  it('visits each member once when relationships loop back', async () => {
    const { roster, lifecycle } = buildRoster();
    const stable = roster.stable('The Order');
    const ava = roster.wrestler('Ava');
    const max = roster.manager('Max');
    const team = roster.tagTeam('The Pair');
    roster
      .addToStable(stable, ava)
      .addToStable(stable, max)
      .addToStable(stable, team)
      .assignManager(ava, max)
      .addToTagTeam(team, ava);

    await lifecycle.actions.withCustomCascade(stable, 'employ', [allMembers()]);

    expect(roster.calls()).toEqual([
      `createEmployment ${entityKey(stable)}`,
      `createEmployment ${entityKey(ava)}`,
      `createEmployment ${entityKey(max)}`,
      `createEmployment ${entityKey(team)}`,
    ]);
  });

  it('employs only the listed relationships with a custom cascade', async () => {
    const { roster, lifecycle } = buildRoster();
    const max = roster.manager('Max');
    const ava = roster.wrestler('Ava');
    const team = roster.tagTeam('The Pair');
    roster.assignManager(ava, max).assignManager(team, max);

    await lifecycle.actions.withCustomCascade(max, 'employ', [custom(['tag-teams'])]);

    expect(team.isEmployed()).toBe(true);
    expect(ava.isEmployed()).toBe(false);
  });

  it('does nothing for transitions other than employ', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava', { status: 'employed' });
    roster.assignManager(ava, roster.manager('Max'));

    await lifecycle.actions.withCustomCascade(ava, 'release', [allMembers()]);

    expect(roster.calls()).toEqual([`createRelease ${entityKey(ava)}`]);
  });
});

// ---------------------------------------------------------------------------
// Suspension & reinstatement
// ---------------------------------------------------------------------------

describe('suspension cascades', () => {
  it('suspends a tag team, its wrestlers, then its managers', async () => {
    const { roster, lifecycle } = buildRoster();
    const team = roster.tagTeam('The Pair', { status: 'employed' });
    const ava = roster.wrestler('Ava', { status: 'employed' });
    const bea = roster.wrestler('Bea', { status: 'employed' });
    const max = roster.manager('Max', { status: 'employed' });
    roster.addToTagTeam(team, ava).addToTagTeam(team, bea).assignManager(team, max);

    await lifecycle.actions.suspend(team);

    expect(roster.calls()).toEqual([
      `createSuspension ${entityKey(team)}`,
      `createSuspension ${entityKey(ava)}`,
      `createSuspension ${entityKey(bea)}`,
      `createSuspension ${entityKey(max)}`,
    ]);
  });

  it('leaves unemployed managers alone', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava', { status: 'employed' });
    const max = roster.manager('Max');
    roster.assignManager(ava, max);

    await lifecycle.actions.suspend(ava);

    expect(roster.calls()).toEqual([`createSuspension ${entityKey(ava)}`]);
  });

  it('refuses to suspend a tag team whose wrestler is already suspended', async () => {
    const { roster, lifecycle } = buildRoster();
    const team = roster.tagTeam('The Pair', { status: 'employed' });
    roster.addToTagTeam(team, roster.wrestler('Ava', { status: 'suspended' }));

    await expect(lifecycle.actions.suspend(team)).rejects.toThrow(
      "Tag team 'The Pair' cannot be suspended because wrestler 'Ava' is already suspended.",
    );
    expect(roster.mutations).toEqual([]);
  });
});

describe('reinstatement cascades', () => {
  it('reinstates a suspended tag team with its suspended wrestlers', async () => {
    const { roster, lifecycle } = buildRoster();
    const team = roster.tagTeam('The Pair', { status: 'suspended' });
    const ava = roster.wrestler('Ava', { status: 'suspended' });
    const bea = roster.wrestler('Bea', { status: 'employed' });
    roster.addToTagTeam(team, ava).addToTagTeam(team, bea);

    await lifecycle.actions.reinstate(team);

    expect(roster.calls()).toEqual([
      `createReinstatement ${entityKey(team)}`,
      `createReinstatement ${entityKey(ava)}`,
    ]);
  });

  it('keeps a manager suspended while another managed wrestler is suspended', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava', { status: 'suspended' });
    const bea = roster.wrestler('Bea', { status: 'suspended' });
    const max = roster.manager('Max', { status: 'suspended' });
    roster.assignManager(ava, max).assignManager(bea, max);

    await lifecycle.actions.reinstate(ava);

    expect(roster.calls()).toEqual([`createReinstatement ${entityKey(ava)}`]);
    expect(max.isSuspended()).toBe(true);
  });

  it('reinstates a manager once nothing else they manage is suspended', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava', { status: 'suspended' });
    const bea = roster.wrestler('Bea', { status: 'employed' });
    const max = roster.manager('Max', { status: 'suspended' });
    roster.assignManager(ava, max).assignManager(bea, max);

    await lifecycle.actions.reinstate(ava);

    expect(max.isSuspended()).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Retirement
// ---------------------------------------------------------------------------

describe('retirement cascades', () => {
  it('detaches a retiring wrestler from team, managers and stable', async () => {
    const { roster, lifecycle } = buildRoster();
    const stable = roster.stable('The Order', { status: 'employed' });
    const team = roster.tagTeam('The Pair', { status: 'employed' });
    const ava = roster.wrestler('Ava', { status: 'employed' });
    const max = roster.manager('Max', { status: 'employed' });
    roster.addToTagTeam(team, ava).assignManager(ava, max).addToStable(stable, ava);

    await lifecycle.actions.retire(ava);

    expect(roster.calls()).toEqual([
      `createRetirement ${entityKey(ava)}`,
      `removeFromCurrentTagTeam ${entityKey(ava)}`,
      `removeCurrentManagers ${entityKey(ava)}`,
      `removeWrestler ${entityKey(stable)} ${entityKey(ava)}`,
    ]);
    expect(await ava.currentTagTeam()).toBeNull();
    expect(await ava.currentManagers()).toEqual([]);
    expect(await stable.currentWrestlers()).toEqual([]);
  });

  it('ends the relationships of a retiring manager', async () => {
    const { roster, lifecycle } = buildRoster();
    const ava = roster.wrestler('Ava', { status: 'employed' });
    const max = roster.manager('Max', { status: 'employed' });
    roster.assignManager(ava, max);

    await lifecycle.actions.retire(max);

    expect(roster.calls()).toEqual([
      `createRetirement ${entityKey(max)}`,
      `removeCurrentWrestlers ${entityKey(max)}`,
    ]);
    expect(await ava.currentManagers()).toEqual([]);
  });

  it('empties a retiring stable', async () => {
    const { roster, lifecycle } = buildRoster();
    const stable = roster.stable('The Order', { status: 'employed' });
    const ava = roster.wrestler('Ava', { status: 'employed' });
    const max = roster.manager('Max', { status: 'employed' });
    roster.addToStable(stable, ava).addToStable(stable, max);

    await lifecycle.actions.retire(stable);

    expect(roster.calls()).toEqual([
      `createRetirement ${entityKey(stable)}`,
      `removeWrestler ${entityKey(stable)} ${entityKey(ava)}`,
      `removeManager ${entityKey(stable)} ${entityKey(max)}`,
    ]);
    expect(stable.isRetired()).toBe(true);
    expect(ava.isRetired()).toBe(false);
  });
});
