import { hasCapability, isStable } from '../../domain/capabilities.js';
import type { RosterEntity } from '../../domain/types.js';
import type { MemberType, RepositoryRegistry } from '../../lib/repositories.js';
import type { CascadeStrategy } from '../lifecycle/types.js';
import { currentMembers } from './relationships.js';

function memberType(entity: RosterEntity): MemberType | null {
  const { type } = entity;
  return type === 'stable' ? null : type;
}

/** Ends the entity's current stable membership. */
export function leaveStable(repositories: RepositoryRegistry): CascadeStrategy {
  return async (entity, date, transition) => {
    if (transition !== 'retire' || !hasCapability(entity, 'stable-membership')) {
      return;
    }
    const stable = await entity.currentStable();
    if (!stable) {
      return;
    }

    const stables = repositories.stables();
    switch (entity.type) {
      case 'wrestler':
        await stables.removeWrestler(stable, entity, date);
        break;
      case 'tag_team':
        await stables.removeTagTeam(stable, entity, date);
        break;
      case 'manager':
        await stables.removeManager(stable, entity, date);
        break;
      default:
        break;
    }
  };
}

/** Ends every current manager relationship of the entity. */
export function detachManagers(repositories: RepositoryRegistry): CascadeStrategy {
  return async (entity, date, transition) => {
    const type = memberType(entity);
    if (transition !== 'retire' || type === null) {
      return;
    }
    if ((await currentMembers(entity, 'managers')).length === 0) {
      return;
    }
    await repositories.detachment(type, 'removeCurrentManagers')(entity, date);
  };
}

/** Removes a wrestler from their current tag team. */
export function leaveTagTeam(repositories: RepositoryRegistry): CascadeStrategy {
  return async (entity, date, transition) => {
    const type = memberType(entity);
    if (transition !== 'retire' || type === null || !hasCapability(entity, 'tag-team-membership')) {
      return;
    }
    if (!(await entity.currentTagTeam())) {
      return;
    }
    await repositories.detachment(type, 'removeFromCurrentTagTeam')(entity, date);
  };
}

/** Ends a manager's relationships with the wrestlers and tag teams they manage. */
export function detachManagedMembers(repositories: RepositoryRegistry): CascadeStrategy {
  return async (entity, date, transition) => {
    const type = memberType(entity);
    if (transition !== 'retire' || type === null) {
      return;
    }
    if ((await currentMembers(entity, 'wrestlers')).length > 0) {
      await repositories.detachment(type, 'removeCurrentWrestlers')(entity, date);
    }
    if ((await currentMembers(entity, 'tag-teams')).length > 0) {
      await repositories.detachment(type, 'removeCurrentTagTeams')(entity, date);
    }
  };
}

/** Removes every current wrestler, tag team and manager from a retiring stable. */
export function removeStableMembers(repositories: RepositoryRegistry): CascadeStrategy {
  return async (entity, date, transition) => {
    if (transition !== 'retire' || !isStable(entity)) {
      return;
    }
    const stables = repositories.stables();
    for (const wrestler of await entity.currentWrestlers()) {
      await stables.removeWrestler(entity, wrestler, date);
    }
    for (const tagTeam of await entity.currentTagTeams()) {
      await stables.removeTagTeam(entity, tagTeam, date);
    }
    for (const manager of await entity.currentManagers()) {
      await stables.removeManager(entity, manager, date);
    }
  };
}
