import type { RosterEntity } from '../../domain/types.js';
import type { CascadeScope } from '../lifecycle/cascade-scope.js';
import type { CascadeStrategy } from '../lifecycle/types.js';
import { currentMembers, isEmployedAndNotSuspended } from './relationships.js';
import type { MemberRelationship } from './relationships.js';

async function suspendEach(members: RosterEntity[], date: Date, scope: CascadeScope): Promise<void> {
  for (const member of members) {
    if (!isEmployedAndNotSuspended(member)) {
      continue;
    }
    await scope.pipeline(member, 'suspend', date).execute();
  }
}

/**
 * Suspends the employed, not yet suspended members of each relationship when
 * the entity itself is suspended.
 */
export function suspendMembers(relationships: readonly MemberRelationship[]): CascadeStrategy {
  return async (entity, date, transition, scope) => {
    if (transition !== 'suspend') {
      return;
    }
    for (const relationship of relationships) {
      await suspendEach(await currentMembers(entity, relationship), date, scope);
    }
  };
}

export function suspendManagers(): CascadeStrategy {
  return suspendMembers(['managers']);
}

export function suspendWrestlers(): CascadeStrategy {
  return suspendMembers(['wrestlers']);
}
