import { hasCapability } from '../../domain/capabilities.js';
import type { RosterEntity } from '../../domain/types.js';

export type MemberRelationship = 'managers' | 'wrestlers' | 'tag-teams';

/**
 * Current members of one relationship kind. Entities that do not declare the
 * relationship have none; the accessor is never called on them.
 */
export async function currentMembers(
  entity: RosterEntity,
  relationship: MemberRelationship,
): Promise<RosterEntity[]> {
  switch (relationship) {
    case 'managers':
      return hasCapability(entity, 'managers') ? entity.currentManagers() : [];
    case 'wrestlers':
      return hasCapability(entity, 'wrestlers') ? entity.currentWrestlers() : [];
    case 'tag-teams':
      return hasCapability(entity, 'tag-teams') ? entity.currentTagTeams() : [];
  }
}

/** Not employed now and not contracted to start later. */
export function awaitingEmployment(entity: RosterEntity): boolean {
  return (
    hasCapability(entity, 'employment') && !entity.isEmployed() && !entity.hasFutureEmployment()
  );
}

export function isEmployedAndNotSuspended(entity: RosterEntity): boolean {
  return (
    hasCapability(entity, 'employment') &&
    entity.isEmployed() &&
    !(hasCapability(entity, 'suspension') && entity.isSuspended())
  );
}

export function isSuspended(entity: RosterEntity): boolean {
  return hasCapability(entity, 'suspension') && entity.isSuspended();
}
