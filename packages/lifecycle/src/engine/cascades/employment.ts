import { entityKey } from '../../domain/capabilities.js';
import type { RosterEntity } from '../../domain/types.js';
import type { CascadeScope } from '../lifecycle/cascade-scope.js';
import type { CascadeStrategy } from '../lifecycle/types.js';
import { awaitingEmployment, currentMembers } from './relationships.js';
import type { MemberRelationship } from './relationships.js';

const ALL_MEMBERS_BUCKET = 'cascade:all-members';

async function employEach(
  members: RosterEntity[],
  date: Date,
  scope: CascadeScope,
  cascades: CascadeStrategy[] = [],
): Promise<void> {
  for (const member of members) {
    // Re-checked per member: an earlier cascade may already have employed it.
    if (!awaitingEmployment(member)) {
      continue;
    }
    const pipeline = scope.pipeline(member, 'employ', date);
    for (const cascade of cascades) {
      pipeline.withCascade(cascade);
    }
    await pipeline.execute();
  }
}

/** Employs every current manager who is not yet employed. */
export function managers(): CascadeStrategy {
  return async (entity, date, transition, scope) => {
    if (transition !== 'employ') {
      return;
    }
    await employEach(await currentMembers(entity, 'managers'), date, scope);
  };
}

/** Employs every current wrestler who is not yet employed. */
export function wrestlers(): CascadeStrategy {
  return async (entity, date, transition, scope) => {
    if (transition !== 'employ') {
      return;
    }
    await employEach(await currentMembers(entity, 'wrestlers'), date, scope);
  };
}

/**
 * Employs every current tag team who is not yet employed, and in turn the
 * wrestlers and managers of each of those teams.
 */
export function tagTeams(): CascadeStrategy {
  return async (entity, date, transition, scope) => {
    if (transition !== 'employ') {
      return;
    }
    await employEach(await currentMembers(entity, 'tag-teams'), date, scope, [
      wrestlers(),
      managers(),
    ]);
  };
}

/**
 * Employs wrestlers, then tag teams, then managers, and applies itself to
 * each of those employments. Every entity is expanded at most once per
 * top-level transition, so mutual relationships terminate.
 */
export function allMembers(): CascadeStrategy {
  const strategy: CascadeStrategy = async (entity, date, transition, scope) => {
    if (transition !== 'employ') {
      return;
    }
    if (!scope.markVisited(ALL_MEMBERS_BUCKET, entityKey(entity))) {
      return;
    }

    await employEach(await currentMembers(entity, 'wrestlers'), date, scope, [
      managers(),
      strategy,
    ]);
    await employEach(await currentMembers(entity, 'tag-teams'), date, scope, [
      wrestlers(),
      managers(),
      strategy,
    ]);
    await employEach(await currentMembers(entity, 'managers'), date, scope, [strategy]);
  };
  return strategy;
}

/** Employs not-yet-employed members across the given relationships, in order. */
export function custom(relationships: readonly MemberRelationship[]): CascadeStrategy {
  return async (entity, date, transition, scope) => {
    if (transition !== 'employ') {
      return;
    }
    for (const relationship of relationships) {
      await employEach(await currentMembers(entity, relationship), date, scope);
    }
  };
}
