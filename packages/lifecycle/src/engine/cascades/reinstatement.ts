import type { RosterEntity } from '../../domain/types.js';
import type { CascadeStrategy } from '../lifecycle/types.js';
import { currentMembers, isSuspended } from './relationships.js';

/**
 * A manager is only reinstated alongside `reinstated` when nothing else they
 * manage is still suspended.
 */
async function managesOtherSuspended(manager: RosterEntity, reinstated: RosterEntity): Promise<boolean> {
  for (const relationship of ['wrestlers', 'tag-teams'] as const) {
    const others = await currentMembers(manager, relationship);
    const stillSuspended = others.some(
      (other) => !(other.type === reinstated.type && other.id === reinstated.id) && isSuspended(other),
    );
    if (stillSuspended) {
      return true;
    }
  }
  return false;
}

/** Reinstates the suspended wrestlers of a reinstated tag team. */
export function reinstateWrestlers(): CascadeStrategy {
  return async (entity, date, transition, scope) => {
    if (transition !== 'reinstate') {
      return;
    }
    for (const wrestler of await currentMembers(entity, 'wrestlers')) {
      if (isSuspended(wrestler)) {
        await scope.pipeline(wrestler, 'reinstate', date).execute();
      }
    }
  };
}

/**
 * Reinstates suspended managers of the entity unless they still manage
 * another suspended wrestler or tag team.
 */
export function reinstateManagers(): CascadeStrategy {
  return async (entity, date, transition, scope) => {
    if (transition !== 'reinstate') {
      return;
    }
    for (const manager of await currentMembers(entity, 'managers')) {
      if (!isSuspended(manager) || (await managesOtherSuspended(manager, entity))) {
        continue;
      }
      await scope.pipeline(manager, 'reinstate', date).execute();
    }
  };
}
