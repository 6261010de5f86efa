import { hasCapability } from '../../domain/capabilities.js';
import type { EntityType, RosterEntity, TransitionName } from '../../domain/types.js';
import { ConfigurationError } from '../../lib/errors.js';
import type { LifecycleGraph } from './lifecycle-graph.js';
import type { SerializedGuard, TransitionGuard, TransitionResult } from './types.js';

const ALLOWED: TransitionResult = { allowed: true, reason: 'Transition allowed' };

function deny(reason: string): TransitionResult {
  return { allowed: false, reason };
}

/**
 * Built-in guard: a tag team can only be suspended while it has current
 * wrestlers and none of them is already suspended or injured.
 */
export function tagTeamWrestlersSuspendable(): TransitionGuard {
  return {
    description: 'Every current wrestler of the tag team must be able to be suspended',
    check: async (tagTeam: RosterEntity) => {
      if (!hasCapability(tagTeam, 'wrestlers')) {
        return ALLOWED;
      }

      const wrestlers = await tagTeam.currentWrestlers();
      if (wrestlers.length === 0) {
        return deny(`This team '${tagTeam.name}' has no active wrestlers and cannot be suspended.`);
      }

      for (const wrestler of wrestlers) {
        if (hasCapability(wrestler, 'suspension') && wrestler.isSuspended()) {
          return deny(
            `Tag team '${tagTeam.name}' cannot be suspended because wrestler '${wrestler.name}' is already suspended.`,
          );
        }
        if (hasCapability(wrestler, 'injury') && wrestler.isInjured()) {
          return deny(
            `Tag team '${tagTeam.name}' cannot be suspended because wrestler '${wrestler.name}' is injured.`,
          );
        }
      }
      return ALLOWED;
    },
  };
}

/**
 * Built-in guard: a tag team can only be retired while it has current
 * wrestlers and none of them is injured or suspended.
 */
export function tagTeamWrestlersRetirable(): TransitionGuard {
  return {
    description: 'Every current wrestler of the tag team must be able to be retired',
    check: async (tagTeam: RosterEntity) => {
      if (!hasCapability(tagTeam, 'wrestlers')) {
        return ALLOWED;
      }

      const wrestlers = await tagTeam.currentWrestlers();
      if (wrestlers.length === 0) {
        return deny(`This team '${tagTeam.name}' has no active wrestlers and cannot be retired.`);
      }

      for (const wrestler of wrestlers) {
        if (hasCapability(wrestler, 'injury') && wrestler.isInjured()) {
          return deny(
            `Tag team '${tagTeam.name}' cannot be retired because wrestler '${wrestler.name}' is injured.`,
          );
        }
        if (hasCapability(wrestler, 'suspension') && wrestler.isSuspended()) {
          return deny(
            `Tag team '${tagTeam.name}' cannot be retired because wrestler '${wrestler.name}' is suspended.`,
          );
        }
      }
      return ALLOWED;
    },
  };
}

export type GuardFactory = (params?: Record<string, unknown>) => TransitionGuard;

/**
 * Guard factories keyed by type name.
 * Used for deserializing guards from the lifecycle JSON.
 */
const guardFactories: Record<string, GuardFactory> = {
  tag_team_wrestlers_suspendable: () => tagTeamWrestlersSuspendable(),
  tag_team_wrestlers_retirable: () => tagTeamWrestlersRetirable(),
};

/**
 * Deserializes a guard from its JSON representation using the factory table.
 */
export function deserializeGuard(serialized: SerializedGuard): TransitionGuard {
  const factory = guardFactories[serialized.type];
  if (!factory) {
    throw new ConfigurationError(`Unknown guard type: '${serialized.type}'`);
  }
  return factory(serialized.params);
}

/**
 * Registers a guard factory so lifecycle definitions can reference it by
 * type name.
 */
export function registerGuard(type: string, factory: GuardFactory): void {
  guardFactories[type] = factory;
}

interface RegisteredGuard {
  guard: TransitionGuard;
  entityType?: EntityType;
}

/**
 * Guards per transition, optionally restricted to one entity type. Seeded
 * from the lifecycle definition; callers may add more at startup.
 */
export class GuardRegistry {
  private readonly guards = new Map<TransitionName, RegisteredGuard[]>();

  static fromGraph(graph: LifecycleGraph): GuardRegistry {
    const registry = new GuardRegistry();
    for (const transition of graph.getTransitions()) {
      for (const serialized of transition.guards) {
        registry.register(transition.name, deserializeGuard(serialized), serialized.entityType);
      }
    }
    return registry;
  }

  register(transition: TransitionName, guard: TransitionGuard, entityType?: EntityType): this {
    const list = this.guards.get(transition) ?? [];
    list.push({ guard, entityType });
    this.guards.set(transition, list);
    return this;
  }

  guardsFor(transition: TransitionName, entityType: EntityType): TransitionGuard[] {
    return (this.guards.get(transition) ?? [])
      .filter((registered) => registered.entityType === undefined || registered.entityType === entityType)
      .map((registered) => registered.guard);
  }

  /** Evaluates guards in registration order; the first denial wins. */
  async evaluate(entity: RosterEntity, transition: TransitionName): Promise<TransitionResult> {
    for (const guard of this.guardsFor(transition, entity.type)) {
      const result = await guard.check(entity);
      if (!result.allowed) {
        return result;
      }
    }
    return ALLOWED;
  }
}
