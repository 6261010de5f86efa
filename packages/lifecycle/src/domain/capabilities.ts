import type {
  Capability,
  CapabilityMap,
  EntityRef,
  EntityType,
  RosterEntity,
  StableEntity,
  WithCapability,
} from './types.js';

/** Methods an entity must expose to honour each capability. */
const CAPABILITY_METHODS: { [C in Capability]: ReadonlyArray<keyof CapabilityMap[C]> } = {
  employment: ['isEmployed', 'isReleased', 'hasFutureEmployment'],
  suspension: ['isSuspended'],
  injury: ['isInjured'],
  retirement: ['isRetired'],
  managers: ['currentManagers'],
  wrestlers: ['currentWrestlers'],
  'tag-teams': ['currentTagTeams'],
  'stable-membership': ['currentStable'],
  'tag-team-membership': ['currentTagTeam'],
};

/**
 * Default capability profile per entity type. Individuals can be injured;
 * teams and stables cannot.
 */
export const DEFAULT_CAPABILITIES: Readonly<Record<EntityType, readonly Capability[]>> = {
  wrestler: [
    'employment',
    'suspension',
    'injury',
    'retirement',
    'managers',
    'stable-membership',
    'tag-team-membership',
  ],
  manager: [
    'employment',
    'suspension',
    'injury',
    'retirement',
    'wrestlers',
    'tag-teams',
    'stable-membership',
  ],
  referee: ['employment', 'suspension', 'injury', 'retirement'],
  tag_team: ['employment', 'suspension', 'retirement', 'managers', 'wrestlers', 'stable-membership'],
  stable: ['employment', 'suspension', 'retirement', 'wrestlers', 'tag-teams', 'managers'],
};

const TYPE_LABELS: Readonly<Record<EntityType, string>> = {
  wrestler: 'wrestler',
  manager: 'manager',
  referee: 'referee',
  tag_team: 'tag team',
  stable: 'stable',
};

/**
 * Type guard over the tagged capability set. The declared capability must be
 * present and the entity must expose the methods the capability promises.
 */
export function hasCapability<C extends Capability>(
  entity: RosterEntity,
  capability: C,
): entity is WithCapability<C> {
  if (!entity.capabilities.has(capability)) {
    return false;
  }
  return CAPABILITY_METHODS[capability].every((method) => {
    const member: unknown = Reflect.get(entity, method);
    return typeof member === 'function';
  });
}

export function hasAnyCapability(entity: RosterEntity, capabilities: readonly Capability[]): boolean {
  return capabilities.some((capability) => hasCapability(entity, capability));
}

export function isStable(entity: RosterEntity): entity is StableEntity {
  return (
    entity.type === 'stable' &&
    hasCapability(entity, 'employment') &&
    hasCapability(entity, 'suspension') &&
    hasCapability(entity, 'retirement') &&
    hasCapability(entity, 'wrestlers') &&
    hasCapability(entity, 'tag-teams') &&
    hasCapability(entity, 'managers')
  );
}

export function entityKey(entity: RosterEntity | EntityRef): string {
  return `${entity.type}:${entity.id}`;
}

export function toEntityRef(entity: RosterEntity): EntityRef {
  return { type: entity.type, id: entity.id };
}

export function entityLabel(type: EntityType): string {
  return TYPE_LABELS[type];
}

/** "wrestler 'Ava Storm'", as used in log lines and error messages. */
export function describeEntity(entity: RosterEntity): string {
  return `${entityLabel(entity.type)} '${entity.name}'`;
}

/**
 * Normalises a type name for loose matching: 'tag_team', 'TagTeam' and
 * 'Tag Team' all become 'tagteam'.
 */
export function normalizeTypeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}
