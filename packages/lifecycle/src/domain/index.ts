export {
  DEFAULT_CAPABILITIES,
  hasCapability,
  hasAnyCapability,
  isStable,
  entityKey,
  toEntityRef,
  entityLabel,
  describeEntity,
  normalizeTypeName,
} from './capabilities.js';
export {
  resolveStatus,
  isAvailable,
  isEmployedOrExempt,
  isNotSuspendedOrExempt,
  isNotInjuredOrExempt,
  isNotRetiredOrExempt,
} from './status.js';
export { ENTITY_TYPES, TRANSITION_NAMES } from './types.js';
export type {
  EntityType,
  Capability,
  CapabilityMap,
  WithCapability,
  RosterEntity,
  EntityRef,
  Employable,
  Suspendable,
  Injurable,
  Retirable,
  HasManagers,
  HasWrestlers,
  HasTagTeams,
  StableMember,
  TagTeamMember,
  StableEntity,
  LifecycleStatus,
  TransitionName,
} from './types.js';
