// ============================================================================
// Roster capability model
// ============================================================================

export type EntityType = 'wrestler' | 'manager' | 'referee' | 'tag_team' | 'stable';

export const ENTITY_TYPES: readonly EntityType[] = [
  'wrestler',
  'manager',
  'referee',
  'tag_team',
  'stable',
];

export type Capability =
  | 'employment'
  | 'suspension'
  | 'injury'
  | 'retirement'
  | 'managers'
  | 'wrestlers'
  | 'tag-teams'
  | 'stable-membership'
  | 'tag-team-membership';

/**
 * Any roster member or group. Records are owned by the persistence layer; the
 * engine only borrows them for the duration of one operation.
 */
export interface RosterEntity {
  readonly id: string;
  readonly type: EntityType;
  readonly name: string;
  readonly capabilities: ReadonlySet<Capability>;
}

export interface EntityRef {
  type: EntityType;
  id: string;
}

export interface Employable {
  isEmployed(): boolean;
  isReleased(): boolean;
  /** Employment exists but starts after "now". */
  hasFutureEmployment(): boolean;
}

export interface Suspendable {
  isSuspended(): boolean;
}

export interface Injurable {
  isInjured(): boolean;
}

export interface Retirable {
  isRetired(): boolean;
}

export interface HasManagers {
  currentManagers(): Promise<RosterEntity[]>;
}

export interface HasWrestlers {
  currentWrestlers(): Promise<RosterEntity[]>;
}

export interface HasTagTeams {
  currentTagTeams(): Promise<RosterEntity[]>;
}

export interface StableMember {
  currentStable(): Promise<StableEntity | null>;
}

export interface TagTeamMember {
  currentTagTeam(): Promise<RosterEntity | null>;
}

/** Behaviour each capability promises. */
export interface CapabilityMap {
  employment: Employable;
  suspension: Suspendable;
  injury: Injurable;
  retirement: Retirable;
  managers: HasManagers;
  wrestlers: HasWrestlers;
  'tag-teams': HasTagTeams;
  'stable-membership': StableMember;
  'tag-team-membership': TagTeamMember;
}

export type WithCapability<C extends Capability> = RosterEntity & CapabilityMap[C];

export interface StableEntity
  extends RosterEntity,
    Employable,
    Suspendable,
    Retirable,
    HasWrestlers,
    HasTagTeams,
    HasManagers {
  readonly type: 'stable';
}

export type LifecycleStatus =
  | 'unemployed'
  | 'future_employed'
  | 'employed'
  | 'suspended'
  | 'injured'
  | 'retired'
  | 'released';

export type TransitionName = 'employ' | 'suspend' | 'release' | 'retire' | 'injure' | 'reinstate';

export const TRANSITION_NAMES: readonly TransitionName[] = [
  'employ',
  'suspend',
  'release',
  'retire',
  'injure',
  'reinstate',
];
