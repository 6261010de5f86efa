import type { EntityType, RosterEntity, StableEntity, TransitionName } from '../domain/types.js';
import { ConfigurationError } from './errors.js';

// ============================================================================
// Repository contracts
// ============================================================================

/**
 * State-period mutations every lifecycle-aware repository provides. Each
 * opens (or closes) a sub-record; the entity's primary record is never
 * created or deleted here.
 */
export interface StatusRepository {
  createEmployment(entity: RosterEntity, date: Date, notes?: string): Promise<void>;
  createSuspension(entity: RosterEntity, date: Date, notes?: string): Promise<void>;
  createRelease(entity: RosterEntity, date: Date, notes?: string): Promise<void>;
  createRetirement(entity: RosterEntity, date: Date, notes?: string): Promise<void>;
  createInjury(entity: RosterEntity, date: Date, notes?: string): Promise<void>;
  createReinstatement(entity: RosterEntity, date: Date, notes?: string): Promise<void>;
  endRetirement(entity: RosterEntity, date: Date): Promise<void>;
}

export type StatusMutation = Exclude<keyof StatusRepository, 'endRetirement'>;

export const STATUS_MUTATIONS: Readonly<Record<TransitionName, StatusMutation>> = {
  employ: 'createEmployment',
  suspend: 'createSuspension',
  release: 'createRelease',
  retire: 'createRetirement',
  injure: 'createInjury',
  reinstate: 'createReinstatement',
};

/**
 * Relationship detachment used by retirement cascades. Optional per
 * repository; a cascade that needs a missing method raises a
 * ConfigurationError.
 */
export interface DetachmentMethods {
  removeCurrentManagers(entity: RosterEntity, date: Date): Promise<void>;
  removeFromCurrentTagTeam(entity: RosterEntity, date: Date): Promise<void>;
  removeCurrentWrestlers(entity: RosterEntity, date: Date): Promise<void>;
  removeCurrentTagTeams(entity: RosterEntity, date: Date): Promise<void>;
}

export type RosterMemberRepository = StatusRepository & Partial<DetachmentMethods>;

export interface StableData {
  name: string;
  startDate?: Date | null;
}

export interface StableRepository extends StatusRepository {
  create(data: StableData): Promise<StableEntity>;
  update(stable: StableEntity, data: Partial<StableData>): Promise<StableEntity>;
  addWrestler(stable: StableEntity, wrestler: RosterEntity, date: Date): Promise<void>;
  removeWrestler(stable: StableEntity, wrestler: RosterEntity, date: Date): Promise<void>;
  addTagTeam(stable: StableEntity, tagTeam: RosterEntity, date: Date): Promise<void>;
  removeTagTeam(stable: StableEntity, tagTeam: RosterEntity, date: Date): Promise<void>;
  addManager(stable: StableEntity, manager: RosterEntity, date: Date): Promise<void>;
  removeManager(stable: StableEntity, manager: RosterEntity, date: Date): Promise<void>;
}

export type MemberType = Exclude<EntityType, 'stable'>;

export interface RepositoryMap {
  wrestler: RosterMemberRepository;
  manager: RosterMemberRepository;
  referee: RosterMemberRepository;
  tag_team: RosterMemberRepository;
  stable: StableRepository;
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Explicit entity-type → repository map, assembled once at startup.
 */
export class RepositoryRegistry {
  private readonly repositories: Partial<RepositoryMap>;

  constructor(repositories: Partial<RepositoryMap> = {}) {
    this.repositories = { ...repositories };
  }

  register<T extends EntityType>(type: T, repository: RepositoryMap[T]): this {
    this.repositories[type] = repository;
    return this;
  }

  has(type: EntityType): boolean {
    return this.repositories[type] !== undefined;
  }

  resolve<T extends EntityType>(type: T): RepositoryMap[T] {
    const repository: RepositoryMap[T] | undefined = this.repositories[type];
    if (!repository) {
      throw new ConfigurationError(`No repository registered for entity type '${type}'`);
    }
    return repository;
  }

  stables(): StableRepository {
    return this.resolve('stable');
  }

  /**
   * Look up a status mutation on a repository, failing loudly when a
   * JavaScript caller registered an incomplete implementation.
   */
  mutation(
    type: EntityType,
    name: StatusMutation,
  ): (entity: RosterEntity, date: Date, notes?: string) => Promise<void> {
    const repository: StatusRepository = this.resolve(type);
    if (typeof repository[name] !== 'function') {
      throw new ConfigurationError(
        `Repository for entity type '${type}' does not implement '${name}'`,
      );
    }
    return (entity, date, notes) =>
      notes === undefined ? repository[name](entity, date) : repository[name](entity, date, notes);
  }

  endRetirement(type: EntityType): (entity: RosterEntity, date: Date) => Promise<void> {
    const repository: StatusRepository = this.resolve(type);
    if (typeof repository.endRetirement !== 'function') {
      throw new ConfigurationError(
        `Repository for entity type '${type}' does not implement 'endRetirement'`,
      );
    }
    return (entity, date) => repository.endRetirement(entity, date);
  }

  /**
   * Look up an optional detachment method; raises when a cascade needs it and
   * the repository does not provide it.
   */
  detachment(
    type: MemberType,
    name: keyof DetachmentMethods,
  ): (entity: RosterEntity, date: Date) => Promise<void> {
    const repository: RosterMemberRepository = this.resolve(type);
    const method = repository[name];
    if (typeof method !== 'function') {
      throw new ConfigurationError(
        `Repository for entity type '${type}' does not implement '${name}'`,
      );
    }
    return (entity, date) => method.call(repository, entity, date);
  }
}
