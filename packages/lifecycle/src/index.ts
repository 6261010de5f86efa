export { createRosterLifecycle, RosterLifecycle } from './lifecycle.js';
export type { RosterLifecycleOptions } from './lifecycle.js';

export * from './domain/index.js';

export {
  LifecycleGraph,
  GuardRegistry,
  CascadeScope,
  StatusTransitionPipeline,
  tagTeamWrestlersSuspendable,
  tagTeamWrestlersRetirable,
  deserializeGuard,
  registerGuard,
  loadRosterLifecycle,
} from './engine/lifecycle/index.js';
export type {
  GuardFactory,
  PipelineSpawner,
  LifecycleContext,
  LifecycleDefinition,
  TransitionDefinition,
  PriorStateRule,
  SerializedGuard,
  TransitionGuard,
  TransitionResult,
  ValidationResult,
  ValidationStrategy,
  CascadeStrategy,
} from './engine/lifecycle/index.js';

export * as employmentCascades from './engine/cascades/employment.js';
export {
  suspendMembers,
  suspendManagers,
  suspendWrestlers,
  reinstateWrestlers,
  reinstateManagers,
  leaveStable,
  detachManagers,
  leaveTagTeam,
  detachManagedMembers,
  removeStableMembers,
  currentMembers,
  awaitingEmployment,
} from './engine/cascades/index.js';
export type { MemberRelationship } from './engine/cascades/index.js';

export * from './engine/collections/index.js';
export * from './engine/stables/index.js';
export * from './engine/pipeline/index.js';

export { RosterActionsService } from './services/roster-actions.service.js';

export {
  MemberCriteriaSchema,
  EmploymentStatusFilterSchema,
  SuspensionStatusFilterSchema,
  InjuryStatusFilterSchema,
  RetirementStatusFilterSchema,
} from './schemas/member-criteria.schema.js';
export type {
  MemberCriteria,
  EmploymentStatusFilter,
  SuspensionStatusFilter,
  InjuryStatusFilter,
  RetirementStatusFilter,
} from './schemas/member-criteria.schema.js';
export { RosterTransitionJobDataSchema, EntityRefSchema } from './schemas/roster-job.schema.js';
export type { RosterTransitionJobData, RosterTransitionJobInput } from './schemas/roster-job.schema.js';

export * from './jobs/index.js';

export {
  NotFoundError,
  ValidationError,
  TransitionRejectedError,
  ConfigurationError,
  CascadeDepthExceededError,
  CompensationError,
} from './lib/errors.js';
export { getEngineConfig, resetEngineConfigCache } from './lib/config/engine.js';
export type { EngineConfig, LogLevel } from './lib/config/engine.js';
export { getLogger, createLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';
export {
  systemClock,
  fixedClock,
  getEffectiveDate,
  getEffectiveStartDate,
  getEffectiveEndDate,
  isValidDateRange,
  ensureValidDateRange,
  toDateString,
} from './lib/dates.js';
export type { Clock } from './lib/dates.js';
export { AmbientTransactionRunner } from './lib/transaction.js';
export type { TransactionRunner, TransactionDriver } from './lib/transaction.js';
export { RepositoryRegistry, STATUS_MUTATIONS } from './lib/repositories.js';
export type {
  StatusRepository,
  StatusMutation,
  DetachmentMethods,
  RosterMemberRepository,
  StableData,
  StableRepository,
  MemberType,
  RepositoryMap,
} from './lib/repositories.js';
