// ============================================================================
// Lifecycle graph types
// ============================================================================

import type {
  Capability,
  EntityType,
  LifecycleStatus,
  RosterEntity,
  TransitionName,
} from '../../domain/types.js';
import type { StatusMutation } from '../../lib/repositories.js';
import type { CascadeScope } from './cascade-scope.js';

export interface PriorStateRule {
  /** Status that must be closed before the transition's mutation runs. */
  status: LifecycleStatus;
  via: 'endRetirement';
}

export interface SerializedGuard {
  type: string;
  description: string;
  /** Restricts the guard to one entity type; absent means every type. */
  entityType?: EntityType;
  params?: Record<string, unknown>;
}

export interface TransitionDefinition {
  name: TransitionName;
  /** Past participle used in rejection messages ("already suspended"). */
  label: string;
  from: LifecycleStatus[];
  to: LifecycleStatus;
  /** Any one of these capabilities makes the entity eligible. */
  requires: Capability[];
  mutation: StatusMutation;
  endsPriorState?: PriorStateRule;
  guards: SerializedGuard[];
}

export interface LifecycleDefinition {
  id: string;
  name: string;
  initialState: LifecycleStatus;
  /** States entered by the passage of time rather than a transition. */
  passiveStates: LifecycleStatus[];
  states: LifecycleStatus[];
  transitions: TransitionDefinition[];
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export interface TransitionResult {
  allowed: boolean;
  reason: string;
}

/**
 * Business-rule check on one entity for one transition. Returns a denial
 * instead of throwing so guards compose.
 */
export interface TransitionGuard {
  description: string;
  check: (entity: RosterEntity) => TransitionResult | Promise<TransitionResult>;
}

/** Custom validation: throws to veto the transition. */
export type ValidationStrategy = (
  entity: RosterEntity,
  transition: TransitionName,
) => void | Promise<void>;

/**
 * Secondary effect run after the core mutation. Further transitions are
 * started through `scope` so they share the visited set and depth limit.
 */
export type CascadeStrategy = (
  entity: RosterEntity,
  date: Date,
  transition: TransitionName,
  scope: CascadeScope,
) => Promise<void>;
