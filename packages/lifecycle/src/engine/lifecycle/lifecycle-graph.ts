import { z } from 'zod';
import type { LifecycleStatus, TransitionName } from '../../domain/types.js';
import { TRANSITION_NAMES } from '../../domain/types.js';
import { ConfigurationError } from '../../lib/errors.js';
import type {
  LifecycleDefinition,
  TransitionDefinition,
  TransitionResult,
  ValidationResult,
} from './types.js';

const StatusSchema = z.enum([
  'unemployed',
  'future_employed',
  'employed',
  'suspended',
  'injured',
  'retired',
  'released',
]);

const TransitionDefinitionSchema = z.object({
  name: z.enum(['employ', 'suspend', 'release', 'retire', 'injure', 'reinstate']),
  label: z.string().min(1),
  from: z.array(StatusSchema).min(1),
  to: StatusSchema,
  requires: z
    .array(
      z.enum([
        'employment',
        'suspension',
        'injury',
        'retirement',
        'managers',
        'wrestlers',
        'tag-teams',
        'stable-membership',
        'tag-team-membership',
      ]),
    )
    .min(1),
  mutation: z.enum([
    'createEmployment',
    'createSuspension',
    'createRelease',
    'createRetirement',
    'createInjury',
    'createReinstatement',
  ]),
  endsPriorState: z
    .object({
      status: StatusSchema,
      via: z.literal('endRetirement'),
    })
    .optional(),
  guards: z
    .array(
      z.object({
        type: z.string().min(1),
        description: z.string(),
        entityType: z.enum(['wrestler', 'manager', 'referee', 'tag_team', 'stable']).optional(),
        params: z.record(z.string(), z.unknown()).optional(),
      }),
    )
    .default([]),
});

const LifecycleDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  initialState: StatusSchema,
  passiveStates: z.array(StatusSchema).default([]),
  states: z.array(StatusSchema),
  transitions: z.array(TransitionDefinitionSchema),
});

const STATUS_PHRASES: Readonly<Record<LifecycleStatus, string>> = {
  unemployed: 'is unemployed',
  future_employed: 'has not been officially employed',
  employed: 'is employed',
  suspended: 'is suspended',
  injured: 'is injured',
  retired: 'is retired',
  released: 'is released',
};

/**
 * LifecycleGraph: the roster state machine as a directed graph of statuses
 * and named transitions.
 *
 * Loaded from JSON and validated for structural integrity (declared
 * endpoints, one definition per transition, reachability from the initial
 * state).
 */
export class LifecycleGraph {
  readonly id: string;
  readonly name: string;
  readonly initialState: LifecycleStatus;
  private readonly states: Set<LifecycleStatus>;
  private readonly passiveStates: Set<LifecycleStatus>;
  private readonly transitions: Map<TransitionName, TransitionDefinition>;
  /** Adjacency list: state → outgoing transitions */
  private readonly adjacency: Map<LifecycleStatus, TransitionDefinition[]>;

  constructor(definition: LifecycleDefinition) {
    this.id = definition.id;
    this.name = definition.name;
    this.initialState = definition.initialState;
    this.states = new Set(definition.states);
    this.passiveStates = new Set(definition.passiveStates);

    this.transitions = new Map();
    for (const transition of definition.transitions) {
      if (this.transitions.has(transition.name)) {
        throw new ConfigurationError(
          `Lifecycle '${definition.id}' defines transition '${transition.name}' more than once`,
        );
      }
      this.transitions.set(transition.name, transition);
    }

    this.adjacency = new Map();
    for (const state of this.states) {
      this.adjacency.set(state, []);
    }
    for (const transition of this.transitions.values()) {
      for (const from of transition.from) {
        this.adjacency.get(from)?.push(transition);
      }
    }
  }

  /**
   * Parse an untrusted definition (typically JSON) and build the graph.
   * Throws ConfigurationError when the shape is wrong.
   */
  static parse(raw: unknown): LifecycleGraph {
    const parsed = LifecycleDefinitionSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid lifecycle definition: ${detail}`);
    }
    return new LifecycleGraph(parsed.data);
  }

  getStates(): LifecycleStatus[] {
    return [...this.states];
  }

  getTransitions(): TransitionDefinition[] {
    return [...this.transitions.values()];
  }

  getOutgoing(state: LifecycleStatus): TransitionDefinition[] {
    return this.adjacency.get(state) ?? [];
  }

  hasState(state: LifecycleStatus): boolean {
    return this.states.has(state);
  }

  hasTransition(name: string): name is TransitionName {
    const known = TRANSITION_NAMES.find((candidate) => candidate === name);
    return known !== undefined && this.transitions.has(known);
  }

  getTransition(name: TransitionName): TransitionDefinition {
    const transition = this.transitions.get(name);
    if (!transition) {
      throw new ConfigurationError(`Unknown transition '${name}' in lifecycle '${this.id}'`);
    }
    return transition;
  }

  /**
   * Structural check only: is `name` a legal edge out of `current`?
   * `subject` is the "wrestler 'Ava'" fragment used in the denial message.
   */
  canApply(name: TransitionName, current: LifecycleStatus, subject: string): TransitionResult {
    const transition = this.getTransition(name);
    if (transition.from.includes(current)) {
      return { allowed: true, reason: 'Transition allowed' };
    }

    if (transition.label === current) {
      return { allowed: false, reason: `This ${subject} is already ${transition.label}.` };
    }
    return {
      allowed: false,
      reason: `This ${subject} ${STATUS_PHRASES[current]} and cannot be ${transition.label}.`,
    };
  }

  /**
   * Validate the lifecycle graph for structural integrity.
   *
   * Checks:
   * 1. At least one state exists and the initial state is declared
   * 2. All transition endpoints reference declared states, and every
   *    transition name is defined
   * 3. No orphan states, except passive (time-driven) ones
   * 4. All non-passive states are reachable from the initial state
   */
  validate(): ValidationResult {
    const errors: string[] = [];

    if (this.states.size === 0) {
      errors.push('Lifecycle must have at least one state');
      return { valid: false, errors };
    }

    if (!this.states.has(this.initialState)) {
      errors.push(`Initial state '${this.initialState}' is not declared`);
    }

    for (const transition of this.transitions.values()) {
      for (const from of transition.from) {
        if (!this.states.has(from)) {
          errors.push(`Transition '${transition.name}' references undeclared source state '${from}'`);
        }
      }
      if (!this.states.has(transition.to)) {
        errors.push(
          `Transition '${transition.name}' references undeclared target state '${transition.to}'`,
        );
      }
    }

    for (const name of TRANSITION_NAMES) {
      if (!this.transitions.has(name)) {
        errors.push(`Transition '${name}' is not defined`);
      }
    }

    const hasIncoming = new Set<LifecycleStatus>();
    const hasOutgoing = new Set<LifecycleStatus>();
    for (const transition of this.transitions.values()) {
      hasIncoming.add(transition.to);
      for (const from of transition.from) {
        hasOutgoing.add(from);
      }
    }

    for (const state of this.states) {
      if (this.passiveStates.has(state)) {
        continue;
      }
      if (state !== this.initialState && !hasIncoming.has(state)) {
        errors.push(`State '${state}' is unreachable (no incoming transitions)`);
      }
      if (!hasOutgoing.has(state)) {
        errors.push(`State '${state}' is a dead-end (no outgoing transitions)`);
      }
    }

    const reachable = new Set<LifecycleStatus>([this.initialState]);
    const queue: LifecycleStatus[] = [this.initialState];
    for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
      for (const transition of this.getOutgoing(current)) {
        if (!reachable.has(transition.to)) {
          reachable.add(transition.to);
          queue.push(transition.to);
        }
      }
    }

    for (const state of this.states) {
      if (!reachable.has(state) && !this.passiveStates.has(state)) {
        errors.push(`State '${state}' is not reachable from entry state '${this.initialState}'`);
      }
    }

    return { valid: errors.length === 0, errors };
  }
}
