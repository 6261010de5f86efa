export { LifecycleGraph } from './lifecycle-graph.js';
export {
  GuardRegistry,
  tagTeamWrestlersSuspendable,
  tagTeamWrestlersRetirable,
  deserializeGuard,
  registerGuard,
} from './guards.js';
export type { GuardFactory } from './guards.js';
export { CascadeScope } from './cascade-scope.js';
export type { PipelineSpawner } from './cascade-scope.js';
export { StatusTransitionPipeline } from './transition-pipeline.js';
export type { LifecycleContext } from './transition-pipeline.js';
export type {
  LifecycleDefinition,
  TransitionDefinition,
  PriorStateRule,
  SerializedGuard,
  TransitionGuard,
  TransitionResult,
  ValidationResult,
  ValidationStrategy,
  CascadeStrategy,
} from './types.js';

import rosterLifecycleJson from './roster-lifecycle.json' with { type: 'json' };
import { LifecycleGraph } from './lifecycle-graph.js';

/** The built-in roster lifecycle, parsed and shape-checked at load. */
export function loadRosterLifecycle(): LifecycleGraph {
  return LifecycleGraph.parse(rosterLifecycleJson);
}
