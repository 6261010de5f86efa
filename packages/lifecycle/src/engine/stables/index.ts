export { StableMembershipOrchestrator, bindStableOrchestration } from './stable-orchestrator.js';
export type { StableRuntime, StableMemberKind, StableOrchestration } from './stable-orchestrator.js';
