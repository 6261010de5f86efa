// Queue exports
export {
  QUEUE_NAMES,
  getRedisConnection,
  getRosterTransitionQueue,
  enqueueRosterTransition,
  closeQueues,
} from './queue.js';

// Processor exports
export { createRosterTransitionProcessor } from './processors/roster-transition.processor.js';
export type {
  EntityLookup,
  RosterTransitionJob,
  RosterTransitionResult,
} from './processors/roster-transition.processor.js';

// Worker exports
export { startRosterTransitionWorker, stopRosterTransitionWorker, getWorkerStatus } from './worker.js';
