export { MemberCollectionManager } from './member-collection.js';
export type { MemberFilter, StatusGroups, CollectionStatistics } from './member-collection.js';
export { runBatch } from './batch.js';
export type { BatchOptions, BatchOutcome, BatchFailure } from './batch.js';
