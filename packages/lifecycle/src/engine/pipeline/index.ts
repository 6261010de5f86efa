export { ActionPipeline } from './action-pipeline.js';
export type {
  PipelineRuntime,
  PipelineOperation,
  PipelineResult,
  CompensationRecord,
  FilterBatchOperation,
  SplitMembers,
} from './action-pipeline.js';
