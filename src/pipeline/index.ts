export { BoundedChannel, DEFAULT_CHANNEL_CAPACITY } from './channel.js';
export { TaskSet, type TaskResult } from './task-set.js';
export {
  runPipeline,
  sortByResponseTime,
  type PipelineOptions,
  type PipelineResult,
} from './aggregator.js';
