export {
  DEFAULT_FOLLOW_UP_THRESHOLDS,
  ProactiveScheduler,
  composeFollowUp,
  needsFollowUp,
} from './scheduler';
export type { FollowUpThresholds, ProactiveRunResult, ProactiveSchedulerOptions } from './scheduler';
