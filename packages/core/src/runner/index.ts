export { PropertyRunner } from './property-runner.js';
export { shrinkFailure, type ShrinkResult } from './shrink.js';
export type {
  RunReport,
  RunStats,
  PassedRun,
  FailedRun,
  ExhaustedRun,
  TrialOutcome,
} from './types.js';
