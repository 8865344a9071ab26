export {
  JOB_STAGES,
  jobStageDisplayNames,
  compareStages,
  isStageAtLeast,
  isJobStage
} from './jobs/jobStage.js'
export type { JobStage } from './jobs/jobStage.js'
export type { JobRecord } from './jobs/jobRecord.js'
export type {
  SelectionPolicy,
  SelectionKind,
  SelectionRequest,
  SelectionOptions
} from './jobs/selection.js'
export type {
  SubmissionOutcome,
  SubmissionSuccess,
  SubmissionFailure,
  SubmissionSummary
} from './jobs/submission.js'
export { noopLogger } from './logger.js'
export type { Logger } from './logger.js'
