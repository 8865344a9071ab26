export { takeSnapshot, DEFAULT_LOG_PROBES } from './snapshot.js'
export type { JobSnapshot, LogRead } from './snapshot.js'
export { checkLog, classifyJob } from './classify.js'
export type { LogCheck, LogState, LogMarkers } from './classify.js'
export {
  anyJob,
  optimizationJobs,
  respSetupCandidates,
  respJobs,
  amberCandidates,
  slvCandidates,
  sacpMolecules,
  mmcJobs
} from './predicates.js'
export type { JobPredicate, JobStatus } from './predicates.js'
export { scanJobs, byName } from './scan-jobs.js'
export type { ScanOptions } from './scan-jobs.js'
