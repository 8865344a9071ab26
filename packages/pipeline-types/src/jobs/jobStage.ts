export const JOB_STAGES = [
  'discovered',
  'opt-ready',
  'opt-incomplete',
  'opt-failed',
  'opt-complete',
  'resp-awaiting-setup',
  'resp-ready',
  'resp-incomplete',
  'resp-failed',
  'resp-complete',
  'amber-complete',
  'slv-complete',
  'sacp-collected',
  'mmc-ready'
] as const

export type JobStage = (typeof JOB_STAGES)[number]

export const jobStageDisplayNames: Record<JobStage, string> = {
  discovered: 'Discovered',
  'opt-ready': 'Optimization input prepared',
  'opt-incomplete': 'Optimization incomplete',
  'opt-failed': 'Optimization failed',
  'opt-complete': 'Optimization complete',
  'resp-awaiting-setup': 'Awaiting RESP setup',
  'resp-ready': 'RESP input prepared',
  'resp-incomplete': 'RESP incomplete',
  'resp-failed': 'RESP failed',
  'resp-complete': 'RESP complete',
  'amber-complete': 'AMBER parameters ready',
  'slv-complete': 'SLV file written',
  'sacp-collected': 'Collected for MMC',
  'mmc-ready': 'MMC input prepared'
}

/**
 * Negative when `a` comes before `b` in the pipeline, positive when after.
 */
export const compareStages = (a: JobStage, b: JobStage): number =>
  JOB_STAGES.indexOf(a) - JOB_STAGES.indexOf(b)

export const isStageAtLeast = (stage: JobStage, floor: JobStage): boolean =>
  compareStages(stage, floor) >= 0

export const isJobStage = (value: string): value is JobStage =>
  (JOB_STAGES as readonly string[]).includes(value)
