import type { JobStage } from './jobStage.js'

export interface JobRecord {
  /** Directory basename, unique within one scan */
  name: string
  /** Absolute path of the job directory */
  path: string
  stage: JobStage
  /** Free-text detail, e.g. "No log file found" */
  status: string
  /** Whether the stage the listing tool cares about is finished */
  completed: boolean
  /** Read errors met while snapshotting the directory */
  diagnostics: string[]
}
