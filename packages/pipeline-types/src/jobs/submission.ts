export type SubmissionOutcome =
  | { name: string; success: true; jobId?: string }
  | { name: string; success: false; reason: string }

export interface SubmissionSuccess {
  name: string
  jobId?: string
}

export interface SubmissionFailure {
  name: string
  reason: string
}

export interface SubmissionSummary {
  total: number
  successes: SubmissionSuccess[]
  failures: SubmissionFailure[]
}
