import type { SubmissionOutcome, SubmissionSummary } from '@fragflow/pipeline-types'

const aggregateOutcomes = (outcomes: SubmissionOutcome[]): SubmissionSummary => {
  const summary: SubmissionSummary = { total: outcomes.length, successes: [], failures: [] }
  for (const outcome of outcomes) {
    if (outcome.success) {
      summary.successes.push({ name: outcome.name, jobId: outcome.jobId })
    } else {
      summary.failures.push({ name: outcome.name, reason: outcome.reason })
    }
  }
  return summary
}

export interface SummaryLabels {
  title: string
  success: string
  failure: string
}

export const submissionLabels: SummaryLabels = {
  title: 'Submission Summary',
  success: 'Successfully submitted',
  failure: 'Failed to submit'
}

export const processingLabels: SummaryLabels = {
  title: 'Processing Summary',
  success: 'Successfully processed',
  failure: 'Failed'
}

const formatSummary = (
  summary: SubmissionSummary,
  labels: SummaryLabels = submissionLabels
): string => {
  const lines = [
    `${labels.title}:`,
    `${labels.success}: ${summary.successes.length}`,
    `${labels.failure}: ${summary.failures.length}`
  ]
  if (summary.failures.length > 0) {
    lines.push('Failed jobs:')
    for (const failure of summary.failures) {
      lines.push(`- ${failure.name}: ${failure.reason.trim()}`)
    }
  }
  return lines.join('\n')
}

export { aggregateOutcomes, formatSummary }
