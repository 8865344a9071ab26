import type { JobRecord } from '@fragflow/pipeline-types'
import { jobStageDisplayNames } from '@fragflow/pipeline-types'

const row = (index: string, name: string, status: string): string =>
  `${index.padEnd(5)} ${name.padEnd(30)} ${status}`.trimEnd()

/**
 * Index / Directory / Status listing. Indices are 1-based and are the
 * ones the selection options refer to.
 */
const formatJobTable = (jobs: JobRecord[], withStage = false): string => {
  const lines = [row('Index', 'Directory', 'Status'), '-'.repeat(45)]
  jobs.forEach((job, i) => {
    const status = withStage ? jobStageDisplayNames[job.stage] : job.status
    lines.push(row(String(i + 1), job.name, status))
  })
  return lines.join('\n')
}

export { formatJobTable }
