import type { Logger, SubmissionOutcome } from '@fragflow/pipeline-types'
import { noopLogger } from '@fragflow/pipeline-types'
import { getErrorMessage } from '../errors.js'
import { submitScript } from './sbatch.js'
import type { ScriptSubmitter, SubmitResult } from './sbatch.js'

/**
 * One scheduler submission. A single-job unit covers one job; a batch unit
 * covers every job run inside its allocation.
 */
export interface SubmissionUnit {
  label: string
  jobs: string[]
  /** Writes the unit's script and returns its path */
  prepare: () => Promise<string>
}

export interface SubmitUnitsOptions {
  submit?: ScriptSubmitter
  logger?: Logger
}

const toOutcomes = (jobs: string[], result: SubmitResult): SubmissionOutcome[] =>
  jobs.map((name): SubmissionOutcome =>
    result.ok
      ? { name, success: true, jobId: result.jobId }
      : { name, success: false, reason: result.reason }
  )

/**
 * Submits units one after another, in the order given. Outcomes come back
 * per job, in the same order.
 */
const submitUnits = async (
  units: SubmissionUnit[],
  options: SubmitUnitsOptions = {}
): Promise<SubmissionOutcome[]> => {
  const { submit = submitScript, logger = noopLogger } = options
  const outcomes: SubmissionOutcome[] = []

  for (const unit of units) {
    let result: SubmitResult
    try {
      const scriptPath = await unit.prepare()
      logger.debug?.(`Created submission script: ${scriptPath}`)
      result = await submit(scriptPath)
    } catch (error) {
      result = { ok: false, reason: getErrorMessage(error) }
    }

    if (result.ok) {
      logger.info(`Submitted ${unit.label}: Job ID ${result.jobId ?? 'unknown'}`)
    } else {
      logger.error(`Failed to submit ${unit.label}: ${result.reason.trim()}`)
    }
    outcomes.push(...toOutcomes(unit.jobs, result))
  }

  return outcomes
}

export { submitUnits }
