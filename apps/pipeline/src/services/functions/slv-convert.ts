import path from 'path'
import type { JobRecord, Logger, SubmissionOutcome } from '@fragflow/pipeline-types'
import { noopLogger } from '@fragflow/pipeline-types'
import { convertToSlv } from '@fragflow/mol-utils'
import { processSequentially } from './job-utils.js'

export interface SlvConvertOptions {
  logger?: Logger
  /** Fail a job whose charge count differs from its atom count */
  strictCount?: boolean
}

const convertSlvFiles = async (
  jobs: JobRecord[],
  { logger = noopLogger, strictCount = false }: SlvConvertOptions = {}
): Promise<SubmissionOutcome[]> =>
  processSequentially(
    jobs,
    (job) => job.name,
    async (job) => {
      const amberDir = path.join(job.path, 'RESP', 'AMBER')
      const records = await convertToSlv({
        pdbPath: path.join(amberDir, 'MOL.pdb'),
        prepiPath: path.join(amberDir, 'MOL.prepi'),
        topPath: path.join(amberDir, 'lig.top'),
        outputPath: path.join(amberDir, 'lig.slv'),
        strictCount,
        logger
      })
      logger.info(`${job.name}: wrote ${records.length} atoms`)
    },
    logger
  )

export { convertSlvFiles }
