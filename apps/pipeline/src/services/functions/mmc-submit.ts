import fs from 'fs-extra'
import path from 'path'
import type { JobRecord, Logger, SubmissionOutcome } from '@fragflow/pipeline-types'
import { noopLogger } from '@fragflow/pipeline-types'
import { config } from '../../config/config.js'
import type { SlurmProfile } from '../../config/config.js'
import { ConfigurationError } from '../errors.js'
import { renderSlurmScript, writeSlurmScript } from '../submission/slurm-script.js'
import { submitUnits } from '../submission/submit-units.js'
import type { SubmissionUnit } from '../submission/submit-units.js'
import type { ScriptSubmitter } from '../submission/sbatch.js'

export interface MmcSubmitOptions {
  /** Directory holding the mmc.bin executable */
  mmcPath: string
  batchSize?: number
  logDir: string
  profile?: SlurmProfile
  submit?: ScriptSubmitter
  logger?: Logger
}

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size))
  }
  return batches
}

/**
 * Groups MMC jobs into batches of `batchSize`, in selection order, and
 * submits one allocation per batch that runs its jobs under GNU parallel.
 */
const submitMmcBatches = async (
  jobs: JobRecord[],
  {
    mmcPath,
    batchSize = config.mmcBatchSize,
    logDir,
    profile = config.slurm.mmc,
    submit,
    logger = noopLogger
  }: MmcSubmitOptions
): Promise<SubmissionOutcome[]> => {
  const mmcBin = path.resolve(mmcPath, config.mmcBinaryName)
  if (!(await fs.pathExists(mmcBin))) {
    throw new ConfigurationError(`${config.mmcBinaryName} not found in ${mmcPath}`)
  }
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigurationError(`Batch size must be a positive integer, got ${batchSize}`)
  }
  logger.info(`Using MMC binary: ${mmcBin}`)

  const units: SubmissionUnit[] = chunk(jobs, batchSize).map((batch, i) => {
    const batchNumber = i + 1
    return {
      label: `batch_${batchNumber}`,
      jobs: batch.map((job) => job.name),
      prepare: async () => {
        const script = await renderSlurmScript(
          'mmc-batch',
          {
            jobName: `MMC_batch_${batchNumber}`,
            output: path.join(logDir, `batch_${batchNumber}_slurm_%j.out`),
            error: path.join(logDir, `batch_${batchNumber}_slurm_%j.err`),
            time: profile.time,
            nodes: profile.nodes,
            ntasks: profile.ntasks * batch.length,
            cpusPerTask: profile.cpusPerTask,
            partition: profile.partition
          },
          {
            parallelModule: config.parallelModule,
            jobs: batch.length,
            commands: batch.map((job) => `cd ${job.path} && ${mmcBin} < prot.inp > prot.out`)
          }
        )
        return writeSlurmScript(path.join(logDir, `batch_${batchNumber}_submit.sh`), script)
      }
    }
  })

  return submitUnits(units, { submit, logger })
}

export { submitMmcBatches, chunk }
