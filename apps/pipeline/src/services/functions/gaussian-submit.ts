import path from 'path'
import type { JobRecord, Logger, SubmissionOutcome } from '@fragflow/pipeline-types'
import { noopLogger } from '@fragflow/pipeline-types'
import { config } from '../../config/config.js'
import type { SlurmProfile } from '../../config/config.js'
import { renderSlurmScript, writeSlurmScript } from '../submission/slurm-script.js'
import { submitUnits } from '../submission/submit-units.js'
import type { SubmissionUnit } from '../submission/submit-units.js'
import type { ScriptSubmitter } from '../submission/sbatch.js'

export type GaussianRun = 'gaussian' | 'resp'

export interface GaussianSubmitOptions {
  /** Scripts and Slurm output land here */
  logDir: string
  profile?: SlurmProfile
  submit?: ScriptSubmitter
  logger?: Logger
}

// Names, paths and the scratch directory for one job of either run
const runLayout = (run: GaussianRun, job: JobRecord, logDir: string) => {
  const prefix = run === 'resp' ? `resp_${job.name}` : job.name
  return {
    jobName: prefix,
    scriptPath: path.join(logDir, `submit_${prefix}.sh`),
    output: path.join(logDir, `${prefix}_%j.out`),
    error: path.join(logDir, `${prefix}_%j.err`),
    workDir: run === 'resp' ? path.join(job.path, 'RESP') : job.path,
    scratchDir: `${config.gaussianScratchRoot}/gaussian_${prefix}_$SLURM_JOB_ID`
  }
}

/**
 * Writes one Slurm script per job and submits it. `run` picks the
 * optimization (`mpp.com` at the job root) or the RESP step (`RESP/mpp.com`).
 */
const submitGaussianJobs = async (
  run: GaussianRun,
  jobs: JobRecord[],
  { logDir, profile = config.slurm[run], submit, logger = noopLogger }: GaussianSubmitOptions
): Promise<SubmissionOutcome[]> => {
  const units: SubmissionUnit[] = jobs.map((job) => {
    const layout = runLayout(run, job, logDir)
    return {
      label: job.name,
      jobs: [job.name],
      prepare: async () => {
        const script = await renderSlurmScript(
          run,
          {
            jobName: layout.jobName,
            output: layout.output,
            error: layout.error,
            time: profile.time,
            nodes: profile.nodes,
            ntasks: profile.ntasks,
            cpusPerTask: profile.cpusPerTask,
            partition: profile.partition
          },
          {
            jobLabel: job.name,
            workDir: layout.workDir,
            scratchDir: layout.scratchDir,
            inputFile: 'mpp.com',
            gaussianBin: config.gaussianBin,
            gaussianModule: config.gaussianModule,
            gaussianProfile: config.gaussianProfile
          }
        )
        return writeSlurmScript(layout.scriptPath, script)
      }
    }
  })

  return submitUnits(units, { submit, logger })
}

export { submitGaussianJobs }
