import fs from 'fs-extra'
import path from 'path'
import type { JobRecord, Logger, SubmissionOutcome } from '@fragflow/pipeline-types'
import { noopLogger } from '@fragflow/pipeline-types'
import { config } from '../../config/config.js'
import { runCommand } from '../../helpers/runCommand.js'
import { renderTemplate } from '../../helpers/templates.js'
import { processSequentially } from './job-utils.js'

export interface AmberParamsOptions {
  logger?: Logger
  templateDir?: string
}

interface AmberStep {
  label: string
  command: string
  args: string[]
}

export const AMBER_FILES = [
  'MOL.mol2',
  'MOL.prepi',
  'MOL.frcmod',
  'MOL.pdb',
  'lig.top',
  'lig.crd'
]

const amberSteps = (logFile: string): AmberStep[] => [
  {
    label: 'mol2 generation',
    command: config.antechamberBin,
    args: ['-fi', 'gout', '-fo', 'mol2', '-pf', 'y', '-i', logFile, '-o', 'MOL.mol2', '-c', 'resp']
  },
  {
    label: 'prepi generation',
    command: config.antechamberBin,
    args: ['-fi', 'gout', '-fo', 'prepi', '-pf', 'y', '-i', logFile, '-o', 'MOL.prepi', '-c', 'resp']
  },
  {
    label: 'parmchk2',
    command: config.parmchk2Bin,
    args: ['-f', 'prepi', '-i', 'MOL.prepi', '-o', 'MOL.frcmod']
  },
  {
    label: 'PDB generation',
    command: config.antechamberBin,
    args: ['-fi', 'prepi', '-fo', 'pdb', '-i', 'MOL.prepi', '-o', 'MOL.pdb']
  }
]

const runStep = async (step: AmberStep, cwd: string, logger: Logger): Promise<void> => {
  logger.debug?.(`${step.command} ${step.args.join(' ')}`)
  const { code, stderr } = await runCommand(step.command, step.args, { cwd })
  if (code !== 0) {
    throw new Error(stderr ? `${step.label} failed: ${stderr}` : `${step.label} failed`)
  }
}

const generateForJob = async (
  job: JobRecord,
  logger: Logger,
  templateDir?: string
): Promise<void> => {
  const respDir = path.join(job.path, 'RESP')
  const amberDir = path.join(respDir, 'AMBER')
  await fs.ensureDir(amberDir)
  const logFile = path.join(respDir, 'mpp.log')

  for (const step of amberSteps(logFile)) {
    await runStep(step, amberDir, logger)
  }

  const tleapInput = await renderTemplate(
    'amber/tleap.in',
    {
      prepiFile: 'MOL.prepi',
      frcmodFile: 'MOL.frcmod',
      pdbFile: 'MOL.pdb',
      topFile: 'lig.top',
      crdFile: 'lig.crd'
    },
    templateDir
  )
  await fs.writeFile(path.join(amberDir, 'tleap.in'), tleapInput)
  await runStep(
    { label: 'tleap', command: config.tleapBin, args: ['-f', 'tleap.in'] },
    amberDir,
    logger
  )

  logger.info(`${job.name} completed, files generated in ${amberDir}:`)
  for (const file of AMBER_FILES) {
    logger.info(`  - ${file}`)
  }
}

/**
 * Builds AMBER parameters from each job's RESP log: antechamber (mol2,
 * prepi), parmchk2, antechamber (pdb), then tleap. The first failing
 * command fails the job.
 */
const generateAmberParams = async (
  jobs: JobRecord[],
  { logger = noopLogger, templateDir }: AmberParamsOptions = {}
): Promise<SubmissionOutcome[]> =>
  processSequentially(
    jobs,
    (job) => job.name,
    (job) => generateForJob(job, logger, templateDir),
    logger
  )

export { generateAmberParams }
