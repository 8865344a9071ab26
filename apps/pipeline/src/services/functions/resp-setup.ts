import fs from 'fs-extra'
import path from 'path'
import type { JobRecord, Logger, SubmissionOutcome } from '@fragflow/pipeline-types'
import { noopLogger } from '@fragflow/pipeline-types'
import { parseChargeMultiplicity } from '@fragflow/mol-utils'
import { renderTemplate } from '../../helpers/templates.js'
import { processSequentially } from './job-utils.js'

export interface RespSetupOptions {
  logger?: Logger
  templateDir?: string
}

const rootFilesEnding = async (dir: string, suffix: string): Promise<string[]> => {
  const dirents = await fs.readdir(dir, { withFileTypes: true })
  return dirents
    .filter((dirent) => dirent.isFile() && dirent.name.endsWith(suffix))
    .map((dirent) => dirent.name)
    .sort()
}

const setupRespFolder = async (
  job: JobRecord,
  logger: Logger,
  templateDir?: string
): Promise<void> => {
  const chkFiles = await rootFilesEnding(job.path, '.chk')
  const gFiles = await rootFilesEnding(job.path, '.g')
  if (chkFiles.length === 0 || gFiles.length === 0) {
    throw new Error('Missing .chk or .g file')
  }

  const chargeMult = parseChargeMultiplicity(
    await fs.readFile(path.join(job.path, gFiles[0]), 'utf8')
  )
  if (!chargeMult) {
    throw new Error(
      `Could not find valid charge and multiplicity values in ${gFiles[0]}`
    )
  }

  const respDir = path.join(job.path, 'RESP')
  await fs.ensureDir(respDir)
  for (const chkFile of chkFiles) {
    await fs.copy(path.join(job.path, chkFile), path.join(respDir, chkFile))
    logger.info(`Copied ${chkFile} to ${job.name}/RESP`)
  }

  const content = await renderTemplate('gaussian/resp.com', chargeMult, templateDir)
  await fs.writeFile(path.join(respDir, 'mpp.com'), content)
  logger.info(
    `Created mpp.com for ${job.name} with charge ${chargeMult.charge} and multiplicity ${chargeMult.multiplicity}`
  )
}

/**
 * Creates `RESP/` in each job, copies its checkpoints and writes the RESP
 * `mpp.com` with the job's own charge and multiplicity.
 */
const setupRespFolders = async (
  jobs: JobRecord[],
  { logger = noopLogger, templateDir }: RespSetupOptions = {}
): Promise<SubmissionOutcome[]> =>
  processSequentially(
    jobs,
    (job) => job.name,
    (job) => setupRespFolder(job, logger, templateDir),
    logger
  )

export { setupRespFolders }
