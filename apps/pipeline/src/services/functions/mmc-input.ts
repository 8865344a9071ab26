import fs from 'fs-extra'
import path from 'path'
import type { Logger, SubmissionOutcome } from '@fragflow/pipeline-types'
import { noopLogger } from '@fragflow/pipeline-types'
import { countSlvAtoms, updateSlvaAtomCount } from '@fragflow/mol-utils'
import { ConfigurationError } from '../errors.js'
import { sacpMolecules } from '../tracker/predicates.js'
import { scanJobs } from '../tracker/scan-jobs.js'
import { processSequentially, requireDirectory, requireFile } from './job-utils.js'

export interface MmcInputOptions {
  sacpPath: string
  templatePath: string
  /** Files in this directory are copied next to every prot.inp */
  proteinPath?: string
  logger?: Logger
}

/**
 * `sacpPath` itself, or its `SACP` subdirectory when it has one.
 */
const resolveSacpDir = async (sacpPath: string): Promise<string> => {
  const nested = path.join(sacpPath, 'SACP')
  const stat = await fs.stat(nested).catch(() => null)
  return stat?.isDirectory() ? nested : sacpPath
}

const copyProteinFiles = async (
  proteinPath: string,
  moleculeDir: string,
  logger: Logger
): Promise<void> => {
  const dirents = await fs.readdir(proteinPath, { withFileTypes: true })
  for (const dirent of dirents) {
    if (!dirent.isFile() || dirent.name.startsWith('.')) continue
    await fs.copy(path.join(proteinPath, dirent.name), path.join(moleculeDir, dirent.name))
    logger.debug?.(`Copied ${dirent.name} to ${path.basename(moleculeDir)}`)
  }
}

/**
 * Writes `prot.inp` into every SACP molecule directory, with the SLVA
 * line patched to the molecule's atom count.
 */
const writeMmcInputs = async ({
  sacpPath,
  templatePath,
  proteinPath,
  logger = noopLogger
}: MmcInputOptions): Promise<SubmissionOutcome[]> => {
  await requireDirectory(sacpPath, `SACP directory not found: ${sacpPath}`)
  await requireFile(templatePath, `Template file not found: ${templatePath}`)
  if (proteinPath !== undefined) {
    await requireDirectory(proteinPath, `Protein directory not found: ${proteinPath}`)
  }

  const sacpDir = await resolveSacpDir(sacpPath)
  logger.info(`Processing SACP directory: ${sacpDir}`)
  const template = await fs.readFile(templatePath, 'utf8')

  const molecules = await scanJobs(sacpDir, sacpMolecules)
  if (molecules.length === 0) {
    throw new ConfigurationError(`No molecule directories with lig.slv in ${sacpDir}`)
  }
  logger.info(`Found ${molecules.length} molecule directories`)

  return processSequentially(
    molecules,
    (molecule) => molecule.name,
    async (molecule) => {
      const atomCount = countSlvAtoms(
        await fs.readFile(path.join(molecule.path, 'lig.slv'), 'utf8')
      )
      const { content, matched } = updateSlvaAtomCount(template, atomCount)
      if (!matched) {
        logger.warn?.('No SLVA line was modified in the template!')
      }
      await fs.writeFile(path.join(molecule.path, 'prot.inp'), content)
      if (proteinPath !== undefined) {
        await copyProteinFiles(proteinPath, molecule.path, logger)
      }
      logger.info(`${molecule.name}: prot.inp written for ${atomCount} atoms`)
    },
    logger
  )
}

export { writeMmcInputs, resolveSacpDir }
