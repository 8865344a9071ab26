import fs from 'fs-extra'
import path from 'path'
import type { Logger, SubmissionOutcome } from '@fragflow/pipeline-types'
import { noopLogger } from '@fragflow/pipeline-types'
import { listSubdirectories, processSequentially, requireDirectory } from './job-utils.js'

export interface SacpSetupOptions {
  /** Parent directory of the fragment job directories */
  libraryPath: string
  /** Directory the SACP collection(s) are created in */
  sacpPath: string
  split?: number
  /** Library subdirectories that are not molecules */
  exclude?: string[]
  logger?: Logger
}

export interface SacpSetupResult {
  collections: string[]
  outcomes: SubmissionOutcome[]
}

export interface SacpVerification {
  verified: boolean
  molecules: number
}

export const LIGAND_FILES = ['lig.top', 'lig.slv']

const collectionDirs = (sacpPath: string, split: number): string[] =>
  split === 1
    ? [path.join(sacpPath, 'SACP')]
    : Array.from({ length: split }, (_, i) => path.join(sacpPath, `SACP_${i + 1}`))

/**
 * Copies each molecule's `lig.top` and `lig.slv` into `SACP` (or `SACP_1..n`
 * when split). Molecules are taken in sorted order, `ceil(total / split)` per
 * collection.
 */
const createSacpCollections = async ({
  libraryPath,
  sacpPath,
  split = 1,
  exclude = ['File_Prep'],
  logger = noopLogger
}: SacpSetupOptions): Promise<SacpSetupResult> => {
  await requireDirectory(libraryPath, `Library path does not exist: ${libraryPath}`)
  const parts = Math.max(1, Math.floor(split))
  const collections = collectionDirs(sacpPath, parts)
  for (const dir of collections) {
    await fs.ensureDir(dir)
    logger.info(`Created SACP directory: ${dir}`)
  }

  // The collections may live inside the library itself
  const skip = new Set([sacpPath, ...collections].map((dir) => path.resolve(dir)))
  const molecules = (await listSubdirectories(libraryPath)).filter(
    (name) => !exclude.includes(name) && !skip.has(path.resolve(libraryPath, name))
  )
  const perCollection = Math.max(1, Math.ceil(molecules.length / parts))

  const outcomes = await processSequentially(
    molecules.map((name, idx) => ({ name, idx })),
    ({ name }) => name,
    async ({ name, idx }) => {
      const amberDir = path.join(libraryPath, name, 'RESP', 'AMBER')
      if (!(await fs.pathExists(amberDir))) {
        throw new Error('AMBER directory not found')
      }
      for (const file of LIGAND_FILES) {
        if (!(await fs.pathExists(path.join(amberDir, file)))) {
          throw new Error(`Missing ligand file ${file}`)
        }
      }
      const target = collections[Math.min(Math.floor(idx / perCollection), parts - 1)]
      const moleculeDir = path.join(target, name)
      await fs.ensureDir(moleculeDir)
      for (const file of LIGAND_FILES) {
        await fs.copy(path.join(amberDir, file), path.join(moleculeDir, file))
      }
      logger.info(`Copied ligand files for ${name} to ${path.basename(target)}`)
    },
    logger
  )

  const copied = outcomes.filter((outcome) => outcome.success).length
  logger.info(`Successfully processed ${copied} molecules across ${parts} directories`)
  return { collections, outcomes }
}

const verifySacpCollections = async (
  collections: string[],
  logger: Logger = noopLogger
): Promise<SacpVerification> => {
  let verified = true
  let molecules = 0
  for (const dir of collections) {
    const names = await listSubdirectories(dir)
    for (const name of names) {
      for (const file of LIGAND_FILES) {
        if (!(await fs.pathExists(path.join(dir, name, file)))) {
          logger.error(`Missing ${file} in ${path.basename(dir)}/${name}`)
          verified = false
        }
      }
    }
    molecules += names.length
    logger.info(`Molecules in ${path.basename(dir)}: ${names.length}`)
  }
  logger.info(`Total molecules across all SACP directories: ${molecules}`)
  return { verified, molecules }
}

export { createSacpCollections, verifySacpCollections }
