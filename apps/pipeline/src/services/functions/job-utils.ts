import fs from 'fs-extra'
import type { Logger, SubmissionOutcome } from '@fragflow/pipeline-types'
import { ConfigurationError, getErrorMessage } from '../errors.js'
import { isDirectoryEntry } from '../tracker/scan-jobs.js'

/**
 * Runs `work` for each item in order. A thrown error fails that item only;
 * the loop carries on with the next one.
 */
const processSequentially = async <T>(
  items: readonly T[],
  nameOf: (item: T) => string,
  work: (item: T) => Promise<void>,
  logger: Logger
): Promise<SubmissionOutcome[]> => {
  const outcomes: SubmissionOutcome[] = []
  for (const item of items) {
    const name = nameOf(item)
    try {
      await work(item)
      outcomes.push({ name, success: true })
    } catch (error) {
      const reason = getErrorMessage(error)
      logger.error(`${name}: ${reason}`)
      outcomes.push({ name, success: false, reason })
    }
  }
  return outcomes
}

const requireDirectory = async (dir: string, message: string): Promise<void> => {
  const stat = await fs.stat(dir).catch(() => null)
  if (!stat?.isDirectory()) throw new ConfigurationError(message)
}

const requireFile = async (file: string, message: string): Promise<void> => {
  const stat = await fs.stat(file).catch(() => null)
  if (!stat?.isFile()) throw new ConfigurationError(message)
}

// Visible subdirectory names, symlinked ones included, sorted
const listSubdirectories = async (dir: string): Promise<string[]> => {
  const dirents = await fs.readdir(dir, { withFileTypes: true })
  const names: string[] = []
  for (const dirent of dirents) {
    if (dirent.name.startsWith('.')) continue
    if (await isDirectoryEntry(dir, dirent)) names.push(dirent.name)
  }
  return names.sort()
}

export { processSequentially, requireDirectory, requireFile, listSubdirectories }
