import fs from 'fs-extra'
import path from 'path'
import type { Dirent } from 'fs'
import type { JobRecord, Logger } from '@fragflow/pipeline-types'
import { noopLogger } from '@fragflow/pipeline-types'
import { ConfigurationError } from '../errors.js'
import { classifyJob } from './classify.js'
import type { JobPredicate } from './predicates.js'
import { DEFAULT_LOG_PROBES, takeSnapshot } from './snapshot.js'

export interface ScanOptions {
  /** Directory names or paths to leave out, e.g. the directory the tool runs from */
  exclude?: string[]
  /** Drop jobs whose stage is already finished */
  incompleteOnly?: boolean
  probes?: string[]
  /** Receives warnings about skipped directories */
  logger?: Logger
}

export const byName = (a: { name: string }, b: { name: string }): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0

const assertDirectory = async (root: string): Promise<void> => {
  const stat = await fs.stat(root).catch(() => null)
  if (!stat?.isDirectory()) {
    throw new ConfigurationError(`'${root}' is not a valid directory`)
  }
}

// Symlinked directories count as directories
const isDirectoryEntry = async (parent: string, dirent: Dirent): Promise<boolean> => {
  if (dirent.isDirectory()) return true
  if (!dirent.isSymbolicLink()) return false
  const stat = await fs.stat(path.join(parent, dirent.name)).catch(() => null)
  return stat?.isDirectory() ?? false
}

/**
 * Lists the job directories directly under `root` that the predicate
 * accepts, sorted by name. Indices shown to the user are positions in this
 * list, so the order must not depend on the filesystem.
 */
const scanJobs = async (
  root: string,
  predicate: JobPredicate,
  options: ScanOptions = {}
): Promise<JobRecord[]> => {
  const {
    exclude = [],
    incompleteOnly = false,
    probes = DEFAULT_LOG_PROBES,
    logger = noopLogger
  } = options
  const jobsDir = path.resolve(root)
  await assertDirectory(jobsDir)

  const excluded = new Set(exclude.map((entry) => path.resolve(jobsDir, entry)))
  const dirents = await fs.readdir(jobsDir, { withFileTypes: true })

  const records: JobRecord[] = []
  for (const dirent of dirents) {
    if (dirent.name.startsWith('.')) continue
    if (!(await isDirectoryEntry(jobsDir, dirent))) continue
    const jobDir = path.join(jobsDir, dirent.name)
    if (excluded.has(jobDir)) continue

    const snapshot = await takeSnapshot(jobDir, probes)
    if (!predicate.accepts(snapshot)) {
      for (const diagnostic of snapshot.diagnostics) {
        logger.warn?.(`Skipped ${snapshot.name}: ${diagnostic}`)
      }
      continue
    }

    const { status, completed } = predicate.describe(snapshot)
    if (incompleteOnly && completed) continue

    records.push({
      name: snapshot.name,
      path: snapshot.path,
      stage: classifyJob(snapshot),
      status,
      completed,
      diagnostics: snapshot.diagnostics
    })
  }

  return records.sort(byName)
}

export { scanJobs, isDirectoryEntry }
