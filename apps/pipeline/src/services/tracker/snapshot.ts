import fs from 'fs-extra'
import path from 'path'
import { getErrorMessage } from '../errors.js'

export type LogRead = { ok: true; text: string } | { ok: false; error: string }

/**
 * What a job directory held at one moment. Paths are relative to the job
 * directory and use forward slashes, e.g. `RESP/AMBER/MOL.pdb`.
 */
export interface JobSnapshot {
  name: string
  path: string
  entries: Set<string>
  logs: Map<string, LogRead>
  diagnostics: string[]
}

// Levels below the job directory that are listed
const SNAPSHOT_LEVELS = ['', 'RESP', 'RESP/AMBER']

export const DEFAULT_LOG_PROBES = ['mpp.log', 'RESP/mpp.log']

const listLevel = async (
  jobDir: string,
  level: string,
  snapshot: JobSnapshot
): Promise<void> => {
  const dir = level ? path.join(jobDir, ...level.split('/')) : jobDir
  try {
    const dirents = await fs.readdir(dir, { withFileTypes: true })
    for (const dirent of dirents) {
      snapshot.entries.add(level ? `${level}/${dirent.name}` : dirent.name)
    }
  } catch (error) {
    snapshot.diagnostics.push(`Error listing ${dir}: ${getErrorMessage(error)}`)
  }
}

/**
 * Lists the job directory, its `RESP` and `RESP/AMBER` subdirectories and
 * reads the probed log files. Read failures become diagnostics.
 */
const takeSnapshot = async (
  jobDir: string,
  probes: string[] = DEFAULT_LOG_PROBES
): Promise<JobSnapshot> => {
  const snapshot: JobSnapshot = {
    name: path.basename(jobDir),
    path: path.resolve(jobDir),
    entries: new Set(),
    logs: new Map(),
    diagnostics: []
  }

  for (const level of SNAPSHOT_LEVELS) {
    // Only descend into levels that were seen in the parent listing
    if (level && !snapshot.entries.has(level)) continue
    await listLevel(snapshot.path, level, snapshot)
  }

  for (const probe of probes) {
    if (!snapshot.entries.has(probe)) continue
    const file = path.join(snapshot.path, ...probe.split('/'))
    try {
      const text = await fs.readFile(file, 'utf8')
      snapshot.logs.set(probe, { ok: true, text })
    } catch (error) {
      const message = getErrorMessage(error)
      snapshot.logs.set(probe, { ok: false, error: message })
      snapshot.diagnostics.push(`Error reading ${file}: ${message}`)
    }
  }

  return snapshot
}

export { takeSnapshot }
