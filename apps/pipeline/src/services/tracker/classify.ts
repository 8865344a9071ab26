import type { JobStage } from '@fragflow/pipeline-types'
import { config } from '../../config/config.js'
import type { JobSnapshot } from './snapshot.js'

export type LogState = 'missing' | 'unreadable' | 'complete' | 'error' | 'incomplete'

export interface LogCheck {
  state: LogState
  status: string
}

export interface LogMarkers {
  completion: string
  error: string
}

const defaultMarkers: LogMarkers = {
  completion: config.completionMarker,
  error: config.errorMarker
}

const checkLog = (
  snapshot: JobSnapshot,
  relPath: string,
  markers: LogMarkers = defaultMarkers
): LogCheck => {
  const read = snapshot.logs.get(relPath)
  if (!read) {
    if (snapshot.entries.has(relPath)) {
      // Present but never probed
      return { state: 'unreadable', status: 'Error reading log: not loaded' }
    }
    return { state: 'missing', status: 'No log file found' }
  }
  if (!read.ok) {
    return { state: 'unreadable', status: `Error reading log: ${read.error}` }
  }
  if (read.text.includes(markers.completion)) {
    return { state: 'complete', status: 'Completed' }
  }
  if (read.text.includes(markers.error)) {
    return { state: 'error', status: 'Error termination' }
  }
  return { state: 'incomplete', status: 'Incomplete' }
}

const hasRootFileEnding = (snapshot: JobSnapshot, suffix: string): boolean => {
  for (const entry of snapshot.entries) {
    if (!entry.includes('/') && entry.endsWith(suffix)) return true
  }
  return false
}

const hasAll = (snapshot: JobSnapshot, relPaths: string[]): boolean =>
  relPaths.every((rel) => snapshot.entries.has(rel))

const AMBER_OUTPUTS = ['RESP/AMBER/MOL.pdb', 'RESP/AMBER/MOL.prepi', 'RESP/AMBER/lig.top']

const logStage = (
  check: LogCheck,
  stages: { complete: JobStage; error: JobStage; incomplete: JobStage }
): JobStage => {
  if (check.state === 'complete') return stages.complete
  if (check.state === 'error') return stages.error
  return stages.incomplete
}

/**
 * Highest pipeline stage the snapshot shows evidence of. Rules are tried
 * from the most advanced stage down; the first match wins.
 */
const classifyJob = (snapshot: JobSnapshot): JobStage => {
  if (snapshot.entries.has('prot.inp')) return 'mmc-ready'
  if (hasAll(snapshot, ['lig.slv', 'lig.top'])) return 'sacp-collected'
  if (snapshot.entries.has('RESP/AMBER/lig.slv')) return 'slv-complete'
  if (hasAll(snapshot, AMBER_OUTPUTS)) return 'amber-complete'
  if (snapshot.entries.has('RESP/mpp.log')) {
    return logStage(checkLog(snapshot, 'RESP/mpp.log'), {
      complete: 'resp-complete',
      error: 'resp-failed',
      incomplete: 'resp-incomplete'
    })
  }
  if (snapshot.entries.has('RESP/mpp.com')) return 'resp-ready'
  // A log outranks the checkpoint: its markers decide the optimization outcome
  if (snapshot.entries.has('mpp.log')) {
    return logStage(checkLog(snapshot, 'mpp.log'), {
      complete: 'opt-complete',
      error: 'opt-failed',
      incomplete: 'opt-incomplete'
    })
  }
  if (hasRootFileEnding(snapshot, '.chk') && hasRootFileEnding(snapshot, '.g')) {
    return 'resp-awaiting-setup'
  }
  if (snapshot.entries.has('mpp.com')) return 'opt-ready'
  return 'discovered'
}

export { checkLog, classifyJob, hasRootFileEnding, hasAll, AMBER_OUTPUTS }
