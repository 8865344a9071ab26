import { jobStageDisplayNames } from '@fragflow/pipeline-types'
import { AMBER_OUTPUTS, checkLog, classifyJob, hasAll, hasRootFileEnding } from './classify.js'
import type { JobSnapshot } from './snapshot.js'

export interface JobStatus {
  status: string
  completed: boolean
}

/**
 * Decides which job directories a tool lists and how it reports them.
 */
export interface JobPredicate {
  label: string
  accepts: (snapshot: JobSnapshot) => boolean
  describe: (snapshot: JobSnapshot) => JobStatus
}

const fromLog = (snapshot: JobSnapshot, relPath: string): JobStatus => {
  const check = checkLog(snapshot, relPath)
  return { status: check.status, completed: check.state === 'complete' }
}

// Every job directory, reported by stage
const anyJob: JobPredicate = {
  label: 'jobs',
  accepts: () => true,
  describe: (snapshot) => {
    const stage = classifyJob(snapshot)
    return { status: jobStageDisplayNames[stage], completed: stage === 'mmc-ready' }
  }
}

const optimizationJobs: JobPredicate = {
  label: 'optimization jobs',
  accepts: (snapshot) => snapshot.entries.has('mpp.com'),
  describe: (snapshot) => fromLog(snapshot, 'mpp.log')
}

const respSetupCandidates: JobPredicate = {
  label: 'RESP setup candidates',
  accepts: (snapshot) =>
    hasRootFileEnding(snapshot, '.chk') && hasRootFileEnding(snapshot, '.g'),
  describe: (snapshot) =>
    snapshot.entries.has('RESP/mpp.com')
      ? { status: 'RESP input exists', completed: true }
      : { status: 'Ready', completed: false }
}

const respJobs: JobPredicate = {
  label: 'RESP jobs',
  accepts: (snapshot) => snapshot.entries.has('RESP/mpp.com'),
  describe: (snapshot) =>
    snapshot.entries.has('RESP/mpp.log')
      ? fromLog(snapshot, 'RESP/mpp.log')
      : { status: 'Ready', completed: false }
}

const amberCandidates: JobPredicate = {
  label: 'RESP calculations',
  accepts: (snapshot) => snapshot.entries.has('RESP/mpp.log'),
  describe: (snapshot) => ({
    status: checkLog(snapshot, 'RESP/mpp.log').status,
    completed: hasAll(snapshot, AMBER_OUTPUTS)
  })
}

const slvCandidates: JobPredicate = {
  label: 'AMBER parameter sets',
  accepts: (snapshot) =>
    hasAll(snapshot, ['RESP/AMBER/MOL.pdb', 'RESP/AMBER/MOL.prepi']),
  describe: (snapshot) =>
    snapshot.entries.has('RESP/AMBER/lig.slv')
      ? { status: 'Converted', completed: true }
      : { status: 'Ready', completed: false }
}

const sacpMolecules: JobPredicate = {
  label: 'SACP molecules',
  accepts: (snapshot) => snapshot.entries.has('lig.slv'),
  describe: (snapshot) =>
    snapshot.entries.has('prot.inp')
      ? { status: 'MMC input exists', completed: true }
      : { status: 'Ready', completed: false }
}

const mmcJobs: JobPredicate = {
  label: 'MMC jobs',
  accepts: (snapshot) => snapshot.entries.has('prot.inp'),
  describe: (snapshot) =>
    snapshot.entries.has('prot.out')
      ? { status: 'Output present', completed: true }
      : { status: 'Ready', completed: false }
}

export {
  anyJob,
  optimizationJobs,
  respSetupCandidates,
  respJobs,
  amberCandidates,
  slvCandidates,
  sacpMolecules,
  mmcJobs
}
