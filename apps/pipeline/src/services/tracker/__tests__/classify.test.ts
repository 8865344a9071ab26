import { describe, it, expect } from 'vitest'
import { checkLog, classifyJob } from '../classify.js'
import type { JobSnapshot, LogRead } from '../snapshot.js'
import { amberCandidates, optimizationJobs, respJobs, slvCandidates } from '../predicates.js'

const NORMAL = ' Normal termination of Gaussian 16 at Mon Jan  1 12:00:00 2024.\n'
const ERROR = ' Error termination via Lnk1e in /opt/g16/l502.exe\n'

const snap = (entries: string[], logs: Record<string, string> = {}): JobSnapshot => {
  const reads = new Map<string, LogRead>()
  for (const [rel, text] of Object.entries(logs)) {
    reads.set(rel, { ok: true, text })
  }
  return {
    name: 'frag_001',
    path: '/jobs/frag_001',
    entries: new Set(entries),
    logs: reads,
    diagnostics: []
  }
}

describe('checkLog', () => {
  it('reports a missing log', () => {
    expect(checkLog(snap([]), 'mpp.log')).toEqual({
      state: 'missing',
      status: 'No log file found'
    })
  })

  it('reports an unreadable log with the read error', () => {
    const snapshot = snap(['mpp.log'])
    snapshot.logs.set('mpp.log', { ok: false, error: 'EACCES: permission denied' })
    expect(checkLog(snapshot, 'mpp.log')).toEqual({
      state: 'unreadable',
      status: 'Error reading log: EACCES: permission denied'
    })
  })

  it('distinguishes completed, failed and unfinished runs', () => {
    expect(checkLog(snap(['mpp.log'], { 'mpp.log': NORMAL }), 'mpp.log').state).toBe(
      'complete'
    )
    expect(checkLog(snap(['mpp.log'], { 'mpp.log': ERROR }), 'mpp.log')).toEqual({
      state: 'error',
      status: 'Error termination'
    })
    expect(checkLog(snap(['mpp.log'], { 'mpp.log': ' SCF Done\n' }), 'mpp.log')).toEqual({
      state: 'incomplete',
      status: 'Incomplete'
    })
  })
})

describe('classifyJob', () => {
  it('walks a job through the optimization stages', () => {
    expect(classifyJob(snap([]))).toBe('discovered')
    expect(classifyJob(snap(['mpp.com', 'frag_001.g']))).toBe('opt-ready')
    expect(classifyJob(snap(['mpp.com', 'mpp.log'], { 'mpp.log': ' SCF Done\n' }))).toBe(
      'opt-incomplete'
    )
    expect(classifyJob(snap(['mpp.com', 'mpp.log'], { 'mpp.log': ERROR }))).toBe(
      'opt-failed'
    )
    expect(classifyJob(snap(['mpp.com', 'mpp.log'], { 'mpp.log': NORMAL }))).toBe(
      'opt-complete'
    )
  })

  it('treats a checkpoint and a geometry file without a log as awaiting RESP setup', () => {
    expect(classifyJob(snap(['mpp.chk', 'frag_001.g']))).toBe('resp-awaiting-setup')
  })

  it('reclassifies a checkpoint job once a completed log appears', () => {
    const entries = ['mpp.chk', 'frag_001.g']
    expect(classifyJob(snap(entries))).toBe('resp-awaiting-setup')
    expect(classifyJob(snap([...entries, 'mpp.log'], { 'mpp.log': NORMAL }))).toBe(
      'opt-complete'
    )
    expect(classifyJob(snap([...entries, 'mpp.log'], { 'mpp.log': ERROR }))).toBe(
      'opt-failed'
    )
  })

  it('moves to the RESP stages once RESP input and logs appear', () => {
    const base = ['mpp.com', 'mpp.log', 'mpp.chk', 'frag_001.g', 'RESP', 'RESP/mpp.com']
    expect(classifyJob(snap(base))).toBe('resp-ready')
    expect(
      classifyJob(snap([...base, 'RESP/mpp.log'], { 'RESP/mpp.log': NORMAL }))
    ).toBe('resp-complete')
    expect(classifyJob(snap([...base, 'RESP/mpp.log'], { 'RESP/mpp.log': ERROR }))).toBe(
      'resp-failed'
    )
    expect(classifyJob(snap([...base, 'RESP/mpp.log'], { 'RESP/mpp.log': '' }))).toBe(
      'resp-incomplete'
    )
  })

  it('recognizes the AMBER, SLV and MMC stages', () => {
    const amber = [
      'RESP',
      'RESP/mpp.log',
      'RESP/AMBER',
      'RESP/AMBER/MOL.pdb',
      'RESP/AMBER/MOL.prepi',
      'RESP/AMBER/lig.top'
    ]
    expect(classifyJob(snap(amber, { 'RESP/mpp.log': NORMAL }))).toBe('amber-complete')
    expect(classifyJob(snap([...amber, 'RESP/AMBER/lig.slv']))).toBe('slv-complete')
    expect(classifyJob(snap(['lig.slv', 'lig.top']))).toBe('sacp-collected')
    expect(classifyJob(snap(['lig.slv', 'lig.top', 'prot.inp']))).toBe('mmc-ready')
  })

  it('only counts checkpoint and geometry files at the job root', () => {
    expect(classifyJob(snap(['RESP', 'RESP/mpp.chk', 'frag_001.g']))).toBe('discovered')
  })
})

describe('predicates', () => {
  it('reports optimization status from the root log', () => {
    const snapshot = snap(['mpp.com', 'mpp.log'], { 'mpp.log': NORMAL })
    expect(optimizationJobs.accepts(snapshot)).toBe(true)
    expect(optimizationJobs.describe(snapshot)).toEqual({
      status: 'Completed',
      completed: true
    })
    expect(optimizationJobs.accepts(snap(['frag_001.g']))).toBe(false)
  })

  it('lists RESP jobs as ready until a log appears', () => {
    const snapshot = snap(['RESP', 'RESP/mpp.com'])
    expect(respJobs.accepts(snapshot)).toBe(true)
    expect(respJobs.describe(snapshot)).toEqual({ status: 'Ready', completed: false })
  })

  it('accepts any RESP log for AMBER parameter generation', () => {
    const snapshot = snap(['RESP', 'RESP/mpp.log'], { 'RESP/mpp.log': ERROR })
    expect(amberCandidates.accepts(snapshot)).toBe(true)
    expect(amberCandidates.describe(snapshot)).toEqual({
      status: 'Error termination',
      completed: false
    })
  })

  it('needs both MOL.pdb and MOL.prepi for SLV conversion', () => {
    expect(slvCandidates.accepts(snap(['RESP/AMBER/MOL.pdb']))).toBe(false)
    expect(
      slvCandidates.accepts(snap(['RESP/AMBER/MOL.pdb', 'RESP/AMBER/MOL.prepi']))
    ).toBe(true)
  })
})
