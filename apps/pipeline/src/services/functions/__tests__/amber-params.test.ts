import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'fs-extra'
import path from 'path'
import { generateAmberParams } from '../amber-params.js'
import { runCommand } from '../../../helpers/runCommand.js'
import { jobRecord, makeTempDir } from '../../../../test/helpers.js'

vi.mock('../../../helpers/runCommand.js', () => ({
  runCommand: vi.fn()
}))

const mockedRun = vi.mocked(runCommand)
const ok = { code: 0, signal: null, stdout: '', stderr: '' }

let root: string

beforeEach(async () => {
  mockedRun.mockReset()
  root = await makeTempDir('amber-params-test')
  await fs.outputFile(path.join(root, 'frag_001', 'RESP', 'mpp.log'), ' Normal termination\n')
})

afterEach(async () => {
  await fs.remove(root)
})

describe('generateAmberParams', () => {
  it('runs antechamber, parmchk2 and tleap in order inside RESP/AMBER', async () => {
    mockedRun.mockResolvedValue(ok)
    const jobDir = path.join(root, 'frag_001')
    const amberDir = path.join(jobDir, 'RESP', 'AMBER')
    const logFile = path.join(jobDir, 'RESP', 'mpp.log')

    const outcomes = await generateAmberParams([jobRecord(jobDir, 'resp-complete')])

    expect(outcomes).toEqual([{ name: 'frag_001', success: true }])
    expect(mockedRun.mock.calls).toEqual([
      [
        'antechamber',
        ['-fi', 'gout', '-fo', 'mol2', '-pf', 'y', '-i', logFile, '-o', 'MOL.mol2', '-c', 'resp'],
        { cwd: amberDir }
      ],
      [
        'antechamber',
        ['-fi', 'gout', '-fo', 'prepi', '-pf', 'y', '-i', logFile, '-o', 'MOL.prepi', '-c', 'resp'],
        { cwd: amberDir }
      ],
      ['parmchk2', ['-f', 'prepi', '-i', 'MOL.prepi', '-o', 'MOL.frcmod'], { cwd: amberDir }],
      [
        'antechamber',
        ['-fi', 'prepi', '-fo', 'pdb', '-i', 'MOL.prepi', '-o', 'MOL.pdb'],
        { cwd: amberDir }
      ],
      ['tleap', ['-f', 'tleap.in'], { cwd: amberDir }]
    ])
    expect(await fs.readFile(path.join(amberDir, 'tleap.in'), 'utf8')).toBe(
      'source leaprc.gaff\nloadamberprep MOL.prepi\nloadAmberParams MOL.frcmod\nLIG = loadpdb MOL.pdb\nsaveAmberParm LIG lig.top lig.crd\nquit\n'
    )
  })

  it('stops a job at the first failing command', async () => {
    mockedRun
      .mockResolvedValueOnce(ok)
      .mockResolvedValueOnce(ok)
      .mockResolvedValueOnce({ ...ok, code: 1, stderr: 'Unknown atom type XX' })

    const outcomes = await generateAmberParams([
      jobRecord(path.join(root, 'frag_001'), 'resp-complete')
    ])

    expect(outcomes).toEqual([
      { name: 'frag_001', success: false, reason: 'parmchk2 failed: Unknown atom type XX' }
    ])
    expect(mockedRun).toHaveBeenCalledTimes(3)
    expect(
      await fs.pathExists(path.join(root, 'frag_001', 'RESP', 'AMBER', 'tleap.in'))
    ).toBe(false)
  })

  it('reports tleap errors with its stderr', async () => {
    mockedRun
      .mockResolvedValueOnce(ok)
      .mockResolvedValueOnce(ok)
      .mockResolvedValueOnce(ok)
      .mockResolvedValueOnce(ok)
      .mockResolvedValueOnce({ ...ok, code: 1, stderr: 'Could not open file MOL.frcmod' })

    const outcomes = await generateAmberParams([
      jobRecord(path.join(root, 'frag_001'), 'resp-complete')
    ])
    expect(outcomes).toEqual([
      { name: 'frag_001', success: false, reason: 'tleap failed: Could not open file MOL.frcmod' }
    ])
  })
})
