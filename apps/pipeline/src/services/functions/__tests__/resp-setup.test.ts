import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import fs from 'fs-extra'
import path from 'path'
import { setupRespFolders } from '../resp-setup.js'
import { jobRecord, makeTempDir } from '../../../../test/helpers.js'

let root: string

beforeAll(async () => {
  root = await makeTempDir('resp-setup-test')
  await fs.outputFile(path.join(root, 'anion', 'mpp.chk'), 'checkpoint')
  await fs.outputFile(path.join(root, 'anion', 'anion.g'), '# header\n\n-1 2\nO 0.0 0.0 0.0\n')
  await fs.outputFile(path.join(root, 'broken', 'mpp.chk'), 'checkpoint')
  await fs.outputFile(path.join(root, 'broken', 'broken.g'), '# no charge line\nO 0.0 0.0 0.0\n')
})

afterAll(async () => {
  await fs.remove(root)
})

describe('setupRespFolders', () => {
  it('writes RESP/mpp.com with the charge and multiplicity of the geometry', async () => {
    const outcomes = await setupRespFolders([
      jobRecord(path.join(root, 'anion'), 'resp-awaiting-setup'),
      jobRecord(path.join(root, 'broken'), 'resp-awaiting-setup')
    ])

    expect(outcomes).toEqual([
      { name: 'anion', success: true },
      {
        name: 'broken',
        success: false,
        reason: 'Could not find valid charge and multiplicity values in broken.g'
      }
    ])
    expect(await fs.readFile(path.join(root, 'anion', 'RESP', 'mpp.com'), 'utf8')).toBe(
      [
        '%mem=35MW',
        '%chk=mpp',
        '%nproc=16',
        '#HF/6-31G* Guess=read Geom=checkpoint SCF=tight Test Pop=MK iop(6/33=2) iop(6/42=6) iop(6/50=1) opt nosymm',
        '',
        'mpp',
        '',
        '-1  2',
        '',
        'antechamber-ini.esp',
        '',
        'antechamber.esp',
        ''
      ].join('\n')
    )
    expect(await fs.readFile(path.join(root, 'anion', 'RESP', 'mpp.chk'), 'utf8')).toBe(
      'checkpoint'
    )
    expect(await fs.pathExists(path.join(root, 'broken', 'RESP'))).toBe(false)
  })
})
