import { describe, it, expect } from 'vitest'
import { readPdbAtoms } from './pdb.js'
import { MolFormatError } from './errors.js'
import { pdbContent } from './__fixtures__/mol.js'

describe('readPdbAtoms', () => {
  it('reads ATOM records in file order and ignores other records', () => {
    const atoms = readPdbAtoms(pdbContent)
    expect(atoms.map((a) => a.name)).toEqual(['N1', 'C1', 'O1'])
    expect(atoms[1]).toEqual({
      serial: 2,
      name: 'C1',
      x: -1.234,
      y: 0.5,
      z: 10.25
    })
  })

  it('splits coordinates by column when they touch', () => {
    const line =
      'ATOM      4 C2   MOL     1    -123.456-789.012   5.000  1.00  0.00'
    const [atom] = readPdbAtoms(line)
    expect(atom.x).toBe(-123.456)
    expect(atom.y).toBe(-789.012)
    expect(atom.z).toBe(5)
  })

  it('rejects a non-numeric coordinate', () => {
    const line =
      'ATOM      1 N1   MOL     1       1.000   abcde   3.000  1.00  0.00'
    expect(() => readPdbAtoms(line)).toThrow(MolFormatError)
    expect(() => readPdbAtoms(line)).toThrow('Invalid y coordinate "abcde" on line 1')
  })

  it('rejects a repeated atom name', () => {
    const content = [
      'ATOM      1 N1   MOL     1       1.000   2.000   3.000  1.00  0.00',
      'ATOM      2 N1   MOL     1       1.000   2.000   3.000  1.00  0.00'
    ].join('\n')
    expect(() => readPdbAtoms(content)).toThrow('Duplicate atom name N1 on line 2')
  })

  it('handles CRLF line endings', () => {
    const atoms = readPdbAtoms(pdbContent.replace(/\n/g, '\r\n'))
    expect(atoms).toHaveLength(3)
    expect(atoms[2].z).toBe(-12.5)
  })
})
