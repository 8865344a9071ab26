import { MolFormatError } from './errors.js'

export interface PdbAtom {
  serial: number
  name: string
  x: number
  y: number
  z: number
}

const parseColumn = (
  line: string,
  start: number,
  end: number,
  label: string,
  lineNumber: number
): number => {
  const raw = line.substring(start, end).trim()
  const value = Number(raw)
  if (raw === '' || Number.isNaN(value)) {
    throw new MolFormatError(
      `Invalid ${label} "${raw}" on line ${lineNumber}`,
      undefined,
      lineNumber
    )
  }
  return value
}

/**
 * Reads ATOM records by column. Atom names and serials may touch each other
 * in this format, so whitespace splitting is not an option.
 *
 * The returned order is the canonical atom order.
 */
export function readPdbAtoms(pdbContent: string): PdbAtom[] {
  const atoms: PdbAtom[] = []
  const seen = new Set<string>()
  const lines = pdbContent.split(/\r?\n/)

  lines.forEach((line, idx) => {
    if (!line.startsWith('ATOM')) return
    const lineNumber = idx + 1
    const serial = parseColumn(line, 6, 11, 'atom serial', lineNumber) // columns 7-11
    const name = line.substring(12, 16).trim() // columns 13-16
    if (!name) {
      throw new MolFormatError(
        `Missing atom name on line ${lineNumber}`,
        undefined,
        lineNumber
      )
    }
    if (seen.has(name)) {
      throw new MolFormatError(
        `Duplicate atom name ${name} on line ${lineNumber}`,
        undefined,
        lineNumber
      )
    }
    seen.add(name)
    atoms.push({
      serial,
      name,
      x: parseColumn(line, 30, 38, 'x coordinate', lineNumber),
      y: parseColumn(line, 38, 46, 'y coordinate', lineNumber),
      z: parseColumn(line, 46, 54, 'z coordinate', lineNumber)
    })
  })

  return atoms
}
