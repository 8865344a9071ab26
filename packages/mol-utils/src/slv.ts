import fs from 'fs-extra'
import path from 'path'
import { noopLogger } from '@fragflow/pipeline-types'
import type { Logger } from '@fragflow/pipeline-types'
import { readPdbAtoms } from './pdb.js'
import type { PdbAtom } from './pdb.js'
import { readPrepiAtomTypes } from './prepi.js'
import { readTopCharges } from './prmtop.js'
import { AtomDataError, MolFormatError } from './errors.js'

export interface AtomRecord extends PdbAtom {
  type: string
  charge: number
}

export interface AssembleOptions {
  /** Fail instead of warning when the charge count differs from the atom count */
  strictCount?: boolean
  logger?: Logger
}

export interface ConvertToSlvParams {
  pdbPath: string
  prepiPath: string
  topPath: string
  outputPath: string
  residueName?: string
  strictCount?: boolean
  logger?: Logger
}

export const DEFAULT_RESIDUE_NAME = 'MOL'

/**
 * Joins coordinates, atom types and charges in the coordinate file's order.
 * Types are looked up by atom name, charges by position.
 */
export function assembleAtomRecords(
  atoms: PdbAtom[],
  atomTypes: Map<string, string>,
  charges: number[],
  { strictCount = false, logger = noopLogger }: AssembleOptions = {}
): AtomRecord[] {
  if (charges.length !== atoms.length) {
    const message = `Charge count (${charges.length}) does not match atom count (${atoms.length})`
    if (strictCount) throw new MolFormatError(message)
    logger.warn?.(message)
  }

  return atoms.map((atom, idx) => {
    const type = atomTypes.get(atom.name)
    if (type === undefined) throw new AtomDataError(atom.name, 'type')
    const charge = charges[idx]
    if (charge === undefined) throw new AtomDataError(atom.name, 'charge')
    return { ...atom, type, charge }
  })
}

/**
 * Sign or space, then the magnitude with 5 decimals in at least 7 characters.
 */
export function formatSlvNumber(value: number): string {
  const magnitude = Math.abs(value).toFixed(5).padStart(7)
  return value >= 0 ? ` ${magnitude}` : `-${magnitude}`
}

export function formatSlvLine(
  atom: AtomRecord,
  residueName: string = DEFAULT_RESIDUE_NAME
): string {
  const typeField = ` ${atom.type.padEnd(2)}      `
  const numbers = [atom.x, atom.y, atom.z, atom.charge]
    .map(formatSlvNumber)
    .join('  ')
  return `${typeField}${numbers}    1  ${residueName}  ${atom.name}`
}

export function buildSlvContent(
  atoms: AtomRecord[],
  residueName: string = DEFAULT_RESIDUE_NAME
): string {
  return atoms.map((atom) => `${formatSlvLine(atom, residueName)}\n`).join('')
}

/**
 * Non-blank lines of an SLV file, one per atom.
 */
export function countSlvAtoms(slvContent: string): number {
  return slvContent.split(/\r?\n/).filter((line) => line.trim()).length
}

/**
 * Converts PDB + PREPI + topology into an SLV file. The file only appears once
 * the whole content has been built; a failing molecule leaves nothing behind.
 */
export async function convertToSlv({
  pdbPath,
  prepiPath,
  topPath,
  outputPath,
  residueName = DEFAULT_RESIDUE_NAME,
  strictCount = false,
  logger = noopLogger
}: ConvertToSlvParams): Promise<AtomRecord[]> {
  const [pdbContent, prepiContent, topContent] = await Promise.all([
    fs.readFile(pdbPath, 'utf8'),
    fs.readFile(prepiPath, 'utf8'),
    fs.readFile(topPath, 'utf8')
  ])

  const atoms = readPdbAtoms(pdbContent)
  const atomTypes = readPrepiAtomTypes(prepiContent)
  const charges = readTopCharges(topContent)
  logger.debug?.(
    `${path.basename(pdbPath)}: ${atoms.length} atoms, ${atomTypes.size} types, ${charges.length} charges`
  )

  const records = assembleAtomRecords(atoms, atomTypes, charges, {
    strictCount,
    logger
  })
  const content = buildSlvContent(records, residueName)

  const tmpPath = `${outputPath}.${process.pid}.tmp`
  try {
    await fs.outputFile(tmpPath, content)
    await fs.move(tmpPath, outputPath, { overwrite: true })
  } catch (error) {
    await fs.remove(tmpPath)
    throw error
  }

  logger.info(`Wrote SLV file: ${outputPath}`)
  return records
}
