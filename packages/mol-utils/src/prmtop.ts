import { MolFormatError } from './errors.js'

/** sqrt(332.0522173): topology charge units per elementary charge */
export const AMBER_CHARGE_FACTOR = 18.2223

const FIELD_WIDTH = 16

/**
 * Reads the %FLAG CHARGE section of a topology file and returns the charges in
 * elementary-charge units, in file order.
 */
export function readTopCharges(topContent: string): number[] {
  const lines = topContent.split(/\r?\n/)
  const flagIdx = lines.findIndex((line) => line.includes('%FLAG CHARGE'))
  if (flagIdx === -1) {
    throw new MolFormatError('No %FLAG CHARGE section found')
  }

  // Data starts after the flag line and its %FORMAT line
  const start = flagIdx + 2
  let end = lines.findIndex((line, i) => i >= start && line.includes('%FLAG'))
  if (end === -1) end = lines.length

  const charges: number[] = []
  for (let i = start; i < end; i++) {
    const line = lines[i].trimEnd()
    for (let col = 0; col < line.length; col += FIELD_WIDTH) {
      const raw = line.substring(col, col + FIELD_WIDTH).trim()
      if (!raw) continue
      const value = Number(raw)
      if (Number.isNaN(value)) {
        throw new MolFormatError(
          `Invalid charge "${raw}" on line ${i + 1}`,
          undefined,
          i + 1
        )
      }
      charges.push(value / AMBER_CHARGE_FACTOR)
    }
  }

  return charges
}
