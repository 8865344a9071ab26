export interface ChargeMultiplicity {
  charge: string
  multiplicity: string
}

const CHARGE_LINE = /^-?\d+\s+-?\d+$/

const isSkippable = (line: string): boolean =>
  line === '' || line.startsWith('#') || line.startsWith('Put')

/**
 * Finds the "charge multiplicity" line of a .g geometry file.
 */
export function parseChargeMultiplicity(
  geometryContent: string
): ChargeMultiplicity | null {
  for (const raw of geometryContent.split(/\r?\n/)) {
    const line = raw.trim()
    if (isSkippable(line)) continue
    if (CHARGE_LINE.test(line)) {
      const [charge, multiplicity] = line.split(/\s+/)
      return { charge, multiplicity }
    }
  }
  return null
}

/**
 * Lines from the charge/multiplicity line to the end of the molecule.
 * Comment and blank lines are dropped throughout.
 */
export function extractGeometryBlock(geometryContent: string): string[] {
  const block: string[] = []
  let collecting = false

  for (const raw of geometryContent.split(/\r?\n/)) {
    const line = raw.trim()
    if (isSkippable(line)) continue
    if (!collecting && CHARGE_LINE.test(line)) collecting = true
    if (collecting) block.push(raw)
  }

  return block
}

/**
 * Route section and title from the template, a blank line, then the
 * geometry followed by the blank line Gaussian expects.
 */
export function buildGaussianInput(template: string, geometry: string[]): string {
  const body = geometry.map((line) => `${line}\n`).join('')
  return `${template.trimEnd()}\n\n${body}\n`
}
