const SLVA_PATTERN =
  /(SLVA\s+)\d+(\s+1\s+MOL\s+1\s+\w+\s+!\s+Read\s+)\d+(\s+solvent atoms)/g

export interface SlvaUpdate {
  content: string
  /** False when the template has no SLVA line to patch */
  matched: boolean
}

/**
 * Writes the solvent atom count into both number fields of the SLVA line of an
 * MMC input template. Nothing else in the template changes.
 */
export function updateSlvaAtomCount(
  template: string,
  atomCount: number
): SlvaUpdate {
  let matched = false
  const content = template.replace(
    SLVA_PATTERN,
    (_match: string, head: string, middle: string, tail: string) => {
      matched = true
      return `${head}${atomCount}${middle}${atomCount}${tail}`
    }
  )
  return { content, matched }
}
