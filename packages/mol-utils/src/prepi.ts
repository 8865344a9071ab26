/**
 * Maps atom name to force-field atom type from the CORRECT block of a PREPI
 * file. Dummy atoms are skipped and reading stops at the LOOP block.
 */
export function readPrepiAtomTypes(prepiContent: string): Map<string, string> {
  const atomTypes = new Map<string, string>()
  let inAtomBlock = false

  for (const line of prepiContent.split(/\r?\n/)) {
    if (!inAtomBlock) {
      if (line.includes('CORRECT')) inAtomBlock = true
      continue
    }
    if (line.includes('LOOP')) break
    if (!line.trim() || line.includes('DUMM')) continue

    const parts = line.trim().split(/\s+/)
    if (parts.length >= 8) {
      atomTypes.set(parts[1], parts[2])
    }
  }

  return atomTypes
}
