/**
 * Raised when an input file does not follow its fixed format.
 */
export class MolFormatError extends Error {
  constructor(
    message: string,
    readonly file?: string,
    readonly line?: number
  ) {
    super(message)
    this.name = 'MolFormatError'
  }
}

/**
 * Raised when an atom from the coordinate file lacks a type or a charge.
 */
export class AtomDataError extends Error {
  constructor(
    readonly atomName: string,
    readonly field: 'type' | 'charge'
  ) {
    super(`Missing ${field} for atom ${atomName}`)
    this.name = 'AtomDataError'
  }
}
