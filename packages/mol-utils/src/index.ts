export { readPdbAtoms } from './pdb.js'
export type { PdbAtom } from './pdb.js'
export { readPrepiAtomTypes } from './prepi.js'
export { readTopCharges, AMBER_CHARGE_FACTOR } from './prmtop.js'
export {
  assembleAtomRecords,
  formatSlvNumber,
  formatSlvLine,
  buildSlvContent,
  countSlvAtoms,
  convertToSlv,
  DEFAULT_RESIDUE_NAME
} from './slv.js'
export type {
  AtomRecord,
  AssembleOptions,
  ConvertToSlvParams
} from './slv.js'
export { updateSlvaAtomCount } from './mmcInput.js'
export type { SlvaUpdate } from './mmcInput.js'
export {
  parseChargeMultiplicity,
  extractGeometryBlock,
  buildGaussianInput
} from './gaussianInput.js'
export type { ChargeMultiplicity } from './gaussianInput.js'
export { MolFormatError, AtomDataError } from './errors.js'
