/**
 * @stowplan/engine - Solver Module
 *
 * Container loading, candidate anchors, input validation and geometry checks.
 */

export {
  packItems,
  packUnits,
  sortUnitsForPacking,
  getUnfittedCountsByName,
  getPlacement
} from './packingEngine';

export { CandidatePointSet } from './candidatePoints';

export {
  PackingInputError,
  validateContainer,
  validateItemRecords,
  validateUnits
} from './inputValidation';

export * from './entities';

export * from './geometry';
