// ---------------------------------------------------------------------------
// @slicewise/decoding: sliced-ensemble orchestration
// ---------------------------------------------------------------------------

// Types + errors
export * from './types.js';
export * from './errors.js';

// Capability queries
export {
  hasCapability,
  requireCapability,
  resolveApplyMethod,
  applyOperation,
  scoreOperation,
  toTensor,
} from './capability.js';

// Engine parts
export { allocateOutput, writeUnit, LazyOutput } from './output.js';
export { dispatchChunks, mergeChunks, type DispatchContext, type PartitionAxis } from './coordinator.js';
export { fitSlices } from './fitter.js';
export { applySameSlice, scoreSameSlice } from './same-slice.js';
export { applyCrossSlice, scoreCrossSlice, stackSlices, unstackSlices } from './cross-slice.js';
export { checkSamples, parseJobCount } from './validation.js';

// Facades
export { SlicedEnsemble, type EnsembleOptions } from './sliced-ensemble.js';
export { GeneralizingEnsemble } from './generalizing-ensemble.js';

// Reference estimators
export * from './estimators/index.js';
