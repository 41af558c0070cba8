export {
  sampleTailEntities,
  type SampleTailEntitiesDeps,
  type SampleTailEntitiesInput,
  type TailSample,
} from './core/usecases/sample-tail-entities.js';
export { findTailEntities, sampleWithoutReplacement, touchesAny } from './core/tail.js';
export { createSeededRandom, createMathRandom, type RandomSource } from './core/random.js';
export {
  createNoTriplesError,
  type NoTriplesError,
  type TailSamplingError,
} from './core/errors.js';
