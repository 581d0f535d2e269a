/**
 * Training module exports
 */

export { SelectionWeights, type RandomSource, type WeightedCandidate } from './selection-weights.js';
export { StatisticsEngine } from './statistics-engine.js';
export { TrainingService, type AddPairsOptions, type AddPairsResult, type BeginTurnOptions } from './training-service.js';
