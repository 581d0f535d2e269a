/**
 * Public API of the vocabulary trainer store
 */

export * from './shared/types/index.js';
export * from './shared/errors.js';
export { APP_CONFIG, TRAINING_CONFIG, TABLES, type GroupingTable } from './shared/constants/index.js';
export { parsePairs, detectLayout, type PairLayout, type ParsedPairs } from './shared/utils/pair-parser.js';
export { compareAnswer, normalizeAnswer, similarity, levenshtein, type AnswerComparison } from './shared/utils/text.js';
export * from './main/database/index.js';
export * from './main/srs/index.js';
export { loadDatabaseConfig, describeDatabase } from './main/config.js';
