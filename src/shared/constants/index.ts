/**
 * Shared constants for the vocabulary trainer
 */

export const APP_CONFIG = {
  DATABASE_NAME: 'vocabulary.db',
  DATA_DIRECTORY: 'data',
  DEFAULT_TIMEOUT_MS: 5000,
  DEFAULT_POOL_SIZE: 5,
  MAX_TERM_LENGTH: 500,
  MAX_GROUPING_NAME_LENGTH: 200,
  MAX_TEXT_LENGTH: 10000,
  MAX_PAIRS_PER_BATCH: 100
} as const;

export const TRAINING_CONFIG = {
  // Normalized answers at or above this similarity count as correct
  SIMILARITY_THRESHOLD: 0.8,
  // Share of sampled lines that must carry a separator to parse as one pair per line
  SEPARATED_FORMAT_RATIO: 0.6,
  FORMAT_SAMPLE_LINES: 5,
  DEFAULT_DIRECTION: 'target-to-source'
} as const;

export const TABLES = {
  USERS: 'users',
  LESSONS: 'lessons',
  CATEGORIES: 'categories',
  VOCABULARY: 'vocabulary'
} as const;

export type GroupingTable = typeof TABLES.LESSONS | typeof TABLES.CATEGORIES;

/**
 * Vocabulary column that references each grouping table
 */
export const GROUPING_REFERENCE_COLUMNS: Record<GroupingTable, 'lesson_id' | 'category_id'> = {
  lessons: 'lesson_id',
  categories: 'category_id'
};
