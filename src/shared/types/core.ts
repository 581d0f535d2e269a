/**
 * Core data models for the vocabulary trainer
 */

export interface User {
  userId: number;          // Issued by the chat platform, never generated here
  username?: string;
  isAdmin: boolean;
  isTracked: boolean;
  addedAt: Date;
  notes?: string;
}

export interface CreateUserRequest {
  userId: number;
  username?: string;
  isAdmin?: boolean;
  isTracked?: boolean;
  notes?: string;
}

export type GroupingKind = 'lesson' | 'category';

/**
 * Named grouping owned by one user. Lessons and categories share this shape.
 */
export interface Grouping {
  id: number;
  name: string;
  ownerId: number;
}

export type Lesson = Grouping;
export type Category = Grouping;

export interface VocabularyEntry {
  id: number;
  ownerId: number;
  sourceText: string;
  targetText: string;
  successCount: number;
  failureCount: number;
  lessonId?: number;
  categoryId?: number;
  createdAt: Date;
}

export interface CreateVocabularyEntryRequest {
  sourceText: string;
  targetText: string;
  lessonId?: number;
  categoryId?: number;
}

export interface VocabularyPair {
  sourceText: string;
  targetText: string;
}

export interface TrainingScope {
  lessonId?: number;
  categoryId?: number;
}

export interface VocabularyFilters extends TrainingScope {
  search?: string;
  limit?: number;
  offset?: number;
}

export type PickResult =
  | { kind: 'entry'; entry: VocabularyEntry }
  | { kind: 'empty' };

export interface BatchAddResult {
  added: number;
  skipped: number;
  errors: string[];
}

export interface OwnerStatistics {
  totalEntries: number;
  practicedEntries: number;
  totalSuccesses: number;
  totalFailures: number;
  accuracy: number;        // 0..1, 0 when nothing was answered yet
}

/**
 * Flat record handed to exporters (CSV, spreadsheets)
 */
export interface VocabularyExportRow {
  id: number;
  sourceText: string;
  targetText: string;
  successCount: number;
  failureCount: number;
  lesson: string | null;
  category: string | null;
  createdAt: string;
}

export type PairOrder = 'source-target' | 'target-source';
export type TrainingDirection = 'source-to-target' | 'target-to-source';

export type TrainingTurn =
  | { kind: 'prompt'; entryId: number; prompt: string; direction: TrainingDirection }
  | { kind: 'empty' };

export interface AnswerResult {
  correct: boolean;
  similarity: number;
  expected: string;
  entry: VocabularyEntry;
}
