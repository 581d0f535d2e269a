/**
 * Input schemas shared by the store and the training service
 */

import { z } from 'zod';
import { APP_CONFIG } from './constants/index.js';
import { InvalidInputError } from './errors.js';

export const UserIdSchema = z.number().int().positive();
export const RecordIdSchema = z.number().int().positive();
export const TermSchema = z.string().trim().min(1, 'must not be empty').max(APP_CONFIG.MAX_TERM_LENGTH);
export const GroupingNameSchema = z.string().trim().min(1, 'must not be empty').max(APP_CONFIG.MAX_GROUPING_NAME_LENGTH);
export const PairTextSchema = z.string().max(APP_CONFIG.MAX_TEXT_LENGTH);

export const CreateUserSchema = z.object({
  userId: UserIdSchema,
  username: z.string().trim().min(1).max(APP_CONFIG.MAX_GROUPING_NAME_LENGTH).optional(),
  isAdmin: z.boolean().optional(),
  isTracked: z.boolean().optional(),
  notes: z.string().max(APP_CONFIG.MAX_TEXT_LENGTH).optional()
});

export const VocabularyPairSchema = z.object({
  sourceText: TermSchema,
  targetText: TermSchema
});

export const TrainingScopeSchema = z.object({
  lessonId: RecordIdSchema.optional(),
  categoryId: RecordIdSchema.optional()
});

export const CreateVocabularyEntrySchema = VocabularyPairSchema.merge(TrainingScopeSchema);

export const VocabularyFiltersSchema = TrainingScopeSchema.extend({
  search: z.string().trim().max(APP_CONFIG.MAX_TERM_LENGTH).optional(),
  limit: z.number().int().positive().max(1000).optional(),
  offset: z.number().int().min(0).optional()
});

/**
 * Parse `value` or throw InvalidInputError naming the offending field
 */
export function validate<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(`Invalid ${label}: ${describeIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message))
    .join('; ');
}
