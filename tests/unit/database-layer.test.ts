/**
 * Tests for the vocabulary store on an in-memory SQLite database
 */

import { createTestDatabase } from '../../src/main/database/factory';
import type { VocabularyDatabaseLayer } from '../../src/main/database/database-layer';
import {
  DuplicateEntryError,
  InvalidInputError,
  InvalidReferenceError,
  NotFoundError
} from '../../src/shared/errors';

describe('VocabularyDatabaseLayer', () => {
  let database: VocabularyDatabaseLayer;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    database = createTestDatabase();
    await database.initialize();
  });

  afterEach(async () => {
    await database.close();
    jest.restoreAllMocks();
  });

  describe('users', () => {
    it('should create a user with default flags', async () => {
      const user = await database.createUser({ userId: 1, username: 'alice' });

      expect(user).toMatchObject({ userId: 1, username: 'alice', isAdmin: false, isTracked: false });
      expect(user.addedAt).toBeInstanceOf(Date);
      expect(user.notes).toBeUndefined();
    });

    it('should reject a second user with the same id', async () => {
      await database.createUser({ userId: 1 });
      await expect(database.createUser({ userId: 1 })).rejects.toThrow(DuplicateEntryError);
      await expect(database.createUser({ userId: 1 })).rejects.toThrow('User 1 already exists');
    });

    it('should leave an existing user untouched in ensureUser', async () => {
      await database.createUser({ userId: 1, username: 'alice', isAdmin: true });

      const user = await database.ensureUser(1, 'someone-else');

      expect(user).toMatchObject({ userId: 1, username: 'alice', isAdmin: true });
    });

    it('should keep stored values and never lower flags in upsertUser', async () => {
      await database.createUser({ userId: 1, username: 'alice', notes: 'first' });

      await database.upsertUser({ userId: 1, isAdmin: true });
      const user = await database.upsertUser({ userId: 1, isTracked: true });

      expect(user).toMatchObject({ userId: 1, username: 'alice', notes: 'first', isAdmin: true, isTracked: true });
    });

    it('should insert through upsertUser when absent', async () => {
      const user = await database.upsertUser({ userId: 9, username: 'new' });
      expect(user).toMatchObject({ userId: 9, username: 'new', isAdmin: false });
    });

    it('should set flags and list tracked users', async () => {
      await database.createUser({ userId: 1 });
      await database.createUser({ userId: 2 });

      await database.setTracked(2, true);
      await database.setAdmin(1, true);

      expect((await database.listTrackedUsers()).map((user) => user.userId)).toEqual([2]);
      expect((await database.getUser(1))?.isAdmin).toBe(true);

      await database.setTracked(2, false);
      expect(await database.listTrackedUsers()).toEqual([]);
    });

    it('should report unknown users', async () => {
      expect(await database.getUser(404)).toBeNull();
      await expect(database.setAdmin(404, true)).rejects.toThrow(NotFoundError);
    });

    it('should reject invalid ids', async () => {
      await expect(database.ensureUser(0)).rejects.toThrow(InvalidInputError);
      await expect(database.ensureUser(1.5)).rejects.toThrow(InvalidInputError);
    });
  });

  describe('lessons and categories', () => {
    beforeEach(async () => {
      await database.ensureUser(1);
      await database.ensureUser(2);
    });

    it('should return the same lesson for the same owner and name', async () => {
      const first = await database.getOrCreateLesson(1, 'Basics');
      const second = await database.getOrCreateLesson(1, '  Basics  ');

      expect(second).toEqual(first);
      expect(first).toMatchObject({ name: 'Basics', ownerId: 1 });
    });

    it('should let two owners use the same name', async () => {
      const mine = await database.getOrCreateLesson(1, 'Basics');
      const theirs = await database.getOrCreateLesson(2, 'Basics');

      expect(theirs.id).not.toBe(mine.id);
      expect(theirs.ownerId).toBe(2);
    });

    it('should resolve concurrent creation to one row', async () => {
      const results = await Promise.all([
        database.getOrCreateCategory(1, 'Verbs'),
        database.getOrCreateCategory(1, 'Verbs'),
        database.getOrCreateCategory(1, 'Verbs')
      ]);

      expect(new Set(results.map((category) => category.id)).size).toBe(1);
      expect(await database.listCategories(1)).toHaveLength(1);
    });

    it('should reject unknown owners and empty names', async () => {
      await expect(database.getOrCreateLesson(404, 'Basics')).rejects.toThrow(NotFoundError);
      await expect(database.getOrCreateLesson(1, '   ')).rejects.toThrow(InvalidInputError);
    });

    it('should list only the owner groupings sorted by name', async () => {
      await database.getOrCreateLesson(1, 'Travel');
      await database.getOrCreateLesson(1, 'Basics');
      await database.getOrCreateLesson(2, 'Other');

      expect((await database.listLessons(1)).map((lesson) => lesson.name)).toEqual(['Basics', 'Travel']);
    });

    it('should keep entries when their lesson is deleted', async () => {
      const lesson = await database.getOrCreateLesson(1, 'Basics');
      const entry = await database.addVocabularyEntry(1, { sourceText: 'νερό', targetText: 'вода', lessonId: lesson.id });

      await database.deleteLesson(1, lesson.id);

      expect(await database.listLessons(1)).toEqual([]);
      const kept = await database.getVocabularyEntry(1, entry.id);
      expect(kept?.sourceText).toBe('νερό');
      expect(kept?.lessonId).toBeUndefined();
    });

    it('should not delete a lesson of another owner', async () => {
      const lesson = await database.getOrCreateLesson(1, 'Basics');

      await expect(database.deleteLesson(2, lesson.id)).rejects.toThrow(NotFoundError);
      await expect(database.deleteCategory(1, 999)).rejects.toThrow('Category 999 not found');
      expect(await database.listLessons(1)).toHaveLength(1);
    });
  });

  describe('vocabulary', () => {
    beforeEach(async () => {
      await database.ensureUser(1);
      await database.ensureUser(2);
    });

    it('should store trimmed pairs with zero counters', async () => {
      const entry = await database.addVocabularyEntry(1, { sourceText: ' σπίτι ', targetText: 'дом ' });

      expect(entry).toMatchObject({ ownerId: 1, sourceText: 'σπίτι', targetText: 'дом', successCount: 0, failureCount: 0 });
      expect(entry.createdAt).toBeInstanceOf(Date);
      expect(await database.countVocabulary(1)).toBe(1);
    });

    it('should allow the same pair for different owners', async () => {
      await database.addVocabularyEntry(1, { sourceText: 'σπίτι', targetText: 'дом' });
      await database.addVocabularyEntry(2, { sourceText: 'σπίτι', targetText: 'дом' });

      expect(await database.countVocabulary(1)).toBe(1);
      expect(await database.countVocabulary(2)).toBe(1);
    });

    it('should reject a duplicate pair for one owner', async () => {
      const first = await database.addVocabularyEntry(1, { sourceText: 'σπίτι', targetText: 'дом' });
      await database.recordOutcome(1, first.id, true);
      await database.recordOutcome(1, first.id, false);

      await expect(database.addVocabularyEntry(1, { sourceText: 'σπίτι', targetText: 'дом' }))
        .rejects.toThrow(DuplicateEntryError);

      expect(await database.getVocabularyEntry(1, first.id)).toMatchObject({ successCount: 1, failureCount: 1 });
      expect(await database.countVocabulary(1)).toBe(1);
    });

    it('should reject lessons of other owners and missing categories', async () => {
      const foreign = await database.getOrCreateLesson(2, 'Theirs');

      await expect(database.addVocabularyEntry(1, { sourceText: 'a', targetText: 'b', lessonId: foreign.id }))
        .rejects.toThrow(InvalidReferenceError);
      await expect(database.addVocabularyEntry(1, { sourceText: 'a', targetText: 'b', categoryId: 999 }))
        .rejects.toThrow('Category 999 does not exist');
      expect(await database.countVocabulary(1)).toBe(0);
    });

    it('should reject entries of unknown owners', async () => {
      await expect(database.addVocabularyEntry(404, { sourceText: 'a', targetText: 'b' }))
        .rejects.toThrow(InvalidReferenceError);
    });

    it('should reject terms over 500 characters', async () => {
      await expect(database.addVocabularyEntry(1, { sourceText: 'x'.repeat(501), targetText: 'b' }))
        .rejects.toThrow(InvalidInputError);
    });

    it('should add batches, skipping stored pairs and reporting invalid ones', async () => {
      await database.addVocabularyEntry(1, { sourceText: 'a', targetText: 'b' });
      const lesson = await database.getOrCreateLesson(1, 'Basics');

      const result = await database.addVocabularyBatch(1, [
        { sourceText: 'a', targetText: 'b' },
        { sourceText: 'c', targetText: 'd' },
        { sourceText: 'c', targetText: 'd' },
        { sourceText: '', targetText: 'x' }
      ], { lessonId: lesson.id });

      expect(result).toEqual({ added: 1, skipped: 2, errors: ['Pair 4: sourceText must not be empty'] });
      const inLesson = await database.listVocabulary(1, { lessonId: lesson.id });
      expect(inLesson.map((entry) => entry.sourceText)).toEqual(['c']);
    });

    it('should reject batches over the size limit', async () => {
      const pairs = Array.from({ length: 101 }, (_, i) => ({ sourceText: `s${i}`, targetText: `t${i}` }));
      await expect(database.addVocabularyBatch(1, pairs)).rejects.toThrow(InvalidInputError);
    });

    it('should search Greek and Cyrillic text regardless of case', async () => {
      await database.addVocabularyBatch(1, [
        { sourceText: 'Σπίτι', targetText: 'Дом' },
        { sourceText: 'House', targetText: 'x' }
      ]);

      const sources = async (search: string) =>
        (await database.listVocabulary(1, { search })).map((entry) => entry.sourceText);

      expect(await sources('Σπίτι')).toEqual(['Σπίτι']);
      expect(await sources('σπίτι')).toEqual(['Σπίτι']);
      expect(await sources('ΣΠΊΤΙ')).toEqual(['Σπίτι']);
      expect(await sources('Дом')).toEqual(['Σπίτι']);
      expect(await sources('дом')).toEqual(['Σπίτι']);
      expect(await sources('house')).toEqual(['House']);
    });

    it('should filter, search and page the vocabulary', async () => {
      await database.addVocabularyBatch(1, [
        { sourceText: 'Alpha', targetText: 'один' },
        { sourceText: 'beta', targetText: 'два' },
        { sourceText: 'gamma', targetText: '100%' },
        { sourceText: 'delta', targetText: 'четыре' }
      ]);

      const searched = await database.listVocabulary(1, { search: 'ALP' });
      expect(searched.map((entry) => entry.sourceText)).toEqual(['Alpha']);

      const percent = await database.listVocabulary(1, { search: '%' });
      expect(percent.map((entry) => entry.sourceText)).toEqual(['gamma']);

      const page = await database.listVocabulary(1, { limit: 2, offset: 1 });
      expect(page.map((entry) => entry.sourceText)).toEqual(['beta', 'gamma']);

      const tail = await database.listVocabulary(1, { offset: 3 });
      expect(tail.map((entry) => entry.sourceText)).toEqual(['delta']);
    });

    it('should hide entries of other owners', async () => {
      const entry = await database.addVocabularyEntry(2, { sourceText: 'a', targetText: 'b' });

      expect(await database.getVocabularyEntry(1, entry.id)).toBeNull();
      expect(await database.listVocabulary(1)).toEqual([]);
    });
  });

  describe('statistics', () => {
    let entryId: number;

    beforeEach(async () => {
      await database.ensureUser(1);
      await database.ensureUser(2);
      entryId = (await database.addVocabularyEntry(1, { sourceText: 'γάτα', targetText: 'кошка' })).id;
    });

    it('should count successes and failures', async () => {
      for (let i = 0; i < 3; i++) {
        await database.recordOutcome(1, entryId, true);
      }
      await database.recordOutcome(1, entryId, false);
      const entry = await database.recordOutcome(1, entryId, false);

      expect(entry).toMatchObject({ successCount: 3, failureCount: 2 });
    });

    it('should not lose concurrent increments', async () => {
      await Promise.all(Array.from({ length: 20 }, () => database.recordOutcome(1, entryId, true)));

      expect((await database.getVocabularyEntry(1, entryId))?.successCount).toBe(20);
    });

    it('should not lose interleaved successes and failures', async () => {
      const outcomes = Array.from({ length: 25 }, (_, i) => i % 5 !== 0);

      await Promise.all(outcomes.map((success) => database.recordOutcome(1, entryId, success)));

      expect(await database.getVocabularyEntry(1, entryId)).toMatchObject({ successCount: 20, failureCount: 5 });
    });

    it('should refuse to count answers on entries of other owners', async () => {
      await expect(database.recordOutcome(2, entryId, true)).rejects.toThrow(NotFoundError);
      await expect(database.recordOutcome(1, 999, true)).rejects.toThrow('Vocabulary entry 999 not found');
    });

    it('should aggregate owner statistics', async () => {
      await database.addVocabularyEntry(1, { sourceText: 'σκύλος', targetText: 'собака' });
      await database.recordOutcome(1, entryId, true);
      await database.recordOutcome(1, entryId, true);
      await database.recordOutcome(1, entryId, true);
      await database.recordOutcome(1, entryId, false);

      expect(await database.getStatistics(1)).toEqual({
        totalEntries: 2,
        practicedEntries: 1,
        totalSuccesses: 3,
        totalFailures: 1,
        accuracy: 0.75
      });
    });

    it('should report zeros for an owner without entries', async () => {
      expect(await database.getStatistics(2)).toEqual({
        totalEntries: 0,
        practicedEntries: 0,
        totalSuccesses: 0,
        totalFailures: 0,
        accuracy: 0
      });
    });

    it('should reset counters of one owner only', async () => {
      const other = await database.addVocabularyEntry(2, { sourceText: 'γάτα', targetText: 'кошка' });
      await database.recordOutcome(1, entryId, true);
      await database.recordOutcome(2, other.id, true);

      expect(await database.resetStatistics(1)).toBe(1);
      expect((await database.getVocabularyEntry(1, entryId))?.successCount).toBe(0);
      expect((await database.getVocabularyEntry(2, other.id))?.successCount).toBe(1);
    });

    it('should export rows with grouping names', async () => {
      const lesson = await database.getOrCreateLesson(1, 'Animals');
      const category = await database.getOrCreateCategory(1, 'Nouns');
      await database.addVocabularyEntry(1, {
        sourceText: 'σκύλος',
        targetText: 'собака',
        lessonId: lesson.id,
        categoryId: category.id
      });

      const rows = await database.exportVocabulary(1);

      expect(rows).toHaveLength(2);
      expect(rows[0]).toMatchObject({ sourceText: 'γάτα', lesson: null, category: null });
      expect(rows[1]).toMatchObject({ sourceText: 'σκύλος', lesson: 'Animals', category: 'Nouns', successCount: 0 });
      expect(rows[1]?.createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });
  });
});
