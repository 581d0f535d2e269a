/**
 * Training Service - entry point for chat front ends
 */

import type {
  AnswerResult,
  BatchAddResult,
  OwnerStatistics,
  PairOrder,
  TrainingDirection,
  TrainingScope,
  TrainingTurn,
  VocabularyEntry,
  VocabularyExportRow
} from '../../shared/types/core.js';
import type { VocabularyStore } from '../../shared/types/database.js';
import { TRAINING_CONFIG } from '../../shared/constants/index.js';
import { NotFoundError } from '../../shared/errors.js';
import { parsePairs, type PairLayout } from '../../shared/utils/pair-parser.js';
import { compareAnswer } from '../../shared/utils/text.js';
import { StatisticsEngine } from './statistics-engine.js';
import type { RandomSource } from './selection-weights.js';

export interface AddPairsOptions {
  order?: PairOrder;
  lessonName?: string;
  categoryName?: string;
  username?: string;
}

export interface AddPairsResult extends BatchAddResult {
  layout: PairLayout;
  totalEntries: number;
}

export interface BeginTurnOptions {
  scope?: TrainingScope;
  direction?: TrainingDirection;
}

export class TrainingService {
  private readonly engine: StatisticsEngine;

  constructor(private store: VocabularyStore, random: RandomSource = Math.random) {
    this.engine = new StatisticsEngine(store, random);
  }

  /**
   * Parse pasted text and store the pairs, optionally filed under a lesson and category
   */
  async addPairs(ownerId: number, text: string, options: AddPairsOptions = {}): Promise<AddPairsResult> {
    const parsed = parsePairs(text, options.order);
    await this.store.ensureUser(ownerId, options.username);

    let batch: BatchAddResult = { added: 0, skipped: 0, errors: [] };

    if (parsed.pairs.length > 0) {
      const scope = await this.resolveScope(ownerId, options);
      batch = await this.store.addVocabularyBatch(ownerId, parsed.pairs, scope);
      console.log(`[TrainingService] User ${ownerId}: added ${batch.added}, skipped ${batch.skipped} (${parsed.layout})`);
    }

    return {
      added: batch.added,
      skipped: batch.skipped,
      errors: [...parsed.errors, ...batch.errors],
      layout: parsed.layout,
      totalEntries: await this.store.countVocabulary(ownerId)
    };
  }

  async beginTurn(ownerId: number, options: BeginTurnOptions = {}): Promise<TrainingTurn> {
    const direction: TrainingDirection = options.direction ?? TRAINING_CONFIG.DEFAULT_DIRECTION;
    const pick = await this.engine.pickNext(ownerId, options.scope);

    if (pick.kind === 'empty') {
      return pick;
    }

    return {
      kind: 'prompt',
      entryId: pick.entry.id,
      prompt: promptFor(pick.entry, direction),
      direction
    };
  }

  /**
   * Grade an answer against the stored pair and count the outcome
   */
  async submitAnswer(
    ownerId: number,
    entryId: number,
    answer: string,
    direction: TrainingDirection = TRAINING_CONFIG.DEFAULT_DIRECTION
  ): Promise<AnswerResult> {
    const entry = await this.store.getVocabularyEntry(ownerId, entryId);
    if (!entry) {
      throw new NotFoundError(`Vocabulary entry ${entryId} not found`);
    }

    const expected = expectedAnswer(entry, direction);
    const { correct, similarity } = compareAnswer(answer, expected);
    const updated = await this.store.recordOutcome(ownerId, entryId, correct);

    return { correct, similarity, expected, entry: updated };
  }

  async getStatistics(ownerId: number): Promise<OwnerStatistics> {
    return this.store.getStatistics(ownerId);
  }

  async exportVocabulary(ownerId: number): Promise<VocabularyExportRow[]> {
    return this.store.exportVocabulary(ownerId);
  }

  private async resolveScope(ownerId: number, options: AddPairsOptions): Promise<TrainingScope> {
    const scope: TrainingScope = {};
    if (options.lessonName) {
      scope.lessonId = (await this.store.getOrCreateLesson(ownerId, options.lessonName)).id;
    }
    if (options.categoryName) {
      scope.categoryId = (await this.store.getOrCreateCategory(ownerId, options.categoryName)).id;
    }
    return scope;
  }
}

function promptFor(entry: VocabularyEntry, direction: TrainingDirection): string {
  return direction === 'source-to-target' ? entry.sourceText : entry.targetText;
}

function expectedAnswer(entry: VocabularyEntry, direction: TrainingDirection): string {
  return direction === 'source-to-target' ? entry.targetText : entry.sourceText;
}
