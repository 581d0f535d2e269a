/**
 * Chooses which vocabulary entry to present next
 */

import type { PickResult, TrainingScope } from '../../shared/types/core.js';
import type { VocabularyStore } from '../../shared/types/database.js';
import { SelectionWeights, type RandomSource } from './selection-weights.js';

export class StatisticsEngine {
  constructor(
    private store: Pick<VocabularyStore, 'listVocabulary'>,
    private random: RandomSource = Math.random
  ) {}

  /**
   * Weighted random pick among the owner's entries in `scope`.
   * Reads counters only; keeps no state between calls.
   */
  async pickNext(ownerId: number, scope: TrainingScope = {}): Promise<PickResult> {
    const candidates = await this.store.listVocabulary(ownerId, {
      lessonId: scope.lessonId,
      categoryId: scope.categoryId
    });

    const entry = SelectionWeights.pickWeighted(candidates, this.random);
    return entry ? { kind: 'entry', entry } : { kind: 'empty' };
  }
}
