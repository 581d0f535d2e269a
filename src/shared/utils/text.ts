/**
 * Answer normalization and fuzzy comparison for training turns
 */

import { TRAINING_CONFIG } from '../constants/index.js';

const PUNCTUATION = /[.,!?;:()"«»¡¿]/g;
const COMBINING_MARKS = /\p{M}/gu;

/**
 * Lower-case, strip punctuation and diacritics, collapse whitespace
 */
export function normalizeAnswer(text: string): string {
  return text
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .replace(PUNCTUATION, '')
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .join(' ');
}

export function levenshtein(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);

  if (left.length === 0) return right.length;
  if (right.length === 0) return left.length;

  let previous = Array.from({ length: right.length + 1 }, (_, i) => i);

  for (let i = 1; i <= left.length; i++) {
    const current = [i];
    for (let j = 1; j <= right.length; j++) {
      const cost = left[i - 1] === right[j - 1] ? 0 : 1;
      current.push(Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      ));
    }
    previous = current;
  }

  return previous[right.length] ?? 0;
}

/**
 * 1 for identical strings, 0 when nothing matches
 */
export function similarity(a: string, b: string): number {
  const longest = Math.max(Array.from(a).length, Array.from(b).length);
  if (longest === 0) {
    return 1;
  }
  return 1 - levenshtein(a, b) / longest;
}

export interface AnswerComparison {
  correct: boolean;
  similarity: number;
}

export function compareAnswer(answer: string, expected: string): AnswerComparison {
  const given = normalizeAnswer(answer);
  const wanted = normalizeAnswer(expected);

  if (given.length === 0) {
    return { correct: false, similarity: 0 };
  }

  const score = given === wanted ? 1 : similarity(given, wanted);
  return { correct: score >= TRAINING_CONFIG.SIMILARITY_THRESHOLD, similarity: score };
}
