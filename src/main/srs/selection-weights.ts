/**
 * Selection weights for the next training prompt
 *
 * weight(s, f) = (f + 1) / (s + 1) + 1 / (s + f + 1)
 *
 * Unpracticed entries weigh 2; a perfect record of n successes weighs 2 / (n + 1);
 * failures always raise the weight and every weight stays above zero.
 */

export type RandomSource = () => number;

export interface WeightedCandidate {
  successCount: number;
  failureCount: number;
}

export class SelectionWeights {
  static weightFor(successCount: number, failureCount: number): number {
    const s = Math.max(0, successCount);
    const f = Math.max(0, failureCount);
    return (f + 1) / (s + 1) + 1 / (s + f + 1);
  }

  /**
   * Draw one candidate with probability proportional to its weight.
   * `random` must return a number in [0, 1).
   */
  static pickWeighted<T extends WeightedCandidate>(candidates: readonly T[], random: RandomSource = Math.random): T | null {
    if (candidates.length === 0) {
      return null;
    }

    const weights = candidates.map((candidate) => SelectionWeights.weightFor(candidate.successCount, candidate.failureCount));
    const total = weights.reduce((sum, weight) => sum + weight, 0);
    const target = random() * total;

    let cumulative = 0;
    for (let i = 0; i < candidates.length; i++) {
      cumulative += weights[i] ?? 0;
      if (target < cumulative) {
        return candidates[i] ?? null;
      }
    }

    // Floating point drift can leave target at the very end of the range
    return candidates[candidates.length - 1] ?? null;
  }
}
