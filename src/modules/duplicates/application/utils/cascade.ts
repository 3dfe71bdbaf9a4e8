import type { CandidateRecord } from '@/modules/duplicates/domain/candidate';
import {
  NOT_FOUND,
  type MatchResult,
  type MatchType,
} from '@/modules/duplicates/domain/match-result';

/**
 * Uma estratégia de busca dentro de uma categoria. Resolve `NOT_FOUND` quando
 * não se aplica ao lead ou não encontrou nada.
 */
export type MatchStrategy<C extends CandidateRecord, M extends MatchType = MatchType> = {
  name: M;
  run: () => Promise<MatchResult<C, M>>;
};

/** Executa as estratégias em ordem e para na primeira que encontrar. */
export async function runCascade<C extends CandidateRecord, M extends MatchType>(
  strategies: Array<MatchStrategy<C, M>>,
): Promise<MatchResult<C, M>> {
  for (const strategy of strategies) {
    const result = await strategy.run();
    if (result.found) return result;
  }
  return NOT_FOUND;
}

/**
 * Maior score estritamente maior vence; empate mantém o primeiro visto.
 * Aceita apenas se o melhor score for >= threshold.
 */
export function selectBestCandidate<C>(
  candidates: C[],
  scoreOf: (candidate: C) => number,
  threshold: number,
): { candidate: C; score: number } | null {
  let best: C | null = null;
  let bestScore = 0;

  for (const candidate of candidates) {
    const score = scoreOf(candidate);
    if (score > bestScore) {
      bestScore = score;
      best = candidate;
    }
  }

  if (best === null || bestScore < threshold) return null;
  return { candidate: best, score: bestScore };
}
