import { partial_token_sort_ratio, ratio, token_set_ratio } from 'fuzzball';

import { normalizeText } from '@/modules/duplicates/application/utils/normalize';

/**
 * `name` compara primeiro/último nome com o ratio simples; `property` compara
 * nomes de imóvel ignorando ordem das palavras e termos extras.
 */
export type SimilarityContext = 'name' | 'property';

export const NAME_MATCH_THRESHOLD = 80;
export const PROPERTY_MATCH_THRESHOLD = 70;

/** Score inteiro em [0, 100] entre dois textos já normalizados. */
export function similarity(a: string, b: string, context: SimilarityContext = 'name'): number {
  if (!a || !b) return 0;

  // ordem canônica: o score não depende de qual lado é o lead
  const [x, y] = a <= b ? [a, b] : [b, a];

  if (context === 'name') {
    return ratio(x, y);
  }

  return Math.max(token_set_ratio(x, y), partial_token_sort_ratio(x, y));
}

export const SIMILARITY_SCORER = Symbol('SIMILARITY_SCORER');

export interface SimilarityScorer {
  /** Recebe textos crus; a normalização é responsabilidade do scorer. */
  score(a: string, b: string, context: SimilarityContext): number;
}

export const fuzzyScorer: SimilarityScorer = {
  score: (a, b, context) => similarity(normalizeText(a), normalizeText(b), context),
};
