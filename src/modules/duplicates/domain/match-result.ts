import type { CandidateRecord } from '@/modules/duplicates/domain/candidate';

export type ContactMatchType = 'email' | 'phone' | 'name';
export type MatchType = ContactMatchType | 'deal' | 'directory';

export interface MatchFound<C extends CandidateRecord, M extends MatchType = MatchType> {
  found: true;
  candidate: C;
  matchType: M;
  /** Só existe para matches fuzzy (name, deal, directory). */
  score?: number;
}

export interface MatchNotFound {
  found: false;
}

export type MatchResult<C extends CandidateRecord, M extends MatchType = MatchType> =
  | MatchFound<C, M>
  | MatchNotFound;

export const NOT_FOUND: MatchNotFound = Object.freeze({ found: false });
