import type { DealCandidate } from '@/modules/duplicates/domain/candidate';

export const DEAL_SEARCH = Symbol('DEAL_SEARCH');

export interface DealSearchPort {
  findByPropertyName(propertyName: string, locality?: string | null): Promise<DealCandidate[]>;
}
