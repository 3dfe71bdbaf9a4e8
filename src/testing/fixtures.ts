import type {
  ContactCandidate,
  DealCandidate,
  DirectoryCandidate,
} from '@/modules/duplicates/domain/candidate';
import type { SimilarityContext, SimilarityScorer } from '@/modules/duplicates/application/utils/similarity';
import type { LeadRecord } from '@/modules/leads/domain/lead';

export function buildLead(overrides: Partial<LeadRecord> = {}): LeadRecord {
  return {
    id: 1,
    email: null,
    phone: null,
    firstName: null,
    lastName: null,
    company: null,
    propertyName: null,
    locality: null,
    countryCode: null,
    ...overrides,
  };
}

export function buildContact(overrides: Partial<ContactCandidate> = {}): ContactCandidate {
  return {
    category: 'contact',
    externalId: '100',
    email: null,
    phone: null,
    firstName: null,
    lastName: null,
    company: null,
    ...overrides,
  };
}

export function buildDeal(overrides: Partial<DealCandidate> = {}): DealCandidate {
  return {
    category: 'deal',
    externalId: '200',
    name: null,
    stage: null,
    amount: null,
    closeDate: null,
    ...overrides,
  };
}

export function buildListing(overrides: Partial<DirectoryCandidate> = {}): DirectoryCandidate {
  return { category: 'directory', externalId: 'rec300', name: null, ...overrides };
}

/**
 * Scorer com notas fixas por par `context:a|b`; pares não cadastrados valem 0.
 */
export function fixedScorer(scores: Record<string, number>): SimilarityScorer & {
  calls: Array<[string, string, SimilarityContext]>;
} {
  const calls: Array<[string, string, SimilarityContext]> = [];
  return {
    calls,
    score(a, b, context) {
      calls.push([a, b, context]);
      return scores[`${context}:${a}|${b}`] ?? 0;
    },
  };
}
