import type {
  ContactCandidate,
  DealCandidate,
  DirectoryCandidate,
} from '@/modules/duplicates/domain/candidate';
import type { ContactMatchType, MatchResult } from '@/modules/duplicates/domain/match-result';

export type DecisionReason = 'contact_duplicate' | 'deal_exists' | 'alohacamp_exists' | 'new_lead';

export interface ContactLinkage {
  id: string;
  email: string;
  phone: string;
  name: string;
  matchType: ContactMatchType;
}

export interface DealLinkage {
  id: string;
  name: string;
  score: number;
}

export type DirectoryLinkage =
  | { exists: true; id: string; name: string; score: number }
  | { exists: false };

interface DecisionLinkages {
  contact: ContactLinkage | null;
  deal: DealLinkage | null;
  directory: DirectoryLinkage;
}

type DecisionVerdict =
  | { status: 'duplicate'; reason: 'contact_duplicate'; followUp: true }
  | { status: 'duplicate'; reason: 'deal_exists' | 'alohacamp_exists'; followUp: false }
  | { status: 'unique'; reason: 'new_lead'; followUp: true };

/**
 * Veredito final de um lead. `followUp` indica se ainda é preciso criar um
 * deal no HubSpot: um contato duplicado continua precisando de deal.
 */
export type DuplicateDecision = DecisionVerdict & DecisionLinkages;

export interface CategoryMatches {
  contact: MatchResult<ContactCandidate, ContactMatchType>;
  deal: MatchResult<DealCandidate>;
  directory: MatchResult<DirectoryCandidate>;
}

function verdictFor(matches: CategoryMatches): DecisionVerdict {
  if (matches.contact.found) {
    return { status: 'duplicate', reason: 'contact_duplicate', followUp: true };
  }
  if (matches.deal.found) {
    return { status: 'duplicate', reason: 'deal_exists', followUp: false };
  }
  if (matches.directory.found) {
    return { status: 'duplicate', reason: 'alohacamp_exists', followUp: false };
  }
  return { status: 'unique', reason: 'new_lead', followUp: true };
}

function contactLinkage(match: CategoryMatches['contact']): ContactLinkage | null {
  if (!match.found) return null;

  const c = match.candidate;
  return {
    id: c.externalId,
    email: c.email ?? '',
    phone: c.phone ?? '',
    name: `${c.firstName ?? ''} ${c.lastName ?? ''}`.trim(),
    matchType: match.matchType,
  };
}

function dealLinkage(match: CategoryMatches['deal']): DealLinkage | null {
  if (!match.found) return null;

  return {
    id: match.candidate.externalId,
    name: match.candidate.name ?? '',
    score: match.score ?? 0,
  };
}

function directoryLinkage(match: CategoryMatches['directory']): DirectoryLinkage {
  if (!match.found) return { exists: false };

  return {
    exists: true,
    id: match.candidate.externalId,
    name: match.candidate.name ?? '',
    score: match.score ?? 0,
  };
}

/**
 * Combina os três resultados (contact > deal > directory). Só a primeira
 * categoria encontrada define `reason`, mas todas as encontradas são reportadas.
 */
export function decideDuplicate(matches: CategoryMatches): DuplicateDecision {
  return {
    ...verdictFor(matches),
    contact: contactLinkage(matches.contact),
    deal: dealLinkage(matches.deal),
    directory: directoryLinkage(matches.directory),
  };
}
