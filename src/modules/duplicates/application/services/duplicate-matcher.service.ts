import { Inject, Injectable, Logger, Optional } from '@nestjs/common';

import type {
  ContactCandidate,
  DealCandidate,
  DirectoryCandidate,
} from '@/modules/duplicates/domain/candidate';
import type { CategoryMatches } from '@/modules/duplicates/domain/duplicate-decision';
import {
  NOT_FOUND,
  type ContactMatchType,
  type MatchResult,
} from '@/modules/duplicates/domain/match-result';
import {
  CONTACT_SEARCH,
  type ContactSearchPort,
} from '@/modules/duplicates/application/ports/contact-search.port';
import { DEAL_SEARCH, type DealSearchPort } from '@/modules/duplicates/application/ports/deal-search.port';
import {
  DIRECTORY_SEARCH,
  type DirectorySearchPort,
} from '@/modules/duplicates/application/ports/directory-search.port';
import {
  runCascade,
  selectBestCandidate,
  type MatchStrategy,
} from '@/modules/duplicates/application/utils/cascade';
import { hasText, normalizePhone } from '@/modules/duplicates/application/utils/normalize';
import {
  NAME_MATCH_THRESHOLD,
  PROPERTY_MATCH_THRESHOLD,
  SIMILARITY_SCORER,
  type SimilarityScorer,
} from '@/modules/duplicates/application/utils/similarity';
import type { LeadRecord } from '@/modules/leads/domain/lead';

type ContactStrategy = MatchStrategy<ContactCandidate, ContactMatchType>;

@Injectable()
export class DuplicateMatcherService {
  private readonly logger = new Logger(DuplicateMatcherService.name);

  constructor(
    @Inject(CONTACT_SEARCH) private readonly contacts: ContactSearchPort,
    @Inject(DEAL_SEARCH) private readonly deals: DealSearchPort,
    @Optional() @Inject(DIRECTORY_SEARCH) private readonly directory: DirectorySearchPort | null,
    @Inject(SIMILARITY_SCORER) private readonly scorer: SimilarityScorer,
  ) {}

  /**
   * As três categorias não dependem uma da outra, então rodam em paralelo.
   * Dentro de cada categoria as estratégias são sequenciais.
   */
  async matchLead(lead: LeadRecord): Promise<CategoryMatches> {
    const [contact, deal, directory] = await Promise.all([
      this.matchContact(lead),
      this.matchDeal(lead),
      this.matchDirectory(lead),
    ]);
    return { contact, deal, directory };
  }

  matchContact(lead: LeadRecord): Promise<MatchResult<ContactCandidate, ContactMatchType>> {
    return runCascade(this.contactStrategies(lead));
  }

  contactStrategies(lead: LeadRecord): ContactStrategy[] {
    return [
      { name: 'email', run: () => this.contactByEmail(lead) },
      { name: 'phone', run: () => this.contactByPhone(lead) },
      { name: 'name', run: () => this.contactByName(lead) },
    ];
  }

  async matchDeal(lead: LeadRecord): Promise<MatchResult<DealCandidate>> {
    if (!hasText(lead.propertyName)) return NOT_FOUND;

    const deals = await this.deals.findByPropertyName(lead.propertyName, lead.locality);
    const best = this.bestByPropertyName(lead.propertyName, deals);
    if (!best) return NOT_FOUND;

    this.logger.debug(`Lead ${lead.id}: deal ${best.candidate.externalId} (score ${best.score})`);
    return { found: true, candidate: best.candidate, matchType: 'deal', score: best.score };
  }

  async matchDirectory(lead: LeadRecord): Promise<MatchResult<DirectoryCandidate>> {
    if (!this.directory || !hasText(lead.propertyName)) return NOT_FOUND;

    const records = await this.directory.findByPropertyName(lead.propertyName, lead.locality);
    const best = this.bestByPropertyName(lead.propertyName, records);
    if (!best) return NOT_FOUND;

    this.logger.debug(
      `Lead ${lead.id}: imóvel ${best.candidate.externalId} no diretório (score ${best.score})`,
    );
    return { found: true, candidate: best.candidate, matchType: 'directory', score: best.score };
  }

  private async contactByEmail(
    lead: LeadRecord,
  ): Promise<MatchResult<ContactCandidate, ContactMatchType>> {
    if (!hasText(lead.email)) return NOT_FOUND;

    const [first] = await this.contacts.findByEmail(lead.email.trim());
    return first ? { found: true, candidate: first, matchType: 'email' } : NOT_FOUND;
  }

  private async contactByPhone(
    lead: LeadRecord,
  ): Promise<MatchResult<ContactCandidate, ContactMatchType>> {
    const phone = normalizePhone(lead.phone, lead.countryCode);
    if (!phone) return NOT_FOUND;

    const [first] = await this.contacts.findByPhone(phone);
    return first ? { found: true, candidate: first, matchType: 'phone' } : NOT_FOUND;
  }

  private async contactByName(
    lead: LeadRecord,
  ): Promise<MatchResult<ContactCandidate, ContactMatchType>> {
    const firstName = hasText(lead.firstName) ? lead.firstName.trim() : '';
    const lastName = hasText(lead.lastName) ? lead.lastName.trim() : '';
    if (!firstName && !lastName) return NOT_FOUND;

    const candidates = await this.contacts.findByName({
      ...(firstName ? { firstName } : {}),
      ...(lastName ? { lastName } : {}),
    });

    for (const candidate of candidates) {
      const firstScore =
        firstName && candidate.firstName
          ? this.scorer.score(firstName, candidate.firstName, 'name')
          : 0;
      const lastScore =
        lastName && candidate.lastName ? this.scorer.score(lastName, candidate.lastName, 'name') : 0;

      // Basta um dos dois nomes passar do threshold
      if (firstScore >= NAME_MATCH_THRESHOLD || lastScore >= NAME_MATCH_THRESHOLD) {
        return {
          found: true,
          candidate,
          matchType: 'name',
          score: Math.max(firstScore, lastScore),
        };
      }
    }

    return NOT_FOUND;
  }

  private bestByPropertyName<C extends DealCandidate | DirectoryCandidate>(
    propertyName: string,
    candidates: C[],
  ): { candidate: C; score: number } | null {
    return selectBestCandidate(
      candidates,
      (candidate) =>
        candidate.name ? this.scorer.score(propertyName, candidate.name, 'property') : 0,
      PROPERTY_MATCH_THRESHOLD,
    );
  }
}
