import { Injectable, Logger } from '@nestjs/common';

import type { ContactSearchPort } from '@/modules/duplicates/application/ports/contact-search.port';
import type { ContactCandidate } from '@/modules/duplicates/domain/candidate';
import { toContactCandidate } from '@/modules/hubspot/application/mappers/hubspot.mapper';
import {
  HubSpotCrmClient,
  type HubSpotFilter,
} from '@/modules/hubspot/infra/api/hubspot-crm.client';

const CONTACT_PROPERTIES = ['email', 'firstname', 'lastname', 'phone', 'mobilephone', 'company'];

const EXACT_LIMIT = 10;
const TOKEN_LIMIT = 20;

@Injectable()
export class HubSpotContactSearchAdapter implements ContactSearchPort {
  private readonly logger = new Logger(HubSpotContactSearchAdapter.name);

  constructor(private readonly crm: HubSpotCrmClient) {}

  findByEmail(email: string): Promise<ContactCandidate[]> {
    if (!email) return Promise.resolve([]);
    return this.search(`email ${email}`, [{ propertyName: 'email', operator: 'EQ', value: email }], EXACT_LIMIT);
  }

  findByPhone(phoneE164: string): Promise<ContactCandidate[]> {
    if (!phoneE164) return Promise.resolve([]);
    return this.search(
      `telefone ${phoneE164}`,
      [{ propertyName: 'phone', operator: 'EQ', value: phoneE164 }],
      EXACT_LIMIT,
    );
  }

  findByName({ firstName, lastName }: { firstName?: string; lastName?: string }): Promise<ContactCandidate[]> {
    const filters: HubSpotFilter[] = [];
    if (firstName) filters.push({ propertyName: 'firstname', operator: 'CONTAINS_TOKEN', value: firstName });
    if (lastName) filters.push({ propertyName: 'lastname', operator: 'CONTAINS_TOKEN', value: lastName });

    if (filters.length === 0) return Promise.resolve([]);
    return this.search(`nome ${[firstName, lastName].filter(Boolean).join(' ')}`, filters, TOKEN_LIMIT);
  }

  private async search(label: string, filters: HubSpotFilter[], limit: number): Promise<ContactCandidate[]> {
    try {
      const results = await this.crm.search('contacts', {
        filters,
        properties: CONTACT_PROPERTIES,
        limit,
      });
      return results.map(toContactCandidate);
    } catch (error) {
      this.logger.warn(
        `Erro ao buscar contatos no HubSpot por ${label}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return [];
    }
  }
}
