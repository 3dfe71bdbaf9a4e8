import { Injectable, Logger } from '@nestjs/common';

import type { DealSearchPort } from '@/modules/duplicates/application/ports/deal-search.port';
import type { DealCandidate } from '@/modules/duplicates/domain/candidate';
import { toDealCandidate } from '@/modules/hubspot/application/mappers/hubspot.mapper';
import { HubSpotCrmClient } from '@/modules/hubspot/infra/api/hubspot-crm.client';

const DEAL_PROPERTIES = ['dealname', 'dealstage', 'amount', 'closedate'];

@Injectable()
export class HubSpotDealSearchAdapter implements DealSearchPort {
  private readonly logger = new Logger(HubSpotDealSearchAdapter.name);

  constructor(private readonly crm: HubSpotCrmClient) {}

  // A cidade não entra no filtro: deals antigos raramente têm cidade preenchida.
  async findByPropertyName(propertyName: string): Promise<DealCandidate[]> {
    if (!propertyName) return [];

    try {
      const results = await this.crm.search('deals', {
        filters: [{ propertyName: 'dealname', operator: 'CONTAINS_TOKEN', value: propertyName }],
        properties: DEAL_PROPERTIES,
        limit: 20,
      });
      return results.map(toDealCandidate);
    } catch (error) {
      this.logger.warn(
        `Erro ao buscar deals no HubSpot por "${propertyName}": ${error instanceof Error ? error.message : String(error)}`,
      );
      return [];
    }
  }
}
