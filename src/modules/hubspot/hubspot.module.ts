import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';

import {
  duplicateCheckConfig,
  type DuplicateCheckConfig,
} from '@/config/duplicate-check.config';
import { CONTACT_SEARCH } from '@/modules/duplicates/application/ports/contact-search.port';
import { DEAL_SEARCH } from '@/modules/duplicates/application/ports/deal-search.port';
import { HubSpotContactSearchAdapter } from '@/modules/hubspot/infra/adapters/hubspot-contact-search.adapter';
import { HubSpotDealSearchAdapter } from '@/modules/hubspot/infra/adapters/hubspot-deal-search.adapter';
import { HubSpotCrmClient } from '@/modules/hubspot/infra/api/hubspot-crm.client';

@Module({
  imports: [
    HttpModule.registerAsync({
      imports: [ConfigModule.forFeature(duplicateCheckConfig)],
      inject: [duplicateCheckConfig.KEY],
      useFactory: (config: DuplicateCheckConfig) => {
        if (!config.hubspot.token) {
          throw new Error('HUBSPOT_TOKEN não configurado no .env');
        }
        return {
          baseURL: config.hubspot.baseUrl,
          headers: {
            Authorization: `Bearer ${config.hubspot.token}`,
            'Content-Type': 'application/json',
          },
          timeout: config.requestTimeoutMs,
        };
      },
    }),
  ],
  providers: [
    HubSpotCrmClient,
    HubSpotContactSearchAdapter,
    HubSpotDealSearchAdapter,
    { provide: CONTACT_SEARCH, useExisting: HubSpotContactSearchAdapter },
    { provide: DEAL_SEARCH, useExisting: HubSpotDealSearchAdapter },
  ],
  exports: [CONTACT_SEARCH, DEAL_SEARCH],
})
export class HubSpotModule {}
