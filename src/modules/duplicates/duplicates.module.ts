import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { duplicateCheckConfig } from '@/config/duplicate-check.config';
import { AirtableModule } from '@/modules/airtable/airtable.module';
import { DuplicateCheckService } from '@/modules/duplicates/application/services/duplicate-check.service';
import { DuplicateMatcherService } from '@/modules/duplicates/application/services/duplicate-matcher.service';
import {
  SIMILARITY_SCORER,
  fuzzyScorer,
} from '@/modules/duplicates/application/utils/similarity';
import { DuplicateCheckController } from '@/modules/duplicates/interface/http/duplicate-check.controller';
import { HubSpotModule } from '@/modules/hubspot/hubspot.module';
import { LeadsModule } from '@/modules/leads/leads.module';

@Module({
  imports: [ConfigModule.forFeature(duplicateCheckConfig), LeadsModule, HubSpotModule, AirtableModule],
  providers: [
    DuplicateMatcherService,
    DuplicateCheckService,
    { provide: SIMILARITY_SCORER, useValue: fuzzyScorer },
  ],
  controllers: [DuplicateCheckController],
  exports: [DuplicateCheckService],
})
export class DuplicatesModule {}
