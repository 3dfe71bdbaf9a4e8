import { Module } from '@nestjs/common';

import { SupabaseModule } from '@/infra/supabase/supabase.module';
import { LEADS_REPOSITORY } from '@/modules/leads/application/ports/leads-repository.port';
import { SupabaseLeadsRepository } from '@/modules/leads/infra/repositories/supabase-leads.repository';

@Module({
  imports: [SupabaseModule],
  providers: [
    {
      provide: LEADS_REPOSITORY,
      useClass: SupabaseLeadsRepository,
    },
  ],
  exports: [LEADS_REPOSITORY],
})
export class LeadsModule {}
