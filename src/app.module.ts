import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { SupabaseModule } from '@/infra/supabase/supabase.module';
import { DuplicatesModule } from '@/modules/duplicates/duplicates.module';
import { LeadsModule } from '@/modules/leads/leads.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), SupabaseModule, LeadsModule, DuplicatesModule],
  controllers: [],
  providers: [],
})
export class AppModule {}
