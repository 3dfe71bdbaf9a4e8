import { Module } from '@nestjs/common';

import { SUPABASE, supabaseProvider } from '@/infra/supabase/supabase.provider';

@Module({
  providers: [supabaseProvider],
  exports: [SUPABASE],
})
export class SupabaseModule {}
