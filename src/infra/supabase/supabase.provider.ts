import type { Provider } from '@nestjs/common';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import { requiredEnv } from '@/config/env';

export const SUPABASE = 'SUPABASE_CLIENT';

export function createSupabaseClient(): SupabaseClient {
  return createClient(requiredEnv('SUPABASE_URL'), requiredEnv('SUPABASE_SERVICE_ROLE_KEY'), {
    auth: {
      persistSession: false, // Job de backend, sem sessão de usuário
    },
  });
}

export const supabaseProvider: Provider = {
  provide: SUPABASE,
  useFactory: createSupabaseClient,
};
