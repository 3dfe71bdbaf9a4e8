import { registerAs, type ConfigType } from '@nestjs/config';

import { intFromEnv } from '@/config/env';

export const duplicateCheckConfig = registerAs('duplicateCheck', () => ({
  batchSize: intFromEnv('DUPLICATE_CHECK_BATCH_SIZE', 100),
  // Pausa entre leads para respeitar o rate limit do HubSpot/Airtable
  leadDelayMs: intFromEnv('DUPLICATE_CHECK_DELAY_MS', 100),
  requestTimeoutMs: intFromEnv('DUPLICATE_CHECK_TIMEOUT_MS', 10_000),
  hubspot: {
    token: process.env.HUBSPOT_TOKEN ?? '',
    baseUrl: process.env.HUBSPOT_BASE_URL ?? 'https://api.hubapi.com',
  },
  airtable: {
    token: process.env.AIRTABLE_TOKEN ?? '',
    baseId: process.env.AIRTABLE_BASE ?? '',
    table: process.env.AIRTABLE_TABLE ?? 'Properties v2',
  },
}));

export type DuplicateCheckConfig = ConfigType<typeof duplicateCheckConfig>;
