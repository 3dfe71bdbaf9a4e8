import { Logger, Module } from '@nestjs/common';
import { HttpModule, HttpService } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';

import {
  duplicateCheckConfig,
  type DuplicateCheckConfig,
} from '@/config/duplicate-check.config';
import {
  DIRECTORY_SEARCH,
  type DirectorySearchPort,
} from '@/modules/duplicates/application/ports/directory-search.port';
import { AirtableDirectoryAdapter } from '@/modules/airtable/infra/adapters/airtable-directory.adapter';

const logger = new Logger('AirtableModule');

export function isAirtableConfigured(config: DuplicateCheckConfig): boolean {
  return Boolean(config.airtable.token && config.airtable.baseId);
}

/** `null` desliga a checagem no diretório (ver `@Optional()` no matcher). */
export function createDirectorySearch(
  http: HttpService,
  config: DuplicateCheckConfig,
): DirectorySearchPort | null {
  if (!isAirtableConfigured(config)) {
    logger.log('AIRTABLE_TOKEN/AIRTABLE_BASE ausentes: checagem no diretório desativada');
    return null;
  }
  return new AirtableDirectoryAdapter(http, {
    baseId: config.airtable.baseId,
    table: config.airtable.table,
  });
}

@Module({
  imports: [
    ConfigModule.forFeature(duplicateCheckConfig),
    HttpModule.registerAsync({
      imports: [ConfigModule.forFeature(duplicateCheckConfig)],
      inject: [duplicateCheckConfig.KEY],
      useFactory: (config: DuplicateCheckConfig) => ({
        baseURL: 'https://api.airtable.com/v0',
        headers: config.airtable.token ? { Authorization: `Bearer ${config.airtable.token}` } : {},
        timeout: config.requestTimeoutMs,
      }),
    }),
  ],
  providers: [
    {
      provide: DIRECTORY_SEARCH,
      inject: [HttpService, duplicateCheckConfig.KEY],
      useFactory: createDirectorySearch,
    },
  ],
  exports: [DIRECTORY_SEARCH],
})
export class AirtableModule {}
