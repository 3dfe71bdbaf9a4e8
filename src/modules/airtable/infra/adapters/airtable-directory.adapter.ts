import { Logger } from '@nestjs/common';
import type { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';

import type { DirectorySearchPort } from '@/modules/duplicates/application/ports/directory-search.port';
import type { DirectoryCandidate } from '@/modules/duplicates/domain/candidate';
import {
  buildPropertySearchFormula,
  parseDirectoryRecords,
} from '@/modules/airtable/application/mappers/airtable.mapper';

export interface AirtableDirectoryOptions {
  baseId: string;
  table: string;
  maxRecords?: number;
}

/**
 * Diretório de imóveis da AlohaCamp no Airtable. A checagem é opcional:
 * qualquer falha vira "nenhum candidato". Só a primeira falha é logada como
 * warning, as seguintes vão para debug.
 */
export class AirtableDirectoryAdapter implements DirectorySearchPort {
  private readonly logger = new Logger(AirtableDirectoryAdapter.name);
  private failureReported = false;

  constructor(
    private readonly http: HttpService,
    private readonly options: AirtableDirectoryOptions,
  ) {}

  async findByPropertyName(propertyName: string): Promise<DirectoryCandidate[]> {
    if (!propertyName) return [];

    try {
      const { data } = await firstValueFrom(
        this.http.get<unknown>(`/${this.options.baseId}/${encodeURIComponent(this.options.table)}`, {
          params: {
            filterByFormula: buildPropertySearchFormula(propertyName),
            maxRecords: this.options.maxRecords ?? 20,
          },
        }),
      );
      return parseDirectoryRecords(data);
    } catch (error) {
      this.reportFailure(error);
      return [];
    }
  }

  private reportFailure(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);

    if (this.failureReported) {
      this.logger.debug(`Busca no Airtable falhou novamente: ${message}`);
      return;
    }

    this.failureReported = true;
    this.logger.warn(`Checagem no Airtable indisponível, seguindo sem ela: ${message}`);
  }
}
