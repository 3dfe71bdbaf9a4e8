import { Controller, Post, Query, ValidationPipe } from '@nestjs/common';

import { CheckDuplicatesQueryDto } from '@/modules/duplicates/application/dto/check-duplicates.query';
import { DuplicateCheckService } from '@/modules/duplicates/application/services/duplicate-check.service';

@Controller('duplicates')
export class DuplicateCheckController {
  constructor(private readonly service: DuplicateCheckService) {}

  /**
   * Roda um lote da checagem de duplicidade.
   * Query params:
   * - limit (opcional): máximo de leads no lote
   * - startId (opcional): só leads com id >= startId
   * - dryRun (opcional): 'true' calcula sem gravar
   */
  @Post('check')
  async check(@Query(new ValidationPipe()) query: CheckDuplicatesQueryDto) {
    return this.service.processBatch(query.limit ? Number(query.limit) : undefined, {
      startId: query.startId ? Number(query.startId) : undefined,
      dryRun: query.dryRun === 'true',
    });
  }
}
