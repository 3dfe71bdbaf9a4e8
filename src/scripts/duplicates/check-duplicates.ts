import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from '@/app.module';
import { DuplicateCheckService } from '@/modules/duplicates/application/services/duplicate-check.service';
import { parseArgs } from '@/scripts/duplicates/check-args';

const logger = new Logger('DuplicateCheck');

async function run() {
  const options = parseArgs(process.argv.slice(2));

  logger.log('🚀 Iniciando checagem de duplicidade (HubSpot + AlohaCamp)...');
  logger.log(
    `📋 Opções: limit=${options.limit ?? 'padrão'}, startId=${options.startId ?? '-'}, dryRun=${options.dryRun}`,
  );

  const ctx = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });

  // Ctrl+C interrompe entre um lead e outro; o que já foi gravado fica
  const controller = new AbortController();
  const stop = () => {
    logger.warn('Sinal recebido, finalizando após o lead atual...');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const service = ctx.get(DuplicateCheckService, { strict: false });

  try {
    const summary = await service.processBatch(options.limit, {
      startId: options.startId,
      dryRun: options.dryRun,
      signal: controller.signal,
    });

    logger.log('');
    logger.log('═══════════════════════════════════════════════');
    logger.log(summary.aborted ? '⏹️  CHECAGEM INTERROMPIDA' : '✅ CHECAGEM CONCLUÍDA');
    logger.log('═══════════════════════════════════════════════');
    logger.log(`📊 TOTAIS:`);
    logger.log(`   Leads processados: ${summary.attempted}`);
    logger.log(`   Leads atualizados: ${summary.updated}${summary.dryRun ? ' (dry-run)' : ''}`);
    logger.log(`   Erros: ${summary.errors}`);
    logger.log(`   Contato duplicado: ${summary.reasons.contact_duplicate}`);
    logger.log(`   Deal existente: ${summary.reasons.deal_exists}`);
    logger.log(`   Já na AlohaCamp: ${summary.reasons.alohacamp_exists}`);
    logger.log(`   Leads novos: ${summary.reasons.new_lead}`);
    logger.log('═══════════════════════════════════════════════');
  } catch (error) {
    logger.error(`❌ Erro durante checagem: ${error instanceof Error ? error.message : String(error)}`);
    throw error;
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    await ctx.close();
  }
}

run().catch((error) => {
  logger.error(`❌ Erro crítico: ${error instanceof Error ? error.stack : String(error)}`);
  process.exit(1);
});
