import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  duplicateCheckConfig,
  type DuplicateCheckConfig,
} from '@/config/duplicate-check.config';
import { DuplicateMatcherService } from '@/modules/duplicates/application/services/duplicate-matcher.service';
import {
  decideDuplicate,
  type DecisionReason,
  type DuplicateDecision,
} from '@/modules/duplicates/domain/duplicate-decision';
import {
  LEADS_REPOSITORY,
  type LeadsRepositoryPort,
} from '@/modules/leads/application/ports/leads-repository.port';
import type { LeadRecord } from '@/modules/leads/domain/lead';

export interface ProcessBatchOptions {
  startId?: number;
  dryRun?: boolean;
  /** Checado antes de cada lead; leads já gravados permanecem gravados. */
  signal?: AbortSignal;
}

export interface BatchSummary {
  attempted: number;
  updated: number;
  errors: number;
  dryRun: boolean;
  aborted: boolean;
  reasons: Record<DecisionReason, number>;
}

@Injectable()
export class DuplicateCheckService {
  private readonly logger = new Logger(DuplicateCheckService.name);

  constructor(
    @Inject(LEADS_REPOSITORY) private readonly leadsRepo: LeadsRepositoryPort,
    private readonly matcher: DuplicateMatcherService,
    @Inject(duplicateCheckConfig.KEY) private readonly config: DuplicateCheckConfig,
  ) {}

  async processBatch(
    limit = this.config.batchSize,
    { startId, dryRun = false, signal }: ProcessBatchOptions = {},
  ): Promise<BatchSummary> {
    this.logger.log(
      `Iniciando checagem de duplicidade (limit=${limit}, startId=${startId ?? '-'}, dryRun=${dryRun})`,
    );

    let leads: LeadRecord[];
    try {
      leads = await this.leadsRepo.findPendingDuplicateCheck({ limit, startId });
    } catch (error) {
      this.logger.error(
        `Falha ao buscar leads pendentes: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }

    const summary: BatchSummary = {
      attempted: 0,
      updated: 0,
      errors: 0,
      dryRun,
      aborted: false,
      reasons: { contact_duplicate: 0, deal_exists: 0, alohacamp_exists: 0, new_lead: 0 },
    };

    if (leads.length === 0) {
      this.logger.log('Nenhum lead pendente de checagem.');
      return summary;
    }

    this.logger.log(`${leads.length} leads para checar`);

    for (const [index, lead] of leads.entries()) {
      if (signal?.aborted) {
        summary.aborted = true;
        this.logger.warn(
          `Checagem interrompida após ${summary.attempted}/${leads.length} leads; o restante fica para a próxima execução.`,
        );
        break;
      }

      summary.attempted += 1;

      try {
        const decision = await this.checkLead(lead);
        summary.reasons[decision.reason] += 1;

        if (dryRun) {
          this.logger.log(`[dry-run] Lead ${lead.id}: ${decision.status} (${decision.reason})`);
        } else {
          const affected = await this.leadsRepo.saveDuplicateDecision(lead.id, decision, new Date());
          if (affected > 0) {
            summary.updated += 1;
            this.logger.log(`Lead ${lead.id} atualizado: ${decision.status} (${decision.reason})`);
          } else {
            this.logger.warn(`Lead ${lead.id} não foi encontrado ao gravar o resultado`);
          }
        }
      } catch (error) {
        summary.errors += 1;
        this.logger.error(
          `Erro ao processar lead ${lead.id}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }

      // Pequeno delay entre leads para evitar rate limiting
      if (index < leads.length - 1 && this.config.leadDelayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.config.leadDelayMs));
      }
    }

    this.logger.log(
      `Checagem finalizada: ${summary.updated}/${summary.attempted} atualizados, ${summary.errors} erros` +
        ` (contact_duplicate=${summary.reasons.contact_duplicate}, deal_exists=${summary.reasons.deal_exists},` +
        ` alohacamp_exists=${summary.reasons.alohacamp_exists}, new_lead=${summary.reasons.new_lead})`,
    );

    return summary;
  }

  async checkLead(lead: LeadRecord): Promise<DuplicateDecision> {
    this.logger.debug(`Checando lead ${lead.id}: ${lead.email ?? ''}`);

    const matches = await this.matcher.matchLead(lead);
    return decideDuplicate(matches);
  }
}
