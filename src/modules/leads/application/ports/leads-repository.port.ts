import type { DuplicateDecision } from '@/modules/duplicates/domain/duplicate-decision';
import type { LeadRecord } from '@/modules/leads/domain/lead';

export const LEADS_REPOSITORY = Symbol('LEADS_REPOSITORY');

export interface FindPendingLeadsParams {
  limit: number;
  startId?: number;
}

export interface LeadsRepositoryPort {
  /**
   * Leads com email validado e sem checagem de duplicidade gravada,
   * ordenados por id.
   */
  findPendingDuplicateCheck(params: FindPendingLeadsParams): Promise<LeadRecord[]>;

  /** Grava o veredito e retorna quantas linhas foram afetadas. */
  saveDuplicateDecision(
    leadId: number,
    decision: DuplicateDecision,
    checkedAt: Date,
  ): Promise<number>;
}
