import { Inject, Injectable } from '@nestjs/common';
import type { SupabaseClient } from '@supabase/supabase-js';

import { SUPABASE } from '@/infra/supabase/supabase.provider';
import type { DuplicateDecision } from '@/modules/duplicates/domain/duplicate-decision';
import type {
  FindPendingLeadsParams,
  LeadsRepositoryPort,
} from '@/modules/leads/application/ports/leads-repository.port';
import type { LeadRecord } from '@/modules/leads/domain/lead';

export const LEADS_TABLE = 'contacts_grid_view';

const LEAD_COLUMNS =
  'id, email, phone, first_name, last_name, company, property_name, address_city_from_lead, country';

type LeadRow = {
  id: number;
  email: string | null;
  phone: string | null;
  first_name: string | null;
  last_name: string | null;
  company: string | null;
  property_name: string | null;
  address_city_from_lead: string | null;
  country: string | null;
};

export type DuplicateCheckColumns = {
  hubspot_duplicate_check_2: DuplicateDecision['status'];
  hubspot_checked_at_2: string;
  hubspot_check_2_completed: true;
  needs_hubspot_deal: boolean;
  deal_creation_reason: DuplicateDecision['reason'];
  alohacamp_exists_2: boolean;
  hubspot_contact_id_2?: string;
  hubspot_contact_email_2?: string;
  hubspot_contact_phone_2?: string;
  hubspot_contact_name_2?: string;
  hubspot_contact_match_type_2?: string;
  hubspot_deal_id_2?: string;
  hubspot_deal_name_2?: string;
  hubspot_deal_score_2?: number;
  alohacamp_match_id_2?: string;
  alohacamp_match_name_2?: string;
  alohacamp_score_2?: number;
};

/**
 * Colunas gravadas em `contacts_grid_view`. Os vínculos só entram quando a
 * categoria encontrou algo; `alohacamp_exists_2` é sempre explícito.
 */
export function toDuplicateCheckColumns(
  decision: DuplicateDecision,
  checkedAt: Date,
): DuplicateCheckColumns {
  const columns: DuplicateCheckColumns = {
    hubspot_duplicate_check_2: decision.status,
    hubspot_checked_at_2: checkedAt.toISOString(),
    hubspot_check_2_completed: true,
    needs_hubspot_deal: decision.followUp,
    deal_creation_reason: decision.reason,
    alohacamp_exists_2: decision.directory.exists,
  };

  if (decision.contact) {
    columns.hubspot_contact_id_2 = decision.contact.id;
    columns.hubspot_contact_email_2 = decision.contact.email;
    columns.hubspot_contact_phone_2 = decision.contact.phone;
    columns.hubspot_contact_name_2 = decision.contact.name;
    columns.hubspot_contact_match_type_2 = decision.contact.matchType;
  }

  if (decision.deal) {
    columns.hubspot_deal_id_2 = decision.deal.id;
    columns.hubspot_deal_name_2 = decision.deal.name;
    columns.hubspot_deal_score_2 = decision.deal.score;
  }

  if (decision.directory.exists) {
    columns.alohacamp_match_id_2 = decision.directory.id;
    columns.alohacamp_match_name_2 = decision.directory.name;
    columns.alohacamp_score_2 = decision.directory.score;
  }

  return columns;
}

@Injectable()
export class SupabaseLeadsRepository implements LeadsRepositoryPort {
  constructor(@Inject(SUPABASE) private readonly supabase: SupabaseClient) {}

  async findPendingDuplicateCheck({ limit, startId }: FindPendingLeadsParams): Promise<LeadRecord[]> {
    if (limit <= 0) return [];

    let query = this.supabase
      .from(LEADS_TABLE)
      .select(LEAD_COLUMNS)
      .eq('zerobounce_status', 'valid')
      .is('hubspot_duplicate_check_2', null)
      .not('email', 'is', null)
      .neq('email', '');

    if (startId !== undefined) {
      query = query.gte('id', startId);
    }

    const { data, error } = await query.order('id', { ascending: true }).limit(limit);

    if (error) throw error;
    return (data ?? []).map(this.mapLead);
  }

  async saveDuplicateDecision(
    leadId: number,
    decision: DuplicateDecision,
    checkedAt: Date,
  ): Promise<number> {
    const { data, error } = await this.supabase
      .from(LEADS_TABLE)
      .update(toDuplicateCheckColumns(decision, checkedAt))
      .eq('id', leadId)
      .select('id');

    if (error) throw error;
    return data?.length ?? 0;
  }

  private mapLead(row: LeadRow): LeadRecord {
    return {
      id: row.id,
      email: row.email,
      phone: row.phone,
      firstName: row.first_name,
      lastName: row.last_name,
      company: row.company,
      propertyName: row.property_name,
      locality: row.address_city_from_lead,
      countryCode: row.country,
    };
  }
}
