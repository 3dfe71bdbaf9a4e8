import type { ContactCandidate } from '@/modules/duplicates/domain/candidate';

export const CONTACT_SEARCH = Symbol('CONTACT_SEARCH');

/**
 * Busca de contatos no CRM. Implementações nunca lançam: falha de rede,
 * timeout ou resposta inválida viram lista vazia.
 */
export interface ContactSearchPort {
  findByEmail(email: string): Promise<ContactCandidate[]>;
  findByPhone(phoneE164: string): Promise<ContactCandidate[]>;
  findByName(params: { firstName?: string; lastName?: string }): Promise<ContactCandidate[]>;
}
