/**
 * Lead do pipeline aguardando a checagem de duplicidade.
 * Somente leitura para o motor de matching.
 */
export interface LeadRecord {
  id: number;
  email: string | null;
  phone: string | null;
  firstName: string | null;
  lastName: string | null;
  company: string | null;
  propertyName: string | null;
  locality: string | null;
  countryCode: string | null;
}
