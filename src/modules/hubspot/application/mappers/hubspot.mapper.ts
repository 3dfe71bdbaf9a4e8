import type { ContactCandidate, DealCandidate } from '@/modules/duplicates/domain/candidate';

/**
 * Objeto do CRM v3: `{ id, properties: { ... } }`. Propriedades ausentes
 * ou não-string viram `null` aqui, uma única vez.
 */
export interface HubSpotObject {
  id: string;
  properties: Record<string, string | null>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toHubSpotObject(item: unknown): HubSpotObject | null {
  if (!isRecord(item)) return null;

  const id = typeof item.id === 'string' || typeof item.id === 'number' ? String(item.id) : '';
  if (!id) return null;

  const properties: Record<string, string | null> = {};
  if (isRecord(item.properties)) {
    for (const [key, value] of Object.entries(item.properties)) {
      properties[key] = typeof value === 'string' ? value : null;
    }
  }

  return { id, properties };
}

/** Lança quando o corpo não tem o formato `{ results: [...] }`. */
export function parseSearchResults(body: unknown): HubSpotObject[] {
  if (!isRecord(body) || !Array.isArray(body.results)) {
    throw new Error('Resposta de busca do HubSpot sem "results"');
  }

  return body.results
    .map(toHubSpotObject)
    .filter((obj): obj is HubSpotObject => obj !== null);
}

function pick(obj: HubSpotObject, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = obj.properties[key]?.trim();
    if (value) return value;
  }
  return null;
}

export function toContactCandidate(obj: HubSpotObject): ContactCandidate {
  return {
    category: 'contact',
    externalId: obj.id,
    email: pick(obj, 'email'),
    phone: pick(obj, 'phone', 'mobilephone'),
    firstName: pick(obj, 'firstname'),
    lastName: pick(obj, 'lastname'),
    company: pick(obj, 'company'),
  };
}

export function toDealCandidate(obj: HubSpotObject): DealCandidate {
  return {
    category: 'deal',
    externalId: obj.id,
    name: pick(obj, 'dealname'),
    stage: pick(obj, 'dealstage'),
    amount: pick(obj, 'amount'),
    closeDate: pick(obj, 'closedate'),
  };
}
