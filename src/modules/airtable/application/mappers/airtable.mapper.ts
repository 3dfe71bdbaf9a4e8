import type { DirectoryCandidate } from '@/modules/duplicates/domain/candidate';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A base antiga usa `Name`; a "Properties v2" usa `Property Name`. */
const NAME_FIELDS = ['Property Name', 'Name'];

function pickName(fields: Record<string, unknown>): string | null {
  for (const key of NAME_FIELDS) {
    const value = fields[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return null;
}

/** Lança quando o corpo não tem o formato `{ records: [...] }`. */
export function parseDirectoryRecords(body: unknown): DirectoryCandidate[] {
  if (!isRecord(body) || !Array.isArray(body.records)) {
    throw new Error('Resposta do Airtable sem "records"');
  }

  const candidates: DirectoryCandidate[] = [];
  for (const record of body.records) {
    if (!isRecord(record) || typeof record.id !== 'string' || !record.id) continue;

    candidates.push({
      category: 'directory',
      externalId: record.id,
      name: isRecord(record.fields) ? pickName(record.fields) : null,
    });
  }
  return candidates;
}

/**
 * Fórmula de busca por substring (case-insensitive) no nome do imóvel.
 * Aspas simples são escapadas para não quebrar a string da fórmula.
 */
export function buildPropertySearchFormula(propertyName: string): string {
  const safeName = propertyName.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
  return `SEARCH(LOWER('${safeName}'), LOWER({Property Name}))`;
}
