import { getCountries, parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js/max';

const SUPPORTED_COUNTRIES = new Set<string>(getCountries());

function isCountryCode(value: string): value is CountryCode {
  return SUPPORTED_COUNTRIES.has(value);
}

/**
 * Texto comparável: minúsculo, sem acentos, só `[a-z0-9 ]` e espaços simples.
 * Idempotente.
 */
export function normalizeText(raw: unknown): string {
  if (typeof raw !== 'string') return '';

  return raw
    .trim()
    .toLowerCase()
    .normalize('NFKD')
    .replace(/\p{M}/gu, '') // remove marcas combinantes (acentos)
    .replace(/[^a-z0-9\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Converte um telefone para E.164. Retorna `undefined` quando o número não é
 * possível ou não é válido para a região; nunca lança.
 */
export function normalizePhone(raw: unknown, countryHint?: string | null): string | undefined {
  if (typeof raw !== 'string' || !raw.trim()) return undefined;

  const hint = countryHint?.trim().toUpperCase() ?? '';
  const defaultCountry = isCountryCode(hint) ? hint : undefined;

  try {
    const parsed = parsePhoneNumberFromString(raw.trim(), defaultCountry);
    if (parsed && parsed.isPossible() && parsed.isValid()) {
      return parsed.number;
    }
  } catch {
    return undefined;
  }

  return undefined;
}

/**
 * Campo preenchido. Importações de planilha gravam `nan` para célula vazia.
 */
export function hasText(raw: unknown): raw is string {
  if (typeof raw !== 'string') return false;
  const value = raw.trim();
  return value.length > 0 && value.toLowerCase() !== 'nan';
}
