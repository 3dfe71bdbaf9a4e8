import type { DirectoryCandidate } from '@/modules/duplicates/domain/candidate';

export const DIRECTORY_SEARCH = Symbol('DIRECTORY_SEARCH');

/** Diretório de imóveis opcional: o provider resolve `null` quando não configurado. */
export interface DirectorySearchPort {
  findByPropertyName(propertyName: string, locality?: string | null): Promise<DirectoryCandidate[]>;
}
