export type CandidateCategory = 'contact' | 'deal' | 'directory';

export interface ContactCandidate {
  category: 'contact';
  externalId: string;
  email: string | null;
  phone: string | null;
  firstName: string | null;
  lastName: string | null;
  company: string | null;
}

export interface DealCandidate {
  category: 'deal';
  externalId: string;
  name: string | null;
  stage: string | null;
  amount: string | null;
  closeDate: string | null;
}

export interface DirectoryCandidate {
  category: 'directory';
  externalId: string;
  name: string | null;
}

export type CandidateRecord = ContactCandidate | DealCandidate | DirectoryCandidate;
