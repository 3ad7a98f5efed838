import type { EnrichmentError } from '../errors.js';

export interface OrganizationLookup {
  orgId: string;
  nameEn: string | null;
}

/** Assigns organization ids and English names to literal team strings. */
export interface OrganizationResolver {
  getOrCreateOrganization(teamName: string): OrganizationLookup | Promise<OrganizationLookup>;
  updateOrganizationStats?(teamName: string, firstSeen: string, playerId: string): void | Promise<void>;
}

export type EnglishNameSource = 'verified' | 'generated';

export interface EnglishNameCandidate {
  fullName: string;
  source: EnglishNameSource;
  externalId?: string | null;
  externalSource?: 'fie' | 'fencingtracker' | null;
}

/** Looks up the international (romanized or verified) form of a name. */
export interface InternationalNameSource {
  getEnglishName(name: string): EnglishNameCandidate | null | Promise<EnglishNameCandidate | null>;
}

export interface EnrichmentOptions {
  /** Extra attempts after the first failure. */
  retries?: number;
  retryDelayMs?: number;
}

export interface EnrichmentReport {
  updated: number;
  failed: number;
  errors: EnrichmentError[];
}
