import { loadConfig, loadSpecialPlayers } from './config.js';
import type { ResolverConfig } from './config.js';
import { PlayerIdentityResolver } from './identity/resolver.js';
import type { ResolverLogger } from './identity/types.js';

export * from './errors.js';
export * from './config.js';
export * from './identity/types.js';
export * from './identity/classify.js';
export { partitionByGender } from './identity/gender.js';
export { findAgeRegression, splitAtDate, sortByDate } from './identity/age.js';
export { partitionByWeapon, weaponKey } from './identity/weapons.js';
export { findOverlappingTeams, findPseudoOverlaps, shouldSeparateByTeamPattern, teamPairKey, hasTeamPair } from './identity/overlap.js';
export type { TeamPairSet } from './identity/overlap.js';
export { buildTeamSpans } from './identity/teams.js';
export type { TeamSpan } from './identity/teams.js';
export { mergeTeams, couldBeSamePerson } from './identity/merger.js';
export { ConstrainedUnionFind } from './identity/union-find.js';
export { partitionNameGroup, resolveGroupIdentities } from './identity/pipeline.js';
export type { IdentityGroup, ResolvedIdentity } from './identity/pipeline.js';
export { addRecord, addTeam, createProfile, currentTeam, profileTeams } from './identity/profile.js';
export { PlayerIdGenerator, assignSpecialIds } from './identity/ids.js';
export type { PlayerIdMemo } from './identity/ids.js';
export { toProfileResponse, toResolverSnapshot } from './identity/serializer.js';
export type { ProfileResponse, ResolverSnapshot } from './identity/serializer.js';
export { PlayerIdentityResolver, DEFAULT_COUNTRY_CODE } from './identity/resolver.js';
export type { PlayerIdentityResolverOptions, PlayerSearchOptions, ResolverStats } from './identity/resolver.js';
export { extractAppearanceRecords, flattenCompetition, parseCompetitionPayload } from './ingest/competition.js';
export { buildPlayerDatabase, loadDataset } from './ingest/dataset.js';
export { populateEnglishNames, populateTeamInfo, withRetry } from './enrichment/populate.js';
export type {
  EnglishNameCandidate,
  EnglishNameSource,
  EnrichmentOptions,
  EnrichmentReport,
  InternationalNameSource,
  OrganizationLookup,
  OrganizationResolver,
} from './enrichment/types.js';

export const createResolver = (
  config: ResolverConfig = loadConfig(),
  options: { logger?: ResolverLogger } = {}
): PlayerIdentityResolver =>
  new PlayerIdentityResolver({
    countryCode: config.countryCode,
    specialPlayers: loadSpecialPlayers(config.specialPlayersPath),
    logger: options.logger,
    enrichment: config.enrichment,
  });
