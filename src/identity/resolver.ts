import { populateEnglishNames, populateTeamInfo } from '../enrichment/populate.js';
import type {
  EnrichmentOptions,
  EnrichmentReport,
  InternationalNameSource,
  OrganizationResolver,
} from '../enrichment/types.js';
import { extractAppearanceRecords } from '../ingest/competition.js';
import { sortByDate } from './age.js';
import { PlayerIdGenerator, assignSpecialIds } from './ids.js';
import type { PlayerIdMemo } from './ids.js';
import { findOverlappingTeams } from './overlap.js';
import { partitionNameGroup, resolveGroupIdentities } from './pipeline.js';
import type { ResolvedIdentity } from './pipeline.js';
import { addRecord, createProfile, currentTeam } from './profile.js';
import { toResolverSnapshot } from './serializer.js';
import type { ResolverSnapshot } from './serializer.js';
import type { AppearanceRecord, NameGroup, PlayerProfile, ResolverLogger, SpecialPlayerRule } from './types.js';

export const DEFAULT_COUNTRY_CODE = 'KO';

export interface PlayerIdentityResolverOptions {
  countryCode?: string;
  specialPlayers?: readonly SpecialPlayerRule[];
  logger?: ResolverLogger;
  idMemo?: PlayerIdMemo;
  /** Retry defaults for `populateTeamInfo` and `populateEnglishNames`. */
  enrichment?: EnrichmentOptions;
}

export interface PlayerSearchOptions {
  /** Match the query against every past team, not only the current one. */
  includeHistory?: boolean;
}

export interface ResolverStats {
  names: number;
  records: number;
  profiles: number;
  ambiguousNames: number;
}

/**
 * Resolves appearance records into player identities. Records are collected
 * per literal name; `resolveIdentities()` recomputes every profile from
 * scratch. The id memo outlives a run, so a repeated run hands the same ids
 * to identities seeded from the same (name, first team).
 */
export class PlayerIdentityResolver {
  readonly countryCode: string;
  private readonly specialPlayers: readonly SpecialPlayerRule[];
  private readonly logger: ResolverLogger;
  private readonly ids: PlayerIdGenerator;
  private readonly enrichment: EnrichmentOptions;
  private readonly nameGroups = new Map<string, NameGroup>();
  private profiles = new Map<string, PlayerProfile>();
  private nameToProfiles = new Map<string, string[]>();
  private specialIdsAssigned = new Set<string>();

  constructor(options: PlayerIdentityResolverOptions = {}) {
    this.countryCode = options.countryCode ?? DEFAULT_COUNTRY_CODE;
    this.specialPlayers = options.specialPlayers ?? [];
    this.logger = options.logger ?? console;
    this.ids = new PlayerIdGenerator({ countryCode: this.countryCode, memo: options.idMemo });
    this.enrichment = options.enrichment ?? {};
  }

  /** Adds every appearance of one scraped competition; returns the number of records added. */
  addCompetitionData(competition: unknown): number {
    const records = extractAppearanceRecords(competition);
    if (!records) {
      this.logger.warn('competition_payload_invalid', { received: typeof competition });
      return 0;
    }
    return this.addRecords(records);
  }

  addRecords(records: Iterable<AppearanceRecord>): number {
    let added = 0;
    for (const record of records) {
      if (!record.name) continue;
      let group = this.nameGroups.get(record.name);
      if (!group) {
        group = { name: record.name, records: [], profiles: [] };
        this.nameGroups.set(record.name, group);
      }
      group.records.push(record);
      added += 1;
    }
    return added;
  }

  /** Rebuilds all profiles; returns the number of special ids assigned. */
  resolveIdentities(): number {
    this.profiles = new Map();
    this.nameToProfiles = new Map();
    this.specialIdsAssigned = new Set();

    for (const group of this.nameGroups.values()) {
      group.profiles = [];
      if (!group.records.length) continue;

      const records = sortByDate(group.records);
      const nameOverlaps = findOverlappingTeams(records);
      const groups = partitionNameGroup(records, {
        onAgeSplit: (split) => this.logger.info('age_regression_split', { name: group.name, ...split }),
      });
      for (const partition of groups) {
        for (const identity of resolveGroupIdentities(partition.records, nameOverlaps)) {
          this.registerProfile(group, identity);
        }
      }
    }

    return assignSpecialIds(
      {
        profiles: this.profiles,
        nameToProfiles: this.nameToProfiles,
        assigned: this.specialIdsAssigned,
      },
      this.specialPlayers,
      this.logger
    );
  }

  searchPlayers(query: string, options: PlayerSearchOptions = {}): PlayerProfile[] {
    const needle = query.trim().toLowerCase();
    if (!needle) return [];

    const results: PlayerProfile[] = [];
    const seen = new Set<string>();

    for (const [name, playerIds] of this.nameToProfiles) {
      if (!name.toLowerCase().includes(needle)) continue;
      for (const playerId of playerIds) {
        const profile = this.profiles.get(playerId);
        if (profile && !seen.has(playerId)) {
          results.push(profile);
          seen.add(playerId);
        }
      }
    }

    for (const [playerId, profile] of this.profiles) {
      if (seen.has(playerId)) continue;
      const teams = options.includeHistory
        ? profile.teamHistory.map((entry) => entry.team)
        : [currentTeam(profile)];
      if (teams.some((team) => team && team.toLowerCase().includes(needle))) {
        results.push(profile);
        seen.add(playerId);
      }
    }

    return results;
  }

  getPlayerById(playerId: string): PlayerProfile | null {
    return this.profiles.get(playerId) ?? null;
  }

  getPlayersByName(name: string): PlayerProfile[] {
    const playerIds = this.nameToProfiles.get(name) ?? [];
    return playerIds.flatMap((playerId) => {
      const profile = this.profiles.get(playerId);
      return profile ? [profile] : [];
    });
  }

  hasDisambiguation(name: string): boolean {
    return (this.nameToProfiles.get(name)?.length ?? 0) > 1;
  }

  getNameGroup(name: string): NameGroup | null {
    return this.nameGroups.get(name) ?? null;
  }

  listProfiles(): PlayerProfile[] {
    return [...this.profiles.values()];
  }

  get specialIds(): ReadonlySet<string> {
    return this.specialIdsAssigned;
  }

  stats(): ResolverStats {
    let records = 0;
    for (const group of this.nameGroups.values()) records += group.records.length;
    let ambiguousNames = 0;
    for (const playerIds of this.nameToProfiles.values()) {
      if (playerIds.length > 1) ambiguousNames += 1;
    }
    return {
      names: this.nameGroups.size,
      records,
      profiles: this.profiles.size,
      ambiguousNames,
    };
  }

  toDict(): ResolverSnapshot {
    return toResolverSnapshot(this.profiles, this.nameToProfiles);
  }

  populateTeamInfo(resolver: OrganizationResolver, options: EnrichmentOptions = {}): Promise<EnrichmentReport> {
    return populateTeamInfo(this.profiles.values(), resolver, {
      ...this.enrichment,
      ...options,
      logger: this.logger,
    });
  }

  populateEnglishNames(source: InternationalNameSource, options: EnrichmentOptions = {}): Promise<EnrichmentReport> {
    return populateEnglishNames(this.profiles.values(), source, {
      ...this.enrichment,
      ...options,
      logger: this.logger,
    });
  }

  private registerProfile(group: NameGroup, identity: ResolvedIdentity) {
    const playerId = this.ids.idFor(group.name, identity.seedTeam, (candidate) => this.profiles.has(candidate));
    const profile = createProfile(playerId, group.name);
    for (const record of sortByDate(identity.records)) {
      addRecord(profile, record);
    }

    this.profiles.set(playerId, profile);
    const playerIds = this.nameToProfiles.get(group.name);
    if (playerIds) playerIds.push(playerId);
    else this.nameToProfiles.set(group.name, [playerId]);
    group.profiles.push(profile);
  }
}
