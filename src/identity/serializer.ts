import { currentTeam, profileTeams } from './profile.js';
import type { PlayerProfile, PodiumCounts, TeamRecord } from './types.js';

const serializeTeamRecord = (record: TeamRecord) => ({
  team: record.team,
  team_id: record.teamId,
  team_en: record.teamEn,
  first_seen: record.firstSeen,
  last_seen: record.lastSeen,
  competition_count: record.competitionCount,
});

export const toProfileResponse = (profile: PlayerProfile) => {
  const podium: Record<string, PodiumCounts> = {};
  for (const [season, counts] of profile.podiumBySeason) {
    podium[season] = { ...counts };
  }

  return {
    player_id: profile.playerId,
    name: profile.name,
    name_en: profile.nameEn,
    name_en_verified: profile.nameEnVerified,
    fie_id: profile.fieId,
    fencingtracker_id: profile.fencingtrackerId,
    current_team: currentTeam(profile),
    teams: profileTeams(profile),
    team_history: profile.teamHistory.map(serializeTeamRecord),
    weapons: [...profile.weapons],
    age_groups: [...profile.ageGroups],
    competition_count: profile.competitionIds.size,
    podium_by_season: podium,
  };
};

export type ProfileResponse = ReturnType<typeof toProfileResponse>;

export interface ResolverSnapshot {
  profiles: Record<string, ProfileResponse>;
  name_index: Record<string, string[]>;
  ambiguous_names: string[];
}

export const toResolverSnapshot = (
  profiles: ReadonlyMap<string, PlayerProfile>,
  nameToProfiles: ReadonlyMap<string, readonly string[]>
): ResolverSnapshot => {
  const serializedProfiles: Record<string, ProfileResponse> = {};
  for (const [playerId, profile] of profiles) {
    serializedProfiles[playerId] = toProfileResponse(profile);
  }

  const nameIndex: Record<string, string[]> = {};
  const ambiguousNames: string[] = [];
  for (const [name, playerIds] of nameToProfiles) {
    nameIndex[name] = [...playerIds];
    if (playerIds.length > 1) ambiguousNames.push(name);
  }

  return {
    profiles: serializedProfiles,
    name_index: nameIndex,
    ambiguous_names: ambiguousNames,
  };
};
