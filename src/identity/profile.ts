import type { AppearanceRecord, PlayerProfile, PodiumCounts, TeamRecord } from './types.js';

export const createProfile = (playerId: string, name: string): PlayerProfile => ({
  playerId,
  name,
  nameEn: null,
  nameEnVerified: false,
  fieId: null,
  fencingtrackerId: null,
  teamHistory: [],
  competitionIds: new Set(),
  weapons: new Set(),
  ageGroups: new Set(),
  podiumBySeason: new Map(),
  records: [],
});

const byFirstSeen = (a: TeamRecord, b: TeamRecord) =>
  a.firstSeen < b.firstSeen ? -1 : a.firstSeen > b.firstSeen ? 1 : 0;

/** Adds a team affiliation or widens the dates of an existing one. */
export const addTeam = (profile: PlayerProfile, team: string, date: string) => {
  if (!team) return;

  const existing = profile.teamHistory.find((entry) => entry.team === team);
  if (existing) {
    existing.competitionCount += 1;
    if (date) {
      if (!existing.firstSeen || date < existing.firstSeen) existing.firstSeen = date;
      if (!existing.lastSeen || date > existing.lastSeen) existing.lastSeen = date;
    }
  } else {
    profile.teamHistory.push({
      team,
      teamId: null,
      teamEn: null,
      firstSeen: date,
      lastSeen: date,
      competitionCount: 1,
    });
  }
  profile.teamHistory.sort(byFirstSeen);
};

/** The most recently seen team; ties go to the later entry in the history. */
export const currentTeam = (profile: PlayerProfile): string => {
  let latest: TeamRecord | null = null;
  for (const entry of profile.teamHistory) {
    if (!latest || entry.lastSeen >= latest.lastSeen) latest = entry;
  }
  return latest?.team ?? '';
};

export const profileTeams = (profile: PlayerProfile) => profile.teamHistory.map((entry) => entry.team);

export const readRank = (payload: Readonly<Record<string, unknown>>): number | null => {
  const raw = payload.rank;
  const rank = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number.parseInt(raw, 10) : Number.NaN;
  return Number.isInteger(rank) && rank > 0 ? rank : null;
};

const emptyPodium = (): PodiumCounts => ({ gold: 0, silver: 0, bronze: 0, top8: 0, total: 0 });

const recordPodium = (profile: PlayerProfile, record: AppearanceRecord) => {
  if (record.recordType !== 'ranking') return;
  const rank = readRank(record.payload);
  if (rank === null) return;

  const season = record.compDate ? record.compDate.slice(0, 4) : 'Unknown';
  let counts = profile.podiumBySeason.get(season);
  if (!counts) {
    counts = emptyPodium();
    profile.podiumBySeason.set(season, counts);
  }

  if (rank === 1) counts.gold += 1;
  else if (rank === 2) counts.silver += 1;
  else if (rank === 3) counts.bronze += 1;
  else if (rank <= 8) counts.top8 += 1;
  counts.total += 1;
};

export const addRecord = (profile: PlayerProfile, record: AppearanceRecord) => {
  addTeam(profile, record.team, record.compDate);
  profile.competitionIds.add(record.compId);
  profile.records.push(record);
  if (record.weapon) profile.weapons.add(record.weapon);
  if (record.ageGroup) profile.ageGroups.add(record.ageGroup);
  recordPodium(profile, record);
};
