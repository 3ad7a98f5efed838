import { isSchool } from './classify.js';
import { assignEntryKeys } from './teams.js';
import type { TeamSpan } from './teams.js';
import type { AppearanceRecord } from './types.js';

export type TeamPairSet = Set<string>;

export const teamPairKey = (a: string, b: string) => JSON.stringify(a < b ? [a, b] : [b, a]);

export const hasTeamPair = (pairs: TeamPairSet, a: string, b: string) => pairs.has(teamPairKey(a, b));

/**
 * Team pairs that entered the same competition under one name. One person
 * cannot register twice in a competition, so every pair is two people.
 */
export const findOverlappingTeams = (records: AppearanceRecord[]): TeamPairSet => {
  const keys = assignEntryKeys(records);
  const teamsByCompetition = new Map<string, Set<string>>();

  records.forEach((record, idx) => {
    const key = keys[idx];
    if (!key) return;
    const teams = teamsByCompetition.get(record.compId);
    if (teams) teams.add(key);
    else teamsByCompetition.set(record.compId, new Set([key]));
  });

  const overlapping: TeamPairSet = new Set();
  for (const teams of teamsByCompetition.values()) {
    if (teams.size < 2) continue;
    const list = [...teams];
    for (let i = 0; i < list.length; i += 1) {
      for (let j = i + 1; j < list.length; j += 1) {
        overlapping.add(teamPairKey(list[i], list[j]));
      }
    }
  }
  return overlapping;
};

const rangesOverlap = (a: TeamSpan, b: TeamSpan) => {
  if (!a.firstDate || !a.lastDate || !b.firstDate || !b.lastDate) return false;
  return !(a.lastDate <= b.firstDate || b.lastDate <= a.firstDate);
};

/**
 * Two schools of the same tier active over the same period under one name.
 * Heuristic: a single mistimed record can fake the overlap.
 */
export const shouldSeparateByTeamPattern = (a: TeamSpan, b: TeamSpan) =>
  isSchool(a.type) && a.type === b.type && a.team !== b.team && rangesOverlap(a, b);

export const findPseudoOverlaps = (spans: TeamSpan[]): TeamPairSet => {
  const pairs: TeamPairSet = new Set();
  for (let i = 0; i < spans.length; i += 1) {
    for (let j = i + 1; j < spans.length; j += 1) {
      if (shouldSeparateByTeamPattern(spans[i], spans[j])) {
        pairs.add(teamPairKey(spans[i].key, spans[j].key));
      }
    }
  }
  return pairs;
};
