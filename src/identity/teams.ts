import { SCHOOL_LEVEL, getTeamType } from './classify.js';
import type { AppearanceRecord, TeamType } from './types.js';

/**
 * One node of the identity graph: the records a name carries under one team.
 * `key` is the team itself, or `team#n` for the n-th duplicate entrant of the
 * same name and team inside one event listing.
 */
export interface TeamSpan {
  key: string;
  team: string;
  type: TeamType;
  level: number;
  firstDate: string | null;
  lastDate: string | null;
  weapons: Set<string>;
  records: AppearanceRecord[];
}

// Final rankings and DE seedings list each entrant exactly once per event;
// pool rounds repeat entrants, so they never mark duplicates.
const ENTRY_LIST_TYPES = new Set<AppearanceRecord['recordType']>(['ranking', 'de_seeding']);

export const assignEntryKeys = (records: AppearanceRecord[]): string[] => {
  const seen = new Map<string, number>();
  return records.map((record) => {
    if (!record.team) return '';
    if (!ENTRY_LIST_TYPES.has(record.recordType)) return record.team;

    const listingKey = JSON.stringify([record.compId, record.eventName, record.recordType, record.team]);
    const occurrence = seen.get(listingKey) ?? 0;
    seen.set(listingKey, occurrence + 1);
    return occurrence === 0 ? record.team : `${record.team}#${occurrence + 1}`;
  });
};

export const buildTeamSpans = (records: AppearanceRecord[]) => {
  const keys = assignEntryKeys(records);
  const spans: TeamSpan[] = [];
  const byKey = new Map<string, TeamSpan>();
  const teamless: AppearanceRecord[] = [];

  records.forEach((record, idx) => {
    const key = keys[idx];
    if (!key) {
      teamless.push(record);
      return;
    }

    let span = byKey.get(key);
    if (!span) {
      const type = getTeamType(record.team);
      span = {
        key,
        team: record.team,
        type,
        level: SCHOOL_LEVEL[type],
        firstDate: null,
        lastDate: null,
        weapons: new Set(),
        records: [],
      };
      byKey.set(key, span);
      spans.push(span);
    }

    span.records.push(record);
    if (record.weapon) span.weapons.add(record.weapon);
    if (record.compDate) {
      if (span.firstDate === null || record.compDate < span.firstDate) span.firstDate = record.compDate;
      if (span.lastDate === null || record.compDate > span.lastDate) span.lastDate = record.compDate;
    }
  });

  return { spans, teamless };
};
