import { classifyGender } from './classify.js';
import type { AppearanceRecord, Gender } from './types.js';

const collectTeams = (records: AppearanceRecord[] | undefined) => {
  const teams = new Set<string>();
  for (const record of records ?? []) {
    if (record.team) teams.add(record.team);
  }
  return teams;
};

/**
 * Splits one name's records by the gender read from their event names.
 * Only non-empty buckets are returned, in MALE, FEMALE, UNKNOWN order.
 *
 * An unknown record moves into a known bucket only when its team occurs in
 * that bucket and not in the other one.
 */
export const partitionByGender = (records: AppearanceRecord[]): Map<Gender, AppearanceRecord[]> => {
  const buckets: Record<Gender, AppearanceRecord[]> = { MALE: [], FEMALE: [], UNKNOWN: [] };
  for (const record of records) {
    buckets[classifyGender(record.eventName)].push(record);
  }

  if (buckets.UNKNOWN.length && (buckets.MALE.length || buckets.FEMALE.length)) {
    const maleTeams = collectTeams(buckets.MALE);
    const femaleTeams = collectTeams(buckets.FEMALE);
    const unresolved: AppearanceRecord[] = [];

    for (const record of buckets.UNKNOWN) {
      const inMale = record.team !== '' && maleTeams.has(record.team);
      const inFemale = record.team !== '' && femaleTeams.has(record.team);
      if (inMale && !inFemale) buckets.MALE.push(record);
      else if (inFemale && !inMale) buckets.FEMALE.push(record);
      else unresolved.push(record);
    }
    buckets.UNKNOWN = unresolved;
  }

  const result = new Map<Gender, AppearanceRecord[]>();
  for (const gender of ['MALE', 'FEMALE', 'UNKNOWN'] as const) {
    if (buckets[gender].length) result.set(gender, buckets[gender]);
  }
  return result;
};
