import { isSchool } from './classify.js';
import { hasTeamPair } from './overlap.js';
import type { TeamPairSet } from './overlap.js';
import type { TeamSpan } from './teams.js';
import { ConstrainedUnionFind } from './union-find.js';

const MS_PER_DAY = 86_400_000;
const SCHOOL_GAP_YEARS = 1;
const CLUB_GAP_YEARS = 2;
const CLUB_TRANSITION_DAYS = 365;

const parseYear = (date: string) => {
  const year = Number.parseInt(date.slice(0, 4), 10);
  return Number.isNaN(year) ? 0 : year;
};

const toDay = (date: string) => Date.parse(date.slice(0, 10));

const sharesWeapon = (a: TeamSpan, b: TeamSpan) => {
  for (const weapon of a.weapons) {
    if (b.weapons.has(weapon)) return true;
  }
  return false;
};

interface DatedSpan {
  firstDate: string;
  lastDate: string;
}

const dated = (span: TeamSpan): DatedSpan | null =>
  span.firstDate && span.lastDate ? { firstDate: span.firstDate, lastDate: span.lastDate } : null;

// Years between the end of the earlier range and the start of the later one,
// or null when the ranges overlap.
const sequentialGap = (earlier: DatedSpan, later: DatedSpan) =>
  earlier.lastDate <= later.firstDate ? parseYear(later.firstDate) - parseYear(earlier.lastDate) : null;

const schoolTransition = (a: TeamSpan, rangeA: DatedSpan, b: TeamSpan, rangeB: DatedSpan) => {
  const levelDiff = b.level - a.level;
  if (Math.abs(levelDiff) > 1) return false;

  if (levelDiff > 0) {
    const gap = sequentialGap(rangeA, rangeB);
    return gap !== null && gap <= SCHOOL_GAP_YEARS;
  }
  if (levelDiff < 0) {
    const gap = sequentialGap(rangeB, rangeA);
    return gap !== null && gap <= SCHOOL_GAP_YEARS;
  }

  const gap = sequentialGap(rangeA, rangeB) ?? sequentialGap(rangeB, rangeA);
  return gap !== null && gap <= SCHOOL_GAP_YEARS;
};

const clubTransition = (a: TeamSpan, rangeA: DatedSpan, b: TeamSpan, rangeB: DatedSpan) => {
  const gap = sequentialGap(rangeA, rangeB) ?? sequentialGap(rangeB, rangeA);
  if (gap !== null) return gap <= CLUB_GAP_YEARS;

  // Overlapping club ranges: a short hand-over period in the same weapon.
  if (!sharesWeapon(a, b)) return false;
  const start = Math.max(toDay(rangeA.firstDate), toDay(rangeB.firstDate));
  const end = Math.min(toDay(rangeA.lastDate), toDay(rangeB.lastDate));
  if (Number.isNaN(start) || Number.isNaN(end)) return false;
  return (end - start) / MS_PER_DAY <= CLUB_TRANSITION_DAYS;
};

/**
 * Whether two teams could belong to one person, judged by team type, the
 * time between their active ranges and the weapons fenced under each.
 */
export const couldBeSamePerson = (a: TeamSpan, b: TeamSpan): boolean => {
  if (a.weapons.size && b.weapons.size && !sharesWeapon(a, b)) return false;

  const rangeA = dated(a);
  const rangeB = dated(b);
  if (!rangeA || !rangeB) return false;

  const schoolA = isSchool(a.type);
  const schoolB = isSchool(b.type);
  if (schoolA && schoolB) return schoolTransition(a, rangeA, b, rangeB);
  if (schoolA !== schoolB) return false;
  return clubTransition(a, rangeA, b, rangeB);
};

const byFirstDate = (a: TeamSpan, b: TeamSpan) => {
  const left = a.firstDate ?? '9999';
  const right = b.firstDate ?? '9999';
  return left < right ? -1 : left > right ? 1 : 0;
};

/**
 * Partitions team spans into identities. Pairs are visited earliest team
 * first; a plausible pair is merged only if no member of one component is in
 * `forbidden` with any member of the other.
 */
export const mergeTeams = (spans: TeamSpan[], forbidden: TeamPairSet): TeamSpan[][] => {
  const ordered = [...spans].sort(byFirstDate);
  const uf = new ConstrainedUnionFind(ordered.length, (x, y) =>
    hasTeamPair(forbidden, ordered[x].key, ordered[y].key)
  );

  for (let i = 0; i < ordered.length; i += 1) {
    for (let j = i + 1; j < ordered.length; j += 1) {
      if (uf.connected(i, j)) continue;
      if (!uf.canUnion(i, j)) continue;
      if (!couldBeSamePerson(ordered[i], ordered[j])) continue;
      uf.union(i, j);
    }
  }

  return uf.components().map((members) => members.map((idx) => ordered[idx]));
};
