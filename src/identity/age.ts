import { ageLevel } from './classify.js';
import type { AppearanceRecord } from './types.js';

// A one-level drop (re-entering a younger division once) is tolerated as noise.
export const AGE_REGRESSION_THRESHOLD = 2;

export const sortByDate = (records: AppearanceRecord[]) =>
  [...records].sort((a, b) => (a.compDate < b.compDate ? -1 : a.compDate > b.compDate ? 1 : 0));

/**
 * Returns the competition date whose lowest age level falls at least two
 * steps below the lowest level of the preceding tagged date, or null when the
 * sequence is plausible for one person. Records are compared date by date, so
 * the result does not depend on their order within a date, and a split always
 * leaves both sides non-empty.
 */
export const findAgeRegression = (records: AppearanceRecord[]): string | null => {
  const lowestByDate = new Map<string, number>();
  for (const record of sortByDate(records)) {
    if (!record.compDate) continue;
    const level = ageLevel(record.ageGroup);
    if (level === null) continue;
    const lowest = lowestByDate.get(record.compDate);
    if (lowest === undefined || level < lowest) lowestByDate.set(record.compDate, level);
  }

  let previous: number | null = null;
  for (const [date, lowest] of lowestByDate) {
    if (previous !== null && previous - lowest >= AGE_REGRESSION_THRESHOLD) return date;
    previous = lowest;
  }
  return null;
};

export const splitAtDate = (records: AppearanceRecord[], splitDate: string) => {
  const before: AppearanceRecord[] = [];
  const after: AppearanceRecord[] = [];
  for (const record of records) {
    if (record.compDate < splitDate) before.push(record);
    else after.push(record);
  }
  return { before, after };
};
