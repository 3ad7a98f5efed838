import { ConstrainedUnionFind } from './union-find.js';
import type { AppearanceRecord } from './types.js';

export const weaponKey = (weapons: Iterable<string>) => [...new Set(weapons)].sort().join('+');

const intersects = (a: ReadonlySet<string>, b: ReadonlySet<string>) => {
  for (const value of a) {
    if (b.has(value)) return true;
  }
  return false;
};

/**
 * Groups records into components of teams that share at least one weapon.
 * Teams with disjoint weapon sets are different people and land in separate
 * partitions.
 *
 * Records without a team follow the component that owns their weapon (weapon
 * sets of different components are disjoint). With a single component
 * everything stays undivided.
 */
export const partitionByWeapon = (records: AppearanceRecord[]): Map<string, AppearanceRecord[]> => {
  const teams: string[] = [];
  const teamIndex = new Map<string, number>();
  const teamWeapons: Array<Set<string>> = [];

  for (const record of records) {
    if (!record.team) continue;
    let idx = teamIndex.get(record.team);
    if (idx === undefined) {
      idx = teams.length;
      teams.push(record.team);
      teamIndex.set(record.team, idx);
      teamWeapons.push(new Set());
    }
    if (record.weapon) teamWeapons[idx].add(record.weapon);
  }

  const uf = new ConstrainedUnionFind(teams.length);
  for (let i = 0; i < teams.length; i += 1) {
    for (let j = i + 1; j < teams.length; j += 1) {
      if (intersects(teamWeapons[i], teamWeapons[j])) uf.union(i, j);
    }
  }

  const components = uf.components();
  if (components.length <= 1) {
    const allWeapons = records.map((record) => record.weapon).filter(Boolean);
    return records.length ? new Map([[weaponKey(allWeapons), records]]) : new Map();
  }

  const componentKeys = components.map((members) => {
    const weapons = members.flatMap((idx) => [...teamWeapons[idx]]);
    // Weaponless teams cannot be placed by weapon, so each keeps its own slot.
    return weapons.length ? weaponKey(weapons) : `~${teams[members[0]]}`;
  });
  const componentOfTeam = new Map<string, number>();
  const componentOfWeapon = new Map<string, number>();
  components.forEach((members, componentIdx) => {
    for (const idx of members) {
      componentOfTeam.set(teams[idx], componentIdx);
      for (const weapon of teamWeapons[idx]) componentOfWeapon.set(weapon, componentIdx);
    }
  });

  const partitions = new Map<string, AppearanceRecord[]>();
  const push = (key: string, record: AppearanceRecord) => {
    const bucket = partitions.get(key);
    if (bucket) bucket.push(record);
    else partitions.set(key, [record]);
  };

  for (const record of records) {
    const componentIdx = record.team
      ? componentOfTeam.get(record.team)
      : componentOfWeapon.get(record.weapon);
    push(componentIdx === undefined ? '' : componentKeys[componentIdx], record);
  }
  return partitions;
};
