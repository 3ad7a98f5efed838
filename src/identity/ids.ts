import type { PlayerProfile, ResolverLogger, SpecialPlayerRule } from './types.js';

/** name -> first team -> ids minted for that pair, oldest first */
export type PlayerIdMemo = Map<string, Map<string, string[]>>;

export interface PlayerIdGeneratorOptions {
  countryCode: string;
  memo?: PlayerIdMemo;
}

/**
 * Mints `{country}P{00000}` ids in sequence.
 *
 * The memo makes `idFor(name, firstTeam)` idempotent for one generator: the
 * same pair gets its earliest id back that no live profile holds, and a new
 * number is minted only when all of them are taken (two homonyms seeded from
 * the same team). A new generator starts over, so ids are stable within a
 * resolver, never across resolvers.
 */
export class PlayerIdGenerator {
  private counter = 0;
  private readonly countryCode: string;
  private readonly memo: PlayerIdMemo;

  constructor(options: PlayerIdGeneratorOptions) {
    this.countryCode = options.countryCode;
    this.memo = options.memo ?? new Map();
  }

  idFor(name: string, firstTeam: string, isTaken: (playerId: string) => boolean = () => false): string {
    let byTeam = this.memo.get(name);
    if (!byTeam) {
      byTeam = new Map();
      this.memo.set(name, byTeam);
    }

    let minted = byTeam.get(firstTeam);
    if (!minted) {
      minted = [];
      byTeam.set(firstTeam, minted);
    }

    const free = minted.find((playerId) => !isTaken(playerId));
    if (free) return free;

    const playerId = this.mint();
    minted.push(playerId);
    return playerId;
  }

  mint(): string {
    this.counter += 1;
    return `${this.countryCode}P${String(this.counter).padStart(5, '0')}`;
  }
}

export interface SpecialIdState {
  profiles: Map<string, PlayerProfile>;
  nameToProfiles: Map<string, string[]>;
  assigned: Set<string>;
}

/**
 * Re-keys reference players onto their fixed ids. For each rule the first
 * profile of that name whose team history meets one of the rule's teams takes
 * the id; at most one profile per rule per run.
 */
export const assignSpecialIds = (
  state: SpecialIdState,
  rules: readonly SpecialPlayerRule[],
  logger?: ResolverLogger
): number => {
  let assigned = 0;

  for (const rule of rules) {
    if (state.assigned.has(rule.playerId)) continue;

    const playerIds = state.nameToProfiles.get(rule.name);
    if (!playerIds) continue;

    for (const [position, oldId] of playerIds.entries()) {
      const profile = state.profiles.get(oldId);
      if (!profile) continue;
      if (!profile.teamHistory.some((entry) => rule.teams.includes(entry.team))) continue;

      const holder = state.profiles.get(rule.playerId);
      if (holder && holder !== profile) {
        logger?.warn('special_id_in_use', { playerId: rule.playerId, name: rule.name, holder: holder.name });
        break;
      }

      state.profiles.delete(oldId);
      profile.playerId = rule.playerId;
      state.profiles.set(rule.playerId, profile);
      playerIds[position] = rule.playerId;

      state.assigned.add(rule.playerId);
      assigned += 1;
      break;
    }
  }

  return assigned;
};
