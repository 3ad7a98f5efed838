export type RecordType = 'pool' | 'ranking' | 'de_seeding';
export type Gender = 'MALE' | 'FEMALE' | 'UNKNOWN';
export type TeamType = 'elementary' | 'middle' | 'high' | 'university' | 'club';
export type AgeLevel = number;

export interface AppearanceRecord {
  readonly name: string;
  readonly team: string;
  readonly compId: string;
  readonly compName: string;
  readonly compDate: string;
  readonly eventName: string;
  readonly weapon: string;
  readonly ageGroup: string;
  readonly recordType: RecordType;
  readonly payload: Readonly<Record<string, unknown>>;
}

export interface TeamRecord {
  team: string;
  teamId: string | null;
  teamEn: string | null;
  firstSeen: string;
  lastSeen: string;
  competitionCount: number;
}

export interface PodiumCounts {
  gold: number;
  silver: number;
  bronze: number;
  top8: number;
  total: number;
}

export interface PlayerProfile {
  playerId: string;
  name: string;
  nameEn: string | null;
  nameEnVerified: boolean;
  fieId: string | null;
  fencingtrackerId: string | null;
  teamHistory: TeamRecord[];
  competitionIds: Set<string>;
  weapons: Set<string>;
  ageGroups: Set<string>;
  podiumBySeason: Map<string, PodiumCounts>;
  records: AppearanceRecord[];
}

export interface NameGroup {
  name: string;
  records: AppearanceRecord[];
  profiles: PlayerProfile[];
}

export interface SpecialPlayerRule {
  name: string;
  teams: string[];
  playerId: string;
}

export interface ResolverLogger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
}
