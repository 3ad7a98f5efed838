import type { AgeLevel, Gender, TeamType } from './types.js';

const MIXED_PATTERN = /혼성|\bmixed\b/iu;
// Female markers win when an event name carries both.
const FEMALE_PATTERN = /여자|여성|여초|여중|여고|여대|여일반|\b(?:women|female|girls|ladies)\b/iu;
const MALE_PATTERN = /남자|남성|남초|남중|남고|남대|남일반|\b(?:men|male|boys)\b/iu;

export const classifyGender = (eventName: string): Gender => {
  if (!eventName) return 'UNKNOWN';
  if (MIXED_PATTERN.test(eventName)) return 'UNKNOWN';
  if (FEMALE_PATTERN.test(eventName)) return 'FEMALE';
  if (MALE_PATTERN.test(eventName)) return 'MALE';
  return 'UNKNOWN';
};

const AGE_GROUP_PATTERNS: RegExp[] = [
  /(?<!\d)(\d{1,2}세\s*이하부?)/u,
  /(초등저학년|초등고학년|초등저|초등고|초등부|중등부|고등부|대학부|일반부)/u,
  /(남초|여초|남중|여중|남고|여고|남대|여대)/u,
  /(?<![A-Za-z])(U\d{1,2})(?!\d)/u,
  /(시니어|주니어|카뎃|마스터즈|마스터|베테랑)/u,
];

export const extractAgeGroup = (eventName: string): string => {
  for (const pattern of AGE_GROUP_PATTERNS) {
    const match = pattern.exec(eventName);
    if (match) {
      return match[1].replace(/\s+/gu, '');
    }
  }
  return '';
};

const AGE_GROUP_LEVELS: Record<string, AgeLevel> = {
  초등저: 3,
  초등저학년: 3,
  초등부: 4,
  남초: 4,
  여초: 4,
  초등고: 5,
  초등고학년: 5,
  중등부: 6,
  남중: 6,
  여중: 6,
  고등부: 7,
  남고: 7,
  여고: 7,
  카뎃: 7,
  대학부: 8,
  남대: 8,
  여대: 8,
  주니어: 8,
  일반부: 9,
  시니어: 9,
  마스터: 9,
  마스터즈: 9,
  베테랑: 9,
};

const levelForAgeLimit = (limit: number): AgeLevel => {
  if (limit <= 7) return 1;
  if (limit <= 8) return 2;
  if (limit <= 10) return 3;
  if (limit <= 12) return 4;
  if (limit <= 13) return 5;
  if (limit <= 15) return 6;
  if (limit <= 18) return 7;
  if (limit <= 23) return 8;
  return 9;
};

export const ageLevel = (ageGroup: string): AgeLevel | null => {
  if (!ageGroup) return null;
  const known = AGE_GROUP_LEVELS[ageGroup];
  if (known !== undefined) return known;

  const limit = /^(?:U(\d{1,2})|(\d{1,2})세이하부?)$/u.exec(ageGroup);
  if (!limit) return null;
  return levelForAgeLimit(Number.parseInt(limit[1] ?? limit[2], 10));
};

export const getTeamType = (team: string): TeamType => {
  if (!team) return 'club';
  if (/초등학교|초교/u.test(team)) return 'elementary';
  if (/중학교|중$/u.test(team)) return 'middle';
  if (/고등학교|고$|체고/u.test(team)) return 'high';
  if (/대학교|대학$|대$/u.test(team)) return 'university';
  return 'club';
};

// Clubs run on their own track and never progress into schools.
export const SCHOOL_LEVEL: Record<TeamType, number> = {
  elementary: 1,
  middle: 2,
  high: 3,
  university: 4,
  club: 0,
};

export const isSchool = (type: TeamType) => type !== 'club';
