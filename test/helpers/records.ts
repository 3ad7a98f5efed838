import { extractAgeGroup } from '../../src/identity/classify.js';
import { PlayerIdentityResolver } from '../../src/identity/resolver.js';
import type { PlayerIdentityResolverOptions } from '../../src/identity/resolver.js';
import type { AppearanceRecord, ResolverLogger } from '../../src/identity/types.js';

export const buildRecord = (overrides: Partial<AppearanceRecord> = {}): AppearanceRecord => {
  const eventName = overrides.eventName ?? '남자 일반부 에뻬 개인전';
  return {
    name: '홍길동',
    team: '테스트펜싱클럽',
    compId: 'C001',
    compName: '테스트 대회',
    compDate: '2023-05-01',
    eventName,
    weapon: '에뻬',
    ageGroup: extractAgeGroup(eventName),
    recordType: 'ranking',
    payload: {},
    ...overrides,
  };
};

export const createRecordingLogger = () => {
  const entries: Array<{ level: 'info' | 'warn'; message: string; context?: Record<string, unknown> }> = [];
  const logger: ResolverLogger = {
    info: (message, context) => entries.push({ level: 'info', message, context }),
    warn: (message, context) => entries.push({ level: 'warn', message, context }),
  };
  return { logger, entries };
};

export const createTestResolver = (options: PlayerIdentityResolverOptions = {}) =>
  new PlayerIdentityResolver({ logger: createRecordingLogger().logger, ...options });
