import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { extractAppearanceRecords } from '../../src/ingest/competition.js';
import { createTestResolver } from '../helpers/records.js';

const competitionPayload = () => ({
  competition: { event_cd: 'COMP-1', name: '테스트 대회', start_date: '2024-03-02' },
  events: [
    {
      name: '남자 중등부 에뻬 개인전',
      weapon: '에뻬',
      pool_rounds: [
        {
          results: [
            { name: ' 김민수 ', team: '서울중학교' },
            { name: '-', team: '엑스중학교' },
            { name: '', team: '와이중학교' },
          ],
        },
      ],
      final_rankings: [{ name: '김민수', team: '서울중학교', rank: 1 }, 'garbage'],
      de_bracket: { seeding: [{ name: '이서준', team: null }] },
    },
    'not-an-event',
    { name: '여자 일반부 사브르 개인전', weapon: '사브르' },
  ],
});

describe('extractAppearanceRecords', () => {
  it('flattens pools, rankings and seedings', () => {
    const records = extractAppearanceRecords(competitionPayload());
    assert.ok(records);

    assert.deepEqual(
      records.map((record) => [record.name, record.team, record.recordType]),
      [
        ['김민수', '서울중학교', 'pool'],
        ['김민수', '서울중학교', 'ranking'],
        ['이서준', '', 'de_seeding'],
      ]
    );
    assert.deepEqual(records[1], {
      name: '김민수',
      team: '서울중학교',
      compId: 'COMP-1',
      compName: '테스트 대회',
      compDate: '2024-03-02',
      eventName: '남자 중등부 에뻬 개인전',
      weapon: '에뻬',
      ageGroup: '중등부',
      recordType: 'ranking',
      payload: { name: '김민수', team: '서울중학교', rank: 1 },
    });
  });

  it('reads numeric competition ids as strings', () => {
    const records = extractAppearanceRecords({
      competition: { event_cd: 1234, name: '대회', start_date: '2024-01-01' },
      events: [{ name: '남자 에뻬', weapon: '에뻬', final_rankings: [{ name: '김민수', team: 'A' }] }],
    });
    assert.equal(records?.[0].compId, '1234');
  });

  it('accepts an empty object and rejects non-objects', () => {
    assert.deepEqual(extractAppearanceRecords({}), []);
    assert.equal(extractAppearanceRecords(null), null);
    assert.equal(extractAppearanceRecords('competition'), null);
  });
});

describe('PlayerIdentityResolver.addCompetitionData', () => {
  it('groups the flattened records by name', () => {
    const resolver = createTestResolver();

    assert.equal(resolver.addCompetitionData(competitionPayload()), 3);
    resolver.resolveIdentities();

    assert.deepEqual(resolver.stats(), { names: 2, records: 3, profiles: 2, ambiguousNames: 0 });
    const [kim] = resolver.getPlayersByName('김민수');
    assert.equal(kim.podiumBySeason.get('2024')?.gold, 1);
  });
});
