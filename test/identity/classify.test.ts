import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ageLevel, classifyGender, extractAgeGroup, getTeamType } from '../../src/identity/classify.js';

describe('classifyGender', () => {
  const cases: Array<[string, ReturnType<typeof classifyGender>]> = [
    ['여자 일반부 에뻬 개인전', 'FEMALE'],
    ['남자 중등부 플러레 개인전', 'MALE'],
    ['여대 사브르 개인전', 'FEMALE'],
    ['남대 사브르 개인전', 'MALE'],
    ["Women's Epee Individual", 'FEMALE'],
    ["Men's Foil Individual", 'MALE'],
    ['Open Tournament Epee', 'UNKNOWN'],
    ['혼성 단체전', 'UNKNOWN'],
    ['에뻬 개인전', 'UNKNOWN'],
    ['', 'UNKNOWN'],
  ];

  for (const [eventName, expected] of cases) {
    it(`reads ${expected} from "${eventName}"`, () => {
      assert.equal(classifyGender(eventName), expected);
    });
  }
});

describe('extractAgeGroup', () => {
  it('prefers the under-age division pattern', () => {
    assert.equal(extractAgeGroup('남자 13세이하부 플러레'), '13세이하부');
    assert.equal(extractAgeGroup('여자 13세 이하 에뻬'), '13세이하');
  });

  it('does not read 18세이하 as 8세이하', () => {
    assert.equal(extractAgeGroup('여자 18세이하부 사브르'), '18세이하부');
  });

  it('reads division and school tokens', () => {
    assert.equal(extractAgeGroup('남자 일반부 에뻬'), '일반부');
    assert.equal(extractAgeGroup('여중 사브르 개인전'), '여중');
    assert.equal(extractAgeGroup('U11 Epee'), 'U11');
    assert.equal(extractAgeGroup('남자 시니어 에뻬'), '시니어');
  });

  it('returns an empty string without a token', () => {
    assert.equal(extractAgeGroup('에뻬 개인전'), '');
  });
});

describe('ageLevel', () => {
  it('orders divisions from elementary to general', () => {
    assert.equal(ageLevel('초등저'), 3);
    assert.equal(ageLevel('여중'), 6);
    assert.equal(ageLevel('고등부'), 7);
    assert.equal(ageLevel('여대'), 8);
    assert.equal(ageLevel('일반부'), 9);
  });

  it('maps age limits onto the same scale', () => {
    assert.equal(ageLevel('U11'), 4);
    assert.equal(ageLevel('13세이하부'), 5);
    assert.equal(ageLevel('U17'), 7);
    assert.equal(ageLevel('20세이하'), 8);
  });

  it('returns null for unknown tokens', () => {
    assert.equal(ageLevel(''), null);
    assert.equal(ageLevel('알수없음'), null);
  });
});

describe('getTeamType', () => {
  it('classifies school tiers and clubs', () => {
    assert.equal(getTeamType('서울초등학교'), 'elementary');
    assert.equal(getTeamType('서울중학교'), 'middle');
    assert.equal(getTeamType('대전중'), 'middle');
    assert.equal(getTeamType('서울고'), 'high');
    assert.equal(getTeamType('부산체고'), 'high');
    assert.equal(getTeamType('한국체육대학교'), 'university');
    assert.equal(getTeamType('최강펜싱클럽'), 'club');
    assert.equal(getTeamType(''), 'club');
  });
});
