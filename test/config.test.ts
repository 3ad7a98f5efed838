import assert from 'node:assert/strict';
import { after, before, describe, it } from 'node:test';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import { loadConfig, loadSpecialPlayers } from '../src/config.js';
import { ConfigError, SpecialPlayerConfigError } from '../src/errors.js';
import type { OrganizationResolver } from '../src/enrichment/types.js';
import { createResolver } from '../src/index.js';
import { buildRecord, createRecordingLogger } from './helpers/records.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    assert.deepEqual(loadConfig({}), {
      countryCode: 'KO',
      specialPlayersPath: resolve('config/special-players.json'),
      enrichment: { retries: 1, retryDelayMs: 200 },
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PLAYER_ID_COUNTRY: 'JP',
      SPECIAL_PLAYERS_PATH: '/tmp/special.json',
      ENRICHMENT_RETRIES: '3',
      ENRICHMENT_RETRY_DELAY_MS: '0',
    });

    assert.equal(config.countryCode, 'JP');
    assert.equal(config.specialPlayersPath, '/tmp/special.json');
    assert.deepEqual(config.enrichment, { retries: 3, retryDelayMs: 0 });
  });

  it('rejects malformed values', () => {
    assert.throws(() => loadConfig({ PLAYER_ID_COUNTRY: 'jp' }), ConfigError);
    assert.throws(() => loadConfig({ ENRICHMENT_RETRIES: 'many' }), ConfigError);
  });
});

describe('loadSpecialPlayers', () => {
  let dir = '';

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'special-players-'));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const writeTable = (fileName: string, contents: unknown) => {
    const filePath = join(dir, fileName);
    writeFileSync(filePath, typeof contents === 'string' ? contents : JSON.stringify(contents), 'utf8');
    return filePath;
  };

  it('maps table entries onto rules', () => {
    const filePath = writeTable('table.json', [{ name: '홍길동', teams: ['테스트펜싱클럽'], id: 'KOP00000' }]);

    assert.deepEqual(loadSpecialPlayers(filePath), [
      { name: '홍길동', teams: ['테스트펜싱클럽'], playerId: 'KOP00000' },
    ]);
  });

  it('loads the bundled table', () => {
    assert.equal(loadSpecialPlayers(resolve('config/special-players.json')).length, 1);
  });

  it('treats a missing table as empty', () => {
    assert.deepEqual(loadSpecialPlayers(join(dir, 'missing.json')), []);
  });

  it('rejects invalid tables', () => {
    const badJson = writeTable('bad.json', '[{');
    const badId = writeTable('bad-id.json', [{ name: '홍길동', teams: ['A'], id: 'P1' }]);
    const duplicate = writeTable('duplicate.json', [
      { name: '홍길동', teams: ['A'], id: 'KOP00000' },
      { name: '김철수', teams: ['B'], id: 'KOP00000' },
    ]);

    assert.throws(() => loadSpecialPlayers(badJson), SpecialPlayerConfigError);
    assert.throws(() => loadSpecialPlayers(badId), SpecialPlayerConfigError);
    assert.throws(() => loadSpecialPlayers(duplicate), /assigned twice/);
  });
});

describe('createResolver', () => {
  it('builds a resolver from config', () => {
    const resolver = createResolver(
      loadConfig({ PLAYER_ID_COUNTRY: 'JP', SPECIAL_PLAYERS_PATH: resolve('config/special-players.json') }),
      { logger: { info: () => {}, warn: () => {} } }
    );

    assert.equal(resolver.countryCode, 'JP');
    assert.deepEqual(resolver.stats(), { names: 0, records: 0, profiles: 0, ambiguousNames: 0 });
  });

  it('applies the configured retry count to enrichment', async () => {
    let attempts = 0;
    const flaky: OrganizationResolver = {
      getOrCreateOrganization: () => {
        attempts += 1;
        if (attempts < 3) throw new Error('lookup offline');
        return { orgId: 'ORG-1', nameEn: null };
      },
    };
    const build = (retries: string) => {
      const resolver = createResolver(
        loadConfig({
          ENRICHMENT_RETRIES: retries,
          ENRICHMENT_RETRY_DELAY_MS: '0',
          SPECIAL_PLAYERS_PATH: resolve('config/special-players.json'),
        }),
        { logger: createRecordingLogger().logger }
      );
      resolver.addRecords([buildRecord()]);
      resolver.resolveIdentities();
      return resolver;
    };

    const withoutRetries = await build('0').populateTeamInfo(flaky);
    assert.equal(withoutRetries.failed, 1);
    assert.equal(attempts, 1);

    attempts = 0;
    const withRetries = await build('2').populateTeamInfo(flaky);
    assert.equal(withRetries.updated, 1);
    assert.equal(attempts, 3);
  });
});
