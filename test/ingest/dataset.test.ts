import assert from 'node:assert/strict';
import { after, before, describe, it } from 'node:test';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { DatasetLoadError } from '../../src/errors.js';
import { buildPlayerDatabase, loadDataset } from '../../src/ingest/dataset.js';
import { createRecordingLogger } from '../helpers/records.js';

describe('dataset loading', () => {
  let dir = '';

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'player-identity-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const writeDataset = async (fileName: string, contents: string) => {
    const filePath = join(dir, fileName);
    await writeFile(filePath, contents, 'utf8');
    return filePath;
  };

  it('builds a resolved database from a competitions file', async () => {
    const filePath = await writeDataset(
      'dataset.json',
      JSON.stringify({
        competitions: [
          {
            competition: { event_cd: 'C1', name: '봄 대회', start_date: '2022-04-01' },
            events: [
              {
                name: '남자 중등부 에뻬 개인전',
                weapon: '에뻬',
                final_rankings: [{ name: '김민수', team: '서울중학교', rank: 2 }],
              },
            ],
          },
          {
            competition: { event_cd: 'C2', name: '가을 대회', start_date: '2022-10-01' },
            events: [
              {
                name: '남자 중등부 에뻬 개인전',
                weapon: '에뻬',
                final_rankings: [{ name: '김민수', team: '서울중학교', rank: 1 }],
              },
            ],
          },
          'broken',
        ],
      })
    );
    const { logger, entries } = createRecordingLogger();

    const resolver = await buildPlayerDatabase(filePath, { logger });

    assert.deepEqual(resolver.stats(), { names: 1, records: 2, profiles: 1, ambiguousNames: 0 });
    assert.deepEqual(
      entries.map((entry) => entry.message),
      ['competition_payload_invalid']
    );
  });

  it('rejects files that are not JSON', async () => {
    const filePath = await writeDataset('broken.json', '{ not json');
    await assert.rejects(() => loadDataset(filePath), DatasetLoadError);
  });

  it('rejects JSON without a competitions array', async () => {
    const filePath = await writeDataset('empty.json', JSON.stringify({ events: [] }));
    await assert.rejects(() => loadDataset(filePath), (err: unknown) => {
      assert.ok(err instanceof DatasetLoadError);
      assert.equal(err.path, filePath);
      return true;
    });
  });

  it('rejects a missing file', async () => {
    await assert.rejects(() => loadDataset(join(dir, 'missing.json')), DatasetLoadError);
  });
});
