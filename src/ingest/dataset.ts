import { readFile } from 'node:fs/promises';

import { DatasetLoadError } from '../errors.js';
import { PlayerIdentityResolver } from '../identity/resolver.js';
import type { PlayerIdentityResolverOptions } from '../identity/resolver.js';
import { DatasetSchema } from './schemas.js';

export const loadDataset = async (filePath: string): Promise<unknown[]> => {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (err) {
    throw new DatasetLoadError(
      `Unable to read dataset: ${err instanceof Error ? err.message : String(err)}`,
      filePath
    );
  }

  const parsed = DatasetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DatasetLoadError('Dataset must be an object with a competitions array', filePath, parsed.error.issues);
  }
  return parsed.data.competitions;
};

/** Loads a `{ competitions: [...] }` file and resolves every player in it. */
export const buildPlayerDatabase = async (
  filePath: string,
  options: PlayerIdentityResolverOptions = {}
): Promise<PlayerIdentityResolver> => {
  const competitions = await loadDataset(filePath);
  const resolver = new PlayerIdentityResolver(options);
  for (const competition of competitions) {
    resolver.addCompetitionData(competition);
  }
  resolver.resolveIdentities();
  return resolver;
};
