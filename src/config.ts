import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

import { ConfigError, SpecialPlayerConfigError } from './errors.js';
import type { SpecialPlayerRule } from './identity/types.js';
import { SpecialPlayersFileSchema } from './ingest/schemas.js';

const EnvSchema = z.object({
  PLAYER_ID_COUNTRY: z.string().regex(/^[A-Z]{2}$/u, 'must be a two-letter upper-case country code').default('KO'),
  SPECIAL_PLAYERS_PATH: z.string().min(1).default('config/special-players.json'),
  ENRICHMENT_RETRIES: z.coerce.number().int().min(0).max(10).default(1),
  ENRICHMENT_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(200),
});

export interface ResolverConfig {
  countryCode: string;
  specialPlayersPath: string;
  enrichment: {
    retries: number;
    retryDelayMs: number;
  };
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ResolverConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('Invalid resolver configuration', parsed.error.flatten().fieldErrors);
  }

  return {
    countryCode: parsed.data.PLAYER_ID_COUNTRY,
    specialPlayersPath: resolve(parsed.data.SPECIAL_PLAYERS_PATH),
    enrichment: {
      retries: parsed.data.ENRICHMENT_RETRIES,
      retryDelayMs: parsed.data.ENRICHMENT_RETRY_DELAY_MS,
    },
  };
};

/** Reads the reference-player table; a missing file means no special ids. */
export const loadSpecialPlayers = (filePath: string): SpecialPlayerRule[] => {
  if (!existsSync(filePath)) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new SpecialPlayerConfigError(
      `Special player table is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      filePath
    );
  }

  const parsed = SpecialPlayersFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SpecialPlayerConfigError('Special player table failed validation', filePath, parsed.error.issues);
  }

  const seen = new Set<string>();
  return parsed.data.map((entry) => {
    if (seen.has(entry.id)) {
      throw new SpecialPlayerConfigError(`Special player id ${entry.id} is assigned twice`, filePath);
    }
    seen.add(entry.id);
    return { name: entry.name, teams: entry.teams, playerId: entry.id };
  });
};
