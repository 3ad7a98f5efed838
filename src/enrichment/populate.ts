import { setTimeout as sleep } from 'timers/promises';

import { EnrichmentError } from '../errors.js';
import type { PlayerProfile, ResolverLogger } from '../identity/types.js';
import type {
  EnglishNameCandidate,
  EnrichmentOptions,
  EnrichmentReport,
  InternationalNameSource,
  OrganizationResolver,
} from './types.js';

const DEFAULT_RETRIES = 1;
const DEFAULT_RETRY_DELAY_MS = 200;

const describeError = (err: unknown) => (err instanceof Error ? err.message : String(err));

const recordFailure = (report: EnrichmentReport, failure: EnrichmentError, logger?: ResolverLogger) => {
  report.failed += 1;
  report.errors.push(failure);
  logger?.warn(failure.code, { ...failure.context, message: failure.message });
};

export const withRetry = async <T>(
  task: () => T | Promise<T>,
  options: EnrichmentOptions = {}
): Promise<T> => {
  const retries = Math.max(0, options.retries ?? DEFAULT_RETRIES);
  const delayMs = Math.max(0, options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);

  let lastError: unknown;
  for (let attempt = 0; attempt <= retries; attempt += 1) {
    try {
      return await task();
    } catch (err) {
      lastError = err;
      if (attempt < retries && delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
  throw lastError;
};

/**
 * Backfills `teamId`/`teamEn` on every team record that has none yet.
 * A failed lookup leaves that record untouched and moves on.
 */
export const populateTeamInfo = async (
  profiles: Iterable<PlayerProfile>,
  resolver: OrganizationResolver,
  options: EnrichmentOptions & { logger?: ResolverLogger } = {}
): Promise<EnrichmentReport> => {
  const report: EnrichmentReport = { updated: 0, failed: 0, errors: [] };

  for (const profile of profiles) {
    for (const teamRecord of profile.teamHistory) {
      if (teamRecord.teamId) continue;

      try {
        const org = await withRetry(() => resolver.getOrCreateOrganization(teamRecord.team), options);
        teamRecord.teamId = org.orgId;
        teamRecord.teamEn = org.nameEn;
        report.updated += 1;
      } catch (err) {
        recordFailure(
          report,
          new EnrichmentError(
            describeError(err),
            'organization_lookup_failed',
            { playerId: profile.playerId, subject: teamRecord.team },
            err
          ),
          options.logger
        );
        continue;
      }

      if (resolver.updateOrganizationStats) {
        try {
          await resolver.updateOrganizationStats(teamRecord.team, teamRecord.firstSeen, profile.playerId);
        } catch (err) {
          options.logger?.warn('organization_stats_update_failed', {
            playerId: profile.playerId,
            team: teamRecord.team,
            message: describeError(err),
          });
        }
      }
    }
  }

  return report;
};

/**
 * Backfills `nameEn` and, for verified names, the external ids. Profiles that
 * already carry an English name are skipped.
 */
export const populateEnglishNames = async (
  profiles: Iterable<PlayerProfile>,
  source: InternationalNameSource,
  options: EnrichmentOptions & { logger?: ResolverLogger } = {}
): Promise<EnrichmentReport> => {
  const report: EnrichmentReport = { updated: 0, failed: 0, errors: [] };

  for (const profile of profiles) {
    if (profile.nameEn) continue;

    let candidate: EnglishNameCandidate | null;
    try {
      candidate = await withRetry(() => source.getEnglishName(profile.name), options);
    } catch (err) {
      recordFailure(
        report,
        new EnrichmentError(
          describeError(err),
          'english_name_lookup_failed',
          { playerId: profile.playerId, subject: profile.name },
          err
        ),
        options.logger
      );
      continue;
    }
    if (!candidate) continue;

    profile.nameEn = candidate.fullName;
    profile.nameEnVerified = candidate.source === 'verified';
    if (profile.nameEnVerified && candidate.externalId) {
      if (candidate.externalSource === 'fie') profile.fieId = candidate.externalId;
      else if (candidate.externalSource === 'fencingtracker') profile.fencingtrackerId = candidate.externalId;
    }
    report.updated += 1;
  }

  return report;
};
