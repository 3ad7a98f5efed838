import { findAgeRegression, splitAtDate } from './age.js';
import { partitionByGender } from './gender.js';
import { mergeTeams } from './merger.js';
import { findOverlappingTeams, findPseudoOverlaps, hasTeamPair } from './overlap.js';
import type { TeamPairSet } from './overlap.js';
import { buildTeamSpans } from './teams.js';
import type { TeamSpan } from './teams.js';
import type { AppearanceRecord, Gender } from './types.js';
import { partitionByWeapon } from './weapons.js';

export type PartitionStage = 'gender' | 'age' | 'weapon';

export interface PartitionTask {
  records: AppearanceRecord[];
  stage: PartitionStage;
  gender?: Gender;
}

export interface IdentityGroup {
  gender: Gender;
  weaponKey: string;
  records: AppearanceRecord[];
}

export interface PartitionHooks {
  onAgeSplit?: (event: { splitDate: string; before: number; after: number; gender: Gender }) => void;
}

/**
 * Runs the gender, age-regression and weapon stages for one name as a
 * worklist. Every age split sends both halves back through the gender stage,
 * since a split can expose a mixed-gender subgroup that a shared team held
 * together. Tasks are taken depth-first so groups come out in the order the
 * splits produce them.
 */
export const partitionNameGroup = (
  records: AppearanceRecord[],
  hooks: PartitionHooks = {}
): IdentityGroup[] => {
  const queue: PartitionTask[] = [{ records, stage: 'gender' }];
  const groups: IdentityGroup[] = [];

  while (queue.length) {
    const task = queue.shift();
    if (!task || !task.records.length) continue;

    if (task.stage === 'gender') {
      const buckets = partitionByGender(task.records);
      queue.unshift(
        ...[...buckets].map(([gender, bucket]): PartitionTask => ({ records: bucket, stage: 'age', gender }))
      );
      continue;
    }

    const gender = task.gender ?? 'UNKNOWN';

    if (task.stage === 'age') {
      const splitDate = findAgeRegression(task.records);
      if (splitDate) {
        const { before, after } = splitAtDate(task.records, splitDate);
        hooks.onAgeSplit?.({ splitDate, before: before.length, after: after.length, gender });
        queue.unshift({ records: before, stage: 'gender' }, { records: after, stage: 'gender' });
      } else {
        queue.unshift({ records: task.records, stage: 'weapon', gender });
      }
      continue;
    }

    for (const [weaponKey, partition] of partitionByWeapon(task.records)) {
      groups.push({ gender, weaponKey, records: partition });
    }
  }

  return groups;
};

export interface ResolvedIdentity {
  /** Team the id is seeded from; '' for an identity seen only without a team. */
  seedTeam: string;
  records: AppearanceRecord[];
}

const earliestTeam = (component: TeamSpan[]) => {
  let seed = component[0];
  for (const span of component) {
    if (span.firstDate && (!seed.firstDate || span.firstDate < seed.firstDate)) seed = span;
  }
  return seed.team;
};

const touchesForbiddenPair = (spans: TeamSpan[], forbidden: TeamPairSet) =>
  spans.some((span, idx) => spans.slice(idx + 1).some((other) => hasTeamPair(forbidden, span.key, other.key)));

/**
 * Splits one partitioned group into identities. `nameOverlaps` carries the
 * literal overlaps of the whole name, since a record left in another
 * partition can still prove two of this group's teams are different people.
 * Without any forbidden pair among the group's teams the whole group is one
 * person; otherwise teams go through the constrained merger and each
 * component is one person.
 */
export const resolveGroupIdentities = (
  records: AppearanceRecord[],
  nameOverlaps: TeamPairSet = new Set()
): ResolvedIdentity[] => {
  const { spans, teamless } = buildTeamSpans(records);
  const forbidden = new Set([...nameOverlaps, ...findOverlappingTeams(records), ...findPseudoOverlaps(spans)]);

  if (!touchesForbiddenPair(spans, forbidden)) {
    return [{ seedTeam: spans.length ? earliestTeam(spans) : '', records }];
  }

  const components = mergeTeams(spans, forbidden);
  const identities: ResolvedIdentity[] = components.map((component) => ({
    seedTeam: earliestTeam(component),
    records: component.flatMap((span) => span.records),
  }));

  if (teamless.length) {
    // Teamless records only join an identity when there is no choice to make.
    if (identities.length === 1) identities[0].records.push(...teamless);
    else identities.push({ seedTeam: '', records: teamless });
  }
  return identities;
};
