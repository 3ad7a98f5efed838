import { extractAgeGroup } from '../identity/classify.js';
import type { AppearanceRecord, RecordType } from '../identity/types.js';
import { CompetitionPayloadSchema, EntrySchema, EventSchema, PoolRoundSchema } from './schemas.js';
import type { CompetitionPayload } from './schemas.js';

// Scraped tables use "-" for an empty name cell.
const PLACEHOLDER_NAMES = new Set(['', '-']);

export const parseCompetitionPayload = (payload: unknown): CompetitionPayload | null => {
  const parsed = CompetitionPayloadSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
};

/**
 * Flattens one competition into appearance records: pool results, final
 * rankings and DE seedings of every event. Entries without a usable name are
 * dropped; anything else malformed is skipped rather than raised.
 */
export const flattenCompetition = (competition: CompetitionPayload): AppearanceRecord[] => {
  const { event_cd: compId, name: compName, start_date: compDate } = competition.competition;
  const records: AppearanceRecord[] = [];

  for (const rawEvent of competition.events) {
    const event = EventSchema.safeParse(rawEvent);
    if (!event.success) continue;

    const { name: eventName, weapon } = event.data;
    const ageGroup = extractAgeGroup(eventName);

    const push = (rawEntry: unknown, recordType: RecordType) => {
      const entry = EntrySchema.safeParse(rawEntry);
      if (!entry.success || PLACEHOLDER_NAMES.has(entry.data.name)) return;

      records.push({
        name: entry.data.name,
        team: entry.data.team,
        compId,
        compName,
        compDate,
        eventName,
        weapon,
        ageGroup,
        recordType,
        payload: entry.data,
      });
    };

    for (const rawPool of event.data.pool_rounds) {
      const pool = PoolRoundSchema.safeParse(rawPool);
      if (!pool.success) continue;
      for (const result of pool.data.results) push(result, 'pool');
    }
    for (const ranking of event.data.final_rankings) push(ranking, 'ranking');
    for (const seeding of event.data.de_bracket?.seeding ?? []) push(seeding, 'de_seeding');
  }

  return records;
};

export const extractAppearanceRecords = (payload: unknown): AppearanceRecord[] | null => {
  const competition = parseCompetitionPayload(payload);
  return competition ? flattenCompetition(competition) : null;
};
