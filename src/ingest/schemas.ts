import { z } from 'zod';

const LooseString = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .catch('');

const LooseList = z.array(z.unknown()).catch([]);

export const EntrySchema = z
  .object({
    name: LooseString,
    team: LooseString,
  })
  .passthrough();

export const PoolRoundSchema = z
  .object({
    results: LooseList,
  })
  .passthrough();

export const EventSchema = z
  .object({
    name: LooseString,
    weapon: LooseString,
    pool_rounds: LooseList,
    final_rankings: LooseList,
    de_bracket: z.object({ seeding: LooseList }).passthrough().nullable().catch(null),
  })
  .passthrough();

export const CompetitionPayloadSchema = z.object({
  competition: z
    .object({
      event_cd: LooseString,
      name: LooseString,
      start_date: LooseString,
    })
    .catch({ event_cd: '', name: '', start_date: '' }),
  events: LooseList,
});

export const DatasetSchema = z.object({
  competitions: z.array(z.unknown()),
});

export const SpecialPlayerRuleSchema = z.object({
  name: z.string().min(1),
  teams: z.array(z.string().min(1)).min(1),
  id: z.string().regex(/^[A-Z]{2}P\d{5}$/u, 'player id must look like KOP00000'),
});

export const SpecialPlayersFileSchema = z.array(SpecialPlayerRuleSchema);

export type EntryPayload = z.infer<typeof EntrySchema>;
export type EventPayload = z.infer<typeof EventSchema>;
export type CompetitionPayload = z.infer<typeof CompetitionPayloadSchema>;
