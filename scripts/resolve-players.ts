#!/usr/bin/env tsx
import 'dotenv/config';
import { writeFile } from 'node:fs/promises';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadConfig, loadSpecialPlayers } from '../src/config.js';
import { buildPlayerDatabase } from '../src/ingest/dataset.js';
import { currentTeam } from '../src/identity/profile.js';
import type { PlayerIdentityResolver } from '../src/identity/resolver.js';

const formatNumber = (value: number) => value.toLocaleString('en-US');

const printSummary = (resolver: PlayerIdentityResolver, top: number, specialIds: number) => {
  const stats = resolver.stats();
  console.log(
    `Resolved ${formatNumber(stats.records)} record(s) into ${formatNumber(stats.profiles)} profile(s) across ${formatNumber(stats.names)} name(s); ${specialIds} special id(s) assigned.`
  );

  const { name_index: nameIndex } = resolver.toDict();
  const ambiguous = Object.entries(nameIndex)
    .filter(([, playerIds]) => playerIds.length > 1)
    .sort((a, b) => b[1].length - a[1].length);

  console.log(`Ambiguous names: ${formatNumber(ambiguous.length)}`);
  for (const [name, playerIds] of ambiguous.slice(0, top)) {
    console.log(`- ${name}: ${playerIds.length} profiles`);
    for (const profile of resolver.getPlayersByName(name)) {
      console.log(`    ${profile.playerId} ${currentTeam(profile) || 'n/a'} (${profile.competitionIds.size} competitions)`);
    }
  }
};

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('resolve-players')
    .usage('$0 --data <file>', 'Resolve player identities from a scraped competition dataset')
    .option('data', {
      type: 'string',
      demandOption: true,
      describe: 'Path to a JSON file of the form { "competitions": [...] }',
    })
    .option('country', {
      type: 'string',
      describe: 'Two-letter country code used in player ids (overrides PLAYER_ID_COUNTRY)',
    })
    .option('special-players', {
      type: 'string',
      describe: 'Reference player table (overrides SPECIAL_PLAYERS_PATH)',
    })
    .option('out', {
      type: 'string',
      describe: 'Write the resolved profiles as JSON to this path',
    })
    .option('top', {
      type: 'number',
      default: 10,
      describe: 'Number of ambiguous names to list',
    })
    .strict()
    .help()
    .parseAsync();

  const config = loadConfig(argv.country ? { ...process.env, PLAYER_ID_COUNTRY: argv.country } : process.env);
  const specialPlayers = loadSpecialPlayers(argv.specialPlayers ?? config.specialPlayersPath);

  const resolver = await buildPlayerDatabase(argv.data, {
    countryCode: config.countryCode,
    specialPlayers,
  });

  printSummary(resolver, argv.top, resolver.specialIds.size);

  if (argv.out) {
    await writeFile(argv.out, `${JSON.stringify(resolver.toDict(), null, 2)}\n`, 'utf8');
    console.log(`Wrote ${formatNumber(resolver.stats().profiles)} profile(s) to ${argv.out}`);
  }
}

main().catch((err) => {
  console.error('resolve_players_failed', err);
  process.exitCode = 1;
});
