#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { getStore } from '../src/store/index.js';
import { getPool } from '../src/db/client.js';
import { loadConfig } from '../src/config.js';
import { scopeFromTournamentId, describeScope } from '../src/engine/scope.js';
import { TournamentService } from '../src/services/tournament.js';
import type { Pairing, StandingRow } from '../src/store/index.js';

const tournaments = () => new TournamentService(getStore());

const printStandings = (rows: StandingRow[]) => {
  if (!rows.length) {
    console.log('No players registered.');
    return;
  }
  for (const row of rows) {
    console.log(
      `${String(row.rank).padStart(3)}. ${row.name} (#${row.playerId}) wins=${row.wins} matches=${row.gamesPlayed} omw=${row.opponentMatchWins}`
    );
  }
};

const printPairings = (pairings: Pairing[]) => {
  if (!pairings.length) {
    console.log('No pairings available.');
    return;
  }
  for (const [index, pairing] of pairings.entries()) {
    console.log(
      `Table ${index + 1}: ${pairing.name1} (#${pairing.player1Id}) vs ${pairing.name2} (#${pairing.player2Id})`
    );
  }
};

const tournamentOption = {
  type: 'number',
  alias: 't',
  describe: 'Tournament id (omit for all tournaments)',
} as const;

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('tournament')
    .command(
      'register <name>',
      'Register a player',
      (cmd) =>
        cmd.positional('name', {
          type: 'string',
          describe: 'Player name',
          demandOption: true,
        }),
      async (argv) => {
        const player = await tournaments().registerPlayer(argv.name);
        console.log(`Registered ${player.name} as #${player.playerId}`);
      }
    )
    .command(
      'report <winner> <loser>',
      'Report the result of a match',
      (cmd) =>
        cmd
          .positional('winner', { type: 'number', describe: 'Winning player id', demandOption: true })
          .positional('loser', { type: 'number', describe: 'Losing player id', demandOption: true })
          .option('tournament', tournamentOption),
      async (argv) => {
        const match = await tournaments().reportMatch({
          winnerId: argv.winner,
          loserId: argv.loser,
          tournamentId: argv.tournament ?? null,
        });
        console.log(`Recorded match #${match.matchId}`);
      }
    )
    .command(
      'standings',
      'Print ranked standings',
      (cmd) => cmd.option('tournament', tournamentOption),
      async (argv) => {
        const scope = scopeFromTournamentId(argv.tournament);
        console.log(`Standings for ${describeScope(scope)}`);
        printStandings(await tournaments().computeStandings(scope));
      }
    )
    .command(
      'pairings',
      'Print next-round pairings',
      (cmd) => cmd.option('tournament', tournamentOption),
      async (argv) => {
        const scope = scopeFromTournamentId(argv.tournament);
        console.log(`Pairings for ${describeScope(scope)}`);
        printPairings(await tournaments().generatePairings(scope));
      }
    )
    .command(
      'count',
      'Count players',
      (cmd) => cmd.option('tournament', tournamentOption),
      async (argv) => {
        const scope = scopeFromTournamentId(argv.tournament);
        const count = await tournaments().countPlayers(scope);
        console.log(`${count} player(s) in ${describeScope(scope)}`);
      }
    )
    .command(
      'clear',
      'Delete every match, and optionally every player',
      (cmd) =>
        cmd.option('players', {
          type: 'boolean',
          default: false,
          describe: 'Also delete players',
        }),
      async (argv) => {
        const service = tournaments();
        const matches = await service.deleteMatches();
        console.log(`Deleted ${matches} match(es)`);
        if (argv.players) {
          const players = await service.deletePlayers();
          console.log(`Deleted ${players} player(s)`);
        }
      }
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main()
  .catch((err) => {
    console.error('tournament_cli_failed', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  })
  .finally(async () => {
    if (loadConfig().storeDriver !== 'postgres') return;
    try {
      await getPool().end();
    } catch (err) {
      console.error('Failed to close database connection', err);
    }
  });
