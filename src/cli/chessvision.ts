#!/usr/bin/env node
// src/cli/chessvision.ts

/**
 * The chess-vision command.
 *
 * chess-vision <fen> board
 * chess-vision <fen> analyze <square>
 * chess-vision <fen> move <from> <to> [--kind <kind>] [--promotion <q|r|b|n>]
 * chess-vision <fen> hanging <white|black>
 * chess-vision <fen> tactics <white|black>
 * chess-vision <fen> all
 */

import { hideBin } from 'yargs/helpers';

import cli from './cli.js';
import { loadConfig } from './config.js';

try {
	loadConfig();
} catch (e) {
	console.error(e instanceof Error ? e.message : e);
	process.exit(1);
}

process.exitCode = await cli.execute(await cli.parseArgv(hideBin(process.argv)));
