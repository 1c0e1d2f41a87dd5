// src/cli/cli.ts

/**
 * Parses the command line, validates it, and runs the command asked for.
 */

import type { QueryResult } from '../shared/chess/util/queryresult.js';

import * as z from 'zod';
import yargs from 'yargs';

import commands, { COMMAND_NAMES } from './commands.js';
import { executeSafely } from './utility/errorguard.js';
import { logZodError } from './utility/zodlogger.js';
import { analyzeArgsSchema, boardArgsSchema, colorArgsSchema, commandSchema, moveArgsSchema } from './validation.js';

// Type Definitions ------------------------------------------------------------

/** The raw command line, before any validation. */
interface CliInput {
	fen: string;
	command: string;
	/** The command's own arguments: a square, two squares, or a color. */
	args: string[];
	kind?: string;
	promotion?: string;
}

// Parsing ---------------------------------------------------------------------

/** Parses the arguments, without the node binary and script path. */
async function parseArgv(argv: string[]): Promise<CliInput> {
	const parsed = await yargs(argv)
		.scriptName('chess-vision')
		.command('$0 <fen> <command> [args..]', 'Analyze a chess position given as FEN', (builder) =>
			builder
				.positional('fen', { type: 'string', describe: 'The position, in Forsyth-Edwards Notation', demandOption: true })
				.positional('command', { type: 'string', describe: `One of: ${COMMAND_NAMES.join(', ')}`, demandOption: true })
				.positional('args', { type: 'string', array: true, describe: 'A square for analyze, two squares for move, a color for hanging and tactics' }),
		)
		.options({
			kind: { type: 'string', default: 'normal', describe: 'The kind of move: normal, en-passant, castle or promotion' },
			promotion: { type: 'string', describe: 'The piece a pawn promotes to: q, r, b or n' },
		})
		.example('$0 "rnbqkbnr/pppp1ppp/8/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R b KQkq - 1 2" hanging black', 'List the hanging black pieces')
		.example('$0 "r1bqkb1r/pppp1ppp/2n2n2/4p3/2B1P3/5N2/PPPP1PPP/RNBQK2R w KQkq - 4 4" move f3 g5', 'Check whether Ng5 is safe')
		.strict()
		.help()
		.parseAsync();

	return {
		fen: parsed.fen,
		command: parsed.command,
		args: parsed.args ?? [],
		kind: parsed.kind,
		promotion: parsed.promotion,
	};
}

// Running ---------------------------------------------------------------------

/**
 * Validates input against the schema. Malformed input is logged
 * and its problems are printed, and undefined is returned.
 */
async function validate<S extends z.ZodType>(schema: S, input: unknown, command: string): Promise<z.output<S> | undefined> {
	const result = schema.safeParse(input);
	if (result.success) return result.data;
	await logZodError(input, result.error, `Received malformed arguments for the ${command} command.`);
	console.error(z.prettifyError(result.error));
	return undefined;
}

/** Prints the command's output, or its error. Returns the exit code. */
function print(result: QueryResult<string>): number {
	if (!result.success) {
		console.error(commands.formatError(result.error));
		return 1;
	}
	console.log(result.result);
	return 0;
}

async function dispatch(input: CliInput): Promise<number> {
	const command = await validate(commandSchema, input.command, 'requested');
	if (command === undefined) return 1;
	const [first, second] = input.args;

	switch (command) {
		case 'board': {
			const args = await validate(boardArgsSchema, { fen: input.fen }, command);
			if (!args) return 1;
			console.log(commands.runBoard(args.fen));
			return 0;
		}
		case 'analyze': {
			const args = await validate(analyzeArgsSchema, { fen: input.fen, square: first }, command);
			if (!args) return 1;
			return print(commands.runAnalyze(args.fen, args.square));
		}
		case 'move': {
			const args = await validate(moveArgsSchema, { fen: input.fen, from: first, to: second, kind: input.kind, promotion: input.promotion }, command);
			if (!args) return 1;
			return print(commands.runMove(args.fen, args));
		}
		case 'hanging':
		case 'tactics': {
			const args = await validate(colorArgsSchema, { fen: input.fen, color: first }, command);
			if (!args) return 1;
			return print(command === 'hanging' ? commands.runHanging(args.fen, args.color) : commands.runTactics(args.fen, args.color));
		}
		case 'all': {
			const args = await validate(boardArgsSchema, { fen: input.fen }, command);
			if (!args) return 1;
			return print(commands.runAll(args.fen));
		}
	}
}

/**
 * Runs the command. Unexpected exceptions are logged to the error log.
 * @returns The exit code: 0 on success, 1 on malformed input, an engine error, or an exception.
 */
async function execute(input: CliInput): Promise<number> {
	let exitCode = 0;
	const completed = await executeSafely(async () => {
		exitCode = await dispatch(input);
	}, `Unexpected error while running the ${input.command} command.`);
	return completed ? exitCode : 1;
}

export default {
	parseArgv,
	execute,
};

export type { CliInput };
