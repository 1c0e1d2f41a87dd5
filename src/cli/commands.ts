// src/cli/commands.ts

/**
 * The commands of the command line tool. Each one takes an already
 * validated board and arguments, and returns the text to print.
 */

import type { BoardState } from '../shared/chess/logic/boardstate.js';
import type { MoveDescriptor } from '../shared/chess/logic/movepiece.js';
import type { Player } from '../shared/chess/util/typeutil.js';
import type { Square } from '../shared/chess/util/squareutil.js';
import type { EngineError, QueryResult } from '../shared/chess/util/queryresult.js';
import type { MoveArgs } from './validation.js';

import attacks from '../shared/chess/logic/attacks.js';
import movesafety from '../shared/chess/logic/movesafety.js';
import tacticsummary from '../shared/chess/logic/tactics/tacticsummary.js';
import report from './report.js';
import typeutil, { players } from '../shared/chess/util/typeutil.js';
import { succeed } from '../shared/chess/util/queryresult.js';

// Type Definitions ------------------------------------------------------------

type CommandName = 'board' | 'analyze' | 'move' | 'hanging' | 'tactics' | 'all';

const COMMAND_NAMES: readonly CommandName[] = ['board', 'analyze', 'move', 'hanging', 'tactics', 'all'];

const SECTION_DIVIDER = '='.repeat(50);

// Commands --------------------------------------------------------------------

function formatError(error: EngineError): string {
	return `Error (${error.kind}): ${error.reason}`;
}

function runBoard(board: BoardState): string {
	return report.renderBoard(board);
}

function runAnalyze(board: BoardState, square: Square): QueryResult<string> {
	const analysis = attacks.analyzeSquare(board, square);
	if (!analysis.success) return analysis;
	return succeed(JSON.stringify(report.squareReportToJSON(analysis.result), null, 2));
}

function runMove(board: BoardState, args: Omit<MoveArgs, 'fen'>): QueryResult<string> {
	const move: MoveDescriptor = { from: args.from, to: args.to, kind: args.kind, promotion: args.promotion, legal: true };
	const analysis = movesafety.analyzeMove(board, move);
	if (!analysis.success) return analysis;
	const verdict = report.renderMoveVerdict(analysis.result);
	const details = JSON.stringify(report.moveReportToJSON(analysis.result), null, 2);
	return succeed(`${verdict}\n\n--- Full Analysis ---\n${details}`);
}

function runHanging(board: BoardState, color: Player): QueryResult<string> {
	const hanging = attacks.findHangingPieces(board, color);
	if (!hanging.success) return hanging;
	const withAttackers = hanging.result.map((located) => ({
		located,
		attackers: attacks.getAttackers(board, located.square, typeutil.invertPlayer(located.piece.color)),
	}));
	return succeed(report.renderHanging(color, withAttackers, attacks.findUndefendedPieces(board, color)));
}

function runTactics(board: BoardState, color: Player): QueryResult<string> {
	const tactics = tacticsummary.analyzeTactics(board, color);
	if (!tactics.success) return tactics;
	return succeed(report.renderTactics(tactics.result));
}

/** The board, both colors' hanging pieces, and the tactics of the side to move. */
function runAll(board: BoardState): QueryResult<string> {
	const sections = [runBoard(board)];
	for (const result of [runHanging(board, players.WHITE), runHanging(board, players.BLACK)]) {
		if (!result.success) return result;
		sections.push(result.result);
	}
	const tactics = runTactics(board, board.turn);
	if (!tactics.success) return tactics;
	sections.push(SECTION_DIVIDER, tactics.result);
	return succeed(sections.join('\n\n'));
}

export default {
	formatError,
	runBoard,
	runAnalyze,
	runMove,
	runHanging,
	runTactics,
	runAll,
};

export { COMMAND_NAMES };

export type { CommandName };
