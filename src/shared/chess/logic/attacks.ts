// src/shared/chess/logic/attacks.ts

/**
 * Attacker and defender queries: what attacks a square,
 * what defends the piece on it, and whether it can be taken for free.
 */

import type { BoardState, LocatedPiece } from './boardstate.js';
import type { AttackRecord } from './attackindex.js';
import type { Piece, Player } from '../util/typeutil.js';
import type { Square } from '../util/squareutil.js';
import type { QueryResult } from '../util/queryresult.js';

import boardstate from './boardstate.js';
import attackindex from './attackindex.js';
import exchange from './exchange.js';
import squareutil from '../util/squareutil.js';
import { kinds, players } from '../util/typeutil.js';
import { errorKinds, fail, succeed } from '../util/queryresult.js';

// Type Definitions ------------------------------------------------------------

/** Everything known about a single square. */
interface SquareReport {
	square: Square;
	piece: Piece | undefined;
	whiteAttackers: AttackRecord[];
	blackAttackers: AttackRecord[];
	/** Attackers of the occupant's own color. Empty for an empty square. */
	defenders: AttackRecord[];
	isHanging: boolean;
	isProtected: boolean;
}

// Attackers & Defenders -------------------------------------------------------

/** The pieces of a color directly attacking the square, in scan order. X-rays are never included. */
function getAttackers(board: BoardState, square: Square, byColor: Player): AttackRecord[] {
	return [...attackindex.getAttacks(attackindex.build(board, byColor), square)];
}

/**
 * The pieces defending the piece on the square: its own color's attackers of it.
 * Fails with InvalidQuery if the square is empty.
 */
function getDefenders(board: BoardState, square: Square): QueryResult<AttackRecord[]> {
	const piece = boardstate.getPiece(board, square);
	if (!piece) return fail(errorKinds.INVALID_QUERY, `There is no piece on ${squareutil.toAlgebraic(square)} to defend.`);
	return succeed(getAttackers(board, square, piece.color));
}

function isAttacked(board: BoardState, square: Square, byColor: Player): boolean {
	return getAttackers(board, square, byColor).length > 0;
}

function attackCount(board: BoardState, square: Square, byColor: Player): number {
	return getAttackers(board, square, byColor).length;
}

/** Fails with InvalidQuery if the square is empty. */
function defenseCount(board: BoardState, square: Square): QueryResult<number> {
	const defenders = getDefenders(board, square);
	if (!defenders.success) return defenders;
	return succeed(defenders.result.length);
}

/** Every square a color attacks at least once, ascending. */
function getAttackedSquares(board: BoardState, byColor: Player): Square[] {
	return attackindex.getAttackedSquares(attackindex.build(board, byColor));
}

// Hanging & Protected ---------------------------------------------------------

/** {@link isHanging} without validating the board. */
function computeHanging(board: BoardState, square: Square): boolean {
	const piece = boardstate.getPiece(board, square);
	if (!piece) return false;
	const result = exchange.computeExchange(board, square);
	// Attackers pinned off the square's line can't start the exchange
	return result !== undefined && result.sequence.length > 0 && result.netGain >= 0;
}

/**
 * Returns true if the opponent can capture the piece on the square and come
 * out of the exchange even or ahead, en passant included. False for an empty square,
 * and for a piece whose only attackers are pinned away from it.
 * Fails with MalformedBoard unless each color has exactly one king.
 */
function isHanging(board: BoardState, square: Square): QueryResult<boolean> {
	const validation = boardstate.validateKings(board);
	if (!validation.success) return validation;
	return succeed(computeHanging(board, square));
}

/**
 * Returns true if the opponent can't win material by capturing on the square.
 * This runs the full exchange rather than comparing attacker and defender counts:
 * a queen defending against two pawns doesn't protect anything.
 * An empty square is protected.
 */
function isProtected(board: BoardState, square: Square): QueryResult<boolean> {
	const hanging = isHanging(board, square);
	if (!hanging.success) return hanging;
	return succeed(!hanging.result);
}

/** The pieces of a color that are hanging, in square order. */
function findHangingPieces(board: BoardState, color: Player): QueryResult<LocatedPiece[]> {
	const validation = boardstate.validateKings(board);
	if (!validation.success) return validation;
	return succeed(boardstate.getPiecesOfColor(board, color).filter(({ square }) => computeHanging(board, square)));
}

/** The pieces of a color nothing of their own color defends, attacked or not. Kings are skipped. */
function findUndefendedPieces(board: BoardState, color: Player): LocatedPiece[] {
	const index = attackindex.build(board, color);
	return boardstate
		.getPiecesOfColor(board, color)
		.filter(({ square, piece }) => piece.kind !== kinds.KING && attackindex.getAttacks(index, square).length === 0);
}

/** Collects every fact about a square in one report. */
function analyzeSquare(board: BoardState, square: Square): QueryResult<SquareReport> {
	const hanging = isHanging(board, square);
	if (!hanging.success) return hanging;

	const piece = boardstate.getPiece(board, square);
	const whiteAttackers = getAttackers(board, square, players.WHITE);
	const blackAttackers = getAttackers(board, square, players.BLACK);
	let defenders: AttackRecord[] = [];
	if (piece) defenders = piece.color === players.WHITE ? whiteAttackers : blackAttackers;

	return succeed({
		square,
		piece,
		whiteAttackers,
		blackAttackers,
		defenders,
		isHanging: hanging.result,
		isProtected: !hanging.result,
	});
}

export default {
	getAttackers,
	getDefenders,
	isAttacked,
	attackCount,
	defenseCount,
	getAttackedSquares,
	computeHanging,
	isHanging,
	isProtected,
	findHangingPieces,
	findUndefendedPieces,
	analyzeSquare,
};

export type { SquareReport };
