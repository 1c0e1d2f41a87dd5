// src/shared/chess/logic/movesafety.ts

/**
 * Answers "what happens if I play this move?" by making it on a copy
 * of the board and running the attack analysis again on the result.
 */

import type { BoardState, LocatedPiece } from './boardstate.js';
import type { AttackIndex, AttackRecord } from './attackindex.js';
import type { ExchangeResult } from './exchange.js';
import type { MoveDescriptor } from './movepiece.js';
import type { Direction } from './raycaster.js';
import type { Piece, Player } from '../util/typeutil.js';
import type { Square } from '../util/squareutil.js';
import type { QueryResult } from '../util/queryresult.js';

import boardstate from './boardstate.js';
import attackindex from './attackindex.js';
import attacks from './attacks.js';
import exchange from './exchange.js';
import movepiece from './movepiece.js';
import raycaster from './raycaster.js';
import squareutil from '../util/squareutil.js';
import typeutil, { kinds, promotionKinds } from '../util/typeutil.js';
import { errorKinds, fail, succeed } from '../util/queryresult.js';

// Type Definitions ------------------------------------------------------------

/** A line one of our sliders could see down before the move, that the moved piece now cuts short. */
interface ObstructedRay {
	sliderSquare: Square;
	slider: Piece;
	/** Points from the slider toward the destination square. */
	direction: Direction;
	/** The squares beyond the destination the slider no longer reaches. */
	lostSquares: Square[];
}

interface MoveReport {
	move: MoveDescriptor;
	/** The piece standing on the destination after the move. Differs from the mover on promotions. */
	piece: Piece;
	/** The board after the move. */
	after: BoardState;
	captured: LocatedPiece | undefined;
	/** Opponent pieces attacking the destination after the move, a pawn able to take it en passant included. */
	opponentAttackers: AttackRecord[];
	/** Our own pieces guarding the destination after the move. */
	defenders: AttackRecord[];
	/** The exchange on the destination, opponent capturing first. Only present if they can capture at all. */
	exchange: ExchangeResult | undefined;
	/** False if the opponent can take the moved piece without losing material. */
	isDestinationSafe: boolean;
	/** Our pieces, the moved one excluded, that weren't hanging before the move and are after. */
	newlyHanging: LocatedPiece[];
	obstructedRays: ObstructedRay[];
	givesCheck: boolean;
	/** True if the moved piece was guarding its own king, and the king is left with fewer guards. */
	weakensKingDefense: boolean;
}

// Validation ------------------------------------------------------------------

/** Refuses moves from empty squares, moves tagged illegal, and promotions to a kind a pawn can't become. */
function validateMove(board: BoardState, move: MoveDescriptor): QueryResult<Piece> {
	const mover = boardstate.getPiece(board, move.from);
	const description = movepiece.describeMove(move);
	if (!mover) return fail(errorKinds.INVALID_MOVE, `Move ${description} starts on an empty square.`);
	if (!move.legal) return fail(errorKinds.INVALID_MOVE, `Move ${description} is tagged illegal.`);
	if (move.kind === 'promotion' && move.promotion !== undefined && !promotionKinds.includes(move.promotion)) {
		return fail(errorKinds.INVALID_MOVE, `Move ${description} promotes to a piece that can't be promoted to.`);
	}
	return succeed(mover);
}

// Analysis --------------------------------------------------------------------

/**
 * Finds the lines of our sliders that now end on the destination square,
 * and which squares along each of them were visible before the move.
 * Sliders that moved themselves (a castled rook) are skipped.
 */
function findObstructedRays(before: BoardState, after: BoardState, to: Square): ObstructedRay[] {
	const moved = boardstate.getPiece(after, to);
	if (!moved) return [];

	const obstructed: ObstructedRay[] = [];
	for (const { square, piece } of boardstate.getPiecesOfColor(after, moved.color)) {
		if (square === to || !typeutil.isSlider(piece.kind)) continue;
		const previous = boardstate.getPiece(before, square);
		if (!previous || !typeutil.arePiecesEqual(previous, piece)) continue;

		const direction = raycaster.directionBetween(square, to);
		if (direction === undefined || !raycaster.canSlideAlong(piece.kind, direction)) continue;
		if (raycaster.castRay(after, square, direction).at(-1)?.square !== to) continue; // Something else stands in front

		const distanceToDestination = squareutil.chebyshevDistance(square, to);
		const lostSquares = raycaster
			.castRay(before, square, direction)
			.filter((step) => step.distance > distanceToDestination)
			.map((step) => step.square);
		if (lostSquares.length === 0) continue;

		obstructed.push({ sliderSquare: square, slider: piece, direction, lostSquares });
	}
	return obstructed;
}

/** Our pieces hanging on the board, as a set of their squares. */
function getHangingSquares(board: BoardState, color: Player): Set<Square> {
	const squares = new Set<Square>();
	for (const { square } of boardstate.getPiecesOfColor(board, color)) {
		if (attacks.computeHanging(board, square)) squares.add(square);
	}
	return squares;
}

/**
 * Returns true if the piece leaving `from` was one of its king's defenders,
 * and the king has fewer of them once the move is made. Always false for a king move.
 */
function weakensKingDefense(before: BoardState, afterIndex: AttackIndex, from: Square): boolean {
	const mover = boardstate.getPiece(before, from);
	if (!mover || mover.kind === kinds.KING) return false;
	const kingSquare = boardstate.findKing(before, mover.color);
	if (kingSquare === undefined) return false;

	const defendersBefore = attacks.getAttackers(before, kingSquare, mover.color);
	if (!defendersBefore.some((record) => record.attackerSquare === from)) return false;
	return attackindex.getAttacks(afterIndex, kingSquare).length < defendersBefore.length;
}

/**
 * Plays the move on a copy of the board and reports how safe it is.
 * Fails with InvalidMove for a move from an empty square or one tagged illegal,
 * and MalformedBoard unless each color has exactly one king.
 */
function analyzeMove(board: BoardState, move: MoveDescriptor): QueryResult<MoveReport> {
	const validMove = validateMove(board, move);
	if (!validMove.success) return validMove;
	const validation = boardstate.validateKings(board);
	if (!validation.success) return validation;

	const mover = validMove.result;
	const opponent = typeutil.invertPlayer(mover.color);
	const after = movepiece.simulateMove(board, move);
	const indexes = attackindex.buildAll(after);

	const opponentAttackers = [
		...attackindex.getAttacks(indexes[opponent], move.to),
		...attackindex.getEnPassantAttacks(after, indexes[opponent], move.to),
	];
	const defenders = [...attackindex.getAttacks(indexes[mover.color], move.to)];
	const recapture = opponentAttackers.length > 0 ? exchange.computeExchange(after, move.to) : undefined;

	const hangingBefore = getHangingSquares(board, mover.color);
	const newlyHanging = boardstate
		.getPiecesOfColor(after, mover.color)
		.filter(({ square }) => square !== move.to && !hangingBefore.has(square) && attacks.computeHanging(after, square));

	const enemyKing = boardstate.findKing(after, opponent);
	const givesCheck = enemyKing !== undefined && attackindex.getAttacks(indexes[mover.color], enemyKing).length > 0;

	return succeed({
		move,
		piece: movepiece.getLandingPiece(mover, move),
		after,
		captured: movepiece.getCaptured(board, move),
		opponentAttackers,
		defenders,
		exchange: recapture,
		isDestinationSafe: !attacks.computeHanging(after, move.to),
		newlyHanging,
		obstructedRays: findObstructedRays(board, after, move.to),
		givesCheck,
		weakensKingDefense: weakensKingDefense(board, indexes[mover.color], move.from),
	});
}

export default {
	validateMove,
	findObstructedRays,
	weakensKingDefense,
	analyzeMove,
};

export type { ObstructedRay, MoveReport };
