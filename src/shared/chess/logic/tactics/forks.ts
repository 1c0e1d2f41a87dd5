// src/shared/chess/logic/tactics/forks.ts

/**
 * Fork detection: one piece attacking two or more enemy pieces at once.
 *
 * Also finds the squares a piece could step to in order to create a fork.
 */

import type { BoardState, LocatedPiece } from '../boardstate.js';
import type { RayStep } from '../raycaster.js';
import type { Piece, Player } from '../../util/typeutil.js';
import type { Square } from '../../util/squareutil.js';

import boardstate from '../boardstate.js';
import raycaster, { KING_OFFSETS, KNIGHT_OFFSETS, PAWN_CAPTURE_OFFSETS } from '../raycaster.js';
import attackindex from '../attackindex.js';
import attacks from '../attacks.js';
import squareutil from '../../util/squareutil.js';
import typeutil, { kinds, players } from '../../util/typeutil.js';

// Type Definitions ------------------------------------------------------------

interface ForkRecord {
	forkingSquare: Square;
	forkingPiece: Piece;
	/** The attacked enemy pieces, in scan order. */
	targets: LocatedPiece[];
	/** Combined value of the targets. */
	totalValue: number;
}

/** A square a piece could move to from which it would fork. */
interface ForkOpportunity {
	fromSquare: Square;
	toSquare: Square;
	piece: Piece;
	targets: LocatedPiece[];
	totalValue: number;
	/** The enemy piece captured by stepping onto the square, if any. It's never counted as a target. */
	captures: Piece | undefined;
	/** False if the opponent could take the piece on its new square without losing material. */
	isSafe: boolean;
}

// Current Forks ---------------------------------------------------------------

function sumValues(targets: readonly LocatedPiece[]): number {
	return targets.reduce((sum, { piece }) => sum + typeutil.getPieceValue(piece), 0);
}

/** Finds every piece of the color that attacks two or more enemy pieces right now. */
function findForks(board: BoardState, color: Player): ForkRecord[] {
	const index = attackindex.build(board, color);
	const forks: ForkRecord[] = [];

	for (const { square, piece } of boardstate.getPiecesOfColor(board, color)) {
		const targets: LocatedPiece[] = [];
		for (const record of attackindex.getAttacksBy(index, square)) {
			const target = boardstate.getPiece(board, record.targetSquare);
			if (target && target.color !== color) targets.push({ square: record.targetSquare, piece: target });
		}
		if (targets.length < 2) continue;
		forks.push({ forkingSquare: square, forkingPiece: piece, targets, totalValue: sumValues(targets) });
	}

	return forks;
}

// Fork Opportunities ----------------------------------------------------------

/** The starting rank of each color's pawns, from which they may push two squares. */
const PAWN_START_RANKS: Record<Player, number> = {
	[players.WHITE]: 1,
	[players.BLACK]: 6,
};

function getPawnReach(board: BoardState, from: Square, pawn: Piece): Square[] {
	const reach: Square[] = [];
	const forward = pawn.color === players.WHITE ? 1 : -1;

	const single = squareutil.offset(from, [0, forward]);
	if (single !== undefined && boardstate.isEmpty(board, single)) {
		reach.push(single);
		const double = squareutil.offset(from, [0, 2 * forward]);
		if (squareutil.rankOf(from) === PAWN_START_RANKS[pawn.color] && double !== undefined && boardstate.isEmpty(board, double)) {
			reach.push(double);
		}
	}

	for (const { square, piece } of raycaster.leap(board, from, PAWN_CAPTURE_OFFSETS[pawn.color])) {
		if ((piece && piece.color !== pawn.color) || square === board.enPassant) reach.push(square);
	}

	return reach;
}

/**
 * Returns the squares a piece could move to, by geometry alone:
 * empty squares and enemy-occupied ones, up to each slider's first blocker.
 * Whether the move would leave the king in check is not considered.
 */
function getReachableSquares(board: BoardState, from: Square, piece: Piece): Square[] {
	if (piece.kind === kinds.PAWN) return getPawnReach(board, from, piece);

	let steps: RayStep[];
	if (piece.kind === kinds.KNIGHT) steps = raycaster.leap(board, from, KNIGHT_OFFSETS);
	else if (piece.kind === kinds.KING) steps = raycaster.leap(board, from, KING_OFFSETS);
	else steps = raycaster.cast(board, from, raycaster.directionsForKind(piece.kind));

	return steps.filter((step) => step.piece?.color !== piece.color).map((step) => step.square);
}

/**
 * Finds every square a piece of the color could move to from which it
 * would attack two or more enemy pieces. Most valuable forks first.
 */
function findForkSquares(board: BoardState, color: Player): ForkOpportunity[] {
	const opportunities: ForkOpportunity[] = [];
	if (boardstate.getPiecesOfColor(board, typeutil.invertPlayer(color)).length < 2) return opportunities;

	for (const { square: fromSquare, piece } of boardstate.getPiecesOfColor(board, color)) {
		for (const toSquare of getReachableSquares(board, fromSquare, piece)) {
			const captures = boardstate.getPiece(board, toSquare);
			const moved = boardstate.withPiece(boardstate.withoutPiece(board, fromSquare), toSquare, piece);

			const targets: LocatedPiece[] = [];
			for (const attacked of attackindex.getAttackedSquaresFrom(moved, toSquare, piece)) {
				const target = boardstate.getPiece(moved, attacked);
				if (target && target.color !== color) targets.push({ square: attacked, piece: target });
			}
			if (targets.length < 2) continue;

			opportunities.push({
				fromSquare,
				toSquare,
				piece,
				targets,
				totalValue: sumValues(targets),
				captures,
				isSafe: !attacks.computeHanging(moved, toSquare),
			});
		}
	}

	// Array.prototype.sort is stable, so equal values keep their scan order
	return opportunities.sort((a, b) => b.totalValue - a.totalValue);
}

export default {
	findForks,
	getReachableSquares,
	findForkSquares,
};

export type { ForkRecord, ForkOpportunity };
