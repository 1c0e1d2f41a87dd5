// src/shared/chess/logic/movepiece.ts

/**
 * This script applies a move to a board, producing the board after it.
 *
 * It doesn't check legality. Special moves are trusted to be
 * tagged correctly by whatever generated the move.
 */

import type { BoardState, CastlingRight, LocatedPiece } from './boardstate.js';
import type { Kind, Piece, Player } from '../util/typeutil.js';
import type { Square } from '../util/squareutil.js';

import boardstate from './boardstate.js';
import squareutil from '../util/squareutil.js';
import typeutil, { kinds, players } from '../util/typeutil.js';

// Type Definitions ------------------------------------------------------------

type MoveKind = 'normal' | 'en-passant' | 'castle' | 'promotion';

/** A move, as handed over by a legal move generator. */
interface MoveDescriptor {
	from: Square;
	to: Square;
	kind: MoveKind;
	/** The kind a pawn promotes to. Only read on promotion moves, where it defaults to a queen. */
	promotion?: Kind;
	/** Whether the generator considers the move legal. Illegal moves are refused, never analyzed. */
	legal: boolean;
}

const MOVE_KINDS: readonly MoveKind[] = ['normal', 'en-passant', 'castle', 'promotion'];

/** The castling right lost when anything moves from, or is captured on, each corner. */
const CORNER_RIGHTS: ReadonlyMap<Square, CastlingRight> = new Map<Square, CastlingRight>([
	[squareutil.sq('a1'), 'Q'],
	[squareutil.sq('h1'), 'K'],
	[squareutil.sq('a8'), 'q'],
	[squareutil.sq('h8'), 'k'],
]);

/** The castling rights each color loses when its king moves. */
const KING_RIGHTS: Record<Player, readonly CastlingRight[]> = {
	[players.WHITE]: ['K', 'Q'],
	[players.BLACK]: ['k', 'q'],
};

// Move Anatomy ----------------------------------------------------------------

/** Returns the square of the pawn taken by an en passant capture: beside the moving pawn, on the destination's file. */
function getEnPassantVictimSquare(move: MoveDescriptor): Square | undefined {
	return squareutil.fromFileRank(squareutil.fileOf(move.to), squareutil.rankOf(move.from));
}

/** Returns the piece the move captures, and where it stands. */
function getCaptured(board: BoardState, move: MoveDescriptor): LocatedPiece | undefined {
	const mover = boardstate.getPiece(board, move.from);
	if (!mover) return undefined;

	const square = move.kind === 'en-passant' ? getEnPassantVictimSquare(move) : move.to;
	if (square === undefined) return undefined;
	const piece = boardstate.getPiece(board, square);
	if (!piece || piece.color === mover.color) return undefined;
	return { square, piece };
}

/**
 * Returns the rook's start and end squares for a castling move.
 * Kingside when the king heads toward the h-file, the rook landing on the f-file.
 * Queenside otherwise, the rook landing on the d-file.
 */
function getCastlingRookSquares(move: MoveDescriptor): { from: Square; to: Square } | undefined {
	const rank = squareutil.rankOf(move.from);
	const kingside = squareutil.fileOf(move.to) > squareutil.fileOf(move.from);
	const from = squareutil.fromFileRank(kingside ? 7 : 0, rank);
	const to = squareutil.fromFileRank(kingside ? 5 : 3, rank);
	if (from === undefined || to === undefined) return undefined;
	return { from, to };
}

/** Returns the piece that ends up on the destination square: the promoted piece on promotions. */
function getLandingPiece(mover: Piece, move: MoveDescriptor): Piece {
	if (move.kind !== 'promotion') return mover;
	return { color: mover.color, kind: move.promotion ?? kinds.QUEEN };
}

function describeMove(move: MoveDescriptor): string {
	const from = squareutil.toAlgebraic(move.from);
	const to = squareutil.toAlgebraic(move.to);
	const promotion = move.kind === 'promotion' ? `=${(move.promotion ?? kinds.QUEEN).toUpperCase()}` : '';
	return `${from}-${to}${promotion}`;
}

// Simulation ------------------------------------------------------------------

/**
 * Returns the board after making the move. The board passed in is untouched.
 * Updates the turn, castling rights, en passant square and both clocks.
 * Throws if there is no piece on the starting square.
 */
function simulateMove(board: BoardState, move: MoveDescriptor): BoardState {
	const mover = boardstate.getPiece(board, move.from);
	if (!mover) throw new Error(`Cannot move from ${squareutil.toAlgebraic(move.from)}, the square is empty.`);

	const captured = getCaptured(board, move);
	const squares = board.squares.slice();

	if (captured) squares[captured.square] = undefined;
	squares[move.from] = undefined;
	squares[move.to] = getLandingPiece(mover, move);

	if (move.kind === 'castle') {
		const rookSquares = getCastlingRookSquares(move);
		const rook = rookSquares ? squares[rookSquares.from] : undefined;
		if (rookSquares && rook) {
			squares[rookSquares.from] = undefined;
			squares[rookSquares.to] = rook;
		}
	}

	// Castling rights
	const castlingRights = new Set(board.castlingRights);
	if (mover.kind === kinds.KING) {
		for (const right of KING_RIGHTS[mover.color]) castlingRights.delete(right);
	}
	for (const square of [move.from, move.to]) {
		const right = CORNER_RIGHTS.get(square);
		if (right) castlingRights.delete(right);
	}

	// En passant is only ever available right after a double push
	let enPassant: Square | undefined;
	if (mover.kind === kinds.PAWN && Math.abs(squareutil.rankOf(move.to) - squareutil.rankOf(move.from)) === 2) {
		enPassant = (move.from + move.to) / 2;
	}

	const resetsClock = mover.kind === kinds.PAWN || captured !== undefined;

	return {
		squares,
		turn: typeutil.invertPlayer(mover.color),
		castlingRights,
		enPassant,
		halfmoveClock: resetsClock ? 0 : board.halfmoveClock + 1,
		fullmoveNumber: mover.color === players.BLACK ? board.fullmoveNumber + 1 : board.fullmoveNumber,
	};
}

export default {
	getEnPassantVictimSquare,
	getCaptured,
	getCastlingRookSquares,
	getLandingPiece,
	describeMove,
	simulateMove,
};

export { MOVE_KINDS };

export type { MoveKind, MoveDescriptor };
