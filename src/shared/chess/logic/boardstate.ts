// src/shared/chess/logic/boardstate.ts

/**
 * The board snapshot every query runs against.
 *
 * A BoardState is never modified after it's made. Any "what if"
 * produces a new one through {@link withPiece} or {@link clone},
 * which copy the 64-entry square array and nothing deeper.
 */

import type { Piece, Player } from '../util/typeutil.js';
import type { Square } from '../util/squareutil.js';
import type { QueryResult } from '../util/queryresult.js';

import squareutil, { SQUARE_COUNT } from '../util/squareutil.js';
import { kinds, players } from '../util/typeutil.js';
import { errorKinds, fail, succeed } from '../util/queryresult.js';

// Type Definitions ------------------------------------------------------------

/** `K` white kingside, `Q` white queenside, `k` black kingside, `q` black queenside. */
type CastlingRight = 'K' | 'Q' | 'k' | 'q';

interface BoardState {
	/** Index = square. Empty squares are undefined. Always length 64. */
	readonly squares: ReadonlyArray<Piece | undefined>;
	readonly turn: Player;
	readonly castlingRights: ReadonlySet<CastlingRight>;
	/** The square a pawn skipped over on the last double push, if any. */
	readonly enPassant?: Square;
	readonly halfmoveClock: number;
	readonly fullmoveNumber: number;
}

/** A piece, together with the square it stands on. */
interface LocatedPiece {
	square: Square;
	piece: Piece;
}

/** Optional metadata when creating a board. Omitted fields take the values of a fresh game. */
interface BoardMetadata {
	turn?: Player;
	castlingRights?: Iterable<CastlingRight>;
	enPassant?: Square;
	halfmoveClock?: number;
	fullmoveNumber?: number;
}

// Constants -------------------------------------------------------------------

/** In the order FEN writes them. */
const CASTLING_RIGHTS: readonly CastlingRight[] = ['K', 'Q', 'k', 'q'];

// Construction ----------------------------------------------------------------

/**
 * Creates a board from a list of placements.
 * A later placement on the same square replaces the earlier one.
 */
function create(placements: Iterable<LocatedPiece>, metadata: BoardMetadata = {}): BoardState {
	const squares: Array<Piece | undefined> = new Array(SQUARE_COUNT).fill(undefined);
	for (const { square, piece } of placements) {
		if (!squareutil.isValidSquare(square)) throw new Error(`Cannot place a piece on square ${square}.`);
		squares[square] = { ...piece };
	}

	return {
		squares,
		turn: metadata.turn ?? players.WHITE,
		castlingRights: new Set(metadata.castlingRights ?? []),
		enPassant: metadata.enPassant,
		halfmoveClock: metadata.halfmoveClock ?? 0,
		fullmoveNumber: metadata.fullmoveNumber ?? 1,
	};
}

/** Shallow copy of the board. Pieces are values, so sharing them is safe. */
function clone(board: BoardState): BoardState {
	return {
		...board,
		squares: board.squares.slice(),
		castlingRights: new Set(board.castlingRights),
	};
}

/** Returns a copy of the board with one square changed. Pass undefined to empty it. */
function withPiece(board: BoardState, square: Square, piece: Piece | undefined): BoardState {
	const squares = board.squares.slice();
	squares[square] = piece;
	return { ...board, squares };
}

/** Returns a copy of the board with one square emptied. */
function withoutPiece(board: BoardState, square: Square): BoardState {
	return withPiece(board, square, undefined);
}

// Queries ---------------------------------------------------------------------

function getPiece(board: BoardState, square: Square): Piece | undefined {
	return board.squares[square];
}

function isEmpty(board: BoardState, square: Square): boolean {
	return board.squares[square] === undefined;
}

/** Every piece on the board, in square order. */
function getAllPieces(board: BoardState): LocatedPiece[] {
	const pieces: LocatedPiece[] = [];
	board.squares.forEach((piece, square) => {
		if (piece) pieces.push({ square, piece });
	});
	return pieces;
}

/** Every piece of a color, in square order. */
function getPiecesOfColor(board: BoardState, color: Player): LocatedPiece[] {
	return getAllPieces(board).filter(({ piece }) => piece.color === color);
}

/** Every piece of a kind, optionally of one color, in square order. */
function getPiecesOfKind(board: BoardState, kind: Piece['kind'], color?: Player): LocatedPiece[] {
	return getAllPieces(board).filter(({ piece }) => piece.kind === kind && (color === undefined || piece.color === color));
}

/** Returns the square of the first king of the color, or undefined if it has none. */
function findKing(board: BoardState, color: Player): Square | undefined {
	return getPiecesOfKind(board, kinds.KING, color)[0]?.square;
}

/**
 * Makes sure both colors have exactly one king.
 * The analyses that follow lines to a king call this before anything else.
 */
function validateKings(board: BoardState): QueryResult<true> {
	for (const color of [players.WHITE, players.BLACK]) {
		const king = requireKing(board, color);
		if (!king.success) return king;
	}
	return succeed(true);
}

/** Returns the king square of the color, or a MalformedBoard error if it doesn't have exactly one. */
function requireKing(board: BoardState, color: Player): QueryResult<Square> {
	const kings = getPiecesOfKind(board, kinds.KING, color);
	const king = kings[0];
	if (kings.length !== 1 || king === undefined) return fail(errorKinds.MALFORMED_BOARD, `Expected exactly one ${color} king, found ${kings.length}.`);
	return succeed(king.square);
}

export default {
	create,
	clone,
	withPiece,
	withoutPiece,
	getPiece,
	isEmpty,
	getAllPieces,
	getPiecesOfColor,
	getPiecesOfKind,
	findKing,
	validateKings,
	requireKing,
};

export { CASTLING_RIGHTS };

export type { BoardState, LocatedPiece, BoardMetadata, CastlingRight };
