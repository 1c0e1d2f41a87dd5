// src/shared/chess/util/squareutil.ts

/**
 * This script contains utility methods for working with squares.
 *
 * A square is an index 0-63: a1 = 0, h1 = 7, a8 = 56, h8 = 63.
 *
 * ZERO dependancies.
 */

// Type Definitions ------------------------------------------------------------

/** An index 0-63 into the board. */
type Square = number;

/** A file/rank step, e.g. [1,2] for a knight jump. */
type Offset = readonly [number, number];

// Constants -------------------------------------------------------------------

const BOARD_SIZE = 8;
const SQUARE_COUNT = BOARD_SIZE * BOARD_SIZE;

const FILE_CHARS = 'abcdefgh';

// Functions -------------------------------------------------------------------

/** 0-7 (a-h) */
function fileOf(square: Square): number {
	return square % BOARD_SIZE;
}

/** 0-7 (1-8) */
function rankOf(square: Square): number {
	return Math.floor(square / BOARD_SIZE);
}

function isOnBoard(file: number, rank: number): boolean {
	return file >= 0 && file < BOARD_SIZE && rank >= 0 && rank < BOARD_SIZE;
}

function isValidSquare(square: number): boolean {
	return Number.isInteger(square) && square >= 0 && square < SQUARE_COUNT;
}

/** Returns the square at the file and rank, or undefined if it's off the board. */
function fromFileRank(file: number, rank: number): Square | undefined {
	if (!isOnBoard(file, rank)) return undefined;
	return rank * BOARD_SIZE + file;
}

/**
 * Returns the square offset by the file and rank deltas,
 * or undefined if that lands off the board.
 */
function offset(square: Square, [fileDelta, rankDelta]: Offset): Square | undefined {
	return fromFileRank(fileOf(square) + fileDelta, rankOf(square) + rankDelta);
}

/** Returns the algebraic name of a square: 28 => 'e4' */
function toAlgebraic(square: Square): string {
	if (!isValidSquare(square)) throw new Error(`Square ${square} is off the board.`);
	return `${FILE_CHARS.charAt(fileOf(square))}${rankOf(square) + 1}`;
}

/**
 * Returns the square of an algebraic name: 'e4' => 28
 * Returns undefined if the name is not a square.
 */
function fromAlgebraic(name: string): Square | undefined {
	if (name.length !== 2) return undefined;
	const file = FILE_CHARS.indexOf(name.charAt(0).toLowerCase());
	const rank = Number(name.charAt(1)) - 1;
	if (file === -1 || !Number.isInteger(rank)) return undefined;
	return fromFileRank(file, rank);
}

/**
 * {@link fromAlgebraic}, but throws if the name is not a square.
 * Handy for building positions in code.
 */
function sq(name: string): Square {
	const square = fromAlgebraic(name);
	if (square === undefined) throw new Error(`"${name}" is not a square.`);
	return square;
}

/** Returns the largest file or rank distance between two squares. */
function chebyshevDistance(square1: Square, square2: Square): number {
	return Math.max(
		Math.abs(fileOf(square1) - fileOf(square2)),
		Math.abs(rankOf(square1) - rankOf(square2)),
	);
}

// Exports --------------------------------------------------------------------

export default {
	fileOf,
	rankOf,
	isOnBoard,
	isValidSquare,
	fromFileRank,
	offset,
	toAlgebraic,
	fromAlgebraic,
	sq,
	chebyshevDistance,
};

export { BOARD_SIZE, SQUARE_COUNT };

export type { Square, Offset };
