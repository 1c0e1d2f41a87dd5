// src/shared/chess/logic/raycaster.ts

/**
 * This script walks the board geometry: sliding rays out to their first
 * blocker, and the fixed leaper patterns of knights, kings and pawn captures.
 *
 * Direction order is fixed (N, NE, E, SE, S, SW, W, NW) so that everything
 * enumerated from these rays comes out in the same order on every run.
 */

import type { BoardState, LocatedPiece } from './boardstate.js';
import type { Kind, Piece, Player } from '../util/typeutil.js';
import type { Offset, Square } from '../util/squareutil.js';

import squareutil from '../util/squareutil.js';
import { kinds, players } from '../util/typeutil.js';

// Type Definitions ------------------------------------------------------------

type Direction = 'N' | 'NE' | 'E' | 'SE' | 'S' | 'SW' | 'W' | 'NW';

/** A single square visited by a ray or a leaper pattern. */
interface RayStep {
	square: Square;
	/** The piece on the square, if any. */
	piece: Piece | undefined;
	/** The direction walked. Undefined for leaper steps. */
	direction: Direction | undefined;
	/** How many steps out from the origin. Always 1 for leaper steps. */
	distance: number;
	/** True on the occupied square that ends a sliding ray. Leaper steps never block. */
	isBlocker: boolean;
}

// Constants -------------------------------------------------------------------

/** All 8 directions, in scan order. */
const DIRECTIONS: readonly Direction[] = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'];

/** The file/rank step of each direction. */
const DIRECTION_VECTORS: Record<Direction, Offset> = {
	N: [0, 1],
	NE: [1, 1],
	E: [1, 0],
	SE: [1, -1],
	S: [0, -1],
	SW: [-1, -1],
	W: [-1, 0],
	NW: [-1, 1],
};

const ORTHOGONAL_DIRECTIONS: readonly Direction[] = ['N', 'E', 'S', 'W'];
const DIAGONAL_DIRECTIONS: readonly Direction[] = ['NE', 'SE', 'SW', 'NW'];

/** The same 8 squares as the directions, one step out. */
const KING_OFFSETS: readonly Offset[] = DIRECTIONS.map((direction) => DIRECTION_VECTORS[direction]);

/**
 * Generates the 8 jumps for an (m,n) leaper.
 * It creates all permutations of (±m, ±n) and (±n, ±m), clockwise from north.
 */
function generateLeaperOffsets(m: number, n: number): Offset[] {
	return [
		[m, n], [n, m], [n, -m], [m, -n],
		[-m, -n], [-n, -m], [-n, m], [-m, n],
	];
}

const KNIGHT_OFFSETS: readonly Offset[] = generateLeaperOffsets(1, 2);

/** The two squares each color's pawns capture on, relative to the pawn. */
const PAWN_CAPTURE_OFFSETS: Record<Player, readonly Offset[]> = {
	[players.WHITE]: [[-1, 1], [1, 1]],
	[players.BLACK]: [[-1, -1], [1, -1]],
};

// Rays ------------------------------------------------------------------------

/**
 * Walks one direction out from the square, up to and including the first
 * occupied square, which is flagged as the blocker. Stops at the board edge.
 * The origin square itself is never included.
 */
function castRay(board: BoardState, from: Square, direction: Direction): RayStep[] {
	const steps: RayStep[] = [];
	const vector = DIRECTION_VECTORS[direction];
	let distance = 0;
	let current: Square | undefined = squareutil.offset(from, vector);
	while (current !== undefined) {
		distance++;
		const piece = board.squares[current];
		steps.push({ square: current, piece, direction, distance, isBlocker: piece !== undefined });
		if (piece) break; // Blocked
		current = squareutil.offset(current, vector);
	}
	return steps;
}

/** {@link castRay} for every direction of the set, concatenated in the set's order. */
function cast(board: BoardState, from: Square, directions: readonly Direction[]): RayStep[] {
	return directions.flatMap((direction) => castRay(board, from, direction));
}

/** Returns the on-board squares of a leaper pattern. These are never blocked. */
function leap(board: BoardState, from: Square, offsets: readonly Offset[]): RayStep[] {
	const steps: RayStep[] = [];
	for (const jump of offsets) {
		const square = squareutil.offset(from, jump);
		if (square === undefined) continue; // Off the board
		steps.push({ square, piece: board.squares[square], direction: undefined, distance: 1, isBlocker: false });
	}
	return steps;
}

/**
 * Returns the first `limit` occupied squares along a ray, looking straight
 * through whatever it passes. Used to find what stands behind a blocker.
 */
function scanLine(board: BoardState, from: Square, direction: Direction, limit: number): LocatedPiece[] {
	const found: LocatedPiece[] = [];
	const vector = DIRECTION_VECTORS[direction];
	let current: Square | undefined = squareutil.offset(from, vector);
	while (current !== undefined && found.length < limit) {
		const piece = board.squares[current];
		if (piece) found.push({ square: current, piece });
		current = squareutil.offset(current, vector);
	}
	return found;
}

// Geometry --------------------------------------------------------------------

/** The directions a piece of this kind slides along. Empty for non-sliders. */
function directionsForKind(kind: Kind): readonly Direction[] {
	switch (kind) {
		case kinds.BISHOP:
			return DIAGONAL_DIRECTIONS;
		case kinds.ROOK:
			return ORTHOGONAL_DIRECTIONS;
		case kinds.QUEEN:
			return DIRECTIONS;
		default:
			return [];
	}
}

/** Returns true if a piece of this kind slides along the direction. */
function canSlideAlong(kind: Kind, direction: Direction): boolean {
	return directionsForKind(kind).includes(direction);
}

/**
 * Returns the direction to walk from one square to reach another,
 * or undefined if they don't share a rank, file or diagonal.
 */
function directionBetween(from: Square, to: Square): Direction | undefined {
	if (from === to) return undefined;
	const fileDelta = squareutil.fileOf(to) - squareutil.fileOf(from);
	const rankDelta = squareutil.rankOf(to) - squareutil.rankOf(from);
	if (fileDelta !== 0 && rankDelta !== 0 && Math.abs(fileDelta) !== Math.abs(rankDelta)) return undefined;
	const step: Offset = [Math.sign(fileDelta), Math.sign(rankDelta)];
	return DIRECTIONS.find((direction) => {
		const vector = DIRECTION_VECTORS[direction];
		return vector[0] === step[0] && vector[1] === step[1];
	});
}

/** The squares strictly between two aligned squares. Empty if they aren't aligned. */
function squaresBetween(from: Square, to: Square): Square[] {
	const direction = directionBetween(from, to);
	if (direction === undefined) return [];
	const squares: Square[] = [];
	let current = squareutil.offset(from, DIRECTION_VECTORS[direction]);
	while (current !== undefined && current !== to) {
		squares.push(current);
		current = squareutil.offset(current, DIRECTION_VECTORS[direction]);
	}
	return squares;
}

export default {
	castRay,
	cast,
	leap,
	scanLine,
	directionsForKind,
	canSlideAlong,
	directionBetween,
	squaresBetween,
};

export {
	DIRECTIONS,
	DIRECTION_VECTORS,
	KING_OFFSETS,
	KNIGHT_OFFSETS,
	PAWN_CAPTURE_OFFSETS,
};

export type { Direction, RayStep };
