// src/shared/chess/logic/tactics/pins.ts

/**
 * Pin detection.
 *
 * An absolute pin: a piece that can't leave its line without
 * exposing its own king to the enemy slider at the far end.
 * A relative pin: the same shape, shielding a more valuable
 * piece instead of the king.
 */

import type { BoardState, LocatedPiece } from '../boardstate.js';
import type { Direction } from '../raycaster.js';
import type { Piece, Player } from '../../util/typeutil.js';
import type { Square } from '../../util/squareutil.js';
import type { QueryResult } from '../../util/queryresult.js';

import boardstate from '../boardstate.js';
import raycaster, { DIRECTIONS } from '../raycaster.js';
import squareutil from '../../util/squareutil.js';
import typeutil, { kinds, players } from '../../util/typeutil.js';
import { succeed } from '../../util/queryresult.js';

// Type Definitions ------------------------------------------------------------

interface PinRecord {
	pinnedSquare: Square;
	pinnedPiece: Piece;
	/** The enemy slider at the far end of the line. */
	pinningAttacker: Piece;
	pinningSquare: Square;
	kingSquare: Square;
	/** Points from the king out toward the pinned piece and the pinner. */
	rayDirection: Direction;
}

interface RelativePinRecord {
	pinnedSquare: Square;
	pinnedPiece: Piece;
	pinningAttacker: Piece;
	pinningSquare: Square;
	/** The more valuable piece behind the pinned one. */
	shieldedSquare: Square;
	shieldedPiece: Piece;
	/** Points from the shielded piece out toward the pinned piece and the pinner. */
	rayDirection: Direction;
}

/** The kinds worth shielding in a relative pin. */
const SHIELDED_KINDS: readonly Piece['kind'][] = [kinds.QUEEN, kinds.ROOK, kinds.BISHOP, kinds.KNIGHT];

// Scanning --------------------------------------------------------------------

/**
 * Looks out from a piece in one direction. If the first piece met is friendly
 * and the second is an enemy slider that moves along this line, returns both.
 */
function scanForPin(board: BoardState, from: LocatedPiece, direction: Direction): [LocatedPiece, LocatedPiece] | undefined {
	const [first, second] = raycaster.scanLine(board, from.square, direction, 2);
	if (!first || !second) return undefined;
	if (first.piece.color !== from.piece.color) return undefined; // First blocker is an enemy, nothing pinned
	if (second.piece.color === from.piece.color) return undefined;
	if (!raycaster.canSlideAlong(second.piece.kind, direction)) return undefined; // Can't attack down this line
	return [first, second];
}

/**
 * Returns the absolute pins against every king of the color.
 * Doesn't check how many kings there are, so a board without one yields no pins.
 */
function collectPins(board: BoardState, color: Player): PinRecord[] {
	const pins: PinRecord[] = [];
	for (const king of boardstate.getPiecesOfKind(board, kinds.KING, color)) {
		for (const direction of DIRECTIONS) {
			const found = scanForPin(board, king, direction);
			if (!found) continue;
			const [pinned, pinner] = found;
			pins.push({
				pinnedSquare: pinned.square,
				pinnedPiece: pinned.piece,
				pinningAttacker: pinner.piece,
				pinningSquare: pinner.square,
				kingSquare: king.square,
				rayDirection: direction,
			});
		}
	}
	return pins;
}

/**
 * Finds every absolutely pinned piece. Both colors (white's pinned pieces first),
 * or only the pieces of `color` if provided.
 * Fails with MalformedBoard unless each color has exactly one king.
 */
function findPins(board: BoardState, color?: Player): QueryResult<PinRecord[]> {
	const validation = boardstate.validateKings(board);
	if (!validation.success) return validation;

	const colors = color === undefined ? [players.WHITE, players.BLACK] : [color];
	return succeed(colors.flatMap((c) => collectPins(board, c)));
}

/**
 * Finds the pieces of a color pinned to a more valuable piece behind them, the king aside.
 * Pins to the king are not included, see {@link findPins}.
 */
function findRelativePins(board: BoardState, color: Player): RelativePinRecord[] {
	const pins: RelativePinRecord[] = [];
	for (const shielded of boardstate.getPiecesOfColor(board, color)) {
		if (!SHIELDED_KINDS.includes(shielded.piece.kind)) continue;
		for (const direction of DIRECTIONS) {
			const found = scanForPin(board, shielded, direction);
			if (!found) continue;
			const [pinned, pinner] = found;
			if (typeutil.getPieceValue(shielded.piece) <= typeutil.getPieceValue(pinned.piece)) continue; // Nothing gained by the pin
			pins.push({
				pinnedSquare: pinned.square,
				pinnedPiece: pinned.piece,
				pinningAttacker: pinner.piece,
				pinningSquare: pinner.square,
				shieldedSquare: shielded.square,
				shieldedPiece: shielded.piece,
				rayDirection: direction,
			});
		}
	}
	return pins;
}

// Pin Lines -------------------------------------------------------------------

/**
 * Returns true if the square lies on the pin's line between the king
 * and the pinner, the pinner's own square included.
 * A pinned piece may only ever move to, or capture on, these squares.
 */
function isOnPinLine(pin: PinRecord, square: Square): boolean {
	if (raycaster.directionBetween(pin.kingSquare, square) !== pin.rayDirection) return false;
	return squareutil.chebyshevDistance(pin.kingSquare, square) <= squareutil.chebyshevDistance(pin.kingSquare, pin.pinningSquare);
}

/** Returns the pin holding the piece on the square, if any. */
function getPinOn(pins: readonly PinRecord[], square: Square): PinRecord | undefined {
	return pins.find((pin) => pin.pinnedSquare === square);
}

export default {
	collectPins,
	findPins,
	findRelativePins,
	isOnPinLine,
	getPinOn,
};

export type { PinRecord, RelativePinRecord };
