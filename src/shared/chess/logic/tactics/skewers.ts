// src/shared/chess/logic/tactics/skewers.ts

/**
 * Skewer detection, seen from the attacking slider.
 *
 * The slider's ray meets an enemy piece, and straight behind it a second
 * enemy piece. What that line is worth depends on the two values:
 * - `pin`: the piece behind is the king.
 * - `skewer`: the piece behind is worth more than the front one, and isn't the king.
 * - `forcing-skewer`: the front piece is worth more, so it has to step aside
 *   and give up the one behind (a check along the line is the usual case).
 */

import type { BoardState } from '../boardstate.js';
import type { Direction } from '../raycaster.js';
import type { Piece, Player } from '../../util/typeutil.js';
import type { Square } from '../../util/squareutil.js';

import boardstate from '../boardstate.js';
import attackindex from '../attackindex.js';
import typeutil, { kinds } from '../../util/typeutil.js';

// Type Definitions ------------------------------------------------------------

type SkewerKind = 'pin' | 'skewer' | 'forcing-skewer';

interface SkewerRecord {
	kind: SkewerKind;
	attacker: Piece;
	attackerSquare: Square;
	/** The first enemy piece on the line. */
	front: Piece;
	frontSquare: Square;
	/** The enemy piece directly behind the front one. */
	back: Piece;
	backSquare: Square;
	/** Points from the attacker down the line. */
	direction: Direction;
}

// Functions -------------------------------------------------------------------

/** Classifies two enemy pieces lined up behind each other. Undefined if they are worth the same. */
function classify(front: Piece, back: Piece): SkewerKind | undefined {
	if (back.kind === kinds.KING) return 'pin';
	const frontValue = typeutil.getPieceValue(front);
	const backValue = typeutil.getPieceValue(back);
	if (backValue > frontValue) return 'skewer';
	if (frontValue > backValue) return 'forcing-skewer';
	return undefined;
}

/**
 * Finds every line on which a slider of `attackerColor` hits two enemy pieces in a row:
 * the first blocker of its ray, and the piece its x-ray reaches through it.
 */
function findSkewers(board: BoardState, attackerColor: Player): SkewerRecord[] {
	const skewers: SkewerRecord[] = [];
	const enemy = typeutil.invertPlayer(attackerColor);
	const index = attackindex.build(board, attackerColor, { xrays: true });

	for (const { square } of boardstate.getPiecesOfColor(board, attackerColor)) {
		for (const xray of attackindex.getXrayHitsBy(board, index, square)) {
			const front = boardstate.getPiece(board, xray.blockerSquare);
			const back = boardstate.getPiece(board, xray.targetSquare);
			if (front?.color !== enemy || back?.color !== enemy) continue;

			const kind = classify(front, back);
			if (kind === undefined) continue;

			skewers.push({
				kind,
				attacker: xray.attacker,
				attackerSquare: square,
				front,
				frontSquare: xray.blockerSquare,
				back,
				backSquare: xray.targetSquare,
				direction: xray.direction,
			});
		}
	}

	return skewers;
}

export default {
	classify,
	findSkewers,
};

export type { SkewerKind, SkewerRecord };
