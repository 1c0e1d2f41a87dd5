// src/shared/chess/logic/tactics/discoveries.ts

/**
 * Discovered attacks: a friendly piece standing in front of one of our
 * own sliders, which would open the slider's line onto an enemy piece by moving away.
 */

import type { BoardState } from '../boardstate.js';
import type { Direction } from '../raycaster.js';
import type { Piece, Player } from '../../util/typeutil.js';
import type { Square } from '../../util/squareutil.js';
import type { QueryResult } from '../../util/queryresult.js';

import boardstate from '../boardstate.js';
import attackindex from '../attackindex.js';
import typeutil, { kinds } from '../../util/typeutil.js';
import { succeed } from '../../util/queryresult.js';

// Type Definitions ------------------------------------------------------------

/** A discovered check: moving the blocker exposes the enemy king to the slider. */
interface DiscoveryRecord {
	slider: Piece;
	sliderSquare: Square;
	/** Our own piece that would have to move. */
	blocker: Piece;
	blockerSquare: Square;
	kingSquare: Square;
	/** Points from the slider toward the enemy king. */
	direction: Direction;
}

/** A discovered attack on any enemy piece. */
interface DiscoveredAttackRecord {
	slider: Piece;
	sliderSquare: Square;
	blocker: Piece;
	blockerSquare: Square;
	target: Piece;
	targetSquare: Square;
	direction: Direction;
	/** True when the target is the enemy king. */
	isCheck: boolean;
}

// Functions -------------------------------------------------------------------

/**
 * Finds every line where a slider of the color is blocked by its own piece,
 * and its x-ray through that piece lands on an enemy piece: what the slider
 * would hit once the blocker moves away.
 */
function findDiscoveredAttacks(board: BoardState, color: Player): DiscoveredAttackRecord[] {
	const discoveries: DiscoveredAttackRecord[] = [];
	const enemy = typeutil.invertPlayer(color);
	const index = attackindex.build(board, color, { xrays: true });

	for (const { square: sliderSquare, piece: slider } of boardstate.getPiecesOfColor(board, color)) {
		for (const xray of attackindex.getXrayHitsBy(board, index, sliderSquare)) {
			const blocker = boardstate.getPiece(board, xray.blockerSquare);
			const target = boardstate.getPiece(board, xray.targetSquare);
			if (blocker?.color !== color || target?.color !== enemy) continue;

			discoveries.push({
				slider,
				sliderSquare,
				blocker,
				blockerSquare: xray.blockerSquare,
				target,
				targetSquare: xray.targetSquare,
				direction: xray.direction,
				isCheck: target.kind === kinds.KING,
			});
		}
	}

	return discoveries;
}

/**
 * Finds every discovered check the color has available: one of its own
 * pieces stands between its slider and the enemy king.
 * Fails with MalformedBoard unless each color has exactly one king.
 */
function findDiscoveries(board: BoardState, color: Player): QueryResult<DiscoveryRecord[]> {
	const validation = boardstate.validateKings(board);
	if (!validation.success) return validation;

	const checks = findDiscoveredAttacks(board, color)
		.filter((discovery) => discovery.isCheck)
		.map((discovery) => ({
			slider: discovery.slider,
			sliderSquare: discovery.sliderSquare,
			blocker: discovery.blocker,
			blockerSquare: discovery.blockerSquare,
			kingSquare: discovery.targetSquare,
			direction: discovery.direction,
		}));
	return succeed(checks);
}

export default {
	findDiscoveredAttacks,
	findDiscoveries,
};

export type { DiscoveryRecord, DiscoveredAttackRecord };
