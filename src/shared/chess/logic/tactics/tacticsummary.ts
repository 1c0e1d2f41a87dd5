// src/shared/chess/logic/tactics/tacticsummary.ts

/**
 * Runs every tactical detector for one side and collects the results.
 */

import type { BoardState } from '../boardstate.js';
import type { Player } from '../../util/typeutil.js';
import type { QueryResult } from '../../util/queryresult.js';
import type { ForkOpportunity, ForkRecord } from './forks.js';
import type { PinRecord, RelativePinRecord } from './pins.js';
import type { SkewerRecord } from './skewers.js';
import type { DiscoveredAttackRecord } from './discoveries.js';

import boardstate from '../boardstate.js';
import forks from './forks.js';
import pins from './pins.js';
import skewers from './skewers.js';
import discoveries from './discoveries.js';
import typeutil from '../../util/typeutil.js';
import { succeed } from '../../util/queryresult.js';

// Type Definitions ------------------------------------------------------------

interface TacticsReport {
	color: Player;
	/** Forks the color has on the board right now. */
	forks: ForkRecord[];
	/** The most valuable squares the color could fork from next move. */
	forkOpportunities: ForkOpportunity[];
	/** Our pieces pinned to our king. */
	pinsAgainst: PinRecord[];
	/** Enemy pieces pinned to their king. */
	pinsFor: PinRecord[];
	/** Enemy pieces pinned to a more valuable piece that isn't the king. */
	relativePinsFor: RelativePinRecord[];
	/** Skewers and pins our sliders have on enemy pieces. */
	skewers: SkewerRecord[];
	discoveredAttacks: DiscoveredAttackRecord[];
}

/** How many fork opportunities the report keeps. */
const MAX_FORK_OPPORTUNITIES = 5;

// Functions -------------------------------------------------------------------

/** Fails with MalformedBoard unless each color has exactly one king. */
function analyzeTactics(board: BoardState, color: Player): QueryResult<TacticsReport> {
	const validation = boardstate.validateKings(board);
	if (!validation.success) return validation;

	const enemy = typeutil.invertPlayer(color);
	return succeed({
		color,
		forks: forks.findForks(board, color),
		forkOpportunities: forks.findForkSquares(board, color).slice(0, MAX_FORK_OPPORTUNITIES),
		pinsAgainst: pins.collectPins(board, color),
		pinsFor: pins.collectPins(board, enemy),
		relativePinsFor: pins.findRelativePins(board, enemy),
		skewers: skewers.findSkewers(board, color),
		discoveredAttacks: discoveries.findDiscoveredAttacks(board, color),
	});
}

/** Returns true if the report found nothing at all. */
function isQuiet(report: TacticsReport): boolean {
	return (
		report.forks.length === 0 &&
		report.forkOpportunities.length === 0 &&
		report.pinsAgainst.length === 0 &&
		report.pinsFor.length === 0 &&
		report.relativePinsFor.length === 0 &&
		report.skewers.length === 0 &&
		report.discoveredAttacks.length === 0
	);
}

export default {
	analyzeTactics,
	isQuiet,
};

export { MAX_FORK_OPPORTUNITIES };

export type { TacticsReport };
