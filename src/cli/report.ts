// src/cli/report.ts

/**
 * Turns the results of the analyses into the text and JSON the command line prints.
 */

import type { BoardState, LocatedPiece } from '../shared/chess/logic/boardstate.js';
import type { AttackRecord } from '../shared/chess/logic/attackindex.js';
import type { SquareReport } from '../shared/chess/logic/attacks.js';
import type { MoveReport } from '../shared/chess/logic/movesafety.js';
import type { TacticsReport } from '../shared/chess/logic/tactics/tacticsummary.js';
import type { Piece, Player } from '../shared/chess/util/typeutil.js';
import type { Square } from '../shared/chess/util/squareutil.js';

import movepiece from '../shared/chess/logic/movepiece.js';
import squareutil, { BOARD_SIZE } from '../shared/chess/util/squareutil.js';
import tacticsummary from '../shared/chess/logic/tactics/tacticsummary.js';
import typeutil, { kindNames } from '../shared/chess/util/typeutil.js';

// Pieces & Squares ------------------------------------------------------------

const FILE_LABELS = '  a b c d e f g h';
const BOARD_EDGE = '  ─────────────────';

/** 'White' */
function colorName(color: Player): string {
	return color.charAt(0).toUpperCase() + color.slice(1);
}

/** 'white knight on f3' */
function describeAt(piece: Piece, square: Square): string {
	return `${typeutil.describePiece(piece)} on ${squareutil.toAlgebraic(square)}`;
}

function describeLocated({ piece, square }: LocatedPiece): string {
	return describeAt(piece, square);
}

function describeAttacker(record: AttackRecord): string {
	return describeAt(record.attacker, record.attackerSquare);
}

function listAttackers(records: readonly AttackRecord[]): string {
	return records.length === 0 ? 'nothing' : records.map(describeAttacker).join(', ');
}

// Board -----------------------------------------------------------------------

/** Draws the board from white's side, followed by whose turn it is. */
function renderBoard(board: BoardState): string {
	const lines = [FILE_LABELS, BOARD_EDGE];
	for (let rank = BOARD_SIZE - 1; rank >= 0; rank--) {
		let row = `${rank + 1}│`;
		for (let file = 0; file < BOARD_SIZE; file++) {
			const piece = board.squares[rank * BOARD_SIZE + file];
			row += (piece ? typeutil.getCharFromPiece(piece) : '.') + ' ';
		}
		lines.push(`${row}│${rank + 1}`);
	}
	lines.push(BOARD_EDGE, FILE_LABELS, '', `Turn: ${colorName(board.turn)}`);
	return lines.join('\n');
}

// Squares ---------------------------------------------------------------------

/** The square report with every square and piece spelled out, ready for JSON. */
function squareReportToJSON(report: SquareReport) {
	return {
		square: squareutil.toAlgebraic(report.square),
		piece: report.piece ? typeutil.describePiece(report.piece) : null,
		whiteAttackers: report.whiteAttackers.map(describeAttacker),
		blackAttackers: report.blackAttackers.map(describeAttacker),
		defenders: report.defenders.map(describeAttacker),
		isHanging: report.isHanging,
		isProtected: report.isProtected,
	};
}

// Hanging Pieces --------------------------------------------------------------

/**
 * Lists the color's hanging pieces with what attacks each of them,
 * then the pieces nothing defends.
 */
function renderHanging(color: Player, hanging: readonly { located: LocatedPiece; attackers: readonly AttackRecord[] }[], undefended: readonly LocatedPiece[]): string {
	const lines: string[] = [];
	if (hanging.length === 0) lines.push(`No hanging pieces for ${colorName(color)}`);
	else {
		lines.push(`Hanging pieces for ${colorName(color)}:`);
		for (const { located, attackers } of hanging) {
			lines.push(`  ${describeLocated(located)}, attacked by ${listAttackers(attackers)}`);
		}
	}

	if (undefended.length > 0) {
		lines.push('', `Undefended ${colorName(color)} pieces (not necessarily under attack):`);
		for (const located of undefended) lines.push(`  ${describeLocated(located)}`);
	}
	return lines.join('\n');
}

// Moves -----------------------------------------------------------------------

/** Everything about the move worth warning the player of. */
function getMoveWarnings(report: MoveReport): string[] {
	const warnings: string[] = [];
	const to = squareutil.toAlgebraic(report.move.to);

	if (!report.isDestinationSafe) {
		if (report.captured) warnings.push(`Capture on ${to} may lose material (recapture possible)`);
		else if (report.defenders.length === 0) warnings.push(`${colorName(report.piece.color)} ${kindNames[report.piece.kind]} moves to ${to} which is attacked and will be undefended!`);
		else warnings.push(`${to} has ${report.opponentAttackers.length} attackers and ${report.defenders.length} defenders, the exchange loses material`);
	}
	for (const located of report.newlyHanging) warnings.push(`${describeLocated(located)} will be left hanging!`);
	for (const ray of report.obstructedRays) {
		warnings.push(`Blocks the ${describeAt(ray.slider, ray.sliderSquare)}, cutting off ${ray.lostSquares.map(squareutil.toAlgebraic).join(' ')}`);
	}
	if (report.weakensKingDefense) warnings.push('This move weakens king defense');
	return warnings;
}

/** A short human-readable verdict on the move. */
function renderMoveVerdict(report: MoveReport): string {
	const capture = report.captured ? `x${typeutil.describePiece(report.captured.piece)}` : '';
	const lines = [`Move: ${movepiece.describeMove(report.move)}${capture}`];

	if (report.givesCheck) lines.push('[+] Gives check!');
	if (report.captured) {
		const gain = typeutil.getPieceValue(report.captured.piece);
		if (report.isDestinationSafe) lines.push(`[+] Safe capture (+${gain})`);
		else lines.push(`[?] Capture may trade: +${gain} but -${typeutil.getPieceValue(report.piece)}`);
	}

	const warnings = getMoveWarnings(report);
	for (const warning of warnings) lines.push(`[!] ${warning}`);
	if (warnings.length === 0) lines.push('[+] No obvious issues');

	return lines.join('\n');
}

/** The full move report with every square and piece spelled out, ready for JSON. */
function moveReportToJSON(report: MoveReport) {
	return {
		move: movepiece.describeMove(report.move),
		kind: report.move.kind,
		piece: typeutil.describePiece(report.piece),
		captured: report.captured ? describeLocated(report.captured) : null,
		opponentAttackers: report.opponentAttackers.map(describeAttacker),
		defenders: report.defenders.map(describeAttacker),
		exchange: report.exchange
			? {
					netGain: report.exchange.netGain,
					capturesPlayed: report.exchange.capturesPlayed,
					sequence: report.exchange.sequence.map((step) => `${describeAt(step.attacker, step.attackerSquare)} takes ${typeutil.describePiece(step.captured)}`),
				}
			: null,
		isDestinationSafe: report.isDestinationSafe,
		newlyHanging: report.newlyHanging.map(describeLocated),
		obstructedRays: report.obstructedRays.map((ray) => ({
			slider: describeAt(ray.slider, ray.sliderSquare),
			direction: ray.direction,
			lostSquares: ray.lostSquares.map(squareutil.toAlgebraic),
		})),
		givesCheck: report.givesCheck,
		weakensKingDefense: report.weakensKingDefense,
	};
}

// Tactics ---------------------------------------------------------------------

/** Lists everything the tactics report found, one section per pattern. */
function renderTactics(report: TacticsReport): string {
	const lines = [`Tactics for ${colorName(report.color)}:`];

	if (report.forks.length > 0) {
		lines.push('', 'ACTIVE FORKS:');
		for (const fork of report.forks) {
			lines.push(`  ${describeAt(fork.forkingPiece, fork.forkingSquare)} forks: ${fork.targets.map(describeLocated).join(', ')}`);
		}
	}

	if (report.forkOpportunities.length > 0) {
		lines.push('', 'FORK OPPORTUNITIES:');
		for (const opportunity of report.forkOpportunities) {
			const capture = opportunity.captures ? ` (capturing ${typeutil.describePiece(opportunity.captures)})` : '';
			const safety = opportunity.isSafe ? 'safe' : 'UNSAFE';
			lines.push(`  ${describeAt(opportunity.piece, opportunity.fromSquare)} to ${squareutil.toAlgebraic(opportunity.toSquare)}${capture} forks: ${opportunity.targets.map(describeLocated).join(', ')} [${safety}]`);
		}
	}

	if (report.pinsAgainst.length > 0) {
		lines.push('', 'WE ARE PINNED:');
		for (const pin of report.pinsAgainst) {
			lines.push(`  ${describeAt(pin.pinnedPiece, pin.pinnedSquare)} pinned by ${describeAt(pin.pinningAttacker, pin.pinningSquare)}`);
		}
	}

	if (report.pinsFor.length > 0 || report.relativePinsFor.length > 0) {
		lines.push('', 'ENEMY IS PINNED:');
		for (const pin of report.pinsFor) {
			lines.push(`  ${describeAt(pin.pinnedPiece, pin.pinnedSquare)} pinned by ${describeAt(pin.pinningAttacker, pin.pinningSquare)} (to the king)`);
		}
		for (const pin of report.relativePinsFor) {
			lines.push(`  ${describeAt(pin.pinnedPiece, pin.pinnedSquare)} pinned by ${describeAt(pin.pinningAttacker, pin.pinningSquare)} (to the ${describeAt(pin.shieldedPiece, pin.shieldedSquare)})`);
		}
	}

	if (report.skewers.length > 0) {
		lines.push('', 'OUR SKEWERS:');
		for (const skewer of report.skewers) {
			lines.push(`  ${describeAt(skewer.attacker, skewer.attackerSquare)} ${skewer.kind}: ${describeAt(skewer.front, skewer.frontSquare)} / ${describeAt(skewer.back, skewer.backSquare)}`);
		}
	}

	if (report.discoveredAttacks.length > 0) {
		lines.push('', 'DISCOVERED ATTACK OPPORTUNITIES:');
		for (const discovery of report.discoveredAttacks) {
			const check = discovery.isCheck ? ' (CHECK!)' : '';
			lines.push(`  Move ${describeAt(discovery.blocker, discovery.blockerSquare)} to reveal ${describeAt(discovery.slider, discovery.sliderSquare)} -> ${describeAt(discovery.target, discovery.targetSquare)}${check}`);
		}
	}

	if (tacticsummary.isQuiet(report)) lines.push('No major tactical patterns found.');
	return lines.join('\n');
}

export default {
	colorName,
	describeAt,
	renderBoard,
	squareReportToJSON,
	renderHanging,
	getMoveWarnings,
	renderMoveVerdict,
	moveReportToJSON,
	renderTactics,
};
