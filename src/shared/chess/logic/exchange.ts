// src/shared/chess/logic/exchange.ts

/**
 * Static exchange evaluation.
 *
 * Plays out every capture on one square, both sides always taking with
 * their least valuable attacker, then works out where each side would
 * rather stop. The result is the material the first capturer walks away with.
 */

import type { BoardState, LocatedPiece } from './boardstate.js';
import type { PinRecord } from './tactics/pins.js';
import type { Piece, Player } from '../util/typeutil.js';
import type { Square } from '../util/squareutil.js';
import type { QueryResult } from '../util/queryresult.js';

import boardstate from './boardstate.js';
import attackindex from './attackindex.js';
import pins from './tactics/pins.js';
import typeutil, { kinds } from '../util/typeutil.js';
import { errorKinds, fail, succeed } from '../util/queryresult.js';
import squareutil, { SQUARE_COUNT } from '../util/squareutil.js';

// Type Definitions ------------------------------------------------------------

interface ExchangeStep {
	attackerSquare: Square;
	attacker: Piece;
	/** The piece taken by this capture. */
	captured: Piece;
	/** The capturing side's total gain if the exchange ended right after this capture. */
	speculativeGain: number;
	/** Set on a pawn taken en passant. The capturer lands on the skipped square, where the exchange carries on. */
	landingSquare?: Square;
}

interface ExchangeResult {
	square: Square;
	/** The piece standing on the square before the exchange. */
	target: Piece;
	/** The side that captures first: the opponent of the target's owner. */
	capturingSide: Player;
	/**
	 * Material won by the capturing side with both sides stopping whenever
	 * continuing would do them no good. The first capture is always made.
	 * 0 when there is nothing to capture with.
	 */
	netGain: number;
	/** Every capture that could be made, in order, whether or not it is worth making. */
	sequence: ExchangeStep[];
	/** How many captures of the sequence are actually made when both sides stop at the right time. */
	capturesPlayed: number;
}

/** More captures than there are pieces can't happen. Guards the loop regardless. */
const MAX_CAPTURES = SQUARE_COUNT / 2;

// Attacker Selection ----------------------------------------------------------

/**
 * Returns the side's cheapest piece able to capture on the square right now.
 * Rays are cast on the current board, so a slider lined up behind a piece
 * that has just captured is found as soon as the way is clear.
 * Pinned pieces only count if the square is on their pin line.
 * Ties go to whichever attacker comes first in scan order.
 */
function getLeastValuableAttacker(board: BoardState, square: Square, side: Player): LocatedPiece | undefined {
	const index = attackindex.build(board, side);
	const sidePins: PinRecord[] = pins.collectPins(board, side);

	let best: LocatedPiece | undefined;
	for (const record of attackindex.getAttacks(index, square)) {
		const pin = pins.getPinOn(sidePins, record.attackerSquare);
		if (pin && !pins.isOnPinLine(pin, square)) continue; // Can't leave the pin line
		if (best === undefined || typeutil.getPieceValue(record.attacker) < typeutil.getPieceValue(best.piece)) {
			best = { square: record.attackerSquare, piece: record.attacker };
		}
	}
	return best;
}

/**
 * Returns the side's pawn able to open the exchange by taking the pawn on
 * the square en passant, and the square it lands on. Pinned pawns only count
 * if the landing square is on their pin line.
 */
function getEnPassantCapturer(board: BoardState, square: Square, side: Player): { capturer: LocatedPiece; landingSquare: Square } | undefined {
	const landingSquare = board.enPassant;
	if (landingSquare === undefined) return undefined;
	const sidePins: PinRecord[] = pins.collectPins(board, side);

	for (const record of attackindex.getEnPassantAttacks(board, attackindex.build(board, side), square)) {
		const pin = pins.getPinOn(sidePins, record.attackerSquare);
		if (pin && !pins.isOnPinLine(pin, landingSquare)) continue;
		return { capturer: { square: record.attackerSquare, piece: record.attacker }, landingSquare };
	}
	return undefined;
}

// Evaluation ------------------------------------------------------------------

/**
 * Plays out the full capture sequence on the square, without any stopping.
 * A pawn that has just double-pushed may be opened on en passant, after which
 * the captures carry on on the square it skipped over.
 * The board passed in is left untouched; every capture works on a fresh copy.
 */
function simulateCaptures(board: BoardState, square: Square, target: Piece): ExchangeStep[] {
	const sequence: ExchangeStep[] = [];
	let current = board;
	let occupant = target;
	let side = typeutil.invertPlayer(target.color);
	let previousGain = 0;
	let contested = square;

	while (sequence.length < MAX_CAPTURES) {
		let capturer = getLeastValuableAttacker(current, contested, side);
		let landingSquare = contested;
		if (sequence.length === 0 && capturer?.piece.kind !== kinds.PAWN) {
			// Nothing cheaper than a pawn, so an en passant capture goes first when there is one
			const passant = getEnPassantCapturer(current, square, side);
			if (passant) {
				capturer = passant.capturer;
				landingSquare = passant.landingSquare;
			}
		}
		if (!capturer) break; // Side to move has run out of attackers

		const speculativeGain = typeutil.getPieceValue(occupant) - previousGain;
		const step: ExchangeStep = { attackerSquare: capturer.square, attacker: capturer.piece, captured: occupant, speculativeGain };
		if (landingSquare !== contested) step.landingSquare = landingSquare;
		sequence.push(step);

		current = boardstate.withPiece(boardstate.withoutPiece(current, capturer.square), landingSquare, capturer.piece);
		if (landingSquare !== contested) current = boardstate.withoutPiece(current, contested); // Taken en passant
		contested = landingSquare;
		occupant = capturer.piece;
		previousGain = speculativeGain;
		side = typeutil.invertPlayer(side);
	}

	return sequence;
}

/**
 * Works backward through the sequence to find what the first capturer
 * ends up with, and how many captures both sides choose to make.
 */
function resolveStopping(sequence: readonly ExchangeStep[]): { netGain: number; capturesPlayed: number } {
	if (sequence.length === 0) return { netGain: 0, capturesPlayed: 0 };

	const gains = sequence.map((step) => step.speculativeGain);
	// best[i]: the outcome for whoever makes capture i, given they make it and play on optimally
	const best = gains.slice();
	for (let i = gains.length - 1; i > 0; i--) {
		best[i - 1] = Math.min(gains[i - 1]!, -best[i]!);
	}

	let capturesPlayed = 1; // The first capture is forced
	for (let i = 1; i < gains.length; i++) {
		// Capturing only happens if it leaves the opponent worse off than stopping does
		if (-best[i]! < gains[i - 1]!) capturesPlayed++;
		else break;
	}

	const netGain = best[0]!;
	return { netGain: netGain === 0 ? 0 : netGain, capturesPlayed }; // No -0 from an even trade
}

/**
 * Evaluates the exchange on a square without validating the board.
 * Returns undefined if the square is empty.
 */
function computeExchange(board: BoardState, square: Square): ExchangeResult | undefined {
	const target = boardstate.getPiece(board, square);
	if (!target) return undefined;

	const sequence = simulateCaptures(board, square, target);
	const { netGain, capturesPlayed } = resolveStopping(sequence);

	return {
		square,
		target,
		capturingSide: typeutil.invertPlayer(target.color),
		netGain,
		sequence,
		capturesPlayed,
	};
}

/**
 * Evaluates the exchange on the square, the opponent of the piece there capturing first.
 * Fails with InvalidQuery on an empty square, and MalformedBoard unless
 * each color has exactly one king (pins decide which pieces may capture).
 */
function evaluateExchange(board: BoardState, square: Square): QueryResult<ExchangeResult> {
	const validation = boardstate.validateKings(board);
	if (!validation.success) return validation;

	const exchange = computeExchange(board, square);
	if (!exchange) return fail(errorKinds.INVALID_QUERY, `There is no piece on ${squareutil.toAlgebraic(square)} to exchange.`);
	return succeed(exchange);
}

export default {
	getLeastValuableAttacker,
	getEnPassantCapturer,
	simulateCaptures,
	resolveStopping,
	computeExchange,
	evaluateExchange,
};

export type { ExchangeStep, ExchangeResult };
