// src/shared/chess/logic/attackindex.ts

/**
 * This script builds the attack index of a color: for every square,
 * which of that color's pieces attack it.
 *
 * The index is built once per board and read many times. It is never
 * updated in place: a changed board gets a freshly built index.
 */

import type { BoardState } from './boardstate.js';
import type { Direction, RayStep } from './raycaster.js';
import type { Piece, PlayerGroup, Player } from '../util/typeutil.js';
import type { Square } from '../util/squareutil.js';

import boardstate from './boardstate.js';
import raycaster, { KING_OFFSETS, KNIGHT_OFFSETS, PAWN_CAPTURE_OFFSETS } from './raycaster.js';
import { BOARD_SIZE, SQUARE_COUNT } from '../util/squareutil.js';
import { kinds, players } from '../util/typeutil.js';

// Type Definitions ------------------------------------------------------------

interface AttackRecord {
	attacker: Piece;
	attackerSquare: Square;
	targetSquare: Square;
	/**
	 * True if the attack passes through exactly one blocker.
	 * X-rays never count as attackers or defenders, they only
	 * show which lines open up once the blocker leaves.
	 */
	isXray: boolean;
}

/** An attack through exactly one blocker. */
interface XrayRecord extends AttackRecord {
	/** The square of the piece seen through. */
	blockerSquare: Square;
	/** Points from the attacker through the blocker. */
	direction: Direction;
}

interface AttackIndex {
	color: Player;
	/** Index = target square. Direct attacks only, in scan order. */
	direct: ReadonlyArray<readonly AttackRecord[]>;
	/** Index = target square. X-ray attacks only, in scan order. Empty unless the index was built with x-rays. */
	xray: ReadonlyArray<readonly XrayRecord[]>;
	/** Direct attacks grouped by the square of the attacker, in scan order. */
	byAttacker: ReadonlyMap<Square, readonly AttackRecord[]>;
	/** X-ray attacks grouped by the square of the attacker, in scan order. */
	xrayByAttacker: ReadonlyMap<Square, readonly XrayRecord[]>;
}

interface BuildOptions {
	/** Also trace every slider's line through its first blocker. Only the tactic detectors read these. */
	xrays?: boolean;
}

// Attack Patterns -------------------------------------------------------------

/**
 * Returns the squares a piece attacks from its square, in scan order.
 * Pawns attack their two capture squares only, never the squares in front.
 * Sliders include the blocker that ends each ray, whichever color it is.
 */
function getAttackSteps(board: BoardState, from: Square, piece: Piece): RayStep[] {
	switch (piece.kind) {
		case kinds.PAWN:
			return raycaster.leap(board, from, PAWN_CAPTURE_OFFSETS[piece.color]);
		case kinds.KNIGHT:
			return raycaster.leap(board, from, KNIGHT_OFFSETS);
		case kinds.KING:
			return raycaster.leap(board, from, KING_OFFSETS);
		default:
			return raycaster.cast(board, from, raycaster.directionsForKind(piece.kind));
	}
}

/** {@link getAttackSteps}, but only the squares. */
function getAttackedSquaresFrom(board: BoardState, from: Square, piece: Piece): Square[] {
	return getAttackSteps(board, from, piece).map((step) => step.square);
}

/**
 * Returns the squares a slider reaches through exactly one blocker in a direction:
 * everything past the first blocker, up to and including the next occupied square.
 */
function getXraySteps(board: BoardState, from: Square, direction: Direction): RayStep[] {
	const ray = raycaster.castRay(board, from, direction);
	const firstBlocker = ray[ray.length - 1];
	if (!firstBlocker?.isBlocker) return []; // Ray runs off the board unobstructed
	return raycaster.castRay(board, firstBlocker.square, direction).map((step) => ({
		...step,
		distance: step.distance + firstBlocker.distance,
	}));
}

// Building --------------------------------------------------------------------

function emptyTable<T>(): T[][] {
	return Array.from({ length: SQUARE_COUNT }, () => []);
}

/**
 * Builds the attack index of one color.
 * The x-ray table is left empty unless `options.xrays` asks for it.
 */
function build(board: BoardState, color: Player, options: BuildOptions = {}): AttackIndex {
	const direct = emptyTable<AttackRecord>();
	const xray = emptyTable<XrayRecord>();
	const byAttacker = new Map<Square, AttackRecord[]>();
	const xrayByAttacker = new Map<Square, XrayRecord[]>();

	const pieces = boardstate.getPiecesOfColor(board, color);

	for (const { square, piece } of pieces) {
		const records: AttackRecord[] = getAttackSteps(board, square, piece).map((step) => ({
			attacker: piece,
			attackerSquare: square,
			targetSquare: step.square,
			isXray: false,
		}));
		for (const record of records) direct[record.targetSquare]!.push(record);
		byAttacker.set(square, records);
	}

	if (!options.xrays) return { color, direct, xray, byAttacker, xrayByAttacker };

	// Secondary pass: what each slider would hit if its first blocker were gone.
	for (const { square, piece } of pieces) {
		const records: XrayRecord[] = [];
		for (const direction of raycaster.directionsForKind(piece.kind)) {
			const blocker = raycaster.castRay(board, square, direction).at(-1);
			if (!blocker?.isBlocker) continue; // Nothing to see through
			for (const step of getXraySteps(board, square, direction)) {
				records.push({ attacker: piece, attackerSquare: square, targetSquare: step.square, isXray: true, blockerSquare: blocker.square, direction });
			}
		}
		for (const record of records) xray[record.targetSquare]!.push(record);
		if (records.length > 0) xrayByAttacker.set(square, records);
	}

	return { color, direct, xray, byAttacker, xrayByAttacker };
}

/** Builds the attack index of both colors. */
function buildAll(board: BoardState, options: BuildOptions = {}): PlayerGroup<AttackIndex> {
	return {
		[players.WHITE]: build(board, players.WHITE, options),
		[players.BLACK]: build(board, players.BLACK, options),
	};
}

// Reading ---------------------------------------------------------------------

/** The direct attacks on a square. */
function getAttacks(index: AttackIndex, square: Square): readonly AttackRecord[] {
	return index.direct[square] ?? [];
}

/** The x-ray attacks on a square. */
function getXrays(index: AttackIndex, square: Square): readonly XrayRecord[] {
	return index.xray[square] ?? [];
}

/**
 * The x-rays of the piece on a square that end on another piece:
 * at most one per direction, each seeing through exactly one blocker.
 */
function getXrayHitsBy(board: BoardState, index: AttackIndex, attackerSquare: Square): XrayRecord[] {
	const records = index.xrayByAttacker.get(attackerSquare) ?? [];
	return records.filter((record) => !boardstate.isEmpty(board, record.targetSquare));
}

/**
 * The index's pawns able to take the pawn on the square en passant, landing on the
 * square it skipped over. Empty unless that pawn has just double-pushed
 * and the index's color is the one to move.
 */
function getEnPassantAttacks(board: BoardState, index: AttackIndex, square: Square): AttackRecord[] {
	const passant = board.enPassant;
	if (passant === undefined || board.turn !== index.color) return [];
	const victim = boardstate.getPiece(board, square);
	if (victim?.kind !== kinds.PAWN || victim.color === index.color) return [];
	const victimSquare = victim.color === players.WHITE ? passant + BOARD_SIZE : passant - BOARD_SIZE;
	if (victimSquare !== square) return []; // Not the pawn that just double-pushed
	return getAttacks(index, passant).filter((record) => record.attacker.kind === kinds.PAWN);
}

/** The direct attacks made by the piece on a square. Empty if the square holds none of the index's pieces. */
function getAttacksBy(index: AttackIndex, attackerSquare: Square): readonly AttackRecord[] {
	return index.byAttacker.get(attackerSquare) ?? [];
}

/** Every square attacked at least once, ascending. */
function getAttackedSquares(index: AttackIndex): Square[] {
	const squares: Square[] = [];
	index.direct.forEach((records, square) => {
		if (records.length > 0) squares.push(square);
	});
	return squares;
}

export default {
	getAttackSteps,
	getAttackedSquaresFrom,
	getXraySteps,
	build,
	buildAll,
	getAttacks,
	getXrays,
	getXrayHitsBy,
	getEnPassantAttacks,
	getAttacksBy,
	getAttackedSquares,
};

export type { AttackRecord, XrayRecord, AttackIndex, BuildOptions };
