// src/shared/chess/logic/fen/fenconverter.ts

/**
 * Forsyth–Edwards Notation [Converter]
 *
 * This script converts FEN strings into board states and back.
 * 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1'
 */

import type { BoardState, CastlingRight, LocatedPiece } from '../boardstate.js';
import type { Player } from '../../util/typeutil.js';
import type { Square } from '../../util/squareutil.js';

import boardstate, { CASTLING_RIGHTS } from '../boardstate.js';
import squareutil, { BOARD_SIZE } from '../../util/squareutil.js';
import typeutil, { players } from '../../util/typeutil.js';

// Constants -------------------------------------------------------------------

const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/** The fields a FEN may leave off the end, in order, and the values they take when it does. */
const DEFAULT_FIELDS = ['w', '-', '-', '0', '1'];

const FIELD_COUNT = 6;

const player_codes: Record<string, Player> = {
	w: players.WHITE,
	b: players.BLACK,
};

const castlingRegex = /^(?:-|K?Q?k?q?)$/;
/** En passant targets only ever sit on the 3rd or 6th rank. */
const enpassantRegex = /^(?:-|[a-h][36])$/;
const wholeNumberRegex = /^(?:0|[1-9]\d*)$/;
const countingNumberRegex = /^[1-9]\d*$/;

// Parsing ---------------------------------------------------------------------

/** Parses the placement field into its pieces, rank 8 first. */
function parsePlacement(placement: string): LocatedPiece[] {
	const ranks = placement.split('/');
	if (ranks.length !== BOARD_SIZE) throw new Error(`FEN placement must have ${BOARD_SIZE} ranks, found ${ranks.length} ("${placement}")!`);

	const pieces: LocatedPiece[] = [];
	ranks.forEach((rankString, i) => {
		const rank = BOARD_SIZE - 1 - i;
		let file = 0;
		for (const char of rankString) {
			if (char >= '1' && char <= '8') {
				file += Number(char);
				continue;
			}
			const piece = typeutil.getPieceFromChar(char);
			if (!piece) throw new Error(`Unknown piece letter (${char}) on rank ${rank + 1} of FEN!`);
			const square = squareutil.fromFileRank(file, rank);
			if (square === undefined) throw new Error(`Rank ${rank + 1} of FEN is longer than ${BOARD_SIZE} squares ("${rankString}")!`);
			pieces.push({ square, piece });
			file++;
		}
		if (file !== BOARD_SIZE) throw new Error(`Rank ${rank + 1} of FEN must span ${BOARD_SIZE} squares, found ${file} ("${rankString}")!`);
	});
	return pieces;
}

function parseCastling(castling: string): CastlingRight[] {
	if (!castlingRegex.test(castling)) throw new Error(`Invalid castling field (${castling}) in FEN!`);
	return CASTLING_RIGHTS.filter((right) => castling.includes(right));
}

function parseEnPassant(enpassant: string): Square | undefined {
	if (!enpassantRegex.test(enpassant)) throw new Error(`Invalid en passant square (${enpassant}) in FEN!`);
	if (enpassant === '-') return undefined;
	return squareutil.sq(enpassant);
}

/**
 * Parses a FEN string into a board. Trailing fields may be left off,
 * and take the values of a fresh game ('w - - 0 1').
 * Throws an error naming the problem if the FEN is malformed.
 */
function parseFen(fen: string): BoardState {
	const fields = fen.trim().split(/\s+/);
	if (fields.length > FIELD_COUNT || fields[0] === '') throw new Error(`FEN must have between 1 and ${FIELD_COUNT} fields, found ${fen.trim() === '' ? 0 : fields.length}!`);
	const [placement, turn, castling, enpassant, halfmove, fullmove] = [...fields, ...DEFAULT_FIELDS.slice(fields.length - 1)];
	if (placement === undefined || turn === undefined || castling === undefined || enpassant === undefined || halfmove === undefined || fullmove === undefined) {
		throw new Error(`FEN is missing fields ("${fen}")!`);
	}

	const player = player_codes[turn];
	if (player === undefined) throw new Error(`Invalid side to move (${turn}) in FEN!`);
	if (!wholeNumberRegex.test(halfmove)) throw new Error(`Invalid halfmove clock (${halfmove}) in FEN!`);
	if (!countingNumberRegex.test(fullmove)) throw new Error(`Invalid fullmove number (${fullmove}) in FEN!`);

	return boardstate.create(parsePlacement(placement), {
		turn: player,
		castlingRights: parseCastling(castling),
		enPassant: parseEnPassant(enpassant),
		halfmoveClock: Number(halfmove),
		fullmoveNumber: Number(fullmove),
	});
}

// Serializing -----------------------------------------------------------------

function getPlacement(board: BoardState): string {
	const ranks: string[] = [];
	for (let rank = BOARD_SIZE - 1; rank >= 0; rank--) {
		let rankString = '';
		let emptyRun = 0;
		for (let file = 0; file < BOARD_SIZE; file++) {
			const piece = board.squares[rank * BOARD_SIZE + file];
			if (!piece) {
				emptyRun++;
				continue;
			}
			if (emptyRun > 0) rankString += emptyRun;
			emptyRun = 0;
			rankString += typeutil.getCharFromPiece(piece);
		}
		if (emptyRun > 0) rankString += emptyRun;
		ranks.push(rankString);
	}
	return ranks.join('/');
}

/** Converts a board into its FEN string, all six fields included. */
function toFen(board: BoardState): string {
	const turn = board.turn === players.WHITE ? 'w' : 'b';
	const castling = CASTLING_RIGHTS.filter((right) => board.castlingRights.has(right)).join('') || '-';
	const enpassant = board.enPassant === undefined ? '-' : squareutil.toAlgebraic(board.enPassant);
	return [getPlacement(board), turn, castling, enpassant, board.halfmoveClock, board.fullmoveNumber].join(' ');
}

export default {
	parseFen,
	toFen,
};

export { STARTING_FEN };
