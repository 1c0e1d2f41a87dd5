// src/shared/chess/logic/attacks.test.ts

import type { QueryResult } from '../util/queryresult.js';

import { describe, it, expect } from 'vitest';

import attacks from './attacks.js';
import fenconverter, { STARTING_FEN } from './fen/fenconverter.js';
import squareutil, { SQUARE_COUNT } from '../util/squareutil.js';

const { sq } = squareutil;

function unwrap<T>(result: QueryResult<T>): T {
	if (!result.success) throw new Error(`Query failed: ${result.error.kind} ${result.error.reason}`);
	return result.result;
}

/** 1.e4 e5 2.Nf3 d6: the e5 pawn is defended. */
const DEFENDED_E5 = 'rnbqkbnr/ppp2ppp/3p4/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R w KQkq - 0 3';
/** 1.e4 e5 2.Nf3: the e5 pawn is not. */
const UNDEFENDED_E5 = 'rnbqkbnr/pppp1ppp/8/4p3/4P3/5N2/PPPP1PPP/RNBQKB1R b KQkq - 1 2';
/** A knight on e5, guarded by a queen on e1, attacked by pawns on d6 and f6. */
const QUEEN_GUARDS_AGAINST_PAWNS = '7k/8/3p1p2/4N3/8/8/8/K3Q3 w - - 0 1';
/** A knight on d4 guarded by a pawn, attacked by a knight. */
const EVEN_TRADE = '7k/8/8/1n6/3N4/4P3/8/K7 w - - 0 1';
/** The white knight on e2 is pinned to its king and is the only attacker of d4. */
const PINNED_ATTACKER = '4r2k/8/8/8/3p4/8/4N3/4K3 w - - 0 1';

describe('attacks', () => {
	describe('getAttackers', () => {
		it('should find the pieces of a color attacking the square', () => {
			const board = fenconverter.parseFen(DEFENDED_E5);
			const attackers = attacks.getAttackers(board, sq('e5'), 'white');
			expect(attackers).toEqual([{ attacker: { color: 'white', kind: 'n' }, attackerSquare: sq('f3'), targetSquare: sq('e5'), isXray: false }]);
		});

		it('should never mix up colors', () => {
			const board = fenconverter.parseFen(DEFENDED_E5);
			for (let square = 0; square < SQUARE_COUNT; square++) {
				expect(attacks.getAttackers(board, square, 'white').every((record) => record.attacker.color === 'white')).toBe(true);
				expect(attacks.getAttackers(board, square, 'black').every((record) => record.attacker.color === 'black')).toBe(true);
			}
		});
	});

	describe('getDefenders', () => {
		it('should find the pieces defending the occupant', () => {
			const board = fenconverter.parseFen(DEFENDED_E5);
			const defenders = unwrap(attacks.getDefenders(board, sq('e5')));
			expect(defenders.map((record) => record.attackerSquare)).toEqual([sq('d6')]);
		});

		it('should fail with InvalidQuery on an empty square', () => {
			const board = fenconverter.parseFen(STARTING_FEN);
			expect(attacks.getDefenders(board, sq('e4'))).toEqual({
				success: false,
				error: { kind: 'InvalidQuery', reason: 'There is no piece on e4 to defend.' },
			});
			expect(attacks.defenseCount(board, sq('e4')).success).toBe(false);
		});
	});

	describe('isHanging', () => {
		it('should not call a defended pawn hanging', () => {
			const board = fenconverter.parseFen(DEFENDED_E5);
			expect(unwrap(attacks.isHanging(board, sq('e5')))).toBe(false);
			expect(unwrap(attacks.isProtected(board, sq('e5')))).toBe(true);
		});

		it('should call an undefended, attacked pawn hanging', () => {
			const board = fenconverter.parseFen(UNDEFENDED_E5);
			expect(unwrap(attacks.isHanging(board, sq('e5')))).toBe(true);
			expect(unwrap(attacks.isProtected(board, sq('e5')))).toBe(false);
		});

		it('should be false for every square that nothing attacks', () => {
			const board = fenconverter.parseFen(STARTING_FEN);
			for (let square = 0; square < SQUARE_COUNT; square++) {
				expect(unwrap(attacks.isHanging(board, square))).toBe(false);
			}
		});

		it('should go by the exchange rather than by counting defenders', () => {
			const board = fenconverter.parseFen(QUEEN_GUARDS_AGAINST_PAWNS);
			expect(attacks.attackCount(board, sq('e5'), 'black')).toBe(2);
			expect(unwrap(attacks.defenseCount(board, sq('e5')))).toBe(1);
			expect(unwrap(attacks.isHanging(board, sq('e5')))).toBe(true);
			expect(unwrap(attacks.isProtected(board, sq('e5')))).toBe(false);
		});

		it('should count an even trade as hanging', () => {
			const board = fenconverter.parseFen(EVEN_TRADE);
			expect(unwrap(attacks.isHanging(board, sq('d4')))).toBe(true);
		});

		it('should not count an attacker that is pinned away from the square', () => {
			const board = fenconverter.parseFen(PINNED_ATTACKER);
			expect(attacks.getAttackers(board, sq('d4'), 'white')).toHaveLength(1);
			expect(unwrap(attacks.isHanging(board, sq('d4')))).toBe(false);
		});

		it('should count a pawn that can be taken en passant', () => {
			// Black has just played d7-d5 beside the white pawn on e5
			const board = fenconverter.parseFen('k7/8/8/3pP3/8/8/8/K7 w - d6 0 2');
			expect(attacks.getAttackers(board, sq('d5'), 'white')).toEqual([]);
			expect(unwrap(attacks.isHanging(board, sq('d5')))).toBe(true);
		});

		it('should not count en passant once the chance has gone', () => {
			const board = fenconverter.parseFen('k7/8/8/3pP3/8/8/8/K7 b - d6 0 2');
			expect(unwrap(attacks.isHanging(board, sq('d5')))).toBe(false);
		});

		it('should be false on an empty square, which counts as protected', () => {
			const board = fenconverter.parseFen(STARTING_FEN);
			expect(unwrap(attacks.isHanging(board, sq('e4')))).toBe(false);
			expect(unwrap(attacks.isProtected(board, sq('e4')))).toBe(true);
		});

		it('should fail with MalformedBoard when a king is missing', () => {
			const board = fenconverter.parseFen('8/8/8/8/8/8/8/K7 w - - 0 1');
			expect(attacks.isHanging(board, sq('a1'))).toEqual({
				success: false,
				error: { kind: 'MalformedBoard', reason: 'Expected exactly one black king, found 0.' },
			});
		});
	});

	describe('findHangingPieces', () => {
		it('should list the hanging pieces of a color', () => {
			const board = fenconverter.parseFen(UNDEFENDED_E5);
			expect(unwrap(attacks.findHangingPieces(board, 'black'))).toEqual([{ square: sq('e5'), piece: { color: 'black', kind: 'p' } }]);
			expect(unwrap(attacks.findHangingPieces(board, 'white'))).toEqual([]);
		});
	});

	describe('findUndefendedPieces', () => {
		it('should list the pieces nothing defends, skipping the king', () => {
			const board = fenconverter.parseFen('4k3/8/8/8/7R/8/3PP3/4K3 w - - 0 1');
			expect(attacks.findUndefendedPieces(board, 'white')).toEqual([{ square: sq('h4'), piece: { color: 'white', kind: 'r' } }]);
		});
	});

	describe('analyzeSquare', () => {
		it('should collect everything known about an occupied square', () => {
			const board = fenconverter.parseFen(DEFENDED_E5);
			const report = unwrap(attacks.analyzeSquare(board, sq('e5')));

			expect(report.piece).toEqual({ color: 'black', kind: 'p' });
			expect(report.whiteAttackers.map((record) => record.attackerSquare)).toEqual([sq('f3')]);
			expect(report.blackAttackers.map((record) => record.attackerSquare)).toEqual([sq('d6')]);
			expect(report.defenders).toEqual(report.blackAttackers);
			expect(report.isHanging).toBe(false);
			expect(report.isProtected).toBe(true);
		});

		it('should report an empty square with no defenders', () => {
			const board = fenconverter.parseFen(STARTING_FEN);
			const report = unwrap(attacks.analyzeSquare(board, sq('e4')));

			expect(report.piece).toBeUndefined();
			expect(report.whiteAttackers).toEqual([]);
			expect(report.blackAttackers).toEqual([]);
			expect(report.defenders).toEqual([]);
			expect(report.isProtected).toBe(true);
		});
	});
});
