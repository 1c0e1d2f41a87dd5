// src/shared/chess/logic/fen/fenconverter.test.ts

import { describe, it, expect } from 'vitest';

import fenconverter, { STARTING_FEN } from './fenconverter.js';
import boardstate from '../boardstate.js';
import squareutil from '../../util/squareutil.js';

const { sq } = squareutil;

describe('fenconverter', () => {
	describe('parseFen', () => {
		it('should parse the starting position', () => {
			const board = fenconverter.parseFen(STARTING_FEN);

			expect(boardstate.getPiece(board, sq('e1'))).toEqual({ color: 'white', kind: 'k' });
			expect(boardstate.getPiece(board, sq('d8'))).toEqual({ color: 'black', kind: 'q' });
			expect(boardstate.getPiece(board, sq('b1'))).toEqual({ color: 'white', kind: 'n' });
			expect(boardstate.isEmpty(board, sq('e4'))).toBe(true);
			expect(boardstate.getAllPieces(board)).toHaveLength(32);
			expect(board.turn).toBe('white');
			expect([...board.castlingRights]).toEqual(['K', 'Q', 'k', 'q']);
			expect(board.enPassant).toBeUndefined();
			expect(board.halfmoveClock).toBe(0);
			expect(board.fullmoveNumber).toBe(1);
		});

		it('should parse the en passant square', () => {
			const board = fenconverter.parseFen('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1');
			expect(board.turn).toBe('black');
			expect(board.enPassant).toBe(sq('e3'));
		});

		it('should fill in trailing fields that are left off', () => {
			const board = fenconverter.parseFen('8/8/8/8/8/8/8/K6k');
			expect(board.turn).toBe('white');
			expect(board.castlingRights.size).toBe(0);
			expect(board.enPassant).toBeUndefined();
			expect(board.halfmoveClock).toBe(0);
			expect(board.fullmoveNumber).toBe(1);
		});

		it('should throw when the number of ranks is wrong', () => {
			expect(() => fenconverter.parseFen('8/8/8 w - - 0 1')).toThrow('FEN placement must have 8 ranks, found 3 ("8/8/8")!');
		});

		it('should throw when a rank runs past the h-file', () => {
			expect(() => fenconverter.parseFen('ppppppppp/8/8/8/8/8/8/8 w - - 0 1')).toThrow('Rank 8 of FEN is longer than 8 squares ("ppppppppp")!');
		});

		it('should throw when a rank is short', () => {
			expect(() => fenconverter.parseFen('7/8/8/8/8/8/8/8 w - - 0 1')).toThrow('Rank 8 of FEN must span 8 squares, found 7 ("7")!');
		});

		it('should throw on an unknown piece letter', () => {
			expect(() => fenconverter.parseFen('8/8/8/8/8/8/8/K6x w - - 0 1')).toThrow('Unknown piece letter (x) on rank 1 of FEN!');
		});

		it('should throw on a bad side to move', () => {
			expect(() => fenconverter.parseFen('8/8/8/8/8/8/8/K6k x - - 0 1')).toThrow('Invalid side to move (x) in FEN!');
		});

		it('should throw on bad castling rights', () => {
			expect(() => fenconverter.parseFen('8/8/8/8/8/8/8/K6k w KX - 0 1')).toThrow('Invalid castling field (KX) in FEN!');
			expect(() => fenconverter.parseFen('8/8/8/8/8/8/8/K6k w QK - 0 1')).toThrow('Invalid castling field (QK) in FEN!');
		});

		it('should throw on an en passant square off the 3rd and 6th ranks', () => {
			expect(() => fenconverter.parseFen('8/8/8/8/8/8/8/K6k w - e4 0 1')).toThrow('Invalid en passant square (e4) in FEN!');
		});

		it('should throw on bad move counters', () => {
			expect(() => fenconverter.parseFen('8/8/8/8/8/8/8/K6k w - - x 1')).toThrow('Invalid halfmove clock (x) in FEN!');
			expect(() => fenconverter.parseFen('8/8/8/8/8/8/8/K6k w - - 0 0')).toThrow('Invalid fullmove number (0) in FEN!');
		});

		it('should throw on too many or too few fields', () => {
			expect(() => fenconverter.parseFen('8/8/8/8/8/8/8/K6k w - - 0 1 extra')).toThrow('FEN must have between 1 and 6 fields, found 7!');
			expect(() => fenconverter.parseFen('   ')).toThrow('FEN must have between 1 and 6 fields, found 0!');
		});
	});

	describe('toFen', () => {
		it('should write back the FEN it was parsed from', () => {
			const fens = [
				STARTING_FEN,
				'r1bqkb1r/pppp1ppp/2n2n2/4p3/2B1P3/5N2/PPPP1PPP/RNBQK2R w KQkq - 4 4',
				'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1',
			];
			for (const fen of fens) expect(fenconverter.toFen(fenconverter.parseFen(fen))).toBe(fen);
		});

		it('should write all six fields even when some were left off', () => {
			expect(fenconverter.toFen(fenconverter.parseFen('8/8/8/8/8/8/8/K6k'))).toBe('8/8/8/8/8/8/8/K6k w - - 0 1');
		});
	});
});
