// src/shared/chess/logic/movepiece.test.ts

import type { MoveDescriptor } from './movepiece.js';

import { describe, it, expect } from 'vitest';

import movepiece from './movepiece.js';
import boardstate from './boardstate.js';
import fenconverter, { STARTING_FEN } from './fen/fenconverter.js';
import squareutil from '../util/squareutil.js';

const { sq } = squareutil;

function move(from: string, to: string, extra: Partial<MoveDescriptor> = {}): MoveDescriptor {
	return { from: sq(from), to: sq(to), kind: 'normal', legal: true, ...extra };
}

describe('movepiece', () => {
	describe('simulateMove', () => {
		it('should push a pawn two squares and set the en passant square', () => {
			const board = fenconverter.parseFen(STARTING_FEN);
			const after = movepiece.simulateMove(board, move('e2', 'e4'));

			expect(fenconverter.toFen(after)).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1');
			// The board passed in is untouched
			expect(fenconverter.toFen(board)).toBe(STARTING_FEN);
		});

		it('should count the halfmove clock up on a quiet piece move', () => {
			const board = fenconverter.parseFen(STARTING_FEN);
			const after = movepiece.simulateMove(board, move('g1', 'f3'));

			expect(after.halfmoveClock).toBe(1);
			expect(after.enPassant).toBeUndefined();
			expect([...after.castlingRights]).toEqual(['K', 'Q', 'k', 'q']);
		});

		it('should count the fullmove number up after black moves', () => {
			const board = fenconverter.parseFen('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1');
			const after = movepiece.simulateMove(board, move('e7', 'e5'));

			expect(fenconverter.toFen(after)).toBe('rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq e6 0 2');
		});

		it('should remove the pawn taken en passant', () => {
			const board = fenconverter.parseFen('rnbqkbnr/ppp1p1pp/8/3pPp2/8/8/PPPP1PPP/RNBQKBNR w KQkq f6 0 3');
			const enPassant = move('e5', 'f6', { kind: 'en-passant' });

			expect(movepiece.getCaptured(board, enPassant)).toEqual({ square: sq('f5'), piece: { color: 'black', kind: 'p' } });
			const after = movepiece.simulateMove(board, enPassant);
			expect(boardstate.getPiece(after, sq('f6'))).toEqual({ color: 'white', kind: 'p' });
			expect(boardstate.isEmpty(after, sq('f5'))).toBe(true);
			expect(boardstate.isEmpty(after, sq('e5'))).toBe(true);
		});

		it('should move the rook when castling kingside', () => {
			const board = fenconverter.parseFen('r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1');
			const after = movepiece.simulateMove(board, move('e1', 'g1', { kind: 'castle' }));

			expect(fenconverter.toFen(after)).toBe('r3k2r/8/8/8/8/8/8/R4RK1 b kq - 1 1');
		});

		it('should move the rook when castling queenside', () => {
			const board = fenconverter.parseFen('r3k2r/8/8/8/8/8/8/R3K2R b KQkq - 0 1');
			const after = movepiece.simulateMove(board, move('e8', 'c8', { kind: 'castle' }));

			expect(fenconverter.toFen(after)).toBe('2kr3r/8/8/8/8/8/8/R3K2R w KQ - 1 2');
		});

		it('should take away castling rights when a rook moves or is captured', () => {
			const board = fenconverter.parseFen('r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1');

			expect([...movepiece.simulateMove(board, move('a1', 'a2')).castlingRights]).toEqual(['K', 'k', 'q']);
			expect([...movepiece.simulateMove(board, move('h1', 'h8')).castlingRights]).toEqual(['Q', 'q']);
		});

		it('should promote to the piece asked for, or a queen by default', () => {
			const board = fenconverter.parseFen('8/4P3/8/8/8/8/8/k6K w - - 0 1');

			const knight = movepiece.simulateMove(board, move('e7', 'e8', { kind: 'promotion', promotion: 'n' }));
			expect(boardstate.getPiece(knight, sq('e8'))).toEqual({ color: 'white', kind: 'n' });
			const queen = movepiece.simulateMove(board, move('e7', 'e8', { kind: 'promotion' }));
			expect(boardstate.getPiece(queen, sq('e8'))).toEqual({ color: 'white', kind: 'q' });
		});

		it('should throw when moving from an empty square', () => {
			const board = fenconverter.parseFen(STARTING_FEN);
			expect(() => movepiece.simulateMove(board, move('e4', 'e5'))).toThrow('Cannot move from e4, the square is empty.');
		});
	});

	describe('describeMove', () => {
		it('should write the squares, and the promotion if there is one', () => {
			expect(movepiece.describeMove(move('e2', 'e4'))).toBe('e2-e4');
			expect(movepiece.describeMove(move('e7', 'e8', { kind: 'promotion', promotion: 'n' }))).toBe('e7-e8=N');
			expect(movepiece.describeMove(move('e7', 'e8', { kind: 'promotion' }))).toBe('e7-e8=Q');
		});
	});

	describe('getCastlingRookSquares', () => {
		it('should find the rook squares on either side', () => {
			expect(movepiece.getCastlingRookSquares(move('e1', 'g1', { kind: 'castle' }))).toEqual({ from: sq('h1'), to: sq('f1') });
			expect(movepiece.getCastlingRookSquares(move('e8', 'c8', { kind: 'castle' }))).toEqual({ from: sq('a8'), to: sq('d8') });
		});
	});
});
