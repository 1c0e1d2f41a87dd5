// src/shared/chess/logic/tactics/pins.test.ts

import type { QueryResult } from '../../util/queryresult.js';

import { describe, it, expect } from 'vitest';

import pins from './pins.js';
import attacks from '../attacks.js';
import boardstate from '../boardstate.js';
import fenconverter from '../fen/fenconverter.js';
import squareutil from '../../util/squareutil.js';

const { sq } = squareutil;

function unwrap<T>(result: QueryResult<T>): T {
	if (!result.success) throw new Error(`Query failed: ${result.error.kind} ${result.error.reason}`);
	return result.result;
}

/** The white knight on e2 is pinned to its king by the rook on e8. */
const KNIGHT_PINNED = 'k3r3/8/8/8/8/8/P3N3/4K3 w - - 0 1';

describe('pins', () => {
	describe('findPins', () => {
		it('should find a piece pinned to its king', () => {
			const board = fenconverter.parseFen(KNIGHT_PINNED);
			expect(unwrap(pins.findPins(board))).toEqual([
				{
					pinnedSquare: sq('e2'),
					pinnedPiece: { color: 'white', kind: 'n' },
					pinningAttacker: { color: 'black', kind: 'r' },
					pinningSquare: sq('e8'),
					kingSquare: sq('e1'),
					rayDirection: 'N',
				},
			]);
		});

		it('should only look at the color asked for', () => {
			const board = fenconverter.parseFen(KNIGHT_PINNED);
			expect(unwrap(pins.findPins(board, 'black'))).toEqual([]);
			expect(unwrap(pins.findPins(board, 'white'))).toHaveLength(1);
		});

		it('should expose the king when the pinned piece is taken off', () => {
			const board = fenconverter.parseFen(KNIGHT_PINNED);
			const [pin] = unwrap(pins.findPins(board));
			if (!pin) throw new Error('Expected a pin');

			expect(attacks.getAttackers(board, pin.kingSquare, 'black')).toEqual([]);
			const exposed = attacks.getAttackers(boardstate.withoutPiece(board, pin.pinnedSquare), pin.kingSquare, 'black');
			expect(exposed.map((record) => record.attackerSquare)).toEqual([pin.pinningSquare]);

			// Taking off a piece that isn't pinned changes nothing
			expect(attacks.getAttackers(boardstate.withoutPiece(board, sq('a2')), pin.kingSquare, 'black')).toEqual([]);
		});

		it('should ignore a slider that does not move along the line', () => {
			const board = fenconverter.parseFen('k3b3/8/8/8/8/8/4N3/4K3 w - - 0 1');
			expect(unwrap(pins.findPins(board))).toEqual([]);
		});

		it('should ignore a line whose first piece is an enemy', () => {
			const board = fenconverter.parseFen('k3r3/8/8/8/8/8/4n3/4K3 w - - 0 1');
			expect(unwrap(pins.findPins(board))).toEqual([]);
		});

		it('should fail with MalformedBoard without exactly one king per color', () => {
			const board = fenconverter.parseFen('4r3/8/8/8/8/8/4N3/4K3 w - - 0 1');
			expect(pins.findPins(board)).toEqual({
				success: false,
				error: { kind: 'MalformedBoard', reason: 'Expected exactly one black king, found 0.' },
			});
		});
	});

	describe('findRelativePins', () => {
		it('should find a piece pinned to its queen', () => {
			// White bishop b2, black knight d4, black queen f6
			const board = fenconverter.parseFen('7k/8/5q2/8/3n4/8/1B6/K7 w - - 0 1');

			expect(pins.findRelativePins(board, 'black')).toEqual([
				{
					pinnedSquare: sq('d4'),
					pinnedPiece: { color: 'black', kind: 'n' },
					pinningAttacker: { color: 'white', kind: 'b' },
					pinningSquare: sq('b2'),
					shieldedSquare: sq('f6'),
					shieldedPiece: { color: 'black', kind: 'q' },
					rayDirection: 'SW',
				},
			]);
			expect(unwrap(pins.findPins(board))).toEqual([]);
		});

		it('should find a pawn pinned to a minor piece', () => {
			// White rook e1, black pawn e5, black bishop e7
			const board = fenconverter.parseFen('k7/4b3/8/4p3/8/8/8/4R2K w - - 0 1');
			const [pin] = pins.findRelativePins(board, 'black');

			expect(pin?.pinnedSquare).toBe(sq('e5'));
			expect(pin?.shieldedSquare).toBe(sq('e7'));
			expect(pin?.pinningSquare).toBe(sq('e1'));
			expect(pin?.rayDirection).toBe('S');
		});

		it('should ignore a pinned piece worth as much as the one behind it', () => {
			const board = fenconverter.parseFen('7k/8/5q2/8/3q4/8/1B6/K7 w - - 0 1');
			expect(pins.findRelativePins(board, 'black')).toEqual([]);
		});
	});

	describe('isOnPinLine', () => {
		it('should accept the squares between the king and the pinner, and the pinner itself', () => {
			const board = fenconverter.parseFen(KNIGHT_PINNED);
			const [pin] = unwrap(pins.findPins(board));
			if (!pin) throw new Error('Expected a pin');

			expect(pins.isOnPinLine(pin, sq('e5'))).toBe(true);
			expect(pins.isOnPinLine(pin, sq('e8'))).toBe(true);
			expect(pins.isOnPinLine(pin, sq('d3'))).toBe(false);
			expect(pins.isOnPinLine(pin, sq('f2'))).toBe(false);
		});
	});
});
