// src/cli/validation.ts

/**
 * Zod schemas for everything the command line accepts.
 * Square names become squares, and the FEN becomes a board, during validation.
 */

import * as z from 'zod';

import squareutil from '../shared/chess/util/squareutil.js';
import fenconverter from '../shared/chess/logic/fen/fenconverter.js';
import { MOVE_KINDS } from '../shared/chess/logic/movepiece.js';
import { COMMAND_NAMES } from './commands.js';
import { kinds, players } from '../shared/chess/util/typeutil.js';

// Schemas ---------------------------------------------------------------------

const fenSchema = z
	.string()
	.trim()
	.min(1, 'A FEN is required')
	.transform((fen, ctx) => {
		try {
			return fenconverter.parseFen(fen);
		} catch (e) {
			ctx.addIssue({ code: 'custom', message: e instanceof Error ? e.message : String(e) });
			return z.NEVER;
		}
	});

const squareSchema = z
	.string()
	.trim()
	.toLowerCase()
	.regex(/^[a-h][1-8]$/, 'Expected a square name between a1 and h8')
	.transform((name) => squareutil.sq(name));

const colorSchema = z.enum([players.WHITE, players.BLACK]);

const moveKindSchema = z.enum(MOVE_KINDS);

const commandSchema = z.enum(COMMAND_NAMES);

const promotionSchema = z.enum([kinds.QUEEN, kinds.ROOK, kinds.BISHOP, kinds.KNIGHT]);

// Command Arguments -----------------------------------------------------------

const boardArgsSchema = z.object({
	fen: fenSchema,
});

const analyzeArgsSchema = z.object({
	fen: fenSchema,
	square: squareSchema,
});

const moveArgsSchema = z.object({
	fen: fenSchema,
	from: squareSchema,
	to: squareSchema,
	kind: moveKindSchema.default('normal'),
	promotion: promotionSchema.optional(),
});

const colorArgsSchema = z.object({
	fen: fenSchema,
	color: colorSchema,
});

type MoveArgs = z.infer<typeof moveArgsSchema>;

export { fenSchema, squareSchema, colorSchema, moveKindSchema, commandSchema, promotionSchema, boardArgsSchema, analyzeArgsSchema, moveArgsSchema, colorArgsSchema };

export type { MoveArgs };
