// src/shared/chess/util/typeutil.ts

/**
 * This script contains lists of all piece kinds and players,
 * and utility methods for working with them.
 */

/**
 * Every kind of piece on a standard board, keyed to its FEN letter.
 *
 * This exact arrangement affects the order in which
 * the least valuable attacker is picked when two attackers share a value.
 */
const kinds = {
	PAWN: 'p',
	KNIGHT: 'n',
	BISHOP: 'b',
	ROOK: 'r',
	QUEEN: 'q',
	KING: 'k',
} as const;

/** Both player colors. */
const players = {
	WHITE: 'white',
	BLACK: 'black',
} as const;

type Kind = (typeof kinds)[keyof typeof kinds];
type Player = (typeof players)[keyof typeof players];

interface Piece {
	color: Player;
	kind: Kind;
}

/** A dictionary type with both player colors for keys */
type PlayerGroup<T> = {
	[p in Player]: T;
};

/**
 * Material value of each kind. The king is far above the sum of
 * all other material, so an exchange never trades it away.
 */
const pieceValues: Record<Kind, number> = {
	[kinds.PAWN]: 1,
	[kinds.KNIGHT]: 3,
	[kinds.BISHOP]: 3,
	[kinds.ROOK]: 5,
	[kinds.QUEEN]: 9,
	[kinds.KING]: 1000,
};

/** The names of each kind, as used in reports. */
const kindNames: Record<Kind, string> = {
	[kinds.PAWN]: 'pawn',
	[kinds.KNIGHT]: 'knight',
	[kinds.BISHOP]: 'bishop',
	[kinds.ROOK]: 'rook',
	[kinds.QUEEN]: 'queen',
	[kinds.KING]: 'king',
};

const allKinds: readonly Kind[] = Object.values(kinds);

/** Kinds a pawn may promote to. */
const promotionKinds: readonly Kind[] = [kinds.QUEEN, kinds.ROOK, kinds.BISHOP, kinds.KNIGHT];

function invertPlayer(player: Player): Player {
	return player === players.WHITE ? players.BLACK : players.WHITE;
}

function isKind(letter: string): letter is Kind {
	return allKinds.some((kind) => kind === letter);
}

function getPieceValue(piece: Piece): number {
	return pieceValues[piece.kind];
}

/** Returns true if the piece moves along lines (bishop, rook, queen). */
function isSlider(kind: Kind): boolean {
	return kind === kinds.BISHOP || kind === kinds.ROOK || kind === kinds.QUEEN;
}

/** Returns the FEN letter of the piece: uppercase for white, lowercase for black. */
function getCharFromPiece(piece: Piece): string {
	return piece.color === players.WHITE ? piece.kind.toUpperCase() : piece.kind;
}

/** Returns the piece of a FEN letter, or undefined if the letter is not a piece. */
function getPieceFromChar(char: string): Piece | undefined {
	const lower = char.toLowerCase();
	if (!isKind(lower)) return undefined;
	const color = char === lower ? players.BLACK : players.WHITE;
	return { color, kind: lower };
}

function arePiecesEqual(piece1: Piece, piece2: Piece): boolean {
	return piece1.color === piece2.color && piece1.kind === piece2.kind;
}

/** 'white knight' */
function describePiece(piece: Piece): string {
	return `${piece.color} ${kindNames[piece.kind]}`;
}

export default {
	invertPlayer,
	isKind,
	getPieceValue,
	isSlider,
	getCharFromPiece,
	getPieceFromChar,
	arePiecesEqual,
	describePiece,
};

export { kinds, players, pieceValues, kindNames, allKinds, promotionKinds };

export type { Kind, Player, Piece, PlayerGroup };
