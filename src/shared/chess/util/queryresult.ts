// src/shared/chess/util/queryresult.ts

/**
 * The result type returned by every query that can be asked something
 * it cannot answer. A failed query is never replaced with a default answer,
 * so "no attackers" stays distinguishable from "could not compute".
 */

/** The reasons a query can fail. */
const errorKinds = {
	/** A structural invariant of the board is violated, e.g. zero or two kings of one color. */
	MALFORMED_BOARD: 'MalformedBoard',
	/** The query targets an empty square where a piece is required. */
	INVALID_QUERY: 'InvalidQuery',
	/** The move starts on an empty square, or the caller tagged it illegal. */
	INVALID_MOVE: 'InvalidMove',
} as const;

type ErrorKind = (typeof errorKinds)[keyof typeof errorKinds];

interface EngineError {
	kind: ErrorKind;
	reason: string;
}

type QueryResult<T> = { success: true; result: T } | { success: false; error: EngineError };

function succeed<T>(result: T): QueryResult<T> {
	return { success: true, result };
}

function fail<T>(kind: ErrorKind, reason: string): QueryResult<T> {
	return { success: false, error: { kind, reason } };
}

export { errorKinds, succeed, fail };

export type { ErrorKind, EngineError, QueryResult };
