// src/index.ts

/**
 * The library's public API.
 */

export { default as squareutil, BOARD_SIZE, SQUARE_COUNT } from './shared/chess/util/squareutil.js';
export { default as typeutil, kinds, players, pieceValues, kindNames, allKinds, promotionKinds } from './shared/chess/util/typeutil.js';
export { errorKinds, succeed, fail } from './shared/chess/util/queryresult.js';
export { default as boardstate, CASTLING_RIGHTS } from './shared/chess/logic/boardstate.js';
export { default as raycaster, DIRECTIONS, DIRECTION_VECTORS, KING_OFFSETS, KNIGHT_OFFSETS, PAWN_CAPTURE_OFFSETS } from './shared/chess/logic/raycaster.js';
export { default as attackindex } from './shared/chess/logic/attackindex.js';
export { default as attacks } from './shared/chess/logic/attacks.js';
export { default as exchange } from './shared/chess/logic/exchange.js';
export { default as pins } from './shared/chess/logic/tactics/pins.js';
export { default as skewers } from './shared/chess/logic/tactics/skewers.js';
export { default as forks } from './shared/chess/logic/tactics/forks.js';
export { default as discoveries } from './shared/chess/logic/tactics/discoveries.js';
export { default as tacticsummary, MAX_FORK_OPPORTUNITIES } from './shared/chess/logic/tactics/tacticsummary.js';
export { default as movepiece, MOVE_KINDS } from './shared/chess/logic/movepiece.js';
export { default as movesafety } from './shared/chess/logic/movesafety.js';
export { default as fenconverter, STARTING_FEN } from './shared/chess/logic/fen/fenconverter.js';

export type { Square, Offset } from './shared/chess/util/squareutil.js';
export type { Kind, Player, Piece, PlayerGroup } from './shared/chess/util/typeutil.js';
export type { ErrorKind, EngineError, QueryResult } from './shared/chess/util/queryresult.js';
export type { BoardState, LocatedPiece, BoardMetadata, CastlingRight } from './shared/chess/logic/boardstate.js';
export type { Direction, RayStep } from './shared/chess/logic/raycaster.js';
export type { AttackRecord, XrayRecord, AttackIndex, BuildOptions } from './shared/chess/logic/attackindex.js';
export type { SquareReport } from './shared/chess/logic/attacks.js';
export type { ExchangeStep, ExchangeResult } from './shared/chess/logic/exchange.js';
export type { PinRecord, RelativePinRecord } from './shared/chess/logic/tactics/pins.js';
export type { SkewerKind, SkewerRecord } from './shared/chess/logic/tactics/skewers.js';
export type { ForkRecord, ForkOpportunity } from './shared/chess/logic/tactics/forks.js';
export type { DiscoveryRecord, DiscoveredAttackRecord } from './shared/chess/logic/tactics/discoveries.js';
export type { TacticsReport } from './shared/chess/logic/tactics/tacticsummary.js';
export type { MoveKind, MoveDescriptor } from './shared/chess/logic/movepiece.js';
export type { ObstructedRay, MoveReport } from './shared/chess/logic/movesafety.js';
