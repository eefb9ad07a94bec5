// "Core" is the stable, deterministic rules surface: no rendering, no I/O.

export type { Player, Rank, Piece } from "../types.ts";
export { PLAYERS, RANKS, opponentOf } from "../types.ts";
export { makeNodeId, parseNodeId } from "../game/coords.ts";
export type { GameState, NodeId, BoardState, PendingChain } from "../game/state.ts";
export type { Move, QuietMove, CaptureMove } from "../game/moveTypes.ts";
export { sameMove } from "../game/moveTypes.ts";
export type { TopologyId, TopologySpec, GameMeta, CaptureDirection } from "../variants/variantTypes.ts";
export { TOPOLOGIES, DEFAULT_TOPOLOGY_ID, getTopologyById, isTopologyId } from "../variants/variantRegistry.ts";

export type { BoardGraph, BoardNode, TopologyDefinition, JumpTarget } from "../game/board.ts";
export {
  defineTopology,
  createBoardGraph,
  getBoardGraph,
  getAllNodes,
  neighbors,
  forwardNeighbors,
  captureLanding,
  jumpTargets,
} from "../game/board.ts";

export { CAPTURABLE_BY, PIECE_VALUES, canCapture, pieceValue } from "../pieces/captureTable.ts";
export { playerLabel, pieceLabel } from "../pieces/pieceLabel.ts";

export type { GameConfig, GameConfigInput, GameConfigPreset } from "../game/config.ts";
export {
  GAME_CONFIG_PRESETS,
  DEFAULT_MOVE_LIMIT,
  MIN_MOVE_LIMIT,
  MAX_MOVE_LIMIT,
  parseGameConfig,
  newGame,
  newGameFromPreset,
} from "../game/config.ts";

export { generateLegalMoves, generateLegalMoves as legalMoves } from "../game/movegen.ts";
export { applyMove } from "../game/applyMove.ts";

export type { Outcome, WinReason, DrawReason } from "../game/gameOver.ts";
export { evaluateOutcome, evaluateOutcome as evaluate, isTerminal, countPieces } from "../game/gameOver.ts";

export type { NpcProfile } from "../ai/aiTypes.ts";
export type { NpcStyle, NpcDifficulty, StyleWeights, DifficultySchedule } from "../ai/presets.ts";
export { STYLE_WEIGHTS, DIFFICULTY_SCHEDULES } from "../ai/presets.ts";
export type { ScoredMove, MoveFeatures } from "../ai/evaluate.ts";
export type { Selection } from "../ai/search.ts";
export { selectMove, selectMoveWithInfo, scoreMoves } from "../ai/search.ts";
export type { NpcMatchOptions, NpcMatchResult } from "../ai/selfPlay.ts";
export { playNpcMatch } from "../ai/selfPlay.ts";

export {
  DabloError,
  TopologyError,
  IllegalMoveError,
  PreconditionError,
  ConfigError,
  isDabloError,
} from "../game/errors.ts";
export type { DabloErrorCode } from "../game/errors.ts";

export { hashGameState } from "../game/hashState.ts";
export type { SerializedGameState, SaveFile } from "../game/saveLoad.ts";
export { serializeGameState, deserializeGameState, serializeSaveData, deserializeSaveData } from "../game/saveLoad.ts";
export { formatMove, formatNodeId } from "../game/coordFormat.ts";
