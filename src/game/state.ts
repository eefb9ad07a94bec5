import type { Piece, Player, Rank } from "../types.ts";
import type { GameMeta } from "../variants/variantTypes.ts";
import { computeStartPosition } from "./initialPosition.ts";

export type NodeId = string;
/** Occupancy: a node is empty when it has no entry. */
export type BoardState = Map<NodeId, Piece>;

/** Set between the legs of a multi-capture; only this piece may move next. */
export interface PendingChain {
  from: NodeId;
  rank: Rank;
  owner: Player;
}

export interface GameState {
  board: BoardState;
  toMove: Player;
  /** Completed turns. A chain of capture legs counts once. */
  moveCount: number;
  pendingChain?: PendingChain;
  meta: GameMeta;
}

export function createInitialGameState(meta: GameMeta): GameState {
  const board: BoardState = new Map();
  for (const [nodeId, piece] of computeStartPosition(meta.topologyId)) {
    board.set(nodeId, piece);
  }

  return {
    board,
    toMove: "A",
    moveCount: 0,
    meta: { ...meta },
  };
}
