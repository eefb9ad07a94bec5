import type { GameState } from "./state.ts";

const RANK_CODE = { warrior: "W", prince: "P", king: "K" } as const;

/**
 * Canonical string key for a position. Two states with the same hash have the
 * same occupancy, side to move, move count and pending chain.
 */
export function hashGameState(state: GameState): string {
  // Sort node IDs for consistent ordering
  const nodeIds = Array.from(state.board.keys()).sort();

  const parts: string[] = [];
  for (const nodeId of nodeIds) {
    const piece = state.board.get(nodeId);
    if (!piece) continue;
    parts.push(`${nodeId}:${piece.owner}${RANK_CODE[piece.rank]}`);
  }

  parts.push(`toMove:${state.toMove}`);
  parts.push(`n:${state.moveCount}`);
  if (state.pendingChain) parts.push(`chain:${state.pendingChain.from}`);

  return parts.join("|");
}
