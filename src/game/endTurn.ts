import type { GameState } from "./state.ts";

/**
 * End a turn: drop any pending chain, flip `toMove` and count the move.
 */
export function endTurn(state: GameState): GameState {
  const next: GameState = {
    ...state,
    toMove: state.toMove === "A" ? "B" : "A",
    moveCount: state.moveCount + 1,
  };
  delete next.pendingChain;
  return next;
}
