import type { GameState } from "./state.ts";
import type { Move } from "./moveTypes.ts";
import { sameMove } from "./moveTypes.ts";
import { generateCaptureMovesFrom, generateLegalMoves } from "./movegen.ts";
import { evaluateOutcome } from "./gameOver.ts";
import { endTurn } from "./endTurn.ts";
import { formatMove } from "./coordFormat.ts";
import { IllegalMoveError, PreconditionError } from "./errors.ts";

/**
 * Apply one move (or one leg of a chain capture) and return the next state.
 * The input state is left untouched.
 *
 * A capture that leaves the same piece with another capture keeps the turn:
 * `pendingChain` is set and `toMove` / `moveCount` do not change. Any other move
 * ends the turn.
 *
 * @throws PreconditionError if the game is already decided.
 * @throws IllegalMoveError if `move` is not one of `generateLegalMoves(state)`.
 */
export function applyMove(state: GameState, move: Move): GameState {
  const legal = generateLegalMoves(state);

  if (!state.pendingChain) {
    const outcome = evaluateOutcome(state, legal.length === 0);
    if (outcome.kind !== "ongoing") {
      throw new PreconditionError(`applyMove: game is over (${outcome.message})`, { outcome });
    }
  }

  const matched = legal.find((m) => sameMove(m, move));
  if (!matched) {
    const reason = state.pendingChain
      ? `the piece on ${state.pendingChain.from} must continue capturing`
      : legal.some((m) => m.kind === "capture")
        ? "a capture is available and must be taken"
        : "not a legal move";
    throw new IllegalMoveError(move, `applyMove: ${formatMove(move)} rejected: ${reason}`, {
      legalCount: legal.length,
    });
  }

  const nextBoard = new Map(state.board);
  const moving = nextBoard.get(matched.from);
  if (!moving) throw new Error(`applyMove: no moving piece at ${matched.from}`);

  if (matched.kind === "capture") nextBoard.delete(matched.over);
  nextBoard.delete(matched.from);
  nextBoard.set(matched.to, moving);

  const moved: GameState = { ...state, board: nextBoard };

  if (matched.kind === "capture") {
    // Same side is still to move: look for further legs from the landing node.
    if (generateCaptureMovesFrom(moved, matched.to).length > 0) {
      return {
        ...moved,
        pendingChain: { from: matched.to, rank: moving.rank, owner: moving.owner },
      };
    }
  }

  return endTurn(moved);
}
