import { describe, it, expect } from "vitest";
import { endTurn } from "./endTurn.ts";
import { newGame } from "./config.ts";
import type { GameState } from "./state.ts";

describe("endTurn", () => {
  it("flips the side to move and counts the turn", () => {
    const next = endTurn(newGame());
    expect(next.toMove).toBe("B");
    expect(next.moveCount).toBe(1);
    expect(endTurn(next).toMove).toBe("A");
  });

  it("clears a pending chain without touching the input", () => {
    const s: GameState = { ...newGame(), pendingChain: { from: "r8c4", rank: "warrior", owner: "A" } };
    const next = endTurn(s);
    expect(next.pendingChain).toBeUndefined();
    expect("pendingChain" in next).toBe(false);
    expect(s.pendingChain).toEqual({ from: "r8c4", rank: "warrior", owner: "A" });
    expect(next.board).toBe(s.board);
  });
});
