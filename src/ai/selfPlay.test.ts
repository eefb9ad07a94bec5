import { describe, it, expect } from "vitest";
import { playNpcMatch } from "./selfPlay.ts";
import { applyMove } from "../game/applyMove.ts";
import { hashGameState } from "../game/hashState.ts";
import { newGame } from "../game/config.ts";
import type { NpcMatchOptions } from "./selfPlay.ts";

const options: NpcMatchOptions = {
  config: { moveLimit: 50 },
  profiles: {
    A: { style: "random", difficulty: "easy", seed: 1 },
    B: { style: "smart", difficulty: "hard" },
  },
};

describe("playNpcMatch", () => {
  it("plays a game to a decision within the move limit", () => {
    const result = playNpcMatch(options);
    expect(result.outcome.kind === "win" || result.outcome.kind === "draw").toBe(true);
    expect(result.moveCount).toBeLessThanOrEqual(50);
    expect(result.moves.length).toBeGreaterThanOrEqual(result.moveCount);
    expect(result.state.pendingChain).toBeUndefined();
  });

  it("replays to the same final position", () => {
    const result = playNpcMatch(options);
    let state = newGame({ moveLimit: 50 });
    for (const move of result.moves) state = applyMove(state, move);
    expect(hashGameState(state)).toBe(hashGameState(result.state));
  });

  it("is reproducible with seeded or deterministic profiles", () => {
    expect(playNpcMatch(options).moves).toEqual(playNpcMatch(options).moves);
  });
});
