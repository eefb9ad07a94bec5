import { afterEach, describe, it, expect, vi } from "vitest";
import { scoreMoves, selectMove, selectMoveWithInfo } from "./search.ts";
import { resolveProfile } from "./aiTypes.ts";
import { generateLegalMoves } from "../game/movegen.ts";
import { applyMove } from "../game/applyMove.ts";
import { newGame } from "../game/config.ts";
import { ConfigError, PreconditionError } from "../game/errors.ts";
import type { GameState } from "../game/state.ts";
import type { Piece, Player } from "../types.ts";

const A_WARRIOR: Piece = { owner: "A", rank: "warrior" };
const A_KING: Piece = { owner: "A", rank: "king" };
const B_WARRIOR: Piece = { owner: "B", rank: "warrior" };
const B_PRINCE: Piece = { owner: "B", rank: "prince" };
const B_KING: Piece = { owner: "B", rank: "king" };

function mkState(entries: Array<[string, Piece]>, toMove: Player = "A"): GameState {
  return {
    board: new Map(entries),
    toMove,
    moveCount: 0,
    meta: { topologyId: "dablo_6x5", moveLimit: 500, captureDirection: "any" },
  };
}

// The A king can take either the prince on r3c3 or the warrior on r5c5.
function forkState(): GameState {
  return mkState([
    ["r4c4", A_KING],
    ["r10c0", A_WARRIOR],
    ["r3c3", B_PRINCE],
    ["r5c5", B_WARRIOR],
    ["r0c8", B_KING],
  ]);
}

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("resolveProfile", () => {
  it("fills the schedule and weights from the tables", () => {
    const p = resolveProfile({ style: "defensive", difficulty: "easy", topMoves: 2, weights: { capture: 5 } });
    expect(p.schedule).toEqual({ randomness: 0.4, topMoves: 2, selectionWeights: [3, 2, 1] });
    expect(p.weights.capture).toBe(5);
    expect(p.weights.kingSafety).toBe(1.5);
  });

  it("keeps the table weight for a key passed as undefined", () => {
    const profile = { style: "smart", difficulty: "hard", weights: { capture: undefined } } as const;
    expect(resolveProfile(profile).weights).toEqual(resolveProfile({ style: "smart", difficulty: "hard" }).weights);
    expect(resolveProfile(profile).weights.capture).toBe(1);

    const scores = scoreMoves(newGame(), profile).map((m) => m.score);
    expect(scores).toHaveLength(13);
    expect(scores.every((score) => Number.isFinite(score))).toBe(true);
  });

  it("rejects invalid profiles", () => {
    expect(() => resolveProfile({ style: "smart" })).toThrow("Invalid NPC profile: difficulty: Required");
    expect(() => resolveProfile({ style: "smart", difficulty: "hard", extra: 1 })).toThrow(ConfigError);
    expect(() => selectMove(newGame(), { style: "smart", difficulty: "hard", topMoves: 0 })).toThrow(ConfigError);
  });
});

describe("selectMove", () => {
  it("is deterministic at hard difficulty", () => {
    const s = newGame();
    const profile = { style: "smart", difficulty: "hard" } as const;
    const first = selectMove(s, profile);
    expect(selectMove(s, profile)).toEqual(first);
    expect(scoreMoves(s, profile)[0].move).toEqual(first);
  });

  it("reports the best score when there is no randomness", () => {
    const s = forkState();
    const info = selectMoveWithInfo(s, { style: "smart", difficulty: "hard" });
    expect(info.reason).toBe("best");
    expect(info.candidates).toBe(2);
    expect(info.score).toBe(scoreMoves(s, { style: "smart", difficulty: "hard" })[0].score);
  });

  it("prefers the more valuable capture", () => {
    expect(selectMove(forkState(), { style: "aggressive", difficulty: "hard" })).toEqual({
      kind: "capture",
      from: "r4c4",
      over: "r3c3",
      to: "r2c2",
      continuation: false,
    });
  });

  it("repeats itself for a seeded profile", () => {
    const s = newGame();
    const profile = { style: "smart", difficulty: "easy", seed: 7 } as const;
    expect(selectMove(s, profile)).toEqual(selectMove(s, profile));
  });

  it("plays a legal move in random style", () => {
    const s = newGame();
    const info = selectMoveWithInfo(s, { style: "random", difficulty: "hard", seed: "test-seed" });
    expect(info.reason).toBe("random_style");
    expect(info.score).toBe(null);
    expect(generateLegalMoves(s)).toContainEqual(info.move);
  });

  it("takes a random move when randomness is forced", () => {
    const info = selectMoveWithInfo(newGame(), { style: "smart", difficulty: "hard", randomness: 1, seed: 3 });
    expect(info.reason).toBe("randomness");
  });

  it("continues a pending chain", () => {
    const s = mkState([
      ["r8c4", A_WARRIOR],
      ["r7c3", B_WARRIOR],
      ["r5c1", B_WARRIOR],
      ["r0c0", B_WARRIOR],
      ["r10c8", A_KING],
      ["r0c8", B_KING],
    ]);
    const mid = applyMove(s, { kind: "capture", from: "r8c4", over: "r7c3", to: "r6c2", continuation: false });
    expect(selectMove(mid, { style: "defensive", difficulty: "medium" })).toEqual({
      kind: "capture",
      from: "r6c2",
      over: "r5c1",
      to: "r4c0",
      continuation: true,
    });
  });

  it("refuses a finished game", () => {
    const s = mkState([
      ["r0c0", A_KING],
      ["r0c4", A_WARRIOR],
      ["r10c8", B_KING],
      ["r10c0", B_WARRIOR],
    ]);
    expect(() => selectMove(s, { style: "smart", difficulty: "hard" })).toThrow(PreconditionError);
    expect(() => selectMove(s, { style: "smart", difficulty: "hard" })).toThrow(
      "selectMove: game is over (Player B wins: Player A has no legal moves)"
    );
  });

  it("logs one line per decision when enabled", () => {
    vi.stubEnv("DABLO_AI_LOG", "1");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    selectMove(forkState(), { style: "aggressive", difficulty: "hard" });
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(
      /^\[ai:move\] Player A aggressive\/hard r4c4 → r2c2 \(captures r3c3\) eval=-?\d+\.\d\d n=2 via=best$/
    );
  });

  it("stays quiet by default", () => {
    vi.stubEnv("DABLO_AI_LOG", "");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    selectMove(forkState(), { style: "aggressive", difficulty: "hard" });
    expect(log).not.toHaveBeenCalled();
  });
});
