import { describe, it, expect } from "vitest";
import { GAME_CONFIG_PRESETS, newGame, newGameFromPreset, parseGameConfig } from "./config.ts";
import { ConfigError } from "./errors.ts";

describe("game config", () => {
  it("fills in defaults", () => {
    expect(parseGameConfig()).toEqual({ moveLimit: 500, boardTopology: "dablo_6x5", captureDirection: "any" });
  });

  it("bounds the move limit", () => {
    expect(parseGameConfig({ moveLimit: 50 }).moveLimit).toBe(50);
    expect(parseGameConfig({ moveLimit: 2000 }).moveLimit).toBe(2000);
    expect(() => parseGameConfig({ moveLimit: 49 })).toThrow(ConfigError);
    expect(() => parseGameConfig({ moveLimit: 2001 })).toThrow(/^Invalid game config: moveLimit: /);
    expect(() => parseGameConfig({ moveLimit: 100.5 })).toThrow(ConfigError);
  });

  it("rejects unknown topologies", () => {
    expect(() => parseGameConfig({ boardTopology: "hex" })).toThrow(/boardTopology/);
  });

  it("builds the standard setup", () => {
    const s = newGame();
    expect(s.toMove).toBe("A");
    expect(s.moveCount).toBe(0);
    expect(s.pendingChain).toBeUndefined();
    expect(s.board.size).toBe(32);
    expect(s.board.get("r6c8")).toEqual({ owner: "A", rank: "king" });
    expect(s.board.get("r7c7")).toEqual({ owner: "A", rank: "prince" });
    expect(s.board.get("r4c0")).toEqual({ owner: "B", rank: "king" });
    expect(s.board.get("r3c1")).toEqual({ owner: "B", rank: "prince" });
    expect(s.board.get("r9c5")).toEqual({ owner: "A", rank: "warrior" });
    expect(s.board.get("r1c3")).toEqual({ owner: "B", rank: "warrior" });
    expect(s.board.has("r5c3")).toBe(false);
  });

  it("builds the wide board", () => {
    const s = newGame({ boardTopology: "dablo_7x6" });
    expect(s.meta.topologyId).toBe("dablo_7x6");
    // three half-rows of 6 + 5 + 6 warriors, plus prince and king
    expect(s.board.size).toBe(38);
    expect(s.board.get("r8c10")).toEqual({ owner: "A", rank: "king" });
  });

  it("applies presets with overrides", () => {
    expect(GAME_CONFIG_PRESETS.quick.moveLimit).toBe(200);
    expect(newGameFromPreset("quick").meta.moveLimit).toBe(200);
    expect(newGameFromPreset("test", { captureDirection: "forward" }).meta).toEqual({
      topologyId: "dablo_6x5",
      moveLimit: 100,
      captureDirection: "forward",
    });
  });
});
