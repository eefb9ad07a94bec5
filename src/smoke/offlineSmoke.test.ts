import { describe, it, expect } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import {
  TOPOLOGIES,
  applyMove,
  deserializeSaveData,
  evaluate,
  legalMoves,
  newGame,
  selectMove,
} from "../core/index.ts";

describe("offline baseline smoke", () => {
  it("can generate and apply at least one legal move on each board", () => {
    for (const { topologyId } of TOPOLOGIES) {
      const s0 = newGame({ boardTopology: topologyId });
      const legal = legalMoves(s0);
      expect(legal.length, `${topologyId}: expected at least one legal move`).toBeGreaterThan(0);

      const s1 = applyMove(s0, legal[0]);
      expect(s1.meta.topologyId).toBe(topologyId);
      expect(s1.toMove).toBe("B");
      expect(evaluate(s1)).toEqual({ kind: "ongoing" });
    }
  });

  it("can load golden fixtures and let the NPC play on", () => {
    const fixturesDir = path.resolve(process.cwd(), "docs", "test-saves");
    const expected: Record<string, string> = {
      "chain-in-progress.json": "r4c0",
      "prince-fork.json": "r2c2",
    };

    for (const [filename, landing] of Object.entries(expected)) {
      const raw = fs.readFileSync(path.join(fixturesDir, filename), "utf8");
      const { state } = deserializeSaveData(raw);
      const move = selectMove(state, { style: "smart", difficulty: "hard" });
      expect(move.kind, filename).toBe("capture");
      expect(move.to, filename).toBe(landing);
      expect(() => applyMove(state, move)).not.toThrow();
    }
  });
});
