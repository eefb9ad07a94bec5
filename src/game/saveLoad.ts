import { z } from "zod";
import type { GameState, NodeId } from "./state.ts";
import type { Piece } from "../types.ts";
import { TOPOLOGY_IDS } from "../variants/variantTypes.ts";
import { getBoardGraph } from "./board.ts";
import { MoveLimitSchema } from "./config.ts";
import { generateCaptureMovesFrom } from "./movegen.ts";
import { ConfigError, formatZodError } from "./errors.ts";

const PlayerSchema = z.enum(["A", "B"]);
const RankSchema = z.enum(["warrior", "prince", "king"]);

const PieceSchema = z.object({
  owner: PlayerSchema,
  rank: RankSchema,
});

export const SerializedGameStateSchema = z.object({
  board: z.array(z.tuple([z.string(), PieceSchema])),
  toMove: PlayerSchema,
  moveCount: z.number().int().min(0),
  pendingChain: z
    .object({
      from: z.string(),
      rank: RankSchema,
      owner: PlayerSchema,
    })
    .optional(),
  meta: z.object({
    topologyId: z.enum(TOPOLOGY_IDS),
    moveLimit: MoveLimitSchema,
    captureDirection: z.enum(["any", "forward"]),
  }),
});

export type SerializedGameState = z.infer<typeof SerializedGameStateSchema>;

export const SaveFileSchema = z.object({
  saveVersion: z.literal(1),
  current: SerializedGameStateSchema,
  notation: z.array(z.string()).optional(),
});

export type SaveFile = z.infer<typeof SaveFileSchema>;

/**
 * Serialize game state to a JSON-compatible object
 */
export function serializeGameState(state: GameState): SerializedGameState {
  const out: SerializedGameState = {
    board: Array.from(state.board.entries()).map(([id, p]): [NodeId, Piece] => [id, { owner: p.owner, rank: p.rank }]),
    toMove: state.toMove,
    moveCount: state.moveCount,
    meta: { ...state.meta },
  };
  if (state.pendingChain) out.pendingChain = { ...state.pendingChain };
  return out;
}

function checkAgainstTopology(data: SerializedGameState): void {
  const graph = getBoardGraph(data.meta.topologyId);
  const seen = new Set<NodeId>();
  for (const [nodeId] of data.board) {
    if (!graph.nodeById.has(nodeId)) {
      throw new ConfigError(`Invalid save data: node ${nodeId} is not on ${data.meta.topologyId}`, { nodeId });
    }
    if (seen.has(nodeId)) throw new ConfigError(`Invalid save data: node ${nodeId} listed twice`, { nodeId });
    seen.add(nodeId);
  }

  const chain = data.pendingChain;
  if (!chain) return;
  const piece = data.board.find(([id]) => id === chain.from)?.[1];
  if (!piece || piece.owner !== chain.owner || piece.rank !== chain.rank || chain.owner !== data.toMove) {
    throw new ConfigError(`Invalid save data: pending chain at ${chain.from} does not match the board`, {
      pendingChain: chain,
    });
  }
}

/**
 * Deserialize game state from a JSON-compatible object.
 * @throws ConfigError when the data does not describe a playable position on a known board.
 */
export function deserializeGameState(data: unknown): GameState {
  const result = SerializedGameStateSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(`Invalid save data: ${formatZodError(result.error)}`, { issues: result.error.issues });
  }
  const parsed = result.data;
  checkAgainstTopology(parsed);

  const state: GameState = {
    board: new Map(parsed.board),
    toMove: parsed.toMove,
    moveCount: parsed.moveCount,
    meta: { ...parsed.meta },
  };
  if (parsed.pendingChain) {
    const chain = { ...parsed.pendingChain };
    state.pendingChain = chain;
    // A chain only stays open while its piece has another capture.
    if (generateCaptureMovesFrom(state, chain.from, true).length === 0) {
      throw new ConfigError(`Invalid save data: pending chain at ${chain.from} has no capture left`, {
        pendingChain: chain,
      });
    }
  }
  return state;
}

export function serializeSaveData(state: GameState, notation?: readonly string[]): string {
  const file: SaveFile = {
    saveVersion: 1,
    current: serializeGameState(state),
  };
  if (notation) file.notation = [...notation];
  return JSON.stringify(file, null, 2);
}

export function deserializeSaveData(json: string): { state: GameState; notation: string[] } {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid save file: ${msg}`);
  }

  const result = SaveFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid save file: ${formatZodError(result.error)}`, { issues: result.error.issues });
  }

  return {
    state: deserializeGameState(result.data.current),
    notation: result.data.notation ?? [],
  };
}
