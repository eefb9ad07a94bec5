import type { Move } from "./moveTypes.ts";
import { toBoardUnits, tryParseNodeId } from "./coords.ts";

export type CoordFormat = "id" | "board";

/** Board-unit notation, e.g. r7c3 → "(3.5, 1.5)". */
export function nodeIdToBoard(nodeId: string): string {
  const parsed = tryParseNodeId(nodeId);
  if (!parsed) return nodeId;
  const { row, col } = toBoardUnits(parsed.r, parsed.c);
  return `(${row.toFixed(1)}, ${col.toFixed(1)})`;
}

export function formatNodeId(nodeId: string, format: CoordFormat = "board"): string {
  if (format === "board") return nodeIdToBoard(nodeId);
  return nodeId;
}

export function formatMove(move: Move, format: CoordFormat = "board"): string {
  const from = formatNodeId(move.from, format);
  const to = formatNodeId(move.to, format);
  if (move.kind === "capture") return `${from} → ${to} (captures ${formatNodeId(move.over, format)})`;
  return `${from} → ${to}`;
}
