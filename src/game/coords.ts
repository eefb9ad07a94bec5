import type { NodeId } from "./state.ts";

// Node ids live on a half-step grid: board row 2.5 is stored as r5, so
// primary nodes are even/even and secondary nodes odd/odd.

const NODE_ID_RE = /^r(\d+)c(\d+)$/;

/** Grid coordinates of `id`, or null when it is not an `r#c#` id. */
export function tryParseNodeId(id: string): { r: number; c: number } | null {
  const m = NODE_ID_RE.exec(id);
  if (!m) return null;
  return { r: Number(m[1]), c: Number(m[2]) };
}

export function parseNodeId(id: string): { r: number; c: number } {
  const parsed = tryParseNodeId(id);
  if (!parsed) throw new Error(`Invalid node id: ${id}`);
  return parsed;
}

export function makeNodeId(r: number, c: number): NodeId {
  return `r${r}c${c}`;
}

export function isPrimaryCell(r: number, c: number): boolean {
  return r % 2 === 0 && c % 2 === 0;
}

export function isSecondaryCell(r: number, c: number): boolean {
  return r % 2 === 1 && c % 2 === 1;
}

/** Board-unit position (row 2.5, col 1.5) of a half-step cell. */
export function toBoardUnits(r: number, c: number): { row: number; col: number } {
  return { row: r / 2, col: c / 2 };
}
