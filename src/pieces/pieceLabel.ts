import type { Piece, Player, Rank } from "../types.ts";

const SAMI_NAMES: Record<Rank, string> = {
  warrior: "dåarohke",
  prince: "gånkan elkie",
  king: "gånka",
};

export function playerLabel(owner: Player): string {
  return owner === "A" ? "Player A" : "Player B";
}

function rankLabel(rank: Rank): string {
  switch (rank) {
    case "warrior": return "Warrior";
    case "prince": return "Prince";
    case "king": return "King";
  }
}

export function pieceLabel(p: Piece, opts: { withSamiName?: boolean } = {}): string {
  const base = `${playerLabel(p.owner)} ${rankLabel(p.rank)}`;
  return opts.withSamiName ? `${base} (${SAMI_NAMES[p.rank]})` : base;
}
