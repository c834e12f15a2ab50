import { Cell, CellState, FlagOutcome, RevealOutcome } from "./types";
import { EngineInvariantError } from "./errors";

export function createCell(): Cell {
  return { mine: false, state: CellState.Hidden, adjacentMines: 0 };
}

export function markMine(cell: Cell): void {
  cell.mine = true;
}

export function setAdjacency(cell: Cell, n: number): void {
  if (!Number.isInteger(n) || n < 0 || n > 8) {
    throw new EngineInvariantError("BAD_ADJACENCY", `Adjacency count ${n} is outside 0..8`);
  }
  cell.adjacentMines = n;
}

// Flag protection is the reveal engine's job: a flagged cell is revealed here like a hidden one
export function revealCell(cell: Cell): RevealOutcome {
  if (cell.state === CellState.Revealed) return { kind: "already-revealed" };
  cell.state = CellState.Revealed;
  if (cell.mine) return { kind: "mine" };
  return { kind: "safe", adjacentMines: cell.adjacentMines };
}

export function toggleCellFlag(cell: Cell): FlagOutcome {
  switch (cell.state) {
    case CellState.Hidden:
      cell.state = CellState.Flagged;
      return FlagOutcome.Flagged;
    case CellState.Flagged:
      cell.state = CellState.Hidden;
      return FlagOutcome.Hidden;
    case CellState.Revealed:
      return FlagOutcome.Rejected;
  }
}
