import { CellState, Pos, RevealKind, SafeArea } from "./types";
import { revealCell } from "./cell";
import type { Board } from "./board";

export interface RevealPlacement {
  rng: () => number;
  safeArea: SafeArea;
  layout?: readonly Pos[];
}

export interface RevealStep {
  outcome: RevealKind;
  revealed: Pos[];
}

/**
 * Reveals `pos`, placing the mines first if this is the board's first reveal.
 * Zero cells flood outwards breadth-first; numbered cells stop the flood but
 * are themselves revealed. Flagged cells are never touched.
 */
export function revealFrom(board: Board, pos: Pos, placement: RevealPlacement): RevealStep {
  // Checked before placement so that revealing a flag never changes the board
  if (board.cellAt(pos).state === CellState.Flagged) return { outcome: "flagged", revealed: [] };
  if (!board.minesPlaced) {
    if (placement.layout) board.layMines(placement.layout);
    else board.placeMines(pos, placement.rng, placement.safeArea);
  }
  return revealPlaced(board, pos);
}

function revealPlaced(board: Board, pos: Pos): RevealStep {
  const cell = board.cellAt(pos);
  if (cell.state === CellState.Flagged) return { outcome: "flagged", revealed: [] };

  const outcome = revealCell(cell);
  switch (outcome.kind) {
    case "already-revealed":
      return { outcome: "already-revealed", revealed: [] };
    case "mine":
      return { outcome: "mine", revealed: [pos] };
    case "safe":
      board.noteSafeRevealed();
      if (outcome.adjacentMines > 0) return { outcome: "safe", revealed: [pos] };
      return { outcome: "safe", revealed: flood(board, pos) };
  }
}

// Iterative so large empty boards cannot exhaust the stack
function flood(board: Board, start: Pos): Pos[] {
  const cols = board.cols;
  const visited = new Uint8Array(board.rows * cols);
  visited[start.row * cols + start.col] = 1;

  const revealed: Pos[] = [start];
  const queue: Pos[] = [start];
  let head = 0;

  while (head < queue.length) {
    const p = queue[head++];
    for (const n of board.neighbours(p)) {
      const idx = n.row * cols + n.col;
      if (visited[idx]) continue;
      visited[idx] = 1;

      const nc = board.cellAt(n);
      if (nc.state !== CellState.Hidden || nc.mine) continue;
      revealCell(nc);
      board.noteSafeRevealed();
      revealed.push(n);
      if (nc.adjacentMines === 0) queue.push(n);
    }
  }

  return revealed;
}

/**
 * Reveals every hidden neighbour of a revealed number whose flag count
 * matches it. Stops at the first mine.
 */
export function chordFrom(board: Board, pos: Pos): RevealStep {
  const cell = board.cellAt(pos);
  if (cell.state !== CellState.Revealed || cell.mine || cell.adjacentMines === 0) {
    return { outcome: "unsatisfied", revealed: [] };
  }

  let flagged = 0;
  const hidden: Pos[] = [];
  for (const n of board.neighbours(pos)) {
    const state = board.cellAt(n).state;
    if (state === CellState.Flagged) flagged++;
    else if (state === CellState.Hidden) hidden.push(n);
  }
  if (flagged !== cell.adjacentMines) return { outcome: "unsatisfied", revealed: [] };

  const revealed: Pos[] = [];
  for (const n of hidden) {
    const step = revealPlaced(board, n);
    revealed.push(...step.revealed);
    if (step.outcome === "mine") return { outcome: "mine", revealed };
  }
  return { outcome: "safe", revealed };
}
