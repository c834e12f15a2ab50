import { Cell, CellState, Difficulty, FlagOutcome, Pos, SafeArea } from "./types";
import { createCell, markMine, setAdjacency, toggleCellFlag } from "./cell";
import { EngineInvariantError } from "./errors";
import { shuffle } from "./rng";
import { revealFrom, RevealPlacement, RevealStep } from "./reveal";

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

const DELTAS: ReadonlyArray<{ dr: number; dc: number }> = (() => {
  const deltas: Array<{ dr: number; dc: number }> = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      deltas.push({ dr, dc });
    }
  }
  return deltas;
})();

// Lazy and restartable: every call yields a fresh iterator
export function* neighbours(row: number, col: number, rows: number, cols: number): Generator<Pos> {
  for (const { dr, dc } of DELTAS) {
    const r = row + dr;
    const c = col + dc;
    if (r < 0 || r >= rows || c < 0 || c >= cols) continue;
    yield { row: r, col: c };
  }
}

/** Describes what is wrong with a fixed mine layout, or returns null if it fits. */
export function layoutProblem(
  positions: readonly Pos[],
  rows: number,
  cols: number,
  mines: number,
): string | null {
  if (positions.length !== mines) {
    return `Layout has ${positions.length} mines, board expects ${mines}`;
  }
  const seen = new Set<string>();
  for (const p of positions) {
    const key = posKey(p);
    const inside =
      Number.isInteger(p.row) && Number.isInteger(p.col) &&
      p.row >= 0 && p.row < rows && p.col >= 0 && p.col < cols;
    if (!inside) {
      return `Mine at (${key}) is outside the ${rows}x${cols} board`;
    }
    if (seen.has(key)) return `Mine at (${key}) is listed twice`;
    seen.add(key);
  }
  return null;
}

export function createEmptyGrid(rows: number, cols: number): Cell[][] {
  const grid: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) {
      row.push(createCell());
    }
    grid.push(row);
  }
  return grid;
}

export class Board {
  readonly rows: number;
  readonly cols: number;
  readonly mineCount: number;
  private readonly grid: Cell[][];
  private placed = false;
  private flags = 0;
  private revealedSafe = 0;

  constructor(difficulty: Difficulty) {
    this.rows = difficulty.height;
    this.cols = difficulty.width;
    this.mineCount = difficulty.mines;
    this.grid = createEmptyGrid(this.rows, this.cols);
  }

  get minesPlaced(): boolean {
    return this.placed;
  }

  get flagCount(): number {
    return this.flags;
  }

  get safeCellCount(): number {
    return this.rows * this.cols - this.mineCount;
  }

  get revealedSafeCount(): number {
    return this.revealedSafe;
  }

  inBounds(pos: Pos): boolean {
    return (
      Number.isInteger(pos.row) &&
      Number.isInteger(pos.col) &&
      pos.row >= 0 &&
      pos.row < this.rows &&
      pos.col >= 0 &&
      pos.col < this.cols
    );
  }

  cell(pos: Pos): Readonly<Cell> {
    return this.cellAt(pos);
  }

  // Mutable access is limited to this module and the reveal engine
  cellAt(pos: Pos): Cell {
    if (!this.inBounds(pos)) {
      throw new EngineInvariantError(
        "OUT_OF_BOUNDS",
        `(${pos.row},${pos.col}) is outside the ${this.rows}x${this.cols} board`,
      );
    }
    return this.grid[pos.row][pos.col];
  }

  neighbours(pos: Pos): Generator<Pos> {
    return neighbours(pos.row, pos.col, this.rows, this.cols);
  }

  /**
   * Picks `mineCount` distinct cells uniformly at random, keeping `exclude`
   * (and under the "neighbours" policy its neighbours) clear. Falls back to
   * clearing only `exclude` when the neighbourhood leaves too few cells.
   */
  placeMines(exclude: Pos, rng: () => number, safeArea: SafeArea = "neighbours"): Pos[] {
    this.assertUnplaced();
    this.cellAt(exclude);

    const cleared = new Set<string>([posKey(exclude)]);
    if (safeArea === "neighbours") {
      for (const n of this.neighbours(exclude)) cleared.add(posKey(n));
      if (this.rows * this.cols - cleared.size < this.mineCount) {
        cleared.clear();
        cleared.add(posKey(exclude));
      }
    }

    const eligible: Pos[] = [];
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        const p = { row: r, col: c };
        if (!cleared.has(posKey(p))) eligible.push(p);
      }
    }

    const mines = shuffle(eligible, rng, this.mineCount);
    this.layMines(mines);
    return mines;
  }

  /** Places a caller-supplied layout, e.g. for replays or hand-built boards. */
  layMines(positions: readonly Pos[]): void {
    this.assertUnplaced();
    const problem = layoutProblem(positions, this.rows, this.cols, this.mineCount);
    if (problem !== null) throw new EngineInvariantError("BAD_LAYOUT", problem);

    for (const p of positions) markMine(this.grid[p.row][p.col]);
    this.placed = true;
    this.computeAdjacency();
  }

  computeAdjacency(): void {
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        const cell = this.grid[r][c];
        if (cell.mine) continue;
        let count = 0;
        for (const n of neighbours(r, c, this.rows, this.cols)) {
          if (this.grid[n.row][n.col].mine) count++;
        }
        setAdjacency(cell, count);
      }
    }
  }

  reveal(pos: Pos, placement: RevealPlacement): RevealStep {
    return revealFrom(this, pos, placement);
  }

  toggleFlag(pos: Pos): FlagOutcome {
    const outcome = toggleCellFlag(this.cellAt(pos));
    if (outcome === FlagOutcome.Flagged) this.flags++;
    else if (outcome === FlagOutcome.Hidden) this.flags--;
    return outcome;
  }

  /** Called by the reveal engine for every safe cell it turns over. */
  noteSafeRevealed(): void {
    this.revealedSafe++;
  }

  isFullyCleared(): boolean {
    return this.placed && this.revealedSafe === this.safeCellCount;
  }

  // Display only: flagged mines keep their flag. Views show them as mines
  // through `CellView.mine`, which `cellView`/`snapshot` fill in once the game is over
  revealMines(): Pos[] {
    const shown: Pos[] = [];
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        const cell = this.grid[r][c];
        if (cell.mine && cell.state === CellState.Hidden) {
          cell.state = CellState.Revealed;
          shown.push({ row: r, col: c });
        }
      }
    }
    return shown;
  }

  minePositions(): Pos[] {
    const out: Pos[] = [];
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        if (this.grid[r][c].mine) out.push({ row: r, col: c });
      }
    }
    return out;
  }

  private assertUnplaced(): void {
    if (this.placed) {
      throw new EngineInvariantError("ALREADY_PLACED", "Mines are already placed on this board");
    }
  }
}
