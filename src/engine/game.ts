import {
  CellState,
  CellView,
  Difficulty,
  FlagResult,
  GameOptions,
  GameStatus,
  Pos,
  RevealResult,
  ScoreRecord,
  DEFAULT_OPTIONS,
} from "./types";
import { Board, layoutProblem } from "./board";
import { RevealPlacement, RevealStep, chordFrom } from "./reveal";
import { validateDifficulty } from "./difficulty";
import { scoreCandidate } from "./scores";
import { createRng, randomSeed } from "./rng";
import {
  EngineInvariantError,
  Result,
  gameOver,
  invalidLayout,
  invalidTick,
  ok,
  outOfBounds,
  paused,
} from "./errors";

function checkLayout(difficulty: Difficulty, layout: readonly Pos[] | undefined): string | null {
  if (layout === undefined) return null;
  return layoutProblem(layout, difficulty.height, difficulty.width, difficulty.mines);
}

export class GameSession {
  readonly difficulty: Difficulty;
  readonly options: GameOptions;
  private readonly board: Board;
  private readonly placement: RevealPlacement;
  private _status: GameStatus = GameStatus.NotStarted;
  private _elapsed = 0;
  private _paused = false;
  private _explodedAt: Pos | null = null;
  private _scoreRecord: ScoreRecord | null = null;

  /**
   * Throws `EngineInvariantError` on an invalid difficulty or fixed layout;
   * see `GameSession.create`.
   */
  constructor(difficulty: Difficulty, options: Partial<GameOptions> = {}) {
    const checked = validateDifficulty(difficulty);
    if (!checked.ok) throw new EngineInvariantError("INVALID_DIFFICULTY", checked.error.message);
    const problem = checkLayout(checked.value, options.layout);
    if (problem !== null) throw new EngineInvariantError("BAD_LAYOUT", problem);

    this.difficulty = checked.value;
    this.options = { ...DEFAULT_OPTIONS, ...options, seed: options.seed ?? randomSeed() };
    this.board = new Board(this.difficulty);
    this.placement = {
      rng: this.options.rng ?? createRng(this.options.seed),
      safeArea: this.options.safeArea,
      layout: this.options.layout,
    };
  }

  static create(difficulty: Difficulty, options: Partial<GameOptions> = {}): Result<GameSession> {
    const checked = validateDifficulty(difficulty);
    if (!checked.ok) return checked;
    const problem = checkLayout(checked.value, options.layout);
    if (problem !== null) return invalidLayout(problem);
    return ok(new GameSession(checked.value, options));
  }

  get status(): GameStatus {
    return this._status;
  }

  get elapsed(): number {
    return this._elapsed;
  }

  get paused(): boolean {
    return this._paused;
  }

  get rows(): number {
    return this.board.rows;
  }

  get cols(): number {
    return this.board.cols;
  }

  get flagsPlaced(): number {
    return this.board.flagCount;
  }

  // Can go negative when the player over-flags
  get remainingFlags(): number {
    return this.difficulty.mines - this.board.flagCount;
  }

  get explodedAt(): Pos | null {
    return this._explodedAt;
  }

  get scoreRecord(): ScoreRecord | null {
    return this._scoreRecord;
  }

  get isOver(): boolean {
    return this._status === GameStatus.Won || this._status === GameStatus.Lost;
  }

  reveal(pos: Pos): Result<RevealResult> {
    const rejected = this.guard<RevealResult>(pos);
    if (rejected) return rejected;

    this.start();
    return ok(this.settle(this.board.reveal(pos, this.placement)));
  }

  // Open unflagged neighbours of a number whose flags match it
  chord(pos: Pos): Result<RevealResult> {
    const rejected = this.guard<RevealResult>(pos);
    if (rejected) return rejected;

    return ok(this.settle(chordFrom(this.board, pos)));
  }

  toggleFlag(pos: Pos): Result<FlagResult> {
    const rejected = this.guard<FlagResult>(pos);
    if (rejected) return rejected;

    this.start();
    const outcome = this.board.toggleFlag(pos);
    return ok({
      outcome,
      flagsPlaced: this.flagsPlaced,
      remainingFlags: this.remainingFlags,
    });
  }

  /** Advances the clock while playing; returns the elapsed seconds. */
  tick(delta: number): Result<number> {
    if (!Number.isFinite(delta) || delta < 0) return invalidTick(delta);
    if (this._status === GameStatus.Playing && !this._paused) this._elapsed += delta;
    return ok(this._elapsed);
  }

  pause(): boolean {
    if (this._status !== GameStatus.Playing || this._paused) return false;
    this._paused = true;
    return true;
  }

  resume(): boolean {
    if (!this._paused) return false;
    this._paused = false;
    return true;
  }

  cellView(pos: Pos): CellView {
    const c = this.board.cell(pos);
    const lost = this._status === GameStatus.Lost;
    const revealed = c.state === CellState.Revealed;
    const exploded =
      this._explodedAt !== null &&
      this._explodedAt.row === pos.row &&
      this._explodedAt.col === pos.col;

    return {
      row: pos.row,
      col: pos.col,
      state: c.state,
      adjacentMines: !c.mine && (revealed || this.isOver) ? c.adjacentMines : null,
      mine: revealed || this.isOver ? c.mine : null,
      exploded,
      wrongFlag: lost && c.state === CellState.Flagged && !c.mine,
    };
  }

  snapshot(): CellView[][] {
    const out: CellView[][] = [];
    for (let r = 0; r < this.rows; r++) {
      const row: CellView[] = [];
      for (let c = 0; c < this.cols; c++) {
        row.push(this.cellView({ row: r, col: c }));
      }
      out.push(row);
    }
    return out;
  }

  private guard<T>(pos: Pos): Result<T> | null {
    if (this.isOver) return gameOver(this._status);
    if (this._paused) return paused();
    if (!this.board.inBounds(pos)) return outOfBounds(pos, this.rows, this.cols);
    return null;
  }

  private start(): void {
    if (this._status === GameStatus.NotStarted) {
      this._status = GameStatus.Playing;
      this._elapsed = 0;
    }
  }

  private settle(step: RevealStep): RevealResult {
    const cellsRevealed = step.revealed;

    if (step.outcome === "mine") {
      this._status = GameStatus.Lost;
      this._explodedAt = cellsRevealed[cellsRevealed.length - 1] ?? null;
      cellsRevealed.push(...this.board.revealMines());
    } else if (this.board.isFullyCleared()) {
      this._status = GameStatus.Won;
      if (this.difficulty.level !== "custom") {
        const previous = this.options.bestTime?.(this.difficulty.level) ?? null;
        this._scoreRecord = scoreCandidate(this.difficulty, this._elapsed, previous);
      }
    }

    return {
      outcome: step.outcome,
      cellsRevealed,
      status: this._status,
      scoreRecord: this._scoreRecord,
    };
  }
}
