export type DifficultyLevel = "beginner" | "intermediate" | "expert";

// First-click safety: keep only the clicked cell clear, or its neighbours too
export type SafeArea = "cell" | "neighbours";

export interface Pos {
  row: number;
  col: number;
}

export interface Difficulty {
  level: DifficultyLevel | "custom";
  width: number;  // columns
  height: number; // rows
  mines: number;
}

export enum CellState {
  Hidden = "hidden",
  Flagged = "flagged",
  Revealed = "revealed",
}

export interface Cell {
  mine: boolean;
  state: CellState;
  adjacentMines: number; // 0..8, meaningless on mines
}

export type RevealOutcome =
  | { kind: "already-revealed" }
  | { kind: "mine" }
  | { kind: "safe"; adjacentMines: number };

export enum FlagOutcome {
  Flagged = "flagged",
  Hidden = "hidden",
  Rejected = "rejected",
}

export enum GameStatus {
  NotStarted = "not-started",
  Playing = "playing",
  Won = "won",
  Lost = "lost",
}

export interface ScoreRecord {
  level: DifficultyLevel;
  bestTime: number; // whole seconds
}

/** Returns the stored best time for a level, or null if none is stored. */
export type BestTimeLookup = (level: DifficultyLevel) => number | null;

export interface GameOptions {
  seed: number;
  rng?: () => number;
  safeArea: SafeArea;
  // Fixed mine positions; bypasses first-click safety
  layout?: readonly Pos[];
  bestTime?: BestTimeLookup;
}

export type RevealKind =
  | "safe"
  | "mine"
  | "flagged"
  | "already-revealed"
  | "unsatisfied";

export interface RevealResult {
  outcome: RevealKind;
  cellsRevealed: Pos[];
  status: GameStatus;
  scoreRecord: ScoreRecord | null;
}

export interface FlagResult {
  outcome: FlagOutcome;
  flagsPlaced: number;
  remainingFlags: number;
}

// Read-only cell snapshot for the presentation layer
export interface CellView {
  row: number;
  col: number;
  state: CellState;
  adjacentMines: number | null; // visible when revealed or game over
  mine: boolean | null;
  exploded: boolean;            // the mine that ended the game
  wrongFlag: boolean;           // flag on a safe cell, shown after a loss
}

/** Default options. Each session picks its own seed unless one is given. */
export const DEFAULT_OPTIONS: Omit<GameOptions, "seed"> = {
  safeArea: "neighbours",
};
