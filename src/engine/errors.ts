import type { GameStatus, Pos } from "./types";

export type EngineErrorCode =
  | "OUT_OF_BOUNDS"
  | "GAME_OVER"
  | "PAUSED"
  | "INVALID_DIFFICULTY"
  | "INVALID_LAYOUT"
  | "INVALID_TICK";

export interface EngineError {
  code: EngineErrorCode;
  message: string;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: EngineError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(code: EngineErrorCode, message: string): Result<T> {
  return { ok: false, error: { code, message } };
}

// Pre-built failures for common cases

export function outOfBounds<T>(pos: Pos, rows: number, cols: number): Result<T> {
  return fail("OUT_OF_BOUNDS", `(${pos.row},${pos.col}) is outside the ${rows}x${cols} board`);
}

export function gameOver<T>(status: GameStatus): Result<T> {
  return fail("GAME_OVER", `Game is already ${status}`);
}

export function paused<T>(): Result<T> {
  return fail("PAUSED", "Game is paused");
}

export function invalidDifficulty<T>(reason: string): Result<T> {
  return fail("INVALID_DIFFICULTY", reason);
}

export function invalidLayout<T>(reason: string): Result<T> {
  return fail("INVALID_LAYOUT", reason);
}

export function invalidTick<T>(delta: number): Result<T> {
  return fail("INVALID_TICK", `Tick delta must be a finite, non-negative number (got ${delta})`);
}

export type InvariantCode =
  | "ALREADY_PLACED"
  | "BAD_LAYOUT"
  | "OUT_OF_BOUNDS"
  | "BAD_ADJACENCY"
  | "INVALID_DIFFICULTY";

/** Thrown on engine misuse that a correct integration never triggers. */
export class EngineInvariantError extends Error {
  readonly code: InvariantCode;

  constructor(code: InvariantCode, message: string) {
    super(message);
    this.name = "EngineInvariantError";
    this.code = code;
  }
}
