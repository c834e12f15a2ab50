import { CellView, Difficulty, FlagResult, GameOptions, GameStatus, Pos, RevealResult } from "./types";
import { GameSession } from "./game";
import { Result } from "./errors";

// Call contract for presentation layers that prefer plain functions

export function newGame(difficulty: Difficulty, options: Partial<GameOptions> = {}): Result<GameSession> {
  return GameSession.create(difficulty, options);
}

export function reveal(session: GameSession, pos: Pos): Result<RevealResult> {
  return session.reveal(pos);
}

export function chord(session: GameSession, pos: Pos): Result<RevealResult> {
  return session.chord(pos);
}

export function toggleFlag(session: GameSession, pos: Pos): Result<FlagResult> {
  return session.toggleFlag(pos);
}

export function tick(session: GameSession, delta: number): Result<number> {
  return session.tick(delta);
}

export function status(session: GameSession): GameStatus {
  return session.status;
}

export function snapshot(session: GameSession): CellView[][] {
  return session.snapshot();
}
