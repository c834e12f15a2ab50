export { GameSession } from "./game";
export { Board, createEmptyGrid, layoutProblem, neighbours, posKey } from "./board";
export { createCell, markMine, setAdjacency, revealCell, toggleCellFlag } from "./cell";
export { revealFrom, chordFrom } from "./reveal";
export type { RevealPlacement, RevealStep } from "./reveal";
export { createRng, randomSeed, shuffle } from "./rng";
export {
  DIFFICULTY_LEVELS,
  MAX_DIMENSION,
  PRESETS,
  customDifficulty,
  describeDifficulty,
  isDifficultyLevel,
  preset,
  validateDifficulty,
} from "./difficulty";
export {
  HighScoreTable,
  MAX_HIGH_SCORES_PER_LEVEL,
  MAX_HIGH_SCORE_NAME_LENGTH,
  parsePersistedSettings,
  scoreCandidate,
  toPersistedSettings,
} from "./scores";
export type { HighScore, PersistedScores, PersistedSettings } from "./scores";
export { EngineInvariantError, ok, fail } from "./errors";
export type { EngineError, EngineErrorCode, InvariantCode, Result } from "./errors";
export { newGame, reveal, chord, toggleFlag, tick, status, snapshot } from "./api";
export type {
  BestTimeLookup,
  Cell,
  CellView,
  Difficulty,
  DifficultyLevel,
  FlagResult,
  GameOptions,
  Pos,
  RevealKind,
  RevealOutcome,
  RevealResult,
  SafeArea,
  ScoreRecord,
} from "./types";
export { CellState, FlagOutcome, GameStatus, DEFAULT_OPTIONS } from "./types";
