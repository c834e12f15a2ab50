import { BestTimeLookup, Difficulty, DifficultyLevel, ScoreRecord } from "./types";
import {
  DIFFICULTY_LEVELS,
  customDifficulty,
  isDifficultyLevel,
  preset,
} from "./difficulty";

export const MAX_HIGH_SCORES_PER_LEVEL = 3;
export const MAX_HIGH_SCORE_NAME_LENGTH = 32;

export interface HighScore {
  name: string;
  seconds: number;
}

export type PersistedScores = Partial<Record<DifficultyLevel, HighScore[]>>;

// What the storage collaborator keeps between runs
export interface PersistedSettings {
  difficulty: Difficulty;
  scores: PersistedScores;
}

/**
 * Candidate record for a won game: null for custom boards and for times that
 * do not beat the stored best.
 */
export function scoreCandidate(
  difficulty: Difficulty,
  elapsed: number,
  previousBest: number | null,
): ScoreRecord | null {
  if (difficulty.level === "custom") return null;
  const seconds = Math.floor(elapsed);
  if (previousBest !== null && seconds >= previousBest) return null;
  return { level: difficulty.level, bestTime: seconds };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nameLength(name: string): number {
  return Array.from(name).length;
}

function parseHighScore(raw: unknown): HighScore | null {
  if (!isRecord(raw)) return null;
  const { name, seconds } = raw;
  if (typeof name !== "string" || typeof seconds !== "number") return null;
  if (!Number.isFinite(seconds) || seconds < 0) return null;
  const clipped = nameLength(name) < MAX_HIGH_SCORE_NAME_LENGTH
    ? name
    : Array.from(name).slice(0, MAX_HIGH_SCORE_NAME_LENGTH - 1).join("");
  return { name: clipped, seconds: Math.floor(seconds) };
}

export class HighScoreTable {
  private readonly scores = new Map<DifficultyLevel, HighScore[]>();

  /** Bound lookup, suitable for `GameOptions.bestTime`. */
  readonly lookup: BestTimeLookup = (level) => this.bestTime(level);

  entries(level: DifficultyLevel): readonly HighScore[] {
    return (this.scores.get(level) ?? []).map((s) => ({ ...s }));
  }

  bestTime(level: DifficultyLevel): number | null {
    const list = this.scores.get(level);
    return list && list.length > 0 ? list[0].seconds : null;
  }

  /**
   * Inserts a score ahead of the first strictly slower entry and returns its
   * rank, or null when it does not make the table. Ties rank after older scores.
   * Names of `MAX_HIGH_SCORE_NAME_LENGTH` characters or more and times that are
   * negative or not finite are refused the same way.
   */
  insert(level: DifficultyLevel, seconds: number, name = ""): number | null {
    if (!Number.isFinite(seconds) || seconds < 0) return null;
    if (nameLength(name) >= MAX_HIGH_SCORE_NAME_LENGTH) return null;
    const list = this.scores.get(level) ?? [];
    const entry: HighScore = { name, seconds: Math.floor(seconds) };

    let index: number | null = null;
    for (let i = 0; i < MAX_HIGH_SCORES_PER_LEVEL; i++) {
      if (i >= list.length) {
        list.push(entry);
        index = i;
        break;
      }
      if (entry.seconds < list[i].seconds) {
        list.splice(i, 0, entry);
        list.length = Math.min(list.length, MAX_HIGH_SCORES_PER_LEVEL);
        index = i;
        break;
      }
    }

    this.scores.set(level, list);
    return index;
  }

  rename(level: DifficultyLevel, index: number, name: string): boolean {
    if (nameLength(name) >= MAX_HIGH_SCORE_NAME_LENGTH) return false;
    const entry = this.scores.get(level)?.[index];
    if (!entry) return false;
    entry.name = name;
    return true;
  }

  discard(level: DifficultyLevel, index: number): boolean {
    const list = this.scores.get(level);
    if (!list || index < 0 || index >= list.length) return false;
    list.splice(index, 1);
    return true;
  }

  toRecord(): PersistedScores {
    const out: PersistedScores = {};
    for (const level of DIFFICULTY_LEVELS) {
      const list = this.scores.get(level);
      if (list && list.length > 0) out[level] = list.map((s) => ({ ...s }));
    }
    return out;
  }

  /** Rebuilds a table from loaded data, dropping what does not parse. */
  static fromRecord(raw: unknown): HighScoreTable {
    const table = new HighScoreTable();
    if (raw === undefined || raw === null) return table;
    if (!isRecord(raw)) {
      console.warn("Ignoring stored high scores: expected an object");
      return table;
    }

    for (const [key, value] of Object.entries(raw)) {
      if (!isDifficultyLevel(key)) {
        console.warn(`Ignoring high scores for unknown level "${key}"`);
        continue;
      }
      if (!Array.isArray(value)) {
        console.warn(`Ignoring high scores for ${key}: expected a list`);
        continue;
      }
      const list: HighScore[] = [];
      for (const item of value) {
        const score = parseHighScore(item);
        if (score) list.push(score);
        else console.warn(`Dropping malformed ${key} high score`);
      }
      list.sort((a, b) => a.seconds - b.seconds);
      list.length = Math.min(list.length, MAX_HIGH_SCORES_PER_LEVEL);
      if (list.length > 0) table.scores.set(key, list);
    }
    return table;
  }
}

function parseDifficulty(raw: unknown): Difficulty | null {
  if (!isRecord(raw)) return null;
  const { level, width, height, mines } = raw;
  if (isDifficultyLevel(level)) return preset(level);
  if (level !== "custom") return null;
  if (typeof width !== "number" || typeof height !== "number" || typeof mines !== "number") {
    return null;
  }
  const built = customDifficulty(width, height, mines);
  return built.ok ? built.value : null;
}

export function toPersistedSettings(difficulty: Difficulty, table: HighScoreTable): PersistedSettings {
  return { difficulty: { ...difficulty }, scores: table.toRecord() };
}

/**
 * Restores settings the storage layer loaded. An unusable difficulty falls
 * back to beginner; scores are sanitised by `HighScoreTable.fromRecord`.
 */
export function parsePersistedSettings(raw: unknown): { difficulty: Difficulty; table: HighScoreTable } {
  if (!isRecord(raw)) {
    console.warn("Ignoring stored settings: expected an object");
    return { difficulty: preset("beginner"), table: new HighScoreTable() };
  }

  let difficulty = parseDifficulty(raw.difficulty);
  if (!difficulty) {
    console.warn("Stored difficulty is unusable, falling back to beginner");
    difficulty = preset("beginner");
  }
  return { difficulty, table: HighScoreTable.fromRecord(raw.scores) };
}
