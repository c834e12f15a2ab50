import { Difficulty, DifficultyLevel } from "./types";
import { Result, ok, invalidDifficulty } from "./errors";

export const MAX_DIMENSION = 1000;

export const DIFFICULTY_LEVELS: readonly DifficultyLevel[] = ["beginner", "intermediate", "expert"];

export const PRESETS: Readonly<Record<DifficultyLevel, Readonly<Difficulty>>> = {
  beginner: { level: "beginner", width: 9, height: 9, mines: 10 },
  intermediate: { level: "intermediate", width: 16, height: 16, mines: 40 },
  expert: { level: "expert", width: 30, height: 16, mines: 99 },
};

const LABELS: Record<Difficulty["level"], string> = {
  beginner: "Beginner",
  intermediate: "Intermediate",
  expert: "Expert",
  custom: "Custom",
};

export function isDifficultyLevel(value: unknown): value is DifficultyLevel {
  return typeof value === "string" && (DIFFICULTY_LEVELS as readonly string[]).includes(value);
}

export function preset(level: DifficultyLevel): Difficulty {
  return { ...PRESETS[level] };
}

function checkShape(width: number, height: number, mines: number): string | null {
  if (!Number.isInteger(width) || width < 1 || width > MAX_DIMENSION) {
    return `width must be an integer in 1..${MAX_DIMENSION} (got ${width})`;
  }
  if (!Number.isInteger(height) || height < 1 || height > MAX_DIMENSION) {
    return `height must be an integer in 1..${MAX_DIMENSION} (got ${height})`;
  }
  if (!Number.isInteger(mines) || mines < 0) {
    return `mines must be a non-negative integer (got ${mines})`;
  }
  if (mines >= width * height) {
    return `mines must be fewer than the ${width * height} cells (got ${mines})`;
  }
  return null;
}

/**
 * Builds a custom difficulty. A triple equal to one of the presets resolves
 * to that preset, so it keeps its high-score table.
 */
export function customDifficulty(width: number, height: number, mines: number): Result<Difficulty> {
  const problem = checkShape(width, height, mines);
  if (problem) return invalidDifficulty(problem);

  for (const level of DIFFICULTY_LEVELS) {
    const p = PRESETS[level];
    if (p.width === width && p.height === height && p.mines === mines) return ok(preset(level));
  }
  return ok({ level: "custom", width, height, mines });
}

export function validateDifficulty(difficulty: Difficulty): Result<Difficulty> {
  const { level, width, height, mines } = difficulty;
  const problem = checkShape(width, height, mines);
  if (problem) return invalidDifficulty(problem);

  if (level !== "custom") {
    const p = PRESETS[level];
    if (p.width !== width || p.height !== height || p.mines !== mines) {
      return invalidDifficulty(`${LABELS[level]} must be ${p.width}x${p.height} with ${p.mines} mines`);
    }
  }
  return ok({ level, width, height, mines });
}

export function describeDifficulty(difficulty: Difficulty): string {
  const { level, width, height, mines } = difficulty;
  return `${LABELS[level]} (${width}×${height}, ${mines} mines)`;
}
