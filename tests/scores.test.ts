// ─── Difficulty and score tests ─────────────────────────────────────────────

import { afterEach, describe, it, expect, vi } from "vitest";
import {
  HighScoreTable,
  PRESETS,
  customDifficulty,
  describeDifficulty,
  parsePersistedSettings,
  preset,
  scoreCandidate,
  toPersistedSettings,
  validateDifficulty,
} from "../src/engine/index";

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Difficulty ─────────────────────────────────────────────────────────────

describe("difficulty presets", () => {
  it("match the classic board sizes", () => {
    expect(PRESETS.beginner).toEqual({ level: "beginner", width: 9, height: 9, mines: 10 });
    expect(PRESETS.intermediate).toEqual({ level: "intermediate", width: 16, height: 16, mines: 40 });
    expect(PRESETS.expert).toEqual({ level: "expert", width: 30, height: 16, mines: 99 });
  });

  it("hands out copies", () => {
    const p = preset("beginner");
    p.mines = 11;
    expect(PRESETS.beginner.mines).toBe(10);
  });

  it("describes themselves", () => {
    expect(describeDifficulty(preset("expert"))).toBe("Expert (30×16, 99 mines)");
    expect(describeDifficulty({ level: "custom", width: 5, height: 4, mines: 3 })).toBe(
      "Custom (5×4, 3 mines)",
    );
  });
});

describe("customDifficulty", () => {
  it("accepts a board with one free cell", () => {
    const result = customDifficulty(4, 3, 11);
    expect(result).toEqual({ ok: true, value: { level: "custom", width: 4, height: 3, mines: 11 } });
  });

  it("resolves triples that equal a preset", () => {
    const result = customDifficulty(16, 16, 40);
    expect(result.ok && result.value.level).toBe("intermediate");
  });

  it("rejects impossible boards", () => {
    for (const [w, h, m] of [
      [3, 3, 9],
      [3, 3, -1],
      [0, 3, 0],
      [3, 2.5, 1],
      [3, 3, 1.5],
      [1001, 1, 0],
    ]) {
      const result = customDifficulty(w, h, m);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("INVALID_DIFFICULTY");
    }
  });

  it("validates preset levels against their dimensions", () => {
    expect(validateDifficulty(preset("expert")).ok).toBe(true);
    expect(validateDifficulty({ level: "beginner", width: 10, height: 10, mines: 10 }).ok).toBe(false);
  });
});

// ─── Score candidates ───────────────────────────────────────────────────────

describe("scoreCandidate", () => {
  it("records whole seconds when there is no stored best", () => {
    expect(scoreCandidate(preset("expert"), 95.9, null)).toEqual({ level: "expert", bestTime: 95 });
  });

  it("requires a strict improvement", () => {
    expect(scoreCandidate(preset("beginner"), 20, 21)).toEqual({ level: "beginner", bestTime: 20 });
    expect(scoreCandidate(preset("beginner"), 21.5, 21)).toBeNull();
  });

  it("ignores custom boards", () => {
    expect(scoreCandidate({ level: "custom", width: 5, height: 5, mines: 2 }, 3, null)).toBeNull();
  });
});

// ─── High score table ───────────────────────────────────────────────────────

describe("HighScoreTable", () => {
  it("keeps the three fastest times in order", () => {
    const table = new HighScoreTable();
    expect(table.insert("beginner", 50)).toBe(0);
    expect(table.insert("beginner", 30)).toBe(0);
    expect(table.insert("beginner", 40)).toBe(1);
    expect(table.insert("beginner", 60)).toBeNull();
    expect(table.entries("beginner").map((s) => s.seconds)).toEqual([30, 40, 50]);
    expect(table.bestTime("beginner")).toBe(30);
    expect(table.bestTime("expert")).toBeNull();
  });

  it("ranks ties after older scores", () => {
    const table = new HighScoreTable();
    table.insert("expert", 30, "first");
    table.insert("expert", 40, "second");
    table.insert("expert", 50, "third");
    expect(table.insert("expert", 40, "late")).toBe(2);
    expect(table.entries("expert").map((s) => s.name)).toEqual(["first", "second", "late"]);
  });

  it("renames and discards entries", () => {
    const table = new HighScoreTable();
    table.insert("intermediate", 100);
    table.insert("intermediate", 90);

    expect(table.rename("intermediate", 0, "ada")).toBe(true);
    expect(table.rename("intermediate", 0, "x".repeat(32))).toBe(false);
    expect(table.rename("intermediate", 5, "bob")).toBe(false);
    expect(table.entries("intermediate")[0]).toEqual({ name: "ada", seconds: 90 });

    expect(table.discard("intermediate", 0)).toBe(true);
    expect(table.discard("intermediate", 3)).toBe(false);
    expect(table.entries("intermediate")).toEqual([{ name: "", seconds: 100 }]);
  });

  it("refuses over-long names and unusable times", () => {
    const table = new HighScoreTable();
    expect(table.insert("beginner", 10, "x".repeat(32))).toBeNull();
    expect(table.insert("beginner", Number.NaN)).toBeNull();
    expect(table.insert("beginner", -1)).toBeNull();
    expect(table.insert("beginner", Number.POSITIVE_INFINITY)).toBeNull();
    expect(table.entries("beginner")).toEqual([]);
    expect(table.insert("beginner", 12, "y".repeat(31))).toBe(0);
  });

  it("serves as a best-time lookup", () => {
    const table = new HighScoreTable();
    table.insert("expert", 120);
    const lookup = table.lookup;
    expect(lookup("expert")).toBe(120);
    expect(lookup("beginner")).toBeNull();
  });

  it("does not expose its internal lists", () => {
    const table = new HighScoreTable();
    table.insert("beginner", 10, "a");
    const copy = table.entries("beginner");
    expect(copy).toEqual([{ name: "a", seconds: 10 }]);
    table.rename("beginner", 0, "b");
    expect(copy[0].name).toBe("a");
  });
});

// ─── Persisted records ──────────────────────────────────────────────────────

describe("persisted records", () => {
  it("sorts, truncates and drops malformed stored scores", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const table = HighScoreTable.fromRecord({
      beginner: [
        { name: "b", seconds: 20 },
        { name: "a", seconds: 10.9 },
        { bad: 1 },
        { name: "c", seconds: 5 },
        { name: "d", seconds: 15 },
      ],
      novice: [{ name: "z", seconds: 1 }],
      expert: "fast",
    });

    expect(table.toRecord()).toEqual({
      beginner: [
        { name: "c", seconds: 5 },
        { name: "a", seconds: 10 },
        { name: "d", seconds: 15 },
      ],
    });
    expect(warn).toHaveBeenCalledTimes(3);
  });

  it("clips over-long stored names", () => {
    const table = HighScoreTable.fromRecord({ expert: [{ name: "n".repeat(40), seconds: 99 }] });
    expect(table.entries("expert")[0].name).toHaveLength(31);
  });

  it("restores settings written by toPersistedSettings", () => {
    const table = new HighScoreTable();
    table.insert("expert", 150, "eve");
    const difficulty = { level: "custom" as const, width: 20, height: 10, mines: 30 };

    const saved = JSON.parse(JSON.stringify(toPersistedSettings(difficulty, table)));
    const restored = parsePersistedSettings(saved);

    expect(restored.difficulty).toEqual(difficulty);
    expect(restored.table.entries("expert")).toEqual([{ name: "eve", seconds: 150 }]);
  });

  it("uses preset dimensions for named levels", () => {
    const restored = parsePersistedSettings({
      difficulty: { level: "expert", width: 3, height: 3, mines: 1 },
    });
    expect(restored.difficulty).toEqual(PRESETS.expert);
    expect(restored.table.toRecord()).toEqual({});
  });

  it("falls back to beginner on unusable settings", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(parsePersistedSettings("nope").difficulty).toEqual(PRESETS.beginner);
    expect(
      parsePersistedSettings({ difficulty: { level: "custom", width: 2, height: 2, mines: 4 } }).difficulty,
    ).toEqual(PRESETS.beginner);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});
