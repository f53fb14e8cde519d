/**
 * File-backed progress store.
 *
 * Layout of a course directory:
 *   course.json          ordered exercise list: { exercises: [{ name, path }] }
 *   .lesson-state.json   { current, done[] }, rewritten on every change
 *   .originals/<path>    pristine copy of each exercise, used by resets
 */
import { copyFileSync, existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import type { CourseInfo, Exercise, ProgressState, ProgressStore } from "../types.js";
import { StoreError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("store");

export const COURSE_FILE = "course.json";
export const STATE_FILE = ".lesson-state.json";
export const ORIGINALS_DIR = ".originals";

const courseSchema = z.object({
  exercises: z
    .array(z.object({ name: z.string().min(1), path: z.string().min(1) }))
    .min(1, "a course needs at least one exercise")
    .refine(
      (exercises) => new Set(exercises.map((e) => e.name)).size === exercises.length,
      "exercise names must be unique",
    ),
});

const stateSchema = z.object({
  current: z.string(),
  done: z.array(z.string()),
});

// ─── Helpers ─────────────────────────────────────────────────

function readValidated<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new StoreError(`Failed to read ${path}: ${errorMessage(err)}`, { cause: err });
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new StoreError(`Invalid ${path}: ${issues}`, { cause: result.error });
  }
  return result.data;
}

// Mutable record behind the read-only Exercise the list sees
interface ExerciseRecord {
  name: string;
  path: string;
  done: boolean;
}

// ─── Store class ─────────────────────────────────────────────

export class FileProgressStore implements ProgressStore {
  private readonly records: ExerciseRecord[];
  private current: number;
  private doneCount: number;

  private constructor(
    readonly courseDir: string,
    course: CourseInfo,
    state: ProgressState | null,
  ) {
    const done = new Set(state?.done ?? []);
    this.records = course.exercises.map((e) => ({ name: e.name, path: e.path, done: done.has(e.name) }));
    this.doneCount = this.records.filter((r) => r.done).length;
    const current = state ? this.records.findIndex((r) => r.name === state.current) : -1;
    this.current = current >= 0 ? current : 0;
  }

  /** Load the course and its saved progress. A missing state file means a fresh start. */
  static open(courseDir: string): FileProgressStore {
    const course = readValidated(join(courseDir, COURSE_FILE), courseSchema);
    const statePath = join(courseDir, STATE_FILE);
    const state = existsSync(statePath) ? readValidated(statePath, stateSchema) : null;
    const store = new FileProgressStore(courseDir, course, state);
    log.debug("store opened", { courseDir, exercises: store.records.length, done: store.doneCount });
    return store;
  }

  exercises(): readonly Exercise[] {
    return this.records;
  }

  currentExerciseIndex(): number {
    return this.current;
  }

  nDone(): number {
    return this.doneCount;
  }

  private record(index: number): ExerciseRecord {
    if (!Number.isInteger(index) || index < 0 || index >= this.records.length) {
      throw new StoreError(`Invalid exercise index ${index}`);
    }
    return this.records[index];
  }

  resetExerciseByIndex(index: number): string {
    const exercise = this.record(index);
    const original = join(this.courseDir, ORIGINALS_DIR, exercise.path);
    if (!existsSync(original)) {
      throw new StoreError(`No original copy of \`${exercise.name}\` at ${original}`);
    }
    try {
      copyFileSync(original, join(this.courseDir, exercise.path));
    } catch (err) {
      throw new StoreError(`Failed to reset \`${exercise.name}\`: ${errorMessage(err)}`, { cause: err });
    }

    this.updateDone(exercise, false);
    return exercise.name;
  }

  setCurrentExerciseIndex(index: number): void {
    if (index === this.current) return;
    this.record(index);
    const previous = this.current;
    this.update(
      () => (this.current = index),
      () => (this.current = previous),
    );
  }

  /**
   * Completion is set by whatever checks the exercises (a watcher, a test
   * runner); the list only reads it and clears it on reset.
   */
  markDone(index: number): void {
    this.updateDone(this.record(index), true);
  }

  /** Counterpart of {@link markDone}. */
  markPending(index: number): void {
    this.updateDone(this.record(index), false);
  }

  // Apply a change in memory and persist it; undo it if the write fails
  private update(apply: () => void, undo: () => void): void {
    apply();
    try {
      this.write();
    } catch (err) {
      undo();
      throw err;
    }
  }

  private updateDone(exercise: ExerciseRecord, done: boolean): void {
    const wasDone = exercise.done;
    this.update(
      () => this.setDone(exercise, done),
      () => this.setDone(exercise, wasDone),
    );
  }

  private setDone(exercise: ExerciseRecord, done: boolean): void {
    if (exercise.done === done) return;
    exercise.done = done;
    this.doneCount += done ? 1 : -1;
  }

  /** Persist progress to `.lesson-state.json`. */
  write(): void {
    const state: ProgressState = {
      current: this.records[this.current].name,
      done: this.records.filter((r) => r.done).map((r) => r.name),
    };
    try {
      writeFileSync(join(this.courseDir, STATE_FILE), JSON.stringify(state, null, 2) + "\n", "utf-8");
    } catch (err) {
      throw new StoreError(`Failed to write ${STATE_FILE}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
