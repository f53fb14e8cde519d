// ─── Course data (owned by the progress store) ───────────────

// One exercise as the list sees it. Its absolute index is its position
// in `ProgressStore.exercises()`.
export interface Exercise {
  readonly name: string;
  readonly path: string;   // relative to the course directory
  readonly done: boolean;
}

// Which exercises the list shows
export type Filter = "all" | "done" | "pending";

// ─── Progress store (consumed by the list view) ──────────────

export interface ProgressStore {
  /** Ordered, stable list of exercises. */
  exercises(): readonly Exercise[];
  currentExerciseIndex(): number;
  nDone(): number;
  /** Restore the exercise file and mark it pending. Returns the exercise name. */
  resetExerciseByIndex(index: number): string;
  setCurrentExerciseIndex(index: number): void;
}

// ─── Persistence layer (FileProgressStore) ───────────────────

// course.json
export interface CourseInfo {
  exercises: { name: string; path: string }[];
}

// .lesson-state.json
export interface ProgressState {
  current: string;
  done: string[];
}

// ─── Session ─────────────────────────────────────────────────

// Result of handling one key in the list
export type KeyAction = "quit" | "continue" | "redraw" | "ignore";

export type SessionOutcome = "quit" | "continue";

// Returned by runListSession: the store is handed back to the caller
export interface SessionResult<S extends ProgressStore> {
  store: S;
  outcome: SessionOutcome;
}
