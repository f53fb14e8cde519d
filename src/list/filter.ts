import type { Exercise, Filter } from "../types.js";

export function filterPredicate(filter: Filter): (exercise: Exercise) => boolean {
  switch (filter) {
    case "done":
      return (exercise) => exercise.done;
    case "pending":
      return (exercise) => !exercise.done;
    case "all":
      return () => true;
  }
}

/** Exercises visible under `filter`, paired with their absolute index. */
export function* filteredExercises(
  filter: Filter,
  exercises: readonly Exercise[],
): Generator<[index: number, exercise: Exercise]> {
  const matches = filterPredicate(filter);
  for (let i = 0; i < exercises.length; i++) {
    if (matches(exercises[i])) yield [i, exercises[i]];
  }
}

export function countMatching(filter: Filter, exercises: readonly Exercise[]): number {
  if (filter === "all") return exercises.length;
  const matches = filterPredicate(filter);
  return exercises.filter(matches).length;
}

/**
 * Map a row ordinal in the filtered view to the exercise's absolute index.
 * Returns undefined when the filtered view has no such row.
 */
export function filteredToAbsoluteIndex(
  filter: Filter,
  exercises: readonly Exercise[],
  ordinal: number,
): number | undefined {
  if (!Number.isInteger(ordinal) || ordinal < 0) return undefined;
  if (filter === "all") return ordinal < exercises.length ? ordinal : undefined;

  let seen = 0;
  for (const [index] of filteredExercises(filter, exercises)) {
    if (seen === ordinal) return index;
    seen++;
  }
  return undefined;
}
