export type ErrorCode = "TERMINAL_IO" | "INVALID_SELECTION" | "STORE";

export class LessonListError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LessonListError";
  }
}

/** Writing to or flushing the terminal failed. */
export class TerminalIoError extends LessonListError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "TERMINAL_IO", options);
    this.name = "TerminalIoError";
  }
}

/** A filtered-view ordinal has no matching exercise. */
export class InvalidSelectionError extends LessonListError {
  constructor(
    public readonly ordinal: number,
    options?: { cause?: unknown },
  ) {
    super(`Invalid selection index ${ordinal}`, "INVALID_SELECTION", options);
    this.name = "InvalidSelectionError";
  }
}

export class StoreError extends LessonListError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "STORE", options);
    this.name = "StoreError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
