import type { ScreenTerminal, TermColor } from "../../term/terminal.js";
import type { Exercise, ProgressStore } from "../../types.js";
import { StoreError } from "../../errors.js";

// OSC 8 hyperlink brackets take no columns on screen
const OSC8_RE = /\x1B\]8;;[^\x1B]*\x1B\\/g;

/**
 * In-process stand-in for a terminal: keeps the visible text of each row
 * of the last frame. Like a real terminal, moving past the bottom row
 * leaves the cursor on the bottom row.
 */
export class RecordingTerminal implements ScreenTerminal {
  lines: string[];
  frames: string[][] = [];
  commands: string[] = [];
  nextLineCount = 0;
  flushCount = 0;
  inListScreen = false;
  private row = 0;

  constructor(private readonly rows: number = 100) {
    this.lines = Array.from({ length: rows }, () => "");
  }

  write(text: string): void {
    const visible = text.replace(OSC8_RE, "");
    this.lines[this.row] += visible;
    this.commands.push(`write:${visible}`);
  }

  moveTo(_col: number, row: number): void {
    this.row = row;
  }

  moveToNextLine(): void {
    this.nextLineCount++;
    this.row = Math.min(this.row + 1, this.rows - 1);
  }

  clearUntilNewLine(): void {}

  clearAll(): void {
    this.commands.push("clearAll");
  }

  setForeground(color: TermColor): void {
    this.commands.push(`fg:${color}`);
  }

  setBackground(color: TermColor): void {
    this.commands.push(`bg:${color}`);
  }

  setUnderline(): void {
    this.commands.push("underline");
  }

  setNoUnderline(): void {
    this.commands.push("noUnderline");
  }

  resetColor(): void {
    this.commands.push("reset");
  }

  beginSynchronizedUpdate(): void {
    this.commands.push("beginSync");
    this.lines = Array.from({ length: this.rows }, () => "");
    this.nextLineCount = 0;
    this.row = 0;
  }

  endSynchronizedUpdate(): void {
    this.commands.push("endSync");
  }

  flush(): void {
    this.flushCount++;
    this.frames.push([...this.lines]);
  }

  enterListScreen(): void {
    this.inListScreen = true;
    this.commands.push("enter");
  }

  leaveListScreen(): void {
    this.inListScreen = false;
    this.commands.push("leave");
  }

  /** Rows of the last flushed frame. */
  get screen(): string[] {
    return this.frames[this.frames.length - 1] ?? [];
  }
}

export function makeExercises(doneFlags: boolean[]): Exercise[] {
  return doneFlags.map((done, i) => ({
    name: `ex${i + 1}`,
    path: `exercises/ex${i + 1}.txt`,
    done,
  }));
}

/** In-memory progress store; records what the list asked of it. */
export class MemoryProgressStore implements ProgressStore {
  resets: number[] = [];
  failReset?: Error;

  constructor(
    public items: Exercise[],
    public current = 0,
  ) {}

  exercises(): readonly Exercise[] {
    return this.items;
  }

  currentExerciseIndex(): number {
    return this.current;
  }

  nDone(): number {
    return this.items.filter((e) => e.done).length;
  }

  resetExerciseByIndex(index: number): string {
    if (this.failReset) throw this.failReset;
    const exercise = this.items[index];
    if (exercise === undefined) throw new StoreError(`Invalid exercise index ${index}`);
    this.items = this.items.map((e, i) => (i === index ? { ...e, done: false } : e));
    this.resets.push(index);
    return exercise.name;
  }

  setCurrentExerciseIndex(index: number): void {
    if (index < 0 || index >= this.items.length) {
      throw new StoreError(`Invalid exercise index ${index}`);
    }
    this.current = index;
  }
}
