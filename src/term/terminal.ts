import { writeSync } from "node:fs";
import { TerminalIoError } from "../errors.js";
import { hexToRgb } from "../utils.js";

const ESC = "\x1B";
const CSI = `${ESC}[`;

// Synchronized output (DEC mode 2026): the terminal applies everything
// between begin and end as one frame
const SYNC_BEGIN = `${CSI}?2026h`;
const SYNC_END = `${CSI}?2026l`;

const ALT_SCREEN_ON = `${CSI}?1049h`;
const ALT_SCREEN_OFF = `${CSI}?1049l`;
const CURSOR_HIDE = `${CSI}?25l`;
const CURSOR_SHOW = `${CSI}?25h`;
const LINE_WRAP_OFF = `${CSI}?7l`;
const LINE_WRAP_ON = `${CSI}?7h`;

/** A theme hex color, or "reset" for the terminal default. */
export type TermColor = string;

export interface TerminalSink {
  write(chunk: string): void;
}

/**
 * The terminal control capability the list draws with. Commands are
 * queued; nothing is guaranteed to reach the screen before `flush`.
 */
export interface Terminal {
  write(text: string): void;
  moveTo(col: number, row: number): void;
  moveToNextLine(): void;
  clearUntilNewLine(): void;
  clearAll(): void;
  setForeground(color: TermColor): void;
  setBackground(color: TermColor): void;
  setUnderline(): void;
  setNoUnderline(): void;
  resetColor(): void;
  beginSynchronizedUpdate(): void;
  endSynchronizedUpdate(): void;
  flush(): void;
}

/** A terminal the list can take over for a whole session. */
export interface ScreenTerminal extends Terminal {
  enterListScreen(): void;
  leaveListScreen(): void;
}

function colorSeq(layer: 38 | 48, color: TermColor): string {
  if (color === "reset") return `${CSI}${layer + 1}m`;
  const [r, g, b] = hexToRgb(color);
  return `${CSI}${layer};2;${r};${g};${b}m`;
}

// ─── ANSI implementation ─────────────────────────────────────

export class AnsiTerminal implements ScreenTerminal {
  private queue: string[] = [];

  constructor(private readonly sink: TerminalSink) {}

  write(text: string): void {
    this.queue.push(text);
  }

  // Cursor positions are 0-based like the list's rows; CSI is 1-based
  moveTo(col: number, row: number): void {
    this.queue.push(`${CSI}${row + 1};${col + 1}H`);
  }

  moveToNextLine(): void {
    this.queue.push(`${CSI}1E`);
  }

  clearUntilNewLine(): void {
    this.queue.push(`${CSI}K`);
  }

  clearAll(): void {
    this.queue.push(`${CSI}2J`);
  }

  setForeground(color: TermColor): void {
    this.queue.push(colorSeq(38, color));
  }

  setBackground(color: TermColor): void {
    this.queue.push(colorSeq(48, color));
  }

  setUnderline(): void {
    this.queue.push(`${CSI}4m`);
  }

  setNoUnderline(): void {
    this.queue.push(`${CSI}24m`);
  }

  resetColor(): void {
    this.queue.push(`${CSI}0m`);
  }

  beginSynchronizedUpdate(): void {
    this.queue.push(SYNC_BEGIN);
  }

  endSynchronizedUpdate(): void {
    this.queue.push(SYNC_END);
  }

  flush(): void {
    if (this.queue.length === 0) return;
    const chunk = this.queue.join("");
    this.queue = [];
    try {
      this.sink.write(chunk);
    } catch (err) {
      throw new TerminalIoError("Failed to write to the terminal", { cause: err });
    }
  }

  // ─── Screen session ────────────────────────────────────────

  /** Alternate screen, hidden cursor, no autowrap: the list owns the whole screen. */
  enterListScreen(): void {
    this.queue.push(ALT_SCREEN_ON, CURSOR_HIDE, LINE_WRAP_OFF);
    this.clearAll();
    this.flush();
  }

  leaveListScreen(): void {
    this.queue.push(`${CSI}0m`, LINE_WRAP_ON, CURSOR_SHOW, ALT_SCREEN_OFF);
    this.flush();
  }
}

/** Blocking writes straight to a file descriptor (stdout is fd 1). */
export function fdSink(fd: number): TerminalSink {
  return {
    write(chunk: string) {
      writeSync(fd, chunk);
    },
  };
}
