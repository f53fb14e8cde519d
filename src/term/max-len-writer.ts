import type { Terminal } from "./terminal.js";
import { sliceToWidth } from "../utils.js";

/**
 * Writes to a terminal line without ever exceeding a column budget.
 * Whatever does not fit is dropped; overflow is normal, not an error.
 */
export class MaxLenWriter {
  private len = 0;

  constructor(
    public readonly terminal: Terminal,
    private readonly maxLen: number,
  ) {}

  get remaining(): number {
    return Math.max(0, this.maxLen - this.len);
  }

  /** Columns accounted for so far, including credited ones. */
  get columns(): number {
    return this.len;
  }

  /** Single-width text only (ASCII, box drawing). One column per character. */
  writeAscii(text: string): void {
    const n = Math.min(text.length, this.remaining);
    if (n === 0) return;
    this.terminal.write(text.slice(0, n));
    this.len += n;
  }

  writeText(text: string): void {
    const { text: fitting, width } = sliceToWidth(text, this.remaining);
    if (width === 0) return;
    this.terminal.write(fitting);
    this.len += width;
  }

  /**
   * Credit columns for something the caller writes to `terminal` directly,
   * like a double-width icon.
   */
  addToLen(n: number): void {
    this.len += n;
  }
}

