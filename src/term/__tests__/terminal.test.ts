import { describe, it, expect } from "vitest";
import { AnsiTerminal } from "../terminal.js";
import { TerminalIoError } from "../../errors.js";

function recording() {
  const chunks: string[] = [];
  const term = new AnsiTerminal({ write: (c) => chunks.push(c) });
  return { chunks, term };
}

describe("AnsiTerminal", () => {
  it("should queue commands until flushed", () => {
    const { chunks, term } = recording();
    term.beginSynchronizedUpdate();
    term.moveTo(0, 0);
    term.write("hi");
    term.clearUntilNewLine();
    term.moveToNextLine();
    term.endSynchronizedUpdate();
    expect(chunks).toEqual([]);

    term.flush();
    expect(chunks).toEqual(["\x1B[?2026h\x1B[1;1Hhi\x1B[K\x1B[1E\x1B[?2026l"]);
  });

  it("should emit truecolor and attribute sequences", () => {
    const { chunks, term } = recording();
    term.setForeground("#a6e3a1");
    term.setBackground("#313244");
    term.setUnderline();
    term.setForeground("reset");
    term.resetColor();
    term.flush();
    expect(chunks).toEqual(["\x1B[38;2;166;227;161m\x1B[48;2;49;50;68m\x1B[4m\x1B[39m\x1B[0m"]);
  });

  it("should not write empty flushes", () => {
    const { chunks, term } = recording();
    term.flush();
    expect(chunks).toEqual([]);
  });

  it("should wrap sink failures in TerminalIoError", () => {
    const cause = new Error("EPIPE");
    const term = new AnsiTerminal({
      write: () => {
        throw cause;
      },
    });
    term.write("x");
    let caught: unknown;
    try {
      term.flush();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TerminalIoError);
    if (caught instanceof TerminalIoError) {
      expect(caught.code).toBe("TERMINAL_IO");
      expect(caught.cause).toBe(cause);
    }
  });

  it("should take over and give back the screen", () => {
    const { chunks, term } = recording();
    term.enterListScreen();
    term.leaveListScreen();
    expect(chunks).toEqual([
      "\x1B[?1049h\x1B[?25l\x1B[?7l\x1B[2J",
      "\x1B[0m\x1B[?7h\x1B[?25h\x1B[?1049l",
    ]);
  });
});
