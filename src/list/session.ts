import { emitKeypressEvents } from "node:readline";
import type { ProgressStore, SessionOutcome, SessionResult } from "../types.js";
import { AnsiTerminal, fdSink, type ScreenTerminal } from "../term/terminal.js";
import { createLogger } from "../logger.js";
import { ListView, type ListViewOptions } from "./list-view.js";
import { dispatchKey, type KeyPress } from "./keys.js";

const log = createLogger("session");

export interface SessionInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface SessionOutput {
  columns: number;
  rows: number;
  on(event: "resize", listener: () => void): unknown;
  off(event: "resize", listener: () => void): unknown;
}

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface SessionIo {
  input: SessionInput;
  output: SessionOutput;
  terminal: ScreenTerminal;
  /** Termination signals end the session like a quit. */
  signals?: SignalSource;
}

// Raw mode turns Ctrl-C into a key, so SIGINT only comes from outside
const EXIT_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

export function stdioSession(): SessionIo {
  return {
    input: process.stdin,
    output: process.stdout,
    terminal: new AnsiTerminal(fdSink(process.stdout.fd)),
    signals: process,
  };
}

/**
 * Run the interactive list until the user quits or picks an exercise to
 * continue at. The store is handed over for the whole session and handed
 * back in the result; nothing else may touch it meanwhile.
 *
 * The terminal is restored on every exit path, before an error rejects.
 */
export function runListSession<S extends ProgressStore>(
  store: S,
  io: SessionIo = stdioSession(),
  options: ListViewOptions = {},
): Promise<SessionResult<S>> {
  const { input, output, terminal, signals } = io;

  return new Promise((resolve, reject) => {
    let settled = false;
    let rawMode = false;

    const restore = () => {
      input.off("keypress", onKeypress);
      output.off("resize", onResize);
      for (const signal of EXIT_SIGNALS) signals?.off(signal, onSignal);
      if (rawMode && input.setRawMode) input.setRawMode(false);
      input.pause();
      terminal.leaveListScreen();
    };

    const finish = (result: { outcome: SessionOutcome } | { error: unknown }) => {
      if (settled) return;
      settled = true;
      try {
        restore();
      } catch (restoreErr) {
        log.error("failed to restore the terminal", restoreErr);
        if (!("error" in result)) {
          reject(restoreErr);
          return;
        }
      }
      if ("error" in result) {
        log.error("list session failed", result.error);
        reject(result.error);
      } else {
        log.info("list session ended", { outcome: result.outcome });
        resolve({ store, outcome: result.outcome });
      }
    };

    let view: ListView | undefined;

    function onKeypress(_str: string | undefined, key: KeyPress | undefined) {
      if (settled || view === undefined || key === undefined) return;
      try {
        const action = dispatchKey(view, key);
        if (action === "quit" || action === "continue") {
          finish({ outcome: action });
        } else if (action === "redraw") {
          view.draw(terminal);
        }
      } catch (error) {
        finish({ error });
      }
    }

    function onSignal() {
      if (settled) return;
      log.info("termination signal received");
      finish({ outcome: "quit" });
    }

    function onResize() {
      if (settled || view === undefined) return;
      try {
        view.setTermSize(output.columns, output.rows);
        view.draw(terminal);
      } catch (error) {
        finish({ error });
      }
    }

    try {
      terminal.enterListScreen();
      const listView = new ListView(store, options);
      listView.setTermSize(output.columns, output.rows);
      view = listView;

      if (input.isTTY && input.setRawMode) {
        input.setRawMode(true);
        rawMode = true;
      }
      emitKeypressEvents(input);
      input.on("keypress", onKeypress);
      output.on("resize", onResize);
      for (const signal of EXIT_SIGNALS) signals?.on(signal, onSignal);
      input.resume();

      listView.draw(terminal);
      log.info("list session started", {
        exercises: store.exercises().length,
        columns: output.columns,
        rows: output.rows,
      });
    } catch (error) {
      finish({ error });
    }
  });
}
