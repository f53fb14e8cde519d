import type { Filter, KeyAction } from "../types.js";
import { InvalidSelectionError } from "../errors.js";
import type { ListView } from "./list-view.js";

// Shape of the `key` argument of readline's "keypress" event
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export type ListCommand =
  | "quit"
  | "next"
  | "previous"
  | "first"
  | "last"
  | "filterDone"
  | "filterPending"
  | "reset"
  | "continue";

export function commandForKey(key: KeyPress): ListCommand | undefined {
  if (key.ctrl) return key.name === "c" ? "quit" : undefined;
  if (key.meta) return undefined;

  switch (key.name) {
    case "down":
      return "next";
    case "up":
      return "previous";
    case "home":
      return "first";
    case "end":
      return "last";
  }

  // Letters by the character typed, so "G" and "g" differ
  switch (key.sequence) {
    case "q":
      return "quit";
    case "j":
      return "next";
    case "k":
      return "previous";
    case "g":
      return "first";
    case "G":
      return "last";
    case "d":
      return "filterDone";
    case "p":
      return "filterPending";
    case "r":
      return "reset";
    case "c":
      return "continue";
    default:
      return undefined;
  }
}

function toggleFilter(view: ListView, filter: Exclude<Filter, "all">, keyName: string): void {
  const label = filter.toUpperCase();
  if (view.filter === filter) {
    view.setFilter("all");
    view.message += `Disabled filter ${label}`;
  } else {
    view.setFilter(filter);
    view.message += `Enabled filter ${label} │ Press ${keyName} again to disable the filter`;
  }
}

/**
 * Apply one key press to the view. Store errors propagate; a selection
 * that no longer matches the list aborts the action and is reported in the
 * footer instead.
 */
export function dispatchKey(view: ListView, key: KeyPress): KeyAction {
  const command = commandForKey(key);
  if (command === undefined) return "ignore";

  view.message = "";
  try {
    switch (command) {
      case "quit":
        return "quit";
      case "next":
        view.selectNext();
        break;
      case "previous":
        view.selectPrevious();
        break;
      case "first":
        view.selectFirst();
        break;
      case "last":
        view.selectLast();
        break;
      case "filterDone":
        toggleFilter(view, "done", "d");
        break;
      case "filterPending":
        toggleFilter(view, "pending", "p");
        break;
      case "reset":
        view.resetSelected();
        break;
      case "continue":
        if (view.selectedToCurrentExercise()) return "continue";
        break;
    }
  } catch (err) {
    if (!(err instanceof InvalidSelectionError)) throw err;
    view.message = err.message;
  }
  return "redraw";
}
