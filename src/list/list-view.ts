import stringWidth from "string-width";
import type { Exercise, Filter, ProgressStore } from "../types.js";
import type { Terminal } from "../term/terminal.js";
import { MaxLenWriter } from "../term/max-len-writer.js";
import { progressBar, terminalFileLink } from "../term/widgets.js";
import { InvalidSelectionError } from "../errors.js";
import { createLogger } from "../logger.js";
import { C, I } from "../theme.js";
import { padEndToWidth } from "../utils.js";
import { ScrollState } from "./scroll-state.js";
import { countMatching, filteredExercises, filteredToAbsoluteIndex } from "./filter.js";

const log = createLogger("list");

// Below this width the help footer wraps before the filter segment
const WIDE_HELP_FOOTER_WIDTH = 95;
const HEADER_HEIGHT = 1;
// 2 separators, 1 progress bar, 1-2 help/message lines
const BASE_FOOTER_HEIGHT = 4;
// Rows shown before the first setTermSize
const INITIAL_ROWS_TO_DISPLAY = 5;

const NAME_COL_TITLE = "Name";
// Everything left of the name column: selector(2) + current(9) + state(9)
const HEADER_PREFIX = "  Current  State    ";
const CURRENT_MARKER = `${I.current}  `;
const NO_MARKER = " ".repeat(CURRENT_MARKER.length);

const HELP_NAVIGATION = "↓/j ↑/k home/g end/G | <c>ontinue at | <r>eset exercise";

function nextLine(term: Terminal): void {
  term.clearUntilNewLine();
  term.moveToNextLine();
}

export interface ListViewOptions {
  /** Directory exercise paths are relative to, for file links. */
  baseDir?: string;
}

/**
 * Full-screen, filterable exercise list.
 *
 * Row positions handed around by the scroll state are ordinals within the
 * current filter, never absolute exercise indices; `selectedToExerciseIndex`
 * is the only place one turns into the other.
 */
export class ListView {
  /** Footer message shown instead of the help line when not empty. */
  message = "";

  private readonly scrollState: ScrollState;
  private readonly nameColWidth: number;
  private readonly baseDir: string;
  private _filter: Filter = "all";
  // Set by setTermSize
  private termWidth = 0;
  private termHeight = 0;
  private separatorLine = "";
  private _narrowTerm = false;
  private _showFooter = true;

  constructor(
    private readonly store: ProgressStore,
    options: ListViewOptions = {},
  ) {
    const exercises = store.exercises();
    this.nameColWidth = Math.max(
      stringWidth(NAME_COL_TITLE),
      ...exercises.map((exercise) => stringWidth(exercise.name)),
    );
    this.baseDir = options.baseDir ?? ".";
    this.scrollState = new ScrollState(
      exercises.length,
      store.currentExerciseIndex(),
      INITIAL_ROWS_TO_DISPLAY,
    );
  }

  // ─── Layout ──────────────────────────────────────────────────

  setTermSize(width: number, height: number): void {
    this.termWidth = width;
    this.termHeight = height;

    // Resize race: nothing to lay out until the terminal reports a size
    if (height === 0) return;

    // The help footer is a single short line when nothing is selected
    this._narrowTerm = width < WIDE_HELP_FOOTER_WIDTH && this.scrollState.selected !== undefined;

    const footerHeight = this.footerHeight;
    this._showFooter = height > HEADER_HEIGHT + footerHeight;

    if (this._showFooter) {
      this.separatorLine = I.separator.repeat(width);
    }

    this.scrollState.setMaxNRowsToDisplay(
      Math.max(0, height - HEADER_HEIGHT - (this._showFooter ? footerHeight : 0)),
    );
  }

  private get footerHeight(): number {
    return BASE_FOOTER_HEIGHT + (this._narrowTerm ? 1 : 0);
  }

  get narrowTerm(): boolean {
    return this._narrowTerm;
  }

  get showFooter(): boolean {
    return this._showFooter;
  }

  get selected(): number | undefined {
    return this.scrollState.selected;
  }

  get offset(): number {
    return this.scrollState.offset;
  }

  get maxNRowsToDisplay(): number {
    return this.scrollState.maxNRowsToDisplay;
  }

  /** Number of rows matching the current filter. */
  get rowCount(): number {
    return this.scrollState.rowCount;
  }

  // ─── Drawing ─────────────────────────────────────────────────

  private drawRows(term: Terminal, rows: Iterable<[number, Exercise]>): number {
    const currentIndex = this.store.currentExerciseIndex();
    const rowOffset = this.scrollState.offset;
    const maxRows = this.scrollState.maxNRowsToDisplay;
    const selected = this.scrollState.selected;
    let skipped = 0;
    let nDisplayedRows = 0;

    for (const [exerciseIndex, exercise] of rows) {
      if (skipped < rowOffset) {
        skipped++;
        continue;
      }
      if (nDisplayedRows >= maxRows) break;

      const writer = new MaxLenWriter(term, this.termWidth);

      if (selected === rowOffset + nDisplayedRows) {
        term.setBackground(C.surface);
        if (writer.remaining >= 2) {
          // Double-width glyph: written raw, credited by hand
          writer.addToLen(2);
          term.write(I.selected);
        } else {
          writer.writeAscii("  ");
        }
      } else {
        writer.writeAscii("  ");
      }

      if (exerciseIndex === currentIndex) {
        term.setForeground(C.error);
        writer.writeAscii(CURRENT_MARKER);
      } else {
        writer.writeAscii(NO_MARKER);
      }

      if (exercise.done) {
        term.setForeground(C.success);
        writer.writeAscii("DONE     ");
      } else {
        term.setForeground(C.warning);
        writer.writeAscii("PENDING  ");
      }

      term.setForeground("reset");

      writer.writeText(padEndToWidth(exercise.name, this.nameColWidth + 2));
      terminalFileLink(writer, exercise.path, C.primary, this.baseDir);

      nextLine(term);
      term.resetColor();
      nDisplayedRows++;
    }

    return nDisplayedRows;
  }

  private drawSeparator(term: Terminal): void {
    new MaxLenWriter(term, this.termWidth).writeAscii(this.separatorLine);
    nextLine(term);
  }

  private highlight(writer: MaxLenWriter, text: string): void {
    writer.terminal.setForeground(C.accent);
    writer.terminal.setUnderline();
    writer.writeAscii(text);
    writer.terminal.resetColor();
  }

  // Returns the number of lines written
  private drawHelp(term: Terminal): number {
    let lines = 1;
    let writer = new MaxLenWriter(term, this.termWidth);

    if (this.scrollState.selected !== undefined) {
      writer.writeText(HELP_NAVIGATION);
      if (this._narrowTerm) {
        nextLine(term);
        lines++;
        writer = new MaxLenWriter(term, this.termWidth);
        writer.writeAscii("filter ");
      } else {
        writer.writeAscii(" | filter ");
      }
    } else {
      // Nothing selected (and nothing shown): only filter and quit apply
      writer.writeAscii("filter ");
    }

    switch (this._filter) {
      case "done":
        this.highlight(writer, "<d>one");
        writer.writeAscii("/<p>ending");
        break;
      case "pending":
        writer.writeAscii("<d>one/");
        this.highlight(writer, "<p>ending");
        break;
      case "all":
        writer.writeAscii("<d>one/<p>ending");
        break;
    }

    writer.writeAscii(" | <q>uit list");
    nextLine(term);
    return lines;
  }

  private drawFooter(term: Terminal): void {
    this.drawSeparator(term);

    progressBar(
      new MaxLenWriter(term, this.termWidth),
      this.store.nDone(),
      this.store.exercises().length,
      this.termWidth,
    );
    nextLine(term);

    this.drawSeparator(term);

    let lines: number;
    if (this.message.length === 0) {
      lines = this.drawHelp(term);
    } else {
      term.setForeground(C.accent);
      new MaxLenWriter(term, this.termWidth).writeText(this.message);
      term.resetColor();
      nextLine(term);
      lines = 1;
    }

    // Clear whatever is left of the reserved footer area
    for (; lines < this.footerHeight - 3; lines++) {
      nextLine(term);
    }
  }

  /**
   * Draw one frame as a single synchronized update. Reads the store fresh
   * on every call. No-op while the terminal reports zero height.
   */
  draw(term: Terminal): void {
    if (this.termHeight === 0) return;

    term.beginSynchronizedUpdate();
    term.moveTo(0, 0);

    // Header
    const header = new MaxLenWriter(term, this.termWidth);
    header.writeAscii(HEADER_PREFIX);
    header.writeText(padEndToWidth(NAME_COL_TITLE, this.nameColWidth + 2));
    header.writeAscii("Path");
    nextLine(term);

    // Rows
    const nDisplayedRows = this.drawRows(
      term,
      filteredExercises(this._filter, this.store.exercises()),
    );

    // Keep the footer in place however many rows matched
    for (let i = nDisplayedRows; i < this.scrollState.maxNRowsToDisplay; i++) {
      nextLine(term);
    }

    if (this._showFooter) {
      this.drawFooter(term);
    }

    term.endSynchronizedUpdate();
    term.flush();
  }

  // ─── Filtering & navigation ──────────────────────────────────

  private updateRows(): void {
    this.scrollState.setNRows(countMatching(this._filter, this.store.exercises()));
    // Selection may have appeared or vanished, which changes the footer
    if (this.termHeight > 0) {
      this.setTermSize(this.termWidth, this.termHeight);
    }
  }

  get filter(): Filter {
    return this._filter;
  }

  setFilter(filter: Filter): void {
    this._filter = filter;
    this.updateRows();
  }

  selectNext(): void {
    this.scrollState.selectNext();
  }

  selectPrevious(): void {
    this.scrollState.selectPrevious();
  }

  selectFirst(): void {
    this.scrollState.selectFirst();
  }

  selectLast(): void {
    this.scrollState.selectLast();
  }

  // ─── Actions ─────────────────────────────────────────────────

  selectedToExerciseIndex(selected: number): number {
    const index = filteredToAbsoluteIndex(this._filter, this.store.exercises(), selected);
    if (index === undefined) {
      log.warn("selection out of sync with the filtered list", { selected, filter: this._filter });
      throw new InvalidSelectionError(selected);
    }
    return index;
  }

  resetSelected(): void {
    const selected = this.scrollState.selected;
    if (selected === undefined) {
      this.message += "Nothing selected to reset!";
      return;
    }

    const exerciseIndex = this.selectedToExerciseIndex(selected);
    const exerciseName = this.store.resetExerciseByIndex(exerciseIndex);
    log.info("exercise reset", { exercise: exerciseName, index: exerciseIndex });
    this.updateRows();
    this.message += `The exercise \`${exerciseName}\` has been reset`;
  }

  /** Returns true if there was something selected to continue at. */
  selectedToCurrentExercise(): boolean {
    const selected = this.scrollState.selected;
    if (selected === undefined) {
      this.message += "Nothing selected to continue at!";
      return false;
    }

    const exerciseIndex = this.selectedToExerciseIndex(selected);
    this.store.setCurrentExerciseIndex(exerciseIndex);
    log.info("current exercise changed", { index: exerciseIndex });
    return true;
  }
}
