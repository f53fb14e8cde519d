/**
 * Selection and scroll window over `nRows` rows, independent of rendering.
 *
 * Invariants kept by every operation:
 * - `selected` is undefined iff there are no rows, else in [0, nRows)
 * - the window [offset, offset + maxNRowsToDisplay) contains `selected`
 *   (when at least one row can be displayed)
 * - the window never starts past the last full page
 *
 * Navigation clamps at both ends; there is no wraparound.
 */
export class ScrollState {
  private nRows: number;
  private _selected: number | undefined;
  private _offset = 0;
  private _maxNRowsToDisplay: number;

  constructor(nRows: number, selected: number | undefined, maxNRowsToDisplay: number) {
    this.nRows = Math.max(0, nRows);
    this._maxNRowsToDisplay = Math.max(0, maxNRowsToDisplay);
    this._selected =
      this.nRows === 0 ? undefined : Math.min(Math.max(0, selected ?? 0), this.nRows - 1);
    this.updateOffset();
  }

  get offset(): number {
    return this._offset;
  }

  get selected(): number | undefined {
    return this._selected;
  }

  get maxNRowsToDisplay(): number {
    return this._maxNRowsToDisplay;
  }

  get rowCount(): number {
    return this.nRows;
  }

  // Smallest move of the current offset that keeps the selection visible
  private updateOffset(): void {
    if (this._selected === undefined) {
      this._offset = 0;
      return;
    }
    const selected = this._selected;
    const minOffset = Math.max(0, selected - Math.max(0, this._maxNRowsToDisplay - 1));
    const maxOffset = selected;
    const globalMaxOffset = Math.max(0, this.nRows - this._maxNRowsToDisplay);
    this._offset = Math.min(Math.max(this._offset, minOffset), maxOffset, globalMaxOffset);
  }

  private setSelected(selected: number): void {
    this._selected = selected;
    this.updateOffset();
  }

  selectNext(): void {
    if (this._selected === undefined) return;
    this.setSelected(Math.min(this._selected + 1, this.nRows - 1));
  }

  selectPrevious(): void {
    if (this._selected === undefined) return;
    this.setSelected(Math.max(0, this._selected - 1));
  }

  selectFirst(): void {
    if (this.nRows > 0) this.setSelected(0);
  }

  selectLast(): void {
    if (this.nRows > 0) this.setSelected(this.nRows - 1);
  }

  /** Row count changed (filter switch, reset). Re-selects row 0 if rows reappear. */
  setNRows(nRows: number): void {
    this.nRows = Math.max(0, nRows);
    if (this.nRows === 0) {
      this._selected = undefined;
      this._offset = 0;
      return;
    }
    this.setSelected(Math.min(this._selected ?? 0, this.nRows - 1));
  }

  setMaxNRowsToDisplay(maxNRowsToDisplay: number): void {
    this._maxNRowsToDisplay = Math.max(0, maxNRowsToDisplay);
    this.updateOffset();
  }
}
