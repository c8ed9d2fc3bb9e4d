/** Used as the end of the range when every row must be redrawn. */
export const ALL_ROWS = 999_999;

export type RowRange = {
  start: number;
  end: number;
};

/**
 * Pending redraw range `[start, end)`. Damage only ever widens it; a redraw
 * pass takes and clears it.
 */
export class DirtyRows {
  private start = ALL_ROWS;
  private end = 0;

  add(start: number, end: number): void {
    if (end <= start) return;
    this.start = Math.min(this.start, start);
    this.end = Math.max(this.end, end);
  }

  markAll(): void {
    this.start = 0;
    this.end = ALL_ROWS;
  }

  isEmpty(): boolean {
    return this.end <= this.start;
  }

  range(): RowRange | null {
    if (this.isEmpty()) return null;
    return { start: this.start, end: this.end };
  }

  covers(row: number): boolean {
    return !this.isEmpty() && row >= this.start && row < this.end;
  }

  take(): RowRange | null {
    const range = this.range();
    this.start = ALL_ROWS;
    this.end = 0;
    return range;
  }
}
