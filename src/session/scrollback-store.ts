/**
 * Scrollback store: rows that left the emulated screen, kept with their cell
 * attributes so they can be re-rendered after the engine is gone.
 *
 * Line `i` of the store corresponds to line `i` of the session's host
 * document.
 */

import type { EngineCell } from '../types/terminal-contract.js';

export type CapturedLine = {
  /** Populated cells, trailing empty cells trimmed. */
  readonly width: number;
  readonly cells: readonly EngineCell[];
};

const EMPTY_LINE: CapturedLine = Object.freeze({ width: 0, cells: Object.freeze([]) });

/**
 * Width of `cells` once trailing never-written cells are dropped.
 */
export function effectiveWidth(cells: readonly (EngineCell | null | undefined)[]): number {
  for (let i = cells.length - 1; i >= 0; i -= 1) {
    const cell = cells[i];
    if (cell && cell.chars.length > 0) return i + 1;
  }
  return 0;
}

export function copyCell(cell: EngineCell): EngineCell {
  return {
    chars: cell.chars,
    width: cell.width,
    fg: { red: cell.fg.red, green: cell.fg.green, blue: cell.fg.blue },
    bg: { red: cell.bg.red, green: cell.bg.green, blue: cell.bg.blue },
    attrs: { ...cell.attrs },
  };
}

export function blankCell(): EngineCell {
  return {
    chars: '',
    width: 1,
    fg: { red: 0, green: 0, blue: 0 },
    bg: { red: 0, green: 0, blue: 0 },
    attrs: { bold: false, underline: false, italic: false, strike: false, reverse: false },
  };
}

/**
 * Plain text of a captured row: empty cells become spaces, a double-width
 * cell covers the column after it.
 */
export function capturedLineText(line: CapturedLine): string {
  let text = '';
  for (let col = 0; col < line.width; ) {
    const cell = line.cells[col];
    text += cell.chars.length > 0 ? cell.chars : ' ';
    col += cell.width === 2 ? 2 : 1;
  }
  return text;
}

export class ScrollbackStore {
  private lines: CapturedLine[] = [];

  get length(): number {
    return this.lines.length;
  }

  /**
   * Copy the populated prefix of `cells` into a new entry. Missing cells in
   * that prefix are stored blank.
   */
  push(cells: readonly (EngineCell | null | undefined)[]): CapturedLine {
    return this.insert(this.lines.length, cells);
  }

  pushEmpty(): CapturedLine {
    return this.insertEmpty(this.lines.length);
  }

  /** Like `push`, but the new entry becomes line `index`. */
  insert(index: number, cells: readonly (EngineCell | null | undefined)[]): CapturedLine {
    const width = effectiveWidth(cells);
    if (width === 0) return this.insertEmpty(index);

    const copied: EngineCell[] = [];
    for (let col = 0; col < width; col += 1) {
      const cell = cells[col];
      copied.push(cell ? copyCell(cell) : blankCell());
    }
    const line: CapturedLine = Object.freeze({ width, cells: Object.freeze(copied) });
    this.lines.splice(this.clampIndex(index), 0, line);
    return line;
  }

  insertEmpty(index: number): CapturedLine {
    this.lines.splice(this.clampIndex(index), 0, EMPTY_LINE);
    return EMPTY_LINE;
  }

  private clampIndex(index: number): number {
    return Math.max(0, Math.min(this.lines.length, index));
  }

  line(index: number): CapturedLine | undefined {
    if (index < 0 || index >= this.lines.length) return undefined;
    return this.lines[index];
  }

  lineText(index: number): string | undefined {
    const line = this.line(index);
    return line ? capturedLineText(line) : undefined;
  }

  /** Cell at (`index`, `col`), or undefined past the stored rows or the row's width. */
  cellAt(index: number, col: number): EngineCell | undefined {
    const line = this.line(index);
    if (!line || col < 0 || col >= line.width) return undefined;
    return line.cells[col];
  }

  pop(): CapturedLine | undefined {
    return this.lines.pop();
  }

  clear(): void {
    this.lines = [];
  }

  [Symbol.iterator](): Iterator<CapturedLine> {
    return this.lines[Symbol.iterator]();
  }
}
