/**
 * Scripted emulation engine for tests.
 *
 * Understands printable text, CR, LF, BS, scrolling (with push-line), SGR
 * bold / 31 / 0, `ESC [ ? 25 h|l` and `ESC ] 0 ; title BEL`. Damage is batched
 * until flushDamage(), like a real engine.
 */

import {
  KeyModifier,
  type EngineCallbacks,
  type EngineCell,
  type EngineColor,
  type EngineFactory,
  type EngineKey,
  type EnginePos,
  type EngineRect,
  type KeyModifierMask,
  type TerminalEngine,
} from '../../src/types/terminal-contract.js';

export const DEFAULT_FG: EngineColor = { red: 240, green: 240, blue: 240 };
export const DEFAULT_BG: EngineColor = { red: 0, green: 0, blue: 0 };
export const RED: EngineColor = { red: 224, green: 0, blue: 0 };

type Pen = Pick<EngineCell, 'fg' | 'bg' | 'attrs'>;

function plainPen(): Pen {
  return {
    fg: { ...DEFAULT_FG },
    bg: { ...DEFAULT_BG },
    attrs: { bold: false, underline: false, italic: false, strike: false, reverse: false },
  };
}

function emptyCell(): EngineCell {
  return { chars: '', width: 1, ...plainPen() };
}

function blankRow(cols: number): EngineCell[] {
  return Array.from({ length: cols }, () => emptyCell());
}

function isWide(ch: string): boolean {
  return /[\u1100-\u115f\u2e80-\ua4cf\uac00-\ud7a3\uf900-\ufaff\uff00-\uff60]/u.test(ch);
}

const FUNCTION_KEY_CODES: Record<number, number> = {
  5: 15, 6: 17, 7: 18, 8: 19, 9: 20, 10: 21, 11: 23, 12: 24,
};

const KEYPAD_CHARS: Record<string, string> = {
  'kp-plus': '+',
  'kp-minus': '-',
  'kp-mult': '*',
  'kp-divide': '/',
  'kp-period': '.',
  'kp-comma': ',',
  'kp-enter': '\r',
  'kp-equal': '=',
};

export class FakeEngine implements TerminalEngine {
  rows: number;
  cols: number;
  grid: EngineCell[][];
  cursor: EnginePos = { row: 0, col: 0 };
  cursorVisible = true;
  callbacks: EngineCallbacks | null = null;
  readonly writes: string[] = [];
  readonly resets: boolean[] = [];
  defaultColors: { fg: EngineColor; bg: EngineColor } | null = null;
  destroyed = false;

  private output = '';
  private pen: Pen = plainPen();
  private damageStart = Number.POSITIVE_INFINITY;
  private damageEnd = -1;
  private mouse = { row: 0, col: 0 };

  constructor(rows: number, cols: number) {
    this.rows = rows;
    this.cols = cols;
    this.grid = Array.from({ length: rows }, () => blankRow(cols));
  }

  setCallbacks(callbacks: EngineCallbacks): void {
    this.callbacks = callbacks;
  }

  write(text: string): void {
    this.writes.push(text);
    const oldPos = this.getCursorPos();
    const chars = [...text];

    for (let i = 0; i < chars.length; i += 1) {
      const ch = chars[i];
      if (ch === '\x1b') {
        i = this.escape(chars, i);
      } else if (ch === '\r') {
        this.cursor.col = 0;
      } else if (ch === '\n') {
        this.lineFeed();
      } else if (ch === '\b') {
        this.cursor.col = Math.max(0, Math.min(this.cursor.col, this.cols - 1) - 1);
      } else if (ch >= ' ') {
        this.put(ch);
      }
    }

    const newPos = this.getCursorPos();
    if (newPos.row !== oldPos.row || newPos.col !== oldPos.col) {
      this.callbacks?.moveCursor(newPos, oldPos, this.cursorVisible);
    }
  }

  flushDamage(): void {
    if (this.damageEnd < 0) return;
    const rect: EngineRect = { startRow: this.damageStart, endRow: this.damageEnd, startCol: 0, endCol: this.cols };
    this.damageStart = Number.POSITIVE_INFINITY;
    this.damageEnd = -1;
    this.callbacks?.damage(rect);
  }

  getSize(): { rows: number; cols: number } {
    return { rows: this.rows, cols: this.cols };
  }

  setSize(rows: number, cols: number): void {
    const grid: EngineCell[][] = [];
    for (let row = 0; row < rows; row += 1) {
      const old = this.grid[row] ?? [];
      grid.push(Array.from({ length: cols }, (_, col) => old[col] ?? emptyCell()));
    }
    this.grid = grid;
    this.rows = rows;
    this.cols = cols;
    this.cursor = {
      row: Math.min(this.cursor.row, rows - 1),
      col: Math.min(this.cursor.col, cols - 1),
    };
    this.callbacks?.resize(rows, cols);
  }

  getCursorPos(): EnginePos {
    return { row: this.cursor.row, col: Math.min(this.cursor.col, this.cols - 1) };
  }

  getCell(pos: EnginePos): EngineCell | null {
    if (pos.row < 0 || pos.row >= this.rows || pos.col < 0 || pos.col >= this.cols) return null;
    return this.grid[pos.row][pos.col];
  }

  getText(rect: EngineRect): string {
    const lines: string[] = [];
    for (let row = rect.startRow; row < rect.endRow; row += 1) {
      let text = '';
      for (let col = rect.startCol; col < rect.endCol; col += 1) {
        const cell = this.grid[row][col];
        text += cell.chars.length > 0 ? cell.chars : ' ';
        if (cell.width === 2) col += 1;
      }
      lines.push(text);
    }
    return lines.join('\n');
  }

  keyboardKey(key: EngineKey, mod: KeyModifierMask): void {
    const arrows: Record<string, string> = { up: 'A', down: 'B', right: 'C', left: 'D' };
    const fixed: Record<string, string> = {
      enter: '\r', tab: '\t', backspace: '\x7f', escape: '\x1b',
      home: '\x1b[H', end: '\x1b[F', ins: '\x1b[2~', del: '\x1b[3~',
      pageup: '\x1b[5~', pagedown: '\x1b[6~',
    };

    const arrow = arrows[key];
    if (arrow !== undefined) {
      this.output += mod === KeyModifier.NONE ? `\x1b[${arrow}` : `\x1b[1;${mod + 1}${arrow}`;
      return;
    }
    const text = fixed[key] ?? KEYPAD_CHARS[key];
    if (text !== undefined) {
      this.output += text;
      return;
    }
    const fn = /^f(\d+)$/.exec(key);
    if (fn) {
      const n = Number(fn[1]);
      if (n <= 4) this.output += `\x1bO${'PQRS'[n - 1]}`;
      else if (FUNCTION_KEY_CODES[n] !== undefined) this.output += `\x1b[${FUNCTION_KEY_CODES[n]}~`;
      return;
    }
    const kp = /^kp-(\d)$/.exec(key);
    if (kp) this.output += kp[1];
  }

  keyboardUnichar(codepoint: number, mod: KeyModifierMask): void {
    let text = String.fromCodePoint(codepoint);
    if ((mod & KeyModifier.CTRL) !== 0 && /^[a-zA-Z]$/.test(text)) {
      text = String.fromCharCode(text.toUpperCase().charCodeAt(0) & 0x1f);
    }
    if ((mod & KeyModifier.ALT) !== 0) {
      text = `\x1b${text}`;
    }
    this.output += text;
  }

  mouseMove(row: number, col: number, _mod: KeyModifierMask): void {
    this.mouse = { row, col };
  }

  mouseButton(button: number, pressed: boolean, _mod: KeyModifierMask): void {
    const code = button === 4 ? 64 : button === 5 ? 65 : button - 1;
    this.output += `\x1b[<${code};${this.mouse.col + 1};${this.mouse.row + 1}${pressed ? 'M' : 'm'}`;
  }

  startPaste(): void {
    this.output += '\x1b[200~';
  }

  endPaste(): void {
    this.output += '\x1b[201~';
  }

  readOutput(): string {
    const out = this.output;
    this.output = '';
    return out;
  }

  setDefaultColors(fg: EngineColor, bg: EngineColor): void {
    this.defaultColors = { fg, bg };
  }

  reset(hard: boolean): void {
    this.resets.push(hard);
  }

  destroy(): void {
    this.destroyed = true;
  }

  /** Row text as the engine sees it, empty cells as spaces. */
  rowText(row: number): string {
    return this.getText({ startRow: row, endRow: row + 1, startCol: 0, endCol: this.cols });
  }

  private damage(startRow: number, endRow: number): void {
    this.damageStart = Math.min(this.damageStart, startRow);
    this.damageEnd = Math.max(this.damageEnd, endRow);
  }

  private put(ch: string): void {
    const width = isWide(ch) ? 2 : 1;
    if (this.cursor.col + width > this.cols) {
      this.cursor.col = 0;
      this.lineFeed();
    }
    const { row, col } = this.cursor;
    this.grid[row][col] = {
      chars: ch,
      width,
      fg: { ...this.pen.fg },
      bg: { ...this.pen.bg },
      attrs: { ...this.pen.attrs },
    };
    if (width === 2 && col + 1 < this.cols) {
      this.grid[row][col + 1] = emptyCell();
    }
    this.damage(row, row + 1);
    this.cursor.col += width;
  }

  private lineFeed(): void {
    if (this.cursor.row < this.rows - 1) {
      this.cursor.row += 1;
      return;
    }
    const evicted = this.grid.shift() ?? blankRow(this.cols);
    this.callbacks?.pushLine(evicted);
    this.grid.push(blankRow(this.cols));
    this.callbacks?.moveRect(
      { startRow: 0, endRow: this.rows - 1, startCol: 0, endCol: this.cols },
      { startRow: 1, endRow: this.rows, startCol: 0, endCol: this.cols },
    );
    this.damage(this.rows - 1, this.rows);
  }

  private escape(chars: string[], start: number): number {
    const kind = chars[start + 1];
    if (kind === ']') {
      let end = start + 2;
      while (end < chars.length && chars[end] !== '\x07') end += 1;
      const body = chars.slice(start + 2, end).join('');
      const sep = body.indexOf(';');
      if (sep >= 0) {
        this.callbacks?.setTermProp({ kind: 'title', value: body.slice(sep + 1) });
      }
      return end;
    }
    if (kind !== '[') return start;

    let end = start + 2;
    while (end < chars.length && !/[A-Za-z]/.test(chars[end])) end += 1;
    const params = chars.slice(start + 2, end).join('');
    const final = chars[end];
    if (final === 'm') this.sgr(params);
    if ((final === 'h' || final === 'l') && params === '?25') {
      this.cursorVisible = final === 'h';
      this.callbacks?.setTermProp({ kind: 'cursor-visible', value: this.cursorVisible });
    }
    return end;
  }

  private sgr(params: string): void {
    for (const param of params.split(';')) {
      if (param === '' || param === '0') this.pen = plainPen();
      else if (param === '1') this.pen.attrs.bold = true;
      else if (param === '4') this.pen.attrs.underline = true;
      else if (param === '31') this.pen.fg = { ...RED };
    }
  }
}

export function createEngineFactory(): { factory: EngineFactory; engines: FakeEngine[] } {
  const engines: FakeEngine[] = [];
  return {
    engines,
    factory: (rows, cols) => {
      const engine = new FakeEngine(rows, cols);
      engines.push(engine);
      return engine;
    },
  };
}
