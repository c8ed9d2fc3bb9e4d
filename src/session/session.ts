import type { TerminalBackground } from '../config/index.js';
import { positionCursor, feedJobOutput, ScreenAdapter } from '../emulation/screen-adapter.js';
import { DirtyRows } from '../emulation/dirty-rows.js';
import { incMetric } from '../infra/diagnostics.js';
import { createLogger } from '../infra/logger.js';
import { sanitizeForLog } from '../infra/log-sanitizer.js';
import { translateInput, type HostInput } from '../input/key-translator.js';
import { hostPalette, type AttrTable } from '../render/cell-attr.js';
import { colorToHex } from '../render/color-index.js';
import type {
  EngineCell,
  EnginePos,
  HostDisplay,
  HostDocument,
  TerminalEngine,
  TerminalJob,
} from '../types/terminal-contract.js';
import { flushScreenToScrollback } from './scrollback-flush.js';
import { blankCell, ScrollbackStore } from './scrollback-store.js';
import { CachedText, computeStatusText } from './status-text.js';

const log = createLogger('session');

/**
 * - `live`: engine present, input goes to the job
 * - `frozen`: engine present, the screen was flushed to the document for browsing
 * - `finished`: engine gone, content lives in the document and the scrollback
 */
export type SessionState = 'live' | 'frozen' | 'finished';

export type SessionContext = {
  host: HostDisplay;
  attrs: AttrTable;
};

export type SessionInit = {
  document: HostDocument;
  command: string;
  rows: number;
  cols: number;
  rowsFixed: boolean;
  colsFixed: boolean;
  context: SessionContext;
};

export type ScrapedCell = {
  chars: string;
  width: 1 | 2;
  fg: string;
  bg: string;
  attr: number;
};

export type SessionCursor = EnginePos & { visible: boolean };

const LIGHT_FG = { red: 0, green: 0, blue: 0 };
const LIGHT_BG = { red: 255, green: 255, blue: 255 };

export class TerminalSession {
  readonly document: HostDocument;
  readonly command: string;

  rows: number;
  cols: number;
  rowsFixed: boolean;
  colsFixed: boolean;

  cursor: EnginePos = { row: 0, col: 0 };
  cursorVisible = true;
  readonly dirty = new DirtyRows();
  readonly scrollback = new ScrollbackStore();
  /** Rows the engine pushed into the scrollback since the job started. */
  scrolled = 0;
  /** Set while a negotiated size is being applied to the engine. */
  resizing = false;

  private engine: TerminalEngine | null = null;
  private job: TerminalJob | null = null;
  private mode: SessionState = 'live';
  private closed = false;
  private screenFlushed = false;
  private destroyed = false;
  private title: string | null = null;
  private readonly statusText = new CachedText();
  private readonly context: SessionContext;

  constructor(init: SessionInit) {
    this.document = init.document;
    this.command = init.command;
    this.rows = init.rows;
    this.cols = init.cols;
    this.rowsFixed = init.rowsFixed;
    this.colsFixed = init.colsFixed;
    this.context = init.context;
  }

  get host(): HostDisplay {
    return this.context.host;
  }

  get attrs(): AttrTable {
    return this.context.attrs;
  }

  get engineHandle(): TerminalEngine | null {
    return this.engine;
  }

  get jobHandle(): TerminalJob | null {
    return this.job;
  }

  get state(): SessionState {
    return this.mode;
  }

  get channelClosed(): boolean {
    return this.closed;
  }

  /** True while the visible screen has been copied into the document. */
  get flushed(): boolean {
    return this.screenFlushed;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  attachEngine(engine: TerminalEngine, background: TerminalBackground = 'dark'): void {
    this.engine = engine;
    engine.setCallbacks(new ScreenAdapter(this));
    if (background === 'light') {
      engine.setDefaultColors(LIGHT_FG, LIGHT_BG);
    }
    engine.reset(true);
    const size = engine.getSize();
    this.rows = size.rows;
    this.cols = size.cols;
  }

  attachJob(job: TerminalJob): void {
    this.job = job;
    this.statusText.invalidate();
  }

  isDisplayed(): boolean {
    return this.host.currentDocument() === this.document;
  }

  isJobRunning(): boolean {
    return this.job !== null && this.job.status() === 'running' && this.job.isChannelOpen();
  }

  // -------------------------------------------------------------------------
  // Job output and input
  // -------------------------------------------------------------------------

  writeJobOutput(text: string): void {
    if (this.destroyed) return;
    feedJobOutput(this, text);
    this.updateDisplayedCursor();
  }

  /** Translate one input event and send the result to the job. */
  sendInput(input: HostInput): string {
    const bytes = translateInput(this.engine, input);
    if (bytes.length > 0) this.sendToJob(bytes);
    return bytes;
  }

  /** Send every character of `text` as if it were typed. */
  sendText(text: string): string {
    let sent = '';
    for (const ch of text) {
      const codepoint = ch.codePointAt(0);
      if (codepoint === undefined) continue;
      sent += this.sendInput({ type: 'char', codepoint });
    }
    return sent;
  }

  /**
   * Send register contents to the job. Every line is followed by CR, except
   * the last line of a characterwise paste.
   */
  pasteLines(lines: readonly string[], linewise: boolean): boolean {
    if (!this.isJobRunning()) return false;
    let ok = true;
    lines.forEach((line, index) => {
      const chunk = linewise || index < lines.length - 1 ? `${line}\r` : line;
      if (chunk.length > 0 && !this.sendToJob(chunk)) ok = false;
    });
    return ok;
  }

  private sendToJob(bytes: string): boolean {
    if (this.job?.send(bytes)) return true;
    incMetric('job_send_failed');
    log.warn(`could not send ${bytes.length} bytes to '${sanitizeForLog(this.command)}'`);
    return false;
  }

  // -------------------------------------------------------------------------
  // Mode transitions
  // -------------------------------------------------------------------------

  /** Live → Frozen. Returns false when the session is not live. */
  enterFrozen(): boolean {
    if (this.mode !== 'live' || !this.engine) return false;
    if (!this.screenFlushed) {
      flushScreenToScrollback(this);
      this.screenFlushed = true;
    }
    this.mode = 'frozen';
    this.statusChanged();
    return true;
  }

  /** Frozen → Live, removing the rows the freeze added to the document. */
  resume(): boolean {
    if (this.mode !== 'frozen') return false;

    while (this.scrollback.length > this.scrolled) {
      this.scrollback.pop();
      this.document.deleteLine(this.document.lineCount() - 1);
    }
    this.screenFlushed = false;
    this.mode = 'live';

    if (this.engine) {
      this.cursor = this.engine.getCursorPos();
    }
    this.dirty.markAll();
    this.updateDisplayedCursor();
    this.statusChanged();
    return true;
  }

  handleJobEnded(): void {
    if (this.destroyed) return;
    this.title = null;
    this.statusChanged();
  }

  handleChannelClosed(): void {
    if (this.destroyed || this.closed) return;
    this.closed = true;
    this.title = null;
    if (this.mode !== 'finished') this.finish();
    this.statusChanged();
  }

  private finish(): void {
    const engine = this.engine;
    if (engine) {
      if (!this.screenFlushed) {
        flushScreenToScrollback(this);
        this.screenFlushed = true;
      }
      this.engine = null;
      engine.destroy();
    }
    this.mode = 'finished';
    log.debug(`document ${this.document.id} finished with ${this.scrollback.length} scrollback rows`);
  }

  /** Release everything. Kills the job if it is still running. */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;

    const job = this.job;
    this.job = null;
    if (job) {
      if (job.status() === 'running') job.stop('kill');
      job.release();
    }

    const engine = this.engine;
    this.engine = null;
    engine?.destroy();

    this.scrollback.clear();
    this.title = null;
    this.statusText.invalidate();
    this.mode = 'finished';
  }

  // -------------------------------------------------------------------------
  // Title and status
  // -------------------------------------------------------------------------

  getTitle(): string | null {
    return this.title;
  }

  setTitle(title: string | null): void {
    this.title = title;
    this.statusText.invalidate();
    if (this.isDisplayed()) this.host.refreshTitle();
  }

  getStatusText(): string {
    return this.statusText.get(() => computeStatusText({
      name: this.document.name,
      state: this.mode,
      jobRunning: this.isJobRunning(),
      title: this.title,
    }));
  }

  /** `running` or `finished`, with `,frozen` appended while frozen. */
  getStatus(): string {
    const status = this.isJobRunning() ? 'running' : 'finished';
    return this.mode === 'frozen' ? `${status},frozen` : status;
  }

  private statusChanged(): void {
    this.statusText.invalidate();
    this.host.scheduleRedraw(this.document);
    if (this.isDisplayed()) this.host.refreshTitle();
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  getSize(): { rows: number; cols: number } {
    return { rows: this.rows, cols: this.cols };
  }

  getCursor(): SessionCursor {
    return { row: this.cursor.row, col: this.cursor.col, visible: this.cursorVisible };
  }

  /**
   * Text of screen row `row` (default: the cursor row). Once the engine is
   * gone the row is read from the document, below the scrolled-off rows.
   */
  getLine(row: number = this.cursor.row): string | undefined {
    if (this.engine) {
      if (row < 0 || row >= this.rows) return undefined;
      return this.engine.getText({ startRow: row, endRow: row + 1, startCol: 0, endCol: this.cols });
    }
    const index = row + this.scrolled;
    if (row < 0 || index >= this.document.lineCount()) return undefined;
    return this.document.getLine(index);
  }

  /** Cells of screen row `row` with colors and attribute indices. */
  scrape(row: number = this.cursor.row): ScrapedCell[] {
    const palette = hostPalette(this.host);
    const cells: ScrapedCell[] = [];
    const add = (cell: EngineCell) => {
      cells.push({
        chars: cell.chars,
        width: cell.width,
        fg: colorToHex(cell.fg),
        bg: colorToHex(cell.bg),
        attr: this.attrs.cellIndex(cell, palette),
      });
    };

    const engine = this.engine;
    if (engine) {
      if (row < 0 || row >= this.rows) return cells;
      for (let col = 0; col < this.cols; ) {
        const cell = engine.getCell({ row, col }) ?? blankCell();
        add(cell);
        col += cell.width === 2 ? 2 : 1;
      }
      return cells;
    }

    const line = row < 0 ? undefined : this.scrollback.line(row + this.scrolled);
    if (!line) return cells;
    for (let col = 0; col < line.width; ) {
      const cell = line.cells[col];
      add(cell);
      col += cell.width === 2 ? 2 : 1;
    }
    return cells;
  }

  private updateDisplayedCursor(): void {
    if (this.mode !== 'live' || !this.isDisplayed()) return;
    for (const window of this.host.windowsShowing(this.document)) {
      positionCursor(window, this.cursor);
    }
    this.host.setCursorVisible(this.cursorVisible);
  }
}
