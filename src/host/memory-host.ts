/**
 * Headless host: documents are string arrays, windows keep the rows drawn
 * into them, and redraw requests queue until drained.
 */

import type { TerminalConfig } from '../config/index.js';
import type { RowRange } from '../emulation/dirty-rows.js';
import type {
  ColorCapability,
  HostDisplay,
  HostDocument,
  HostScreenCell,
  HostWindow,
  StandardColor,
} from '../types/terminal-contract.js';

const ANSI_INDEX: Record<StandardColor, number> = {
  'black': 0,
  'dark-red': 1,
  'dark-green': 2,
  'dark-yellow': 3,
  'dark-blue': 4,
  'dark-magenta': 5,
  'dark-cyan': 6,
  'light-grey': 7,
  'dark-grey': 8,
  'light-red': 9,
  'light-green': 10,
  'yellow': 11,
  'light-blue': 12,
  'light-magenta': 13,
  'light-cyan': 14,
  'white': 15,
};

export class MemoryDocument implements HostDocument {
  private lines: string[] = [''];
  readonly dirtyRanges: RowRange[] = [];

  constructor(
    readonly id: number,
    readonly name: string,
  ) {}

  lineCount(): number {
    return this.lines.length;
  }

  getLine(index: number): string {
    return this.lines[index] ?? '';
  }

  appendLine(after: number, text: string): void {
    const at = Math.max(0, Math.min(this.lines.length, after));
    this.lines.splice(at, 0, text);
  }

  deleteLine(index: number): void {
    if (index < 0 || index >= this.lines.length) return;
    this.lines.splice(index, 1);
    if (this.lines.length === 0) this.lines.push('');
  }

  markDirty(startRow: number, endRow: number): void {
    this.dirtyRanges.push({ start: startRow, end: endRow });
  }

  text(): string[] {
    return [...this.lines];
  }
}

export type WindowGeometry = {
  top: number;
  left: number;
  height: number;
  width: number;
};

export class MemoryWindow implements HostWindow {
  private geometry: WindowGeometry;
  private rows: HostScreenCell[][] = [];
  viewCursor = { row: 0, col: 0 };
  documentCursor = { line: 0, col: 0 };
  invalidated = false;

  constructor(
    readonly document: MemoryDocument,
    geometry: WindowGeometry,
  ) {
    this.geometry = { ...geometry };
  }

  get top(): number {
    return this.geometry.top;
  }

  get left(): number {
    return this.geometry.left;
  }

  get height(): number {
    return this.geometry.height;
  }

  get width(): number {
    return this.geometry.width;
  }

  setSize(rows: number, cols: number): void {
    this.geometry.height = Math.max(1, rows);
    this.geometry.width = Math.max(1, cols);
  }

  setViewCursor(row: number, col: number): void {
    this.viewCursor = { row, col };
  }

  setDocumentCursor(line: number, col: number): void {
    this.documentCursor = { line, col };
  }

  invalidate(): void {
    this.invalidated = true;
  }

  drawRow(row: number, cells: readonly HostScreenCell[]): void {
    this.rows[row] = [...cells];
  }

  cells(row: number): readonly HostScreenCell[] {
    return this.rows[row] ?? [];
  }

  /** Characters drawn on `row`; right halves of wide characters add nothing. */
  rowText(row: number): string {
    return this.cells(row).map((cell) => cell.char).join('');
  }
}

export type MemoryHostOptions = {
  height?: number;
  width?: number;
  colors?: number;
  trueColor?: boolean;
};

export class MemoryHost implements HostDisplay {
  private documents = new Map<number, MemoryDocument>();
  private windows: MemoryWindow[] = [];
  private current: MemoryDocument | undefined;
  private pendingRedraws = new Set<HostDocument>();
  private nextId = 1;
  private readonly defaultHeight: number;
  private readonly defaultWidth: number;
  private capability: ColorCapability;

  cursorVisible = true;
  titleRefreshes = 0;
  /** When set, the next createDocument fails as if no window could be split. */
  failNextCreate = false;

  constructor(options: MemoryHostOptions = {}) {
    this.defaultHeight = options.height ?? 24;
    this.defaultWidth = options.width ?? 80;
    this.capability = { trueColor: options.trueColor ?? false, colors: options.colors ?? 256 };
  }

  createDocument(name: string): { document: MemoryDocument; window: MemoryWindow } | null {
    if (this.failNextCreate) {
      this.failNextCreate = false;
      return null;
    }
    const document = new MemoryDocument(this.nextId, name);
    this.nextId += 1;
    this.documents.set(document.id, document);
    const window = this.openWindow(document);
    this.current = document;
    return { document, window };
  }

  openWindow(document: MemoryDocument, geometry: Partial<WindowGeometry> = {}): MemoryWindow {
    const window = new MemoryWindow(document, {
      top: geometry.top ?? 0,
      left: geometry.left ?? 0,
      height: geometry.height ?? this.defaultHeight,
      width: geometry.width ?? this.defaultWidth,
    });
    this.windows.push(window);
    return window;
  }

  closeWindow(window: MemoryWindow): void {
    this.windows = this.windows.filter((w) => w !== window);
  }

  document(id: number): MemoryDocument | undefined {
    return this.documents.get(id);
  }

  findDocumentByName(name: string): MemoryDocument | undefined {
    for (const document of this.documents.values()) {
      if (document.name === name) return document;
    }
    return undefined;
  }

  discardDocument(document: HostDocument): void {
    this.documents.delete(document.id);
    this.windows = this.windows.filter((w) => w.document.id !== document.id);
    this.pendingRedraws.delete(document);
    if (this.current?.id === document.id) this.current = undefined;
  }

  windowsShowing(document: HostDocument): MemoryWindow[] {
    return this.windows.filter((w) => w.document.id === document.id);
  }

  currentDocument(): MemoryDocument | undefined {
    return this.current;
  }

  setCurrent(document: MemoryDocument | undefined): void {
    this.current = document;
  }

  setCursorVisible(visible: boolean): void {
    this.cursorVisible = visible;
  }

  refreshTitle(): void {
    this.titleRefreshes += 1;
  }

  scheduleRedraw(document: HostDocument): void {
    this.pendingRedraws.add(document);
  }

  /** Documents with a pending redraw request, in request order; clears them. */
  drainRedraws(): HostDocument[] {
    const pending = [...this.pendingRedraws];
    this.pendingRedraws.clear();
    return pending;
  }

  setColorCapability(capability: ColorCapability): void {
    this.capability = { ...capability };
  }

  colorCapability(): ColorCapability {
    return this.capability;
  }

  paletteIndex(color: StandardColor, _foreground: boolean): number {
    const index = ANSI_INDEX[color];
    return this.capability.colors >= 16 ? index : index % 8;
  }
}

/** A memory host with the color capability of `config`; `options` win. */
export function createMemoryHost(
  config: Pick<TerminalConfig, 'colors' | 'trueColor'>,
  options: MemoryHostOptions = {},
): MemoryHost {
  return new MemoryHost({ colors: config.colors, trueColor: config.trueColor, ...options });
}
