/**
 * Contracts for the collaborators a terminal session talks to.
 *
 * The emulation engine, the job/channel subsystem and the host display are
 * all provided from outside; the session core only ever sees these shapes.
 */

// ---------------------------------------------------------------------------
// Emulation engine
// ---------------------------------------------------------------------------

export type EngineColor = {
  red: number;
  green: number;
  blue: number;
};

export type EngineCellAttrs = {
  bold: boolean;
  underline: boolean;
  italic: boolean;
  strike: boolean;
  reverse: boolean;
};

export type EngineCell = {
  /** One or more code points; empty string for a cell that was never written. */
  chars: string;
  width: 1 | 2;
  fg: EngineColor;
  bg: EngineColor;
  attrs: EngineCellAttrs;
};

export type EnginePos = {
  row: number;
  col: number;
};

/** Half-open on both axes: rows [startRow, endRow), cols [startCol, endCol). */
export type EngineRect = {
  startRow: number;
  endRow: number;
  startCol: number;
  endCol: number;
};

export type EngineProp =
  | { kind: 'title'; value: string }
  | { kind: 'cursor-visible'; value: boolean }
  | { kind: 'other'; name: string };

export const KeyModifier = {
  NONE: 0,
  SHIFT: 1,
  ALT: 2,
  CTRL: 4,
} as const;

export type KeyModifierMask = number;

export type EngineKey =
  | 'enter'
  | 'tab'
  | 'backspace'
  | 'escape'
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'ins'
  | 'del'
  | 'home'
  | 'end'
  | 'pageup'
  | 'pagedown'
  | `f${number}`
  | `kp-${number}`
  | 'kp-mult'
  | 'kp-plus'
  | 'kp-comma'
  | 'kp-minus'
  | 'kp-period'
  | 'kp-divide'
  | 'kp-enter'
  | 'kp-equal';

export interface EngineCallbacks {
  damage(rect: EngineRect): void;
  moveRect(dest: EngineRect, src: EngineRect): void;
  moveCursor(pos: EnginePos, oldPos: EnginePos, visible: boolean): void;
  setTermProp(prop: EngineProp): void;
  resize(rows: number, cols: number): void;
  pushLine(cells: readonly EngineCell[]): void;
  popLine(): boolean;
}

export interface TerminalEngine {
  setCallbacks(callbacks: EngineCallbacks): void;
  /** Feed decoded job output. Callbacks fire synchronously while parsing. */
  write(text: string): void;
  /** Emit pending damage callbacks now. */
  flushDamage(): void;
  getSize(): { rows: number; cols: number };
  setSize(rows: number, cols: number): void;
  getCursorPos(): EnginePos;
  /** Returns null for positions outside the screen. */
  getCell(pos: EnginePos): EngineCell | null;
  getText(rect: EngineRect): string;
  keyboardKey(key: EngineKey, mod: KeyModifierMask): void;
  keyboardUnichar(codepoint: number, mod: KeyModifierMask): void;
  mouseMove(row: number, col: number, mod: KeyModifierMask): void;
  mouseButton(button: number, pressed: boolean, mod: KeyModifierMask): void;
  startPaste(): void;
  endPaste(): void;
  /** Drain the bytes the keyboard/mouse encoders produced. */
  readOutput(): string;
  setDefaultColors(fg: EngineColor, bg: EngineColor): void;
  reset(hard: boolean): void;
  destroy(): void;
}

export type EngineFactory = (rows: number, cols: number) => TerminalEngine;

// ---------------------------------------------------------------------------
// Job / channel
// ---------------------------------------------------------------------------

export type JobStatus = 'not-started' | 'running' | 'ended' | 'failed';

export type JobSignal = 'kill' | 'term' | 'winch';

export type TerminalSize = {
  rows: number;
  cols: number;
};

export interface TerminalJob {
  status(): JobStatus;
  isChannelOpen(): boolean;
  /** Queue input for the child process; false when it could not be queued. */
  send(text: string): boolean;
  stop(signal: JobSignal): boolean;
  reportWinSize(rows: number, cols: number): void;
  /** Drop this holder's reference; the job may outlive it. */
  release(): void;
}

export type JobHandlers = {
  onOutput(chunk: string): void;
  onExit(): void;
  onClose(): void;
};

export interface JobLauncher {
  /** Throws, or returns a job in `failed` status, when the process cannot start. */
  start(command: string, size: TerminalSize, handlers: JobHandlers): TerminalJob;
}

// ---------------------------------------------------------------------------
// Host document / window / display
// ---------------------------------------------------------------------------

export type HostScreenCell = {
  /** Empty string marks the right half of a double-width character. */
  char: string;
  attr: number;
};

export interface HostDocument {
  readonly id: number;
  readonly name: string;
  lineCount(): number;
  getLine(index: number): string;
  /** Insert `text` so that it becomes line number `after` (0-based). */
  appendLine(after: number, text: string): void;
  /** Deleting the only line leaves a single empty placeholder line. */
  deleteLine(index: number): void;
  markDirty(startRow: number, endRow: number): void;
}

export interface HostWindow {
  readonly document: HostDocument;
  readonly top: number;
  readonly left: number;
  readonly height: number;
  readonly width: number;
  setSize(rows: number, cols: number): void;
  /** Place the cursor inside the window's screen area. */
  setViewCursor(row: number, col: number): void;
  /** Move the document cursor used when the window shows document text. */
  setDocumentCursor(line: number, col: number): void;
  invalidate(): void;
  drawRow(row: number, cells: readonly HostScreenCell[]): void;
}

/** Named colors of the default engine palette, as the host knows them. */
export type StandardColor =
  | 'black'
  | 'dark-blue'
  | 'dark-green'
  | 'dark-cyan'
  | 'dark-red'
  | 'dark-magenta'
  | 'dark-yellow'
  | 'light-grey'
  | 'dark-grey'
  | 'light-blue'
  | 'light-green'
  | 'light-cyan'
  | 'light-red'
  | 'light-magenta'
  | 'yellow'
  | 'white';

export type ColorCapability = {
  trueColor: boolean;
  colors: number;
};

export interface HostDisplay {
  /** Open a new window on a new document; null when no window could be made. */
  createDocument(name: string): { document: HostDocument; window: HostWindow } | null;
  findDocumentByName(name: string): HostDocument | undefined;
  discardDocument(document: HostDocument): void;
  windowsShowing(document: HostDocument): Iterable<HostWindow>;
  currentDocument(): HostDocument | undefined;
  setCursorVisible(visible: boolean): void;
  refreshTitle(): void;
  scheduleRedraw(document: HostDocument): void;
  colorCapability(): ColorCapability;
  /** Palette number (0-based) the host uses for a standard color. */
  paletteIndex(color: StandardColor, foreground: boolean): number;
}
