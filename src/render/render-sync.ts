/**
 * Projects a session onto host windows.
 *
 * A live session is drawn from its engine, row by row, into the window's row
 * buffers. A frozen or finished session is drawn by the host from its
 * document; this module then only answers attribute lookups from the
 * scrollback.
 */

import { positionCursor } from '../emulation/screen-adapter.js';
import type { RowRange } from '../emulation/dirty-rows.js';
import type { TerminalSession } from '../session/session.js';
import { blankCell } from '../session/scrollback-store.js';
import type { HostScreenCell, HostWindow } from '../types/terminal-contract.js';
import { hostPalette, type ColorPalette } from './cell-attr.js';
import { applyNegotiatedSize } from './resize-negotiator.js';

function drawRow(session: TerminalSession, window: HostWindow, row: number, palette: ColorPalette): void {
  const cells: HostScreenCell[] = [];
  const engine = session.engineHandle;
  if (engine && row < session.rows) {
    const maxCol = Math.min(window.width, session.cols);
    for (let col = 0; col < maxCol; ) {
      const cell = engine.getCell({ row, col }) ?? blankCell();
      const attr = session.attrs.cellIndex(cell, palette);
      cells.push({ char: cell.chars.length > 0 ? cell.chars : ' ', attr });
      col += 1;
      if (cell.width === 2 && col < maxCol) {
        cells.push({ char: '', attr });
        col += 1;
      }
    }
  }
  window.drawRow(row, cells);
}

/**
 * Draw the rows of `range` (all rows when omitted) that fall inside the
 * window. Rows below the emulated screen are drawn empty. Returns false when
 * the session has no live screen to draw.
 */
export function updateWindow(session: TerminalSession, window: HostWindow, range?: RowRange | null): boolean {
  const engine = session.engineHandle;
  if (!engine || session.state !== 'live') return false;

  const resized = applyNegotiatedSize(session, window);
  const start = resized || !range ? 0 : Math.max(0, range.start);
  const end = resized || !range ? window.height : Math.min(window.height, range.end);

  positionCursor(window, engine.getCursorPos());
  const palette = hostPalette(session.host);
  for (let row = start; row < end; row += 1) {
    drawRow(session, window, row, palette);
  }
  return true;
}

/**
 * Redraw the pending dirty rows on every window showing the session, then
 * clear them. Returns the number of windows drawn.
 */
export function redrawSession(session: TerminalSession): number {
  const range = session.dirty.range();
  if (!range) return 0;
  let drawn = 0;
  for (const window of [...session.host.windowsShowing(session.document)]) {
    if (updateWindow(session, window, session.dirty.range() ?? range)) drawn += 1;
  }
  session.dirty.take();
  return drawn;
}

/**
 * Attribute index for document position (`line`, `col`) of a frozen or
 * finished session; 0 past the stored rows or the row's width.
 */
export function getAttr(session: TerminalSession, line: number, col: number): number {
  const cell = session.scrollback.cellAt(line, col);
  if (!cell) return 0;
  return session.attrs.cellIndex(cell, hostPalette(session.host));
}

/**
 * Called before the host edits the document of a session. A finished
 * session's scrollback no longer lines up with the text, so it is dropped.
 */
export function changeInDocument(session: TerminalSession): boolean {
  if (session.state !== 'finished' || session.scrollback.length === 0) return false;
  session.scrollback.clear();
  session.host.scheduleRedraw(session.document);
  return true;
}
