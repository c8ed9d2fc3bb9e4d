import { positionCursor } from '../emulation/screen-adapter.js';
import { createLogger } from '../infra/logger.js';
import type { TerminalSession } from '../session/session.js';
import type { HostWindow, TerminalSize } from '../types/terminal-contract.js';

const log = createLogger('resize');

export type SizeConstraints = {
  rows: number;
  cols: number;
  rowsFixed: boolean;
  colsFixed: boolean;
};

export type Viewport = {
  height: number;
  width: number;
};

/**
 * Smallest viewport among `observers`, never below 1x1. Pinned dimensions
 * keep their current value; with no observers the size is unchanged.
 */
export function negotiateSize(current: SizeConstraints, observers: Iterable<Viewport>): TerminalSize {
  let rows = Number.POSITIVE_INFINITY;
  let cols = Number.POSITIVE_INFINITY;
  for (const observer of observers) {
    rows = Math.min(rows, observer.height);
    cols = Math.min(cols, observer.width);
  }
  return {
    rows: current.rowsFixed || rows === Number.POSITIVE_INFINITY ? current.rows : Math.max(1, rows),
    cols: current.colsFixed || cols === Number.POSITIVE_INFINITY ? current.cols : Math.max(1, cols),
  };
}

/** True when `window` disagrees with a dimension that follows the windows. */
export function needsResize(current: SizeConstraints, window: Viewport): boolean {
  return (!current.rowsFixed && current.rows !== window.height)
    || (!current.colsFixed && current.cols !== window.width);
}

/**
 * Resize the session's engine after `trigger` changed geometry. Reports the
 * new size to the job and repositions the cursor on every observer. Returns
 * true when the size changed.
 */
export function applyNegotiatedSize(session: TerminalSession, trigger: HostWindow): boolean {
  const engine = session.engineHandle;
  if (!engine || !needsResize(session, trigger)) return false;

  const observers = [...session.host.windowsShowing(session.document)];
  const target = negotiateSize(session, observers.length > 0 ? observers : [trigger]);
  if (target.rows === session.rows && target.cols === session.cols) return false;

  session.resizing = true;
  try {
    engine.setSize(target.rows, target.cols);
  } finally {
    session.resizing = false;
  }
  const size = engine.getSize();
  session.rows = size.rows;
  session.cols = size.cols;
  session.jobHandle?.reportWinSize(size.rows, size.cols);
  log.debug(`document ${session.document.id} resized to ${size.rows}x${size.cols}`);

  session.cursor = engine.getCursorPos();
  for (const window of observers) {
    positionCursor(window, session.cursor);
  }
  session.dirty.markAll();
  return true;
}
